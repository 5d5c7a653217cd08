import { describe, it, expect, vi } from 'vitest';
import { normalizeOptionalArgs, resolveDriverConfig } from '@/lib/config';
import { applyOptionTransforms } from '@/lib/config/transformer';
import { ConfigError } from '@/lib/errors';

vi.mock('@/lib/logger', () => ({
    logger: {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn()
    }
}));

describe('applyOptionTransforms', () => {
    it('renames snake_case keys without touching the input', () => {
        const raw = { canonical_int: true, dest_file_system: 'flash:', port: 2222 };
        const options = applyOptionTransforms(raw);

        expect(options).toEqual({ canonicalInt: true, destFileSystem: 'flash:', port: 2222 });
        expect(raw).toEqual({ canonical_int: true, dest_file_system: 'flash:', port: 2222 });
    });

    it('prefers the camelCase spelling when both are present', () => {
        expect(applyOptionTransforms({ use_keys: false, useKeys: true })).toEqual({ useKeys: true });
    });

    it('converts numeric strings', () => {
        expect(applyOptionTransforms({ port: '2222', global_delay_factor: '2', keepalive: 'soon' })).toEqual({
            port: 2222,
            globalDelayFactor: 2,
            keepalive: 'soon',
        });
    });
});

describe('normalizeOptionalArgs', () => {
    it('keeps typed values and drops unknown keys', () => {
        expect(normalizeOptionalArgs({ transport: 'telnet', secret: 'test-secret', strict_commands: false, bogus: 1 })).toEqual({
            transport: 'telnet',
            secret: 'test-secret',
            strictCommands: false,
        });
    });

    it('skips null values', () => {
        expect(normalizeOptionalArgs({ keyFile: null })).toEqual({});
    });

    it('rejects values of the wrong type', () => {
        expect(() => normalizeOptionalArgs({ transport: 'serial' })).toThrow(ConfigError);
        expect(() => normalizeOptionalArgs({ canonicalInt: 'yes' })).toThrow('canonicalInt must be a boolean');
        expect(() => normalizeOptionalArgs({ keepalive: 'soon' })).toThrow('keepalive must be a number');
        expect(() => normalizeOptionalArgs({ secret: 42 })).toThrow('secret must be a string');
    });
});

describe('resolveDriverConfig', () => {
    it('fills in defaults for ssh', () => {
        const config = resolveDriverConfig('sw1', 'admin', 'test-password');

        expect(config).toMatchObject({
            hostname: 'sw1',
            transport: 'ssh',
            candidateCfg: 'candidate_config.txt',
            mergeCfg: 'merge_config.txt',
            rollbackCfg: 'rollback_config.txt',
            inlineTransfer: false,
            destFileSystem: undefined,
            autoRollbackOnError: true,
            autoFilePrompt: true,
            canonicalInt: false,
            strictCommands: true,
        });
        expect(config.connection).toMatchObject({
            kind: 'ssh',
            host: 'sw1',
            port: 22,
            timeout: 60,
            secret: '',
            keepalive: 30,
            globalDelayFactor: 1,
            useKeys: false,
            sshStrict: false,
            allowAgent: false,
        });
    });

    it('forces inline transfer and port 23 for telnet', () => {
        const config = resolveDriverConfig('sw1', 'admin', 'test-password', 10, { transport: 'telnet', inlineTransfer: false });

        expect(config.inlineTransfer).toBe(true);
        expect(config.connection.port).toBe(23);
        expect(config.connection.timeout).toBe(10);
    });

    it('keeps an explicit port', () => {
        expect(resolveDriverConfig('sw1', 'admin', 'test-password', 60, { port: 2222 }).connection.port).toBe(2222);
    });

    it('rejects invalid values', () => {
        expect(() => resolveDriverConfig('', 'admin', 'test-password')).toThrow('hostname is required');
        expect(() => resolveDriverConfig('sw1', 'admin', 'test-password', 60, { port: 70000 })).toThrow('Invalid port 70000');
        expect(() => resolveDriverConfig('sw1', 'admin', 'test-password', 0)).toThrow('Invalid timeout 0');
        expect(() => resolveDriverConfig('sw1', 'admin', 'test-password', 60, { globalDelayFactor: -1 })).toThrow(ConfigError);
    });
});
