import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { loadInventory, parseInventory } from '@/lib/inventory';
import { ConfigError } from '@/lib/errors';

vi.mock('@/lib/logger', () => ({
    logger: {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn()
    }
}));

const INVENTORY = `
devices:
  - name: access-1
    hostname: 10.0.0.11
    username: admin
    password: test-password
    timeout: 30
    optional_args:
      secret: test-secret
      canonical_int: true
  - hostname: 10.0.0.12
    username: admin
    optionalArgs:
      transport: telnet
      port: "2323"
`;

describe('parseInventory', () => {
    it('reads devices with defaults and normalized options', () => {
        expect(parseInventory(INVENTORY)).toEqual([
            {
                name: 'access-1',
                hostname: '10.0.0.11',
                username: 'admin',
                password: 'test-password',
                timeout: 30,
                optionalArgs: { secret: 'test-secret', canonicalInt: true },
            },
            {
                name: '10.0.0.12',
                hostname: '10.0.0.12',
                username: 'admin',
                password: '',
                timeout: 60,
                optionalArgs: { transport: 'telnet', port: 2323 },
            },
        ]);
    });

    it('accepts JSON', () => {
        const devices = parseInventory('{"devices": [{"hostname": "sw1", "username": "admin"}]}');
        expect(devices.map(d => d.name)).toEqual(['sw1']);
    });

    it('rejects malformed inventories', () => {
        expect(() => parseInventory('devices: [')).toThrow(ConfigError);
        expect(() => parseInventory('hosts: []')).toThrow('Inventory must contain a "devices" list');
        expect(() => parseInventory('devices:\n  - hostname: sw1\n')).toThrow('devices[0].username must be a non-empty string');
        expect(() => parseInventory('devices:\n  - hostname: sw1\n    username: admin\n    timeout: soon\n')).toThrow(
            'devices[0].timeout must be a number',
        );
    });

    it('rejects duplicate device names', () => {
        const content = 'devices:\n  - {hostname: sw1, username: admin}\n  - {hostname: sw1, username: admin}\n';
        expect(() => parseInventory(content)).toThrow("Duplicate device name 'sw1'");
    });
});

describe('loadInventory', () => {
    let tmpDir: string;

    beforeEach(async () => {
        tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'dnos6-inventory-'));
    });

    afterEach(async () => {
        await fs.rm(tmpDir, { recursive: true, force: true });
    });

    it('loads a file from disk', async () => {
        const file = path.join(tmpDir, 'inventory.yaml');
        await fs.writeFile(file, INVENTORY);

        const devices = await loadInventory(file);
        expect(devices).toHaveLength(2);
    });

    it('reports a missing file as ConfigError', async () => {
        await expect(loadInventory(path.join(tmpDir, 'missing.yaml'))).rejects.toThrow(ConfigError);
    });
});
