import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { createTempFile, removeTempFile, withStagedConfig } from '@/lib/tempfile';

vi.mock('@/lib/logger', () => ({
    logger: {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn()
    }
}));

describe('tempfile', () => {
    let tmpDir: string;
    const previous = process.env.STAGING_DIR;

    beforeEach(async () => {
        tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'dnos6-tempfile-'));
        process.env.STAGING_DIR = tmpDir;
    });

    afterEach(async () => {
        if (previous === undefined) delete process.env.STAGING_DIR;
        else process.env.STAGING_DIR = previous;
        await fs.rm(tmpDir, { recursive: true, force: true });
    });

    it('gives every staged config its own file', async () => {
        const first = await createTempFile('hostname "sw1"\n');
        const second = await createTempFile('hostname "sw1"\n');

        expect(first).not.toBe(second);
        expect(path.dirname(first)).toBe(tmpDir);
        expect(await fs.readFile(second, 'utf-8')).toBe('hostname "sw1"\n');
    });

    it('treats a missing file as already removed', async () => {
        await expect(removeTempFile(path.join(tmpDir, 'gone'))).resolves.toBeUndefined();
    });

    it('raises when the path cannot be unlinked', async () => {
        const dir = path.join(tmpDir, 'a-directory');
        await fs.mkdir(dir);
        await expect(removeTempFile(dir)).rejects.toThrow(`Failed to remove staged file ${dir}`);
    });

    it('removes the staged file even when the callback fails', async () => {
        let staged = '';
        await expect(
            withStagedConfig('hostname "sw1"\n', async filePath => {
                staged = filePath;
                throw new Error('push failed');
            }),
        ).rejects.toThrow('push failed');

        expect(staged).not.toBe('');
        await expect(fs.access(staged)).rejects.toThrow();
    });

    it('returns the callback result', async () => {
        const result = await withStagedConfig('hostname "sw1"\n', filePath => fs.readFile(filePath, 'utf-8'));
        expect(result).toBe('hostname "sw1"\n');
        expect(await fs.readdir(tmpDir)).toEqual([]);
    });
});
