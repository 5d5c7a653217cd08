import path from 'path';
import os from 'os';

export const DATA_DIR = process.env.DATA_DIR || path.join(os.homedir(), '.dnos6-driver');
export const SSH_DIR = path.join(os.homedir(), '.ssh');
export const SYSTEM_KNOWN_HOSTS = path.join(SSH_DIR, 'known_hosts');

/** Staged config pushes live under the OS temp dir unless STAGING_DIR is set. */
export function getStagingDir(): string {
	return process.env.STAGING_DIR || os.tmpdir();
}

export function expandHome(filePath: string): string {
	if (filePath === '~') return os.homedir();
	if (filePath.startsWith('~/')) return path.join(os.homedir(), filePath.slice(2));
	return filePath;
}
