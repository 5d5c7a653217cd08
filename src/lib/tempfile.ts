import fs from 'fs/promises';
import path from 'path';
import { randomUUID } from 'crypto';
import { getStagingDir } from './dirs';
import { errorMessage } from './errors';
import { logger } from './logger';

/**
 * Writes config text to a uniquely named file in the staging directory and
 * returns its path. The caller owns the file.
 */
export async function createTempFile(config: string): Promise<string> {
  const filePath = path.join(getStagingDir(), randomUUID());
  await fs.writeFile(filePath, config, 'utf-8');
  logger.debug('Driver', `Staged ${config.length} bytes of config at ${filePath}`);
  return filePath;
}

export async function removeTempFile(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
      logger.debug('Driver', `Staged file ${filePath} already removed`);
      return;
    }
    throw new Error(`Failed to remove staged file ${filePath}: ${errorMessage(e)}`);
  }
}

export async function withStagedConfig<T>(config: string, fn: (filePath: string) => Promise<T>): Promise<T> {
  const filePath = await createTempFile(config);
  try {
    return await fn(filePath);
  } finally {
    await removeTempFile(filePath);
  }
}
