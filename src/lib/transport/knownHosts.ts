import crypto from 'crypto';
import { readFileSync } from 'fs';
import { errorMessage } from '../errors';
import { logger } from '../logger';

export interface KnownHostEntry {
  patterns: string[];
  /** `|1|salt|hash` entries keep the raw token here instead of patterns. */
  hashed?: { salt: Buffer; hash: Buffer };
  keyType: string;
  key: Buffer;
}

/**
 * Parses OpenSSH known_hosts content. Comment lines and @cert-authority /
 * @revoked markers are skipped.
 */
export function parseKnownHosts(content: string): KnownHostEntry[] {
  const entries: KnownHostEntry[] = [];
  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#') || line.startsWith('@')) continue;

    const [hosts, keyType, keyData] = line.split(/\s+/);
    if (!hosts || !keyType || !keyData) continue;

    const key = Buffer.from(keyData, 'base64');
    if (hosts.startsWith('|1|')) {
      const [, , salt, hash] = hosts.split('|');
      entries.push({
        patterns: [],
        hashed: { salt: Buffer.from(salt, 'base64'), hash: Buffer.from(hash, 'base64') },
        keyType,
        key,
      });
    } else {
      entries.push({ patterns: hosts.split(','), keyType, key });
    }
  }
  return entries;
}

function hostToken(host: string, port: number): string {
  return port === 22 ? host : `[${host}]:${port}`;
}

function globToRegExp(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*').replace(/\?/g, '.');
  return new RegExp(`^${escaped}$`, 'i');
}

function matchesEntry(entry: KnownHostEntry, token: string): boolean {
  if (entry.hashed) {
    const digest = crypto.createHmac('sha1', entry.hashed.salt).update(token).digest();
    return digest.equals(entry.hashed.hash);
  }
  let matched = false;
  for (const pattern of entry.patterns) {
    if (pattern.startsWith('!')) {
      if (globToRegExp(pattern.slice(1)).test(token)) return false;
    } else if (globToRegExp(pattern).test(token)) {
      matched = true;
    }
  }
  return matched;
}

export function findHostKeys(entries: KnownHostEntry[], host: string, port: number): Buffer[] {
  const token = hostToken(host, port);
  return entries.filter(entry => matchesEntry(entry, token)).map(entry => entry.key);
}

export function readKnownHostsFile(filePath: string): KnownHostEntry[] {
  try {
    return parseKnownHosts(readFileSync(filePath, 'utf-8'));
  } catch (e) {
    logger.warn('SSH', `Cannot read known hosts file ${filePath}: ${errorMessage(e)}`);
    return [];
  }
}
