export interface SshHostConfig {
  hostName?: string;
  port?: number;
  user?: string;
  identityFile?: string;
}

function patternMatches(pattern: string, host: string): boolean {
  const escaped = pattern.replace(/[.+^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*').replace(/\?/g, '.');
  return new RegExp(`^${escaped}$`, 'i').test(host);
}

function hostMatches(patterns: string[], host: string): boolean {
  let matched = false;
  for (const pattern of patterns) {
    if (pattern.startsWith('!')) {
      if (patternMatches(pattern.slice(1), host)) return false;
    } else if (patternMatches(pattern, host)) {
      matched = true;
    }
  }
  return matched;
}

/**
 * Resolves the HostName, Port, User and IdentityFile an ssh_config file
 * applies to `host`. As with OpenSSH, the first value seen for a keyword wins.
 */
export function lookupSshConfig(content: string, host: string): SshHostConfig {
  const result: SshHostConfig = {};
  let active = true; // keywords before the first Host line apply to every host

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;

    const match = line.match(/^(\S+?)(?:\s*=\s*|\s+)(.+)$/);
    if (!match) continue;
    const keyword = match[1].toLowerCase();
    const value = match[2].trim().replace(/^"(.*)"$/, '$1');

    if (keyword === 'host') {
      active = hostMatches(value.split(/\s+/), host);
      continue;
    }
    if (!active) continue;

    switch (keyword) {
      case 'hostname':
        if (result.hostName === undefined) result.hostName = value.replace(/%h/g, host);
        break;
      case 'port':
        if (result.port === undefined && /^\d+$/.test(value)) result.port = parseInt(value, 10);
        break;
      case 'user':
        if (result.user === undefined) result.user = value;
        break;
      case 'identityfile':
        if (result.identityFile === undefined) result.identityFile = value;
        break;
    }
  }

  return result;
}
