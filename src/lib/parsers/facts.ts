import { ParseError } from '../errors';
import type { InterfaceNamer } from './mac';
import { dottedValue, splitTable, splitTables } from './table';

export interface DeviceFacts {
  uptime: number;
  vendor: string;
  model: string;
  hostname: string;
  fqdn: string;
  osVersion: string;
  serialNumber: string;
  interfaceList: string[];
}

export interface VersionInfo {
  model: string;
  serialNumber: string;
  osVersion: string;
  description: string;
}

export interface SystemInfo {
  hostname: string;
  uptime: number;
}

export const VENDOR = 'Dell';

function required(text: string, label: string, source: string): string {
  const value = dottedValue(text, label);
  if (!value) {
    throw new ParseError(label, `missing from ${source}`);
  }
  return value;
}

/**
 * Parses `show version`:
 *
 *   System Model ID................... N3048
 *   Serial Number..................... CN0ABCDE1234
 *
 *   unit active      backup      current-active next-active
 *   ---- ----------- ----------- -------------- --------------
 *   1    6.3.3.10    6.3.2.7     6.3.3.10       6.3.3.10
 */
export function parseVersion(output: string): VersionInfo {
  const { rows } = splitTable(output, 'version');
  const firstUnit = rows[0]?.trim().split(/\s+/);
  if (!firstUnit || firstUnit.length < 2) {
    throw new ParseError('active', 'no firmware row in version output');
  }

  return {
    model: required(output, 'System Model ID', 'version output'),
    serialNumber: required(output, 'Serial Number', 'version output'),
    description: dottedValue(output, 'Machine Description') ?? '',
    osVersion: firstUnit[1],
  };
}

const UPTIME = /(\d+)\s+days?,\s*(\d+)h:(\d+)m:(\d+)s/;

export function parseUptime(text: string): number {
  const match = text.match(UPTIME);
  if (!match) {
    throw new ParseError('System Up Time', `'${text}' is not an uptime`);
  }
  const [, days, hours, minutes, seconds] = match;
  return Number(days) * 86400 + Number(hours) * 3600 + Number(minutes) * 60 + Number(seconds);
}

/** Parses `show system` (System Name, System Up Time). */
export function parseSystem(output: string): SystemInfo {
  return {
    // An unnamed switch prints an empty System Name
    hostname: dottedValue(output, 'System Name') ?? '',
    uptime: parseUptime(required(output, 'System Up Time', 'system output')),
  };
}

export function parseDomainName(runningConfig: string): string | undefined {
  return runningConfig.match(/^ip domain-name\s+"?([^"\s]+)"?\s*$/m)?.[1];
}

/** First column of every table in `show interfaces status`. */
export function parseInterfaceList(output: string, nameInterface: InterfaceNamer = name => name): string[] {
  const names: string[] = [];
  for (const table of splitTables(output)) {
    for (const row of table.rows) {
      const name = row.trim().split(/\s+/)[0];
      if (name) names.push(nameInterface(name));
    }
  }
  return names;
}

export function buildFacts(
  version: string,
  system: string,
  runningConfig: string,
  interfacesStatus: string,
  nameInterface: InterfaceNamer = name => name,
): DeviceFacts {
  const { model, serialNumber, osVersion } = parseVersion(version);
  const { hostname, uptime } = parseSystem(system);
  const domain = parseDomainName(runningConfig);

  return {
    uptime,
    vendor: VENDOR,
    model,
    hostname,
    fqdn: domain && hostname ? `${hostname}.${domain}` : hostname,
    osVersion,
    serialNumber,
    interfaceList: parseInterfaceList(interfacesStatus, nameInterface),
  };
}
