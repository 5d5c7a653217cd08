import { requireMac } from '../canonical';
import { ParseError } from '../errors';
import type { InterfaceNamer } from './mac';
import { dottedValue } from './table';

export interface InterfaceRecord {
  name: string;
  isUp: boolean;
  isEnabled: boolean;
  description: string;
  lastFlapped: number;
  speed: number;
  macAddress: string;
}

export interface InterfaceConfig {
  description: string;
  enabled: boolean;
}

const DEFAULT_INTERFACE_CONFIG: InterfaceConfig = { description: '', enabled: true };

const CONFIG_BLOCK = /^interface[ \t]+(.+?)[ \t]*\n([\s\S]*?)^exit[ \t]*$/gm;
const DESCRIPTION = /^[ \t]*description:?[ \t]+"(.+?)"/m;
const SHUTDOWN = /^[ \t]*shutdown[ \t]*$/m;

/**
 * Extracts the per-interface settings of a running config:
 *
 *   interface Gi1/0/1
 *   description "uplink"
 *   shutdown
 *   exit
 */
export function parseInterfaceConfigs(runningConfig: string): Map<string, InterfaceConfig> {
  const configs = new Map<string, InterfaceConfig>();
  const text = runningConfig.replace(/\r/g, '');
  for (const match of text.matchAll(CONFIG_BLOCK)) {
    const [, name, body] = match;
    configs.set(name, {
      description: body.match(DESCRIPTION)?.[1] ?? '',
      // `no shutdown` does not match: the line must be the bare keyword
      enabled: !SHUTDOWN.test(body),
    });
  }
  return configs;
}

export function parseSpeed(value: string): number {
  if (value === 'Unknown') return 0;
  if (!/^\d+$/.test(value)) {
    throw new ParseError('speed', `'${value}' is not a port speed`);
  }
  return parseInt(value, 10);
}

function requireDotted(block: string, label: string): string {
  const value = dottedValue(block, label);
  if (value === undefined || value === '') {
    throw new ParseError(label, 'missing from interface block');
  }
  return value;
}

/**
 * Joins `show interfaces` detail blocks with the running config. Blocks are
 * separated by blank lines; each must carry a name, link status, speed and
 * L3 MAC address.
 */
export function parseInterfaces(
  showInterfaces: string,
  runningConfig: string,
  nameInterface: InterfaceNamer = name => name,
): Record<string, InterfaceRecord> {
  const configs = parseInterfaceConfigs(runningConfig);
  const interfaces: Record<string, InterfaceRecord> = {};

  const blocks = showInterfaces.replace(/\r/g, '').split(/\n[ \t]*\n/);
  for (const block of blocks) {
    if (block.trim() === '') continue;

    const rawName = requireDotted(block, 'Interface Name');
    const status = requireDotted(block, 'Link Status');
    const speed = parseSpeed(requireDotted(block, 'Port Speed'));
    const macAddress = requireMac(requireDotted(block, 'L3 MAC Address'), 'L3 MAC Address');
    const { description, enabled } = configs.get(rawName) ?? DEFAULT_INTERFACE_CONFIG;

    const name = nameInterface(rawName);
    if (Object.prototype.hasOwnProperty.call(interfaces, name)) {
      throw new ParseError('Interface Name', `'${name}' listed twice`);
    }
    interfaces[name] = {
      name,
      isUp: status.toLowerCase() === 'up',
      isEnabled: enabled,
      description,
      lastFlapped: -1,
      speed,
      macAddress,
    };
  }

  return interfaces;
}
