import fs from 'fs/promises';
import path from 'path';
import yaml from 'js-yaml';
import { DATA_DIR } from './dirs';
import { ConfigError, errorMessage } from './errors';
import { DEFAULT_TIMEOUT, normalizeOptionalArgs, type DriverOptions } from './config';
import type { JsonRecord } from './config/transformer';

export const DEFAULT_INVENTORY_PATH = path.join(DATA_DIR, 'inventory.yaml');

export interface DeviceEntry {
  name: string;
  hostname: string;
  username: string;
  password: string;
  timeout: number;
  optionalArgs: DriverOptions;
}

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(entry: JsonRecord, key: string, index: number): string {
  const value = entry[key];
  if (typeof value !== 'string' || value === '') {
    throw new ConfigError(`devices[${index}].${key} must be a non-empty string`);
  }
  return value;
}

/**
 * Parses inventory text. YAML is a superset of JSON, so both formats go
 * through js-yaml.
 */
export function parseInventory(content: string): DeviceEntry[] {
  let doc: unknown;
  try {
    doc = yaml.load(content);
  } catch (e) {
    throw new ConfigError(`Inventory is not valid YAML: ${errorMessage(e)}`);
  }

  if (!isRecord(doc) || !Array.isArray(doc.devices)) {
    throw new ConfigError('Inventory must contain a "devices" list');
  }

  const seen = new Set<string>();
  return doc.devices.map((raw: unknown, index: number): DeviceEntry => {
    if (!isRecord(raw)) {
      throw new ConfigError(`devices[${index}] must be a mapping`);
    }
    const hostname = requireString(raw, 'hostname', index);
    const name = typeof raw.name === 'string' && raw.name ? raw.name : hostname;
    if (seen.has(name)) {
      throw new ConfigError(`Duplicate device name '${name}'`);
    }
    seen.add(name);

    const timeout = raw.timeout ?? DEFAULT_TIMEOUT;
    if (typeof timeout !== 'number') {
      throw new ConfigError(`devices[${index}].timeout must be a number`);
    }

    const optional = raw.optionalArgs ?? raw.optional_args ?? {};
    if (!isRecord(optional)) {
      throw new ConfigError(`devices[${index}].optionalArgs must be a mapping`);
    }

    return {
      name,
      hostname,
      username: requireString(raw, 'username', index),
      password: typeof raw.password === 'string' ? raw.password : '',
      timeout,
      optionalArgs: normalizeOptionalArgs(optional),
    };
  });
}

export async function loadInventory(filePath: string = DEFAULT_INVENTORY_PATH): Promise<DeviceEntry[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (e) {
    throw new ConfigError(`Failed to read inventory at ${filePath}: ${errorMessage(e)}`);
  }
  return parseInventory(content);
}
