import { ParseError } from '../errors';
import { logger } from '../logger';
import type { InterfaceNamer } from './mac';
import { columnSpans, sliceColumns, splitTable } from './table';

export interface LldpNeighbor {
  hostname: string | null;
  port: string;
}

export type LldpCapability = 'Bridge' | 'Router' | 'WLAN-AP' | 'Station-only';

export interface LldpNeighborDetail {
  parentInterface: string;
  remoteChassisId: string;
  remoteSystemName: string;
  remotePort: string;
  remotePortDescription: string;
  remoteSystemDescription: string;
  remoteSystemCapab: LldpCapability[];
  remoteSystemEnableCapab: LldpCapability[];
}

const CAPABILITIES: Record<string, LldpCapability> = {
  'bridge': 'Bridge',
  'router': 'Router',
  'wlan access point': 'WLAN-AP',
  'station only': 'Station-only',
};

const SUMMARY_COLUMNS = { localInterface: 0, portId: 3, systemName: 4 };

/**
 * Parses `show lldp remote-device all`. System names may contain spaces, so
 * rows are cut at the offsets of the delimiter's dash groups:
 *
 *   Interface RemID   Chassis ID          Port ID           System Name
 *   --------- ------- ------------------- ----------------- -----------------
 *   Gi1/0/1   1       F4:8E:38:41:96:28   Gi1/0/48          core sw2
 */
export function parseLldpNeighbors(output: string, nameInterface: InterfaceNamer = name => name): Record<string, LldpNeighbor[]> {
  const { delimiter, rows } = splitTable(output, 'lldp remote-device');
  const spans = columnSpans(delimiter);
  if (spans.length <= SUMMARY_COLUMNS.systemName) {
    throw new ParseError('lldp remote-device', `expected ${SUMMARY_COLUMNS.systemName + 1} columns, got ${spans.length}`);
  }

  const neighbors: Record<string, LldpNeighbor[]> = {};
  for (const row of rows) {
    const fields = sliceColumns(row, spans);
    const local = fields[SUMMARY_COLUMNS.localInterface];
    if (!local) {
      throw new ParseError('lldp remote-device', `row without local interface: '${row.trim()}'`);
    }
    const key = nameInterface(local);
    const systemName = fields[SUMMARY_COLUMNS.systemName];
    if (!neighbors[key]) neighbors[key] = [];
    neighbors[key].push({
      hostname: systemName === '' ? null : systemName,
      port: fields[SUMMARY_COLUMNS.portId],
    });
  }
  return neighbors;
}

export function parseCapabilities(text: string): LldpCapability[] {
  const result: LldpCapability[] = [];
  for (const raw of text.split(',')) {
    const name = raw.trim().toLowerCase();
    if (!name || name === 'not advertised') continue;
    const capability = CAPABILITIES[name];
    if (!capability) {
      logger.debug('LLDP', `Dropping unknown capability '${raw.trim()}'`);
      continue;
    }
    if (!result.includes(capability)) result.push(capability);
  }
  return result;
}

function field(output: string, label: string): string | undefined {
  return output.match(new RegExp(`^[ \\t]*${label}:[ \\t]*(.*?)[ \\t]*$`, 'm'))?.[1];
}

const REMOTE_IDENTIFIER = /^[ \t]*Remote Identifier:/;

/** One block per remote device; output without identifiers is a single block. */
function remoteBlocks(text: string): string[] {
  const lines = text.split('\n');
  const starts = lines.flatMap((line, i) => (REMOTE_IDENTIFIER.test(line) ? [i] : []));
  if (starts.length === 0) return [text];
  return starts.map((start, i) => lines.slice(start, starts[i + 1]).join('\n'));
}

function parseDetailBlock(block: string, parentInterface: string): LldpNeighborDetail {
  const remoteChassisId = field(block, 'Chassis ID');
  if (!remoteChassisId) {
    throw new ParseError('Chassis ID', 'missing from lldp detail');
  }

  const optional = {
    remoteSystemName: field(block, 'System Name'),
    remotePort: field(block, 'Port ID'),
    remotePortDescription: field(block, 'Port Description'),
    remoteSystemDescription: field(block, 'System Description'),
    capabilitiesSupported: field(block, 'System Capabilities Supported'),
    capabilitiesEnabled: field(block, 'System Capabilities Enabled'),
  };

  return {
    parentInterface,
    remoteChassisId,
    remoteSystemName: optional.remoteSystemName ?? '',
    remotePort: optional.remotePort ?? '',
    remotePortDescription: optional.remotePortDescription ?? '',
    remoteSystemDescription: optional.remoteSystemDescription ?? '',
    remoteSystemCapab: parseCapabilities(optional.capabilitiesSupported ?? ''),
    remoteSystemEnableCapab: parseCapabilities(optional.capabilitiesEnabled ?? ''),
  };
}

/**
 * Parses `show lldp remote-device detail <interface>` into one record per
 * `Remote Identifier` block. Every block needs a chassis id; every other
 * field falls back to its empty default.
 *
 *   Local Interface: Gi1/0/1
 *
 *   Remote Identifier: 1
 *   Chassis ID: F4:8E:38:41:96:28
 *   Port ID: Gi1/0/48
 *   ...
 */
export function parseLldpNeighborDetails(output: string, parentInterface = ''): LldpNeighborDetail[] {
  return remoteBlocks(output.replace(/\r/g, '')).map(block => parseDetailBlock(block, parentInterface));
}

/** The single remote device on an interface; several remotes are a ParseError. */
export function parseLldpNeighborDetail(output: string, parentInterface = ''): LldpNeighborDetail {
  const details = parseLldpNeighborDetails(output, parentInterface);
  if (details.length !== 1) {
    throw new ParseError('Remote Identifier', `expected one remote device, found ${details.length}`);
  }
  return details[0];
}
