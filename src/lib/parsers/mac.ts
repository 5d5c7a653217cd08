import { requireMac } from '../canonical';
import { ParseError } from '../errors';
import { splitFields, splitTable } from './table';

export interface MacTableEntry {
  mac: string;
  interface: string;
  vlan: number;
  static: boolean;
  active: boolean;
  moves: number;
  lastMove: number;
}

export type InterfaceNamer = (name: string) => string;

const passThrough: InterfaceNamer = name => name;

export function classifyMacType(type: string): { static: boolean; active: boolean } {
  const normalized = type.toLowerCase();
  return {
    static: normalized === 'management' || normalized === 'static',
    active: normalized === 'dynamic',
  };
}

export function parseVlan(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new ParseError('vlan', `'${value}' is not a vlan id`);
  }
  return parseInt(value, 10);
}

/**
 * Parses `show mac address-table`:
 *
 *   Vlan     Mac Address           Type        Port
 *   -------- --------------------- ----------- ---------------------
 *   1        0025.90C2.88ED        Dynamic     Gi1/0/48
 *   1        F48E.3841.9628        Management  Vl1
 *
 *   Total MAC Addresses in use: 2
 */
export function parseMacAddressTable(output: string, nameInterface: InterfaceNamer = passThrough): MacTableEntry[] {
  const { rows } = splitTable(output, 'mac address-table');
  return rows.map(row => {
    const [vlan, mac, type, port] = splitFields(row, 4, 'mac address-table');
    return {
      mac: requireMac(mac),
      interface: nameInterface(port),
      vlan: parseVlan(vlan),
      ...classifyMacType(type),
      moves: -1,
      lastMove: -1.0,
    };
  });
}
