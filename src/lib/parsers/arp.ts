import { isIP } from 'net';
import { requireMac } from '../canonical';
import { ParseError } from '../errors';
import type { InterfaceNamer } from './mac';
import { splitFields, splitTable } from './table';

export interface ArpEntry {
  interface: string;
  mac: string;
  ip: string;
  age: number;
}

const AGE = /^(\d+)h\s*(\d+)m\s*(\d+)s$/;

/**
 * ARP ages print as `n/a` for local entries and `<H>h <M>m <S>s` otherwise,
 * with or without spaces between the components.
 */
export function parseArpAge(text: string): number {
  const value = text.trim();
  if (value.toLowerCase() === 'n/a') return -1.0;

  const match = value.match(AGE);
  if (!match) {
    throw new ParseError('age', `'${value}' is not an ARP age`);
  }
  const [, hours, minutes, seconds] = match;
  return Number(hours) * 3600 + Number(minutes) * 60 + Number(seconds);
}

/**
 * Parses `show arp`:
 *
 *   IP Address      MAC Address       Interface   Type      Age
 *   --------------- ----------------- ----------- --------- -----------
 *   10.0.0.1        0025.90C2.88ED    Vl1         Dynamic   0h 1m 5s
 *   10.0.0.2        F48E.3841.9628    Vl1         Local     n/a
 */
export function parseArpTable(output: string, nameInterface: InterfaceNamer = name => name): ArpEntry[] {
  const { rows } = splitTable(output, 'arp');
  return rows.map(row => {
    // ip mac interface type, then the age as one token or as h/m/s tokens
    const [ip, mac, iface, , ...age] = splitFields(row, [5, 7], 'arp');
    if (isIP(ip) === 0) {
      throw new ParseError('ip', `'${ip}' is not an IP address`);
    }
    return {
      interface: nameInterface(iface),
      mac: requireMac(mac),
      ip,
      age: parseArpAge(age.join(' ')),
    };
  });
}
