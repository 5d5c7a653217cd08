import { ParseError } from './errors';

const MAC_SEPARATORS = /[\s:.-]/g;
const HEX_12 = /^[0-9a-fA-F]{12}$/;

/**
 * Normalizes a MAC address to upper-case colon-separated octets.
 * Accepts colon, dash and Cisco/Dell dot-grouped (0025.90C2.88ED) forms.
 * Input that does not hold exactly twelve hex digits is returned trimmed
 * and otherwise untouched.
 */
export function canonicalMac(input: string): string {
  const digits = input.replace(MAC_SEPARATORS, '');
  if (!HEX_12.test(digits)) return input.trim();
  return digits.toUpperCase().match(/.{2}/g)?.join(':') ?? input.trim();
}

export function isMac(input: string): boolean {
  return HEX_12.test(input.replace(MAC_SEPARATORS, ''));
}

export function requireMac(input: string, field = 'mac'): string {
  if (!isMac(input)) {
    throw new ParseError(field, `'${input}' is not a MAC address`);
  }
  return canonicalMac(input);
}

// Keys are lower-case; long forms map to themselves so expansion is idempotent
const INTERFACE_PREFIXES: Record<string, string> = {
  fa: 'FastEthernet',
  fastethernet: 'FastEthernet',
  gi: 'GigabitEthernet',
  gigabitethernet: 'GigabitEthernet',
  te: 'TenGigabitEthernet',
  tengigabitethernet: 'TenGigabitEthernet',
  tw: 'TwentyFiveGigabitEthernet',
  twentyfivegigabitethernet: 'TwentyFiveGigabitEthernet',
  fo: 'FortyGigabitEthernet',
  fortygigabitethernet: 'FortyGigabitEthernet',
  hu: 'HundredGigabitEthernet',
  hundredgigabitethernet: 'HundredGigabitEthernet',
  po: 'Port-channel',
  'port-channel': 'Port-channel',
  vl: 'Vlan',
  vlan: 'Vlan',
  lo: 'Loopback',
  loopback: 'Loopback',
  tu: 'Tunnel',
  tunnel: 'Tunnel',
  oob: 'out-of-band',
  'out-of-band': 'out-of-band',
};

const INTERFACE_NAME = /^([a-zA-Z][a-zA-Z-]*?)\s*(\d[\w/.:]*)?$/;

export interface CanonicalInterfaceOptions {
  enabled: boolean;
}

/**
 * Expands an abbreviated interface name (Gi1/0/48) to its long form
 * (GigabitEthernet1/0/48). Names with an unknown prefix, and every name when
 * expansion is disabled, pass through unchanged.
 */
export function canonicalInterfaceName(name: string, options: CanonicalInterfaceOptions = { enabled: true }): string {
  const trimmed = name.trim();
  if (!options.enabled) return trimmed;

  const match = trimmed.match(INTERFACE_NAME);
  if (!match) return trimmed;

  const [, prefix, suffix = ''] = match;
  const long = INTERFACE_PREFIXES[prefix.toLowerCase()];
  return long ? `${long}${suffix}` : trimmed;
}
