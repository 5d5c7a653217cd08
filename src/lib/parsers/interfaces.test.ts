import { describe, it, expect } from 'vitest';
import { canonicalInterfaceName } from '../canonical';
import { ParseError } from '../errors';
import { parseInterfaceConfigs, parseInterfaces, parseSpeed } from './interfaces';

const UPLINK = [
    'Interface Name................................. Gi1/0/1',
    'SOC Hardware Info.............................. BCM56150',
    'Link Status.................................... Up',
    'Keepalive Enabled.............................. FALSE',
    'VLAN Membership Mode........................... Access Mode',
    'MTU Size....................................... 1518',
    'Port Speed..................................... 1000',
    'Port Mode...................................... Full',
    'L3 MAC Address................................. F48E.3841.9629',
].join('\n');

const UNUSED = [
    'Interface Name................................. Gi1/0/2',
    'Link Status.................................... Down',
    'Port Speed..................................... Unknown',
    'L3 MAC Address................................. F48E.3841.962A',
].join('\n');

const RUNNING_CONFIG = [
    '!Current Configuration:',
    'hostname "access-sw1"',
    'interface Gi1/0/1',
    'description "uplink to core"',
    'no shutdown',
    'exit',
    '!',
    'interface Gi1/0/2',
    'shutdown',
    'exit',
].join('\n');

describe('parseInterfaceConfigs', () => {
    it('reads description and shutdown per interface block', () => {
        const configs = parseInterfaceConfigs(RUNNING_CONFIG);
        expect(configs.get('Gi1/0/1')).toEqual({ description: 'uplink to core', enabled: true });
        expect(configs.get('Gi1/0/2')).toEqual({ description: '', enabled: false });
        expect(configs.size).toBe(2);
    });
});

describe('parseSpeed', () => {
    it('maps Unknown to 0 and reads numbers', () => {
        expect(parseSpeed('Unknown')).toBe(0);
        expect(parseSpeed('1000')).toBe(1000);
        expect(() => parseSpeed('fast')).toThrow(ParseError);
    });
});

describe('parseInterfaces', () => {
    it('joins interface blocks with the running config', () => {
        const result = parseInterfaces(`${UPLINK}\n\n${UNUSED}\n`, RUNNING_CONFIG);
        expect(result).toEqual({
            'Gi1/0/1': {
                name: 'Gi1/0/1',
                isUp: true,
                isEnabled: true,
                description: 'uplink to core',
                lastFlapped: -1,
                speed: 1000,
                macAddress: 'F4:8E:38:41:96:29',
            },
            'Gi1/0/2': {
                name: 'Gi1/0/2',
                isUp: false,
                isEnabled: false,
                description: '',
                lastFlapped: -1,
                speed: 0,
                macAddress: 'F4:8E:38:41:96:2A',
            },
        });
    });

    it('keys records by canonical name when a namer is given', () => {
        const result = parseInterfaces(UPLINK, RUNNING_CONFIG, name => canonicalInterfaceName(name));
        expect(Object.keys(result)).toEqual(['GigabitEthernet1/0/1']);
        expect(result['GigabitEthernet1/0/1'].description).toBe('uplink to core');
    });

    it('defaults interfaces missing from the running config to enabled', () => {
        const result = parseInterfaces(UNUSED, '');
        expect(result['Gi1/0/2'].isEnabled).toBe(true);
        expect(result['Gi1/0/2'].description).toBe('');
    });

    it('fails when an interface is listed twice', () => {
        expect(() => parseInterfaces(`${UPLINK}\n\n${UPLINK}`, RUNNING_CONFIG)).toThrow("Interface Name: 'Gi1/0/1' listed twice");
    });

    it('fails when a block has no MAC address', () => {
        const block = UNUSED.split('\n').slice(0, 3).join('\n');
        expect(() => parseInterfaces(block, '')).toThrow('L3 MAC Address: missing from interface block');
    });
});
