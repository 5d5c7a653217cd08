import { parseArgs } from 'util';
import { Dnos6Driver, errorMessage, loadInventory, logger } from '../src';
import { DEFAULT_INVENTORY_PATH } from '../src/lib/inventory';

const GETTERS = {
    facts: (d: Dnos6Driver) => d.getFacts(),
    interfaces: (d: Dnos6Driver) => d.getInterfaces(),
    environment: (d: Dnos6Driver) => d.getEnvironment(),
    config: (d: Dnos6Driver) => d.getConfig('all'),
    mac: (d: Dnos6Driver) => d.getMacAddressTable(),
    arp: (d: Dnos6Driver) => d.getArpTable(),
    lldp: (d: Dnos6Driver) => d.getLldpNeighbors(),
    'lldp-detail': (d: Dnos6Driver) => d.getLldpNeighborDetail(),
    ntp: (d: Dnos6Driver) => d.getNtpPeers(),
} satisfies Record<string, (d: Dnos6Driver) => Promise<unknown>>;

type GetterName = keyof typeof GETTERS;

function isGetterName(name: string): name is GetterName {
    return Object.prototype.hasOwnProperty.call(GETTERS, name);
}

async function main() {
    const { values } = parseArgs({
        options: {
            inventory: { type: 'string', short: 'i', default: DEFAULT_INVENTORY_PATH },
            device: { type: 'string', short: 'd' },
            getter: { type: 'string', short: 'g', default: 'facts' },
        },
    });

    const getter = values.getter ?? 'facts';
    if (!isGetterName(getter)) {
        console.error(`Unknown getter '${getter}'. Choose one of: ${Object.keys(GETTERS).join(', ')}`);
        process.exit(2);
    }

    const devices = await loadInventory(values.inventory);
    const selected = values.device ? devices.filter(d => d.name === values.device) : devices;
    if (selected.length === 0) {
        console.error(`No device '${values.device}' in ${values.inventory}`);
        process.exit(2);
    }

    const results: Record<string, unknown> = {};
    let failed = false;
    for (const device of selected) {
        const driver = new Dnos6Driver(device.hostname, device.username, device.password, device.timeout, device.optionalArgs);
        try {
            await driver.open();
            results[device.name] = await GETTERS[getter](driver);
        } catch (e) {
            failed = true;
            logger.error('Driver', `${device.name}: ${errorMessage(e)}`);
            results[device.name] = { error: errorMessage(e) };
        } finally {
            await driver.close();
        }
    }

    console.log(JSON.stringify(results, null, 2));
    process.exit(failed ? 1 : 0);
}

main().catch(err => {
    console.error(errorMessage(err));
    process.exit(1);
});
