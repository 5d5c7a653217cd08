import { canonicalInterfaceName } from './canonical';
import { resolveDriverConfig, DEFAULT_TIMEOUT, type DriverConfig, type DriverOptions } from './config';
import { CommandDispatcher } from './dispatcher';
import { CommandErrorException, ConnectionException, errorMessage } from './errors';
import { logger } from './logger';
import { parseArpTable, type ArpEntry } from './parsers/arp';
import { buildEnvironment, type EnvironmentFacts } from './parsers/environment';
import { buildFacts, type DeviceFacts } from './parsers/facts';
import { parseInterfaces, type InterfaceRecord } from './parsers/interfaces';
import {
  parseLldpNeighborDetail,
  parseLldpNeighborDetails,
  parseLldpNeighbors,
  type LldpNeighbor,
  type LldpNeighborDetail,
} from './parsers/lldp';
import { parseMacAddressTable, type InterfaceNamer, type MacTableEntry } from './parsers/mac';
import { parseNtpPeers, type NtpPeerDetails } from './parsers/ntp';
import { createTempFile, removeTempFile } from './tempfile';
import { createTransport, type AliveState, type Transport } from './transport';

export type ConfigRetrieve = 'all' | 'startup' | 'running';

export interface ConfigBundle {
  startup: string;
  running: string;
  /** DNOS6 has no candidate configuration. */
  candidate: string;
}

export const COMMANDS = {
  runningConfig: 'show running-config',
  startupConfig: 'show startup-config',
  processCpu: ['show process cpu', 'show proc cpu'],
  temperature: 'show system temperature',
  macTable: 'show mac address-table',
  arp: 'show arp',
  interfaces: 'show interfaces',
  interfacesStatus: 'show interfaces status',
  lldpNeighbors: 'show lldp remote-device all',
  lldpDetail: (iface: string) => `show lldp remote-device detail ${iface}`,
  sntpServers: 'show sntp server',
  version: 'show version',
  system: 'show system',
  dir: 'dir',
} as const;

const DIRECTORY_OF = /Directory of\s+(\S+?:)/;

/**
 * Fact retrieval for Dell Networking OS 6 switches. One driver owns one
 * CLI session; getters run their commands one at a time over it.
 */
export class Dnos6Driver {
  readonly config: DriverConfig;
  private transport: Transport | null = null;
  private dispatcher: CommandDispatcher | null = null;
  private opening: Promise<void> | null = null;
  private readonly nameInterface: InterfaceNamer;

  constructor(
    readonly hostname: string,
    readonly username: string,
    password: string,
    timeout: number = DEFAULT_TIMEOUT,
    options: DriverOptions = {},
  ) {
    this.config = resolveDriverConfig(hostname, username, password, timeout, options);
    const enabled = this.config.canonicalInt;
    this.nameInterface = name => canonicalInterfaceName(name, { enabled });
  }

  /** Concurrent callers share one connection attempt. */
  open(): Promise<void> {
    if (this.transport) return Promise.resolve();
    if (!this.opening) {
      this.opening = this.connect().finally(() => {
        this.opening = null;
      });
    }
    return this.opening;
  }

  private async connect(): Promise<void> {
    const transport = createTransport(this.config.connection);
    await transport.open();
    this.transport = transport;
    this.dispatcher = new CommandDispatcher(transport, { strictCommands: this.config.strictCommands });
    logger.info('Driver', `Opened ${this.config.transport} session to ${this.hostname}`);
  }

  async close(): Promise<void> {
    const transport = this.transport;
    this.transport = null;
    this.dispatcher = null;
    if (transport) {
      await transport.close();
    }
  }

  isAlive(): AliveState {
    if (!this.transport) return { isAlive: false };
    return this.transport.isAlive();
  }

  private send(command: string | readonly string[]): Promise<string> {
    if (!this.dispatcher) {
      throw new ConnectionException(`Driver for ${this.hostname} is not open`);
    }
    return this.dispatcher.send(command);
  }

  async getConfig(retrieve: ConfigRetrieve = 'all'): Promise<ConfigBundle> {
    const bundle: ConfigBundle = { startup: '', running: '', candidate: '' };
    if (retrieve === 'all' || retrieve === 'startup') {
      bundle.startup = await this.send(COMMANDS.startupConfig);
    }
    if (retrieve === 'all' || retrieve === 'running') {
      bundle.running = await this.send(COMMANDS.runningConfig);
    }
    return bundle;
  }

  async getEnvironment(): Promise<EnvironmentFacts> {
    const processCpu = await this.send(COMMANDS.processCpu);
    const temperature = await this.send(COMMANDS.temperature);
    return buildEnvironment(processCpu, temperature);
  }

  async getMacAddressTable(): Promise<MacTableEntry[]> {
    return parseMacAddressTable(await this.send(COMMANDS.macTable), this.nameInterface);
  }

  async getArpTable(): Promise<ArpEntry[]> {
    return parseArpTable(await this.send(COMMANDS.arp), this.nameInterface);
  }

  async getInterfaces(): Promise<Record<string, InterfaceRecord>> {
    const runningConfig = await this.send(COMMANDS.runningConfig);
    const showInterfaces = await this.send(COMMANDS.interfaces);
    return parseInterfaces(showInterfaces, runningConfig, this.nameInterface);
  }

  async getLldpNeighbors(): Promise<Record<string, LldpNeighbor[]>> {
    return parseLldpNeighbors(await this.send(COMMANDS.lldpNeighbors), this.nameInterface);
  }

  getLldpNeighborDetail(): Promise<Record<string, LldpNeighborDetail[]>>;
  getLldpNeighborDetail(iface: string): Promise<LldpNeighborDetail>;
  async getLldpNeighborDetail(iface?: string): Promise<LldpNeighborDetail | Record<string, LldpNeighborDetail[]>> {
    if (iface) {
      return parseLldpNeighborDetail(await this.send(COMMANDS.lldpDetail(iface)), this.nameInterface(iface));
    }

    // The device only understands its own spelling of an interface name
    const neighbors = parseLldpNeighbors(await this.send(COMMANDS.lldpNeighbors));
    const details: Record<string, LldpNeighborDetail[]> = {};
    for (const local of Object.keys(neighbors)) {
      const name = this.nameInterface(local);
      details[name] = parseLldpNeighborDetails(await this.send(COMMANDS.lldpDetail(local)), name);
    }
    return details;
  }

  async getNtpPeers(): Promise<Record<string, NtpPeerDetails>> {
    return parseNtpPeers(await this.send(COMMANDS.sntpServers));
  }

  async getFacts(): Promise<DeviceFacts> {
    const version = await this.send(COMMANDS.version);
    const system = await this.send(COMMANDS.system);
    const runningConfig = await this.send(COMMANDS.runningConfig);
    const interfacesStatus = await this.send(COMMANDS.interfacesStatus);
    return buildFacts(version, system, runningConfig, interfacesStatus, this.nameInterface);
  }

  /** The destFileSystem option when set, otherwise the file system `dir` reports. */
  async discoverFileSystem(): Promise<string> {
    if (this.config.destFileSystem) {
      return this.config.destFileSystem;
    }
    let output: string;
    try {
      output = await this.send(COMMANDS.dir);
    } catch (e) {
      if (e instanceof CommandErrorException) {
        throw new CommandErrorException(`File system autodetect failed (set destFileSystem to skip it): ${errorMessage(e)}`);
      }
      throw e;
    }
    const match = output.match(DIRECTORY_OF);
    if (!match) {
      throw new CommandErrorException('File system autodetect failed (set destFileSystem to skip it)');
    }
    return match[1];
  }

  stageConfig(config: string): Promise<string> {
    return createTempFile(config);
  }

  removeStagedConfig(filePath: string): Promise<void> {
    return removeTempFile(filePath);
  }
}
