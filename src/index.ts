export { Dnos6Driver, COMMANDS } from './lib/driver';
export type { ConfigBundle, ConfigRetrieve } from './lib/driver';
export { CommandDispatcher, INVALID_MARKER } from './lib/dispatcher';
export { createTransport } from './lib/transport';
export type { AliveState, Transport } from './lib/transport';
export { SshTransport } from './lib/transport/ssh';
export { TelnetTransport } from './lib/transport/telnet';
export { canonicalMac, canonicalInterfaceName, isMac } from './lib/canonical';
export { resolveDriverConfig, normalizeOptionalArgs, DEFAULT_PORTS, DEFAULT_TIMEOUT } from './lib/config';
export type { DriverOptions, DriverConfig, TransportKind, TransportOptions, ConnectionParams } from './lib/config';
export { loadInventory, parseInventory } from './lib/inventory';
export type { DeviceEntry } from './lib/inventory';
export { createTempFile, removeTempFile, withStagedConfig } from './lib/tempfile';
export { logger } from './lib/logger';
export type { LogEntry, LogFilter, LogLevel } from './lib/logger';
export * from './lib/errors';
export type { ArpEntry } from './lib/parsers/arp';
export type { EnvironmentFacts } from './lib/parsers/environment';
export type { DeviceFacts } from './lib/parsers/facts';
export type { InterfaceRecord } from './lib/parsers/interfaces';
export type { LldpCapability, LldpNeighbor, LldpNeighborDetail } from './lib/parsers/lldp';
export type { MacTableEntry } from './lib/parsers/mac';
export type { NtpPeerDetails } from './lib/parsers/ntp';
