import { ConfigError } from './errors';
import { logger } from './logger';
import { applyOptionTransforms, type JsonRecord } from './config/transformer';

export type TransportKind = 'ssh' | 'telnet';

export const TRANSPORT_KINDS: readonly TransportKind[] = ['ssh', 'telnet'];

export const DEFAULT_PORTS: Record<TransportKind, number> = {
  ssh: 22,
  telnet: 23,
};

/** Tuning knobs handed through to the session layer. */
export interface TransportOptions {
  port?: number;
  /** Enable password; the login password is tried when empty. */
  secret?: string;
  verbose?: boolean;
  /** Keepalive interval in seconds, 0 disables. */
  keepalive?: number;
  /** Multiplier applied to every read timeout. */
  globalDelayFactor?: number;
  useKeys?: boolean;
  keyFile?: string;
  sshStrict?: boolean;
  systemHostKeys?: boolean;
  altHostKeys?: boolean;
  altKeyFile?: string;
  sshConfigFile?: string;
  allowAgent?: boolean;
}

/**
 * The file names, rollback, file-prompt and inline-transfer settings are
 * resolved for config push, which this driver does not perform.
 */
export interface DriverOptions extends TransportOptions {
  transport?: TransportKind;
  candidateCfg?: string;
  mergeCfg?: string;
  rollbackCfg?: string;
  inlineTransfer?: boolean;
  /** Skips filesystem autodetection when set. */
  destFileSystem?: string;
  autoRollbackOnError?: boolean;
  autoFilePrompt?: boolean;
  /** Expand abbreviated interface names (Gi1/0/1 -> GigabitEthernet1/0/1). */
  canonicalInt?: boolean;
  /** Raise UnsupportedCommandException when every command variant is rejected. */
  strictCommands?: boolean;
}

export interface ConnectionParams {
  kind: TransportKind;
  host: string;
  port: number;
  username: string;
  password: string;
  /** Seconds. */
  timeout: number;
  secret: string;
  verbose: boolean;
  keepalive: number;
  globalDelayFactor: number;
  useKeys: boolean;
  keyFile?: string;
  sshStrict: boolean;
  systemHostKeys: boolean;
  altHostKeys: boolean;
  altKeyFile: string;
  sshConfigFile?: string;
  allowAgent: boolean;
}

export interface DriverConfig {
  hostname: string;
  transport: TransportKind;
  candidateCfg: string;
  mergeCfg: string;
  rollbackCfg: string;
  inlineTransfer: boolean;
  destFileSystem?: string;
  autoRollbackOnError: boolean;
  autoFilePrompt: boolean;
  canonicalInt: boolean;
  strictCommands: boolean;
  connection: ConnectionParams;
}

export const DEFAULT_TIMEOUT = 60;

export function resolveDriverConfig(
  hostname: string,
  username: string,
  password: string,
  timeout: number = DEFAULT_TIMEOUT,
  options: DriverOptions = {},
): DriverConfig {
  const transport = options.transport ?? 'ssh';
  const port = options.port ?? DEFAULT_PORTS[transport];

  if (!hostname) {
    throw new ConfigError('hostname is required');
  }
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(`Invalid port ${port}`);
  }
  if (!(timeout > 0)) {
    throw new ConfigError(`Invalid timeout ${timeout}`);
  }
  const globalDelayFactor = options.globalDelayFactor ?? 1;
  if (!(globalDelayFactor > 0)) {
    throw new ConfigError(`Invalid globalDelayFactor ${globalDelayFactor}`);
  }

  return {
    hostname,
    transport,
    candidateCfg: options.candidateCfg ?? 'candidate_config.txt',
    mergeCfg: options.mergeCfg ?? 'merge_config.txt',
    rollbackCfg: options.rollbackCfg ?? 'rollback_config.txt',
    // Telnet has no out-of-band copy channel
    inlineTransfer: transport === 'telnet' ? true : options.inlineTransfer ?? false,
    destFileSystem: options.destFileSystem,
    autoRollbackOnError: options.autoRollbackOnError ?? true,
    autoFilePrompt: options.autoFilePrompt ?? true,
    canonicalInt: options.canonicalInt ?? false,
    strictCommands: options.strictCommands ?? true,
    connection: {
      kind: transport,
      host: hostname,
      port,
      username,
      password,
      timeout,
      secret: options.secret ?? '',
      verbose: options.verbose ?? false,
      keepalive: options.keepalive ?? 30,
      globalDelayFactor,
      useKeys: options.useKeys ?? false,
      keyFile: options.keyFile,
      sshStrict: options.sshStrict ?? false,
      systemHostKeys: options.systemHostKeys ?? false,
      altHostKeys: options.altHostKeys ?? false,
      altKeyFile: options.altKeyFile ?? '',
      sshConfigFile: options.sshConfigFile,
      allowAgent: options.allowAgent ?? false,
    },
  };
}

const STRING_KEYS = [
  'candidateCfg', 'mergeCfg', 'rollbackCfg', 'destFileSystem', 'secret', 'keyFile', 'altKeyFile', 'sshConfigFile',
] as const satisfies readonly (keyof DriverOptions)[];

const BOOLEAN_KEYS = [
  'inlineTransfer', 'autoRollbackOnError', 'autoFilePrompt', 'canonicalInt', 'strictCommands', 'verbose',
  'useKeys', 'sshStrict', 'systemHostKeys', 'altHostKeys', 'allowAgent',
] as const satisfies readonly (keyof DriverOptions)[];

const NUMBER_KEYS = ['port', 'keepalive', 'globalDelayFactor'] as const satisfies readonly (keyof DriverOptions)[];

function isTransportKind(value: unknown): value is TransportKind {
  return TRANSPORT_KINDS.some(kind => kind === value);
}

/**
 * Turns an untyped option bag (inventory file, CLI, legacy optional_args)
 * into DriverOptions. Wrong value types raise ConfigError; unknown keys are
 * logged and ignored.
 */
export function normalizeOptionalArgs(raw: JsonRecord = {}): DriverOptions {
  const source = applyOptionTransforms(raw);
  const options: DriverOptions = {};
  const known = new Set<string>(['transport', ...STRING_KEYS, ...BOOLEAN_KEYS, ...NUMBER_KEYS]);

  for (const key of Object.keys(source)) {
    if (!known.has(key)) {
      logger.warn('Config', `Ignoring unknown driver option '${key}'`);
    }
  }

  if (source.transport !== undefined) {
    if (!isTransportKind(source.transport)) {
      throw new ConfigError(`transport must be one of ${TRANSPORT_KINDS.join(', ')}, got '${String(source.transport)}'`);
    }
    options.transport = source.transport;
  }

  for (const key of STRING_KEYS) {
    const value = source[key];
    if (value === undefined || value === null) continue;
    if (typeof value !== 'string') throw new ConfigError(`${key} must be a string`);
    options[key] = value;
  }

  for (const key of BOOLEAN_KEYS) {
    const value = source[key];
    if (value === undefined || value === null) continue;
    if (typeof value !== 'boolean') throw new ConfigError(`${key} must be a boolean`);
    options[key] = value;
  }

  for (const key of NUMBER_KEYS) {
    const value = source[key];
    if (value === undefined || value === null) continue;
    if (typeof value !== 'number' || Number.isNaN(value)) throw new ConfigError(`${key} must be a number`);
    options[key] = value;
  }

  return options;
}
