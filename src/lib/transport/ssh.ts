import { Client, type ClientChannel, type ConnectConfig } from 'ssh2';
import { readFileSync } from 'fs';
import { StringDecoder } from 'string_decoder';
import type { ConnectionParams } from '../config';
import { expandHome, SYSTEM_KNOWN_HOSTS } from '../dirs';
import { ConnectionClosedException, ConnectionException, errorMessage } from '../errors';
import { logger } from '../logger';
import { findHostKeys, readKnownHostsFile } from './knownHosts';
import { CliSession } from './session';
import { lookupSshConfig, type SshHostConfig } from './sshConfig';
import type { AliveState } from './types';

function readSshConfig(params: ConnectionParams): SshHostConfig {
  if (!params.sshConfigFile) return {};
  const file = expandHome(params.sshConfigFile);
  try {
    return lookupSshConfig(readFileSync(file, 'utf-8'), params.host);
  } catch (e) {
    throw new ConnectionException(`Failed to read SSH config at ${file}: ${errorMessage(e)}`);
  }
}

export function buildHostVerifier(params: ConnectionParams, host: string, port: number): ((key: Buffer) => boolean) | undefined {
  if (!params.sshStrict) return undefined;

  const files: string[] = [];
  if (params.systemHostKeys) files.push(SYSTEM_KNOWN_HOSTS);
  if (params.altHostKeys && params.altKeyFile) files.push(expandHome(params.altKeyFile));
  const knownKeys = findHostKeys(files.flatMap(readKnownHostsFile), host, port);

  return (key: Buffer) => {
    const trusted = knownKeys.some(known => known.equals(key));
    if (!trusted) {
      logger.error('SSH', `Host key for ${host}:${port} is not in ${files.join(', ') || 'any known_hosts file'}`);
    }
    return trusted;
  };
}

export function buildConnectConfig(params: ConnectionParams): ConnectConfig {
  const sshConfig = readSshConfig(params);
  const host = sshConfig.hostName ?? params.host;
  const port = sshConfig.port ?? params.port;

  const config: ConnectConfig = {
    host,
    port,
    username: params.username || sshConfig.user,
    password: params.password,
    tryKeyboard: true,
    readyTimeout: params.timeout * 1000,
    keepaliveInterval: params.keepalive * 1000,
    hostVerifier: buildHostVerifier(params, host, port),
  };

  const keyFile = params.keyFile ?? sshConfig.identityFile;
  if (params.useKeys && keyFile) {
    const keyPath = expandHome(keyFile);
    try {
      config.privateKey = readFileSync(keyPath);
    } catch (e) {
      throw new ConnectionException(`Failed to read SSH key at ${keyPath}: ${errorMessage(e)}`);
    }
  }
  if (params.allowAgent && process.env.SSH_AUTH_SOCK) {
    config.agent = process.env.SSH_AUTH_SOCK;
  }
  return config;
}

export function describeSshError(host: string, err: Error): string {
  const message = err.message;
  if (message.includes('All configured authentication methods failed')) {
    return `Authentication failed for ${host}. Check the username, password or key.`;
  }
  if (message.includes('ENOTFOUND') || message.includes('getaddrinfo')) {
    return `Cannot resolve hostname ${host}`;
  }
  if (message.includes('ECONNREFUSED')) {
    return `Connection refused by ${host}. Check that SSH is enabled on the switch.`;
  }
  if (message.includes('Timed out while waiting for handshake') || message.includes('ETIMEDOUT')) {
    return `Connection timeout for ${host}`;
  }
  return `SSH connection failed for ${host}: ${message}`;
}

export class SshTransport extends CliSession {
  readonly kind = 'ssh' as const;
  protected readonly tag = 'SSH';

  private client: Client | null = null;
  private channel: ClientChannel | null = null;

  protected async connectChannel(): Promise<void> {
    const config = buildConnectConfig(this.params);
    const host = this.params.host;
    const client = new Client();
    this.client = client;

    await new Promise<void>((resolve, reject) => {
      let ready = false;

      client.on('ready', () => {
        ready = true;
        resolve();
      });

      client.on('keyboard-interactive', (_name, _instructions, _lang, prompts, finish) => {
        finish(prompts.map(() => this.params.password));
      });

      client.on('error', (err) => {
        if (!ready) {
          logger.error('SSH', `Connection error for ${host}:`, err.message);
          reject(new ConnectionException(describeSshError(host, err)));
          return;
        }
        this.channelClosed(err.message);
      });

      client.on('end', () => {
        this.channelClosed(`SSH connection to ${host} ended`);
      });

      client.on('close', () => {
        if (!ready) {
          reject(new ConnectionException(`SSH connection to ${host} closed during handshake`));
        }
        this.channelClosed(`SSH connection to ${host} closed`);
      });

      try {
        logger.debug('SSH', `Connecting with config: host=${config.host}, port=${config.port}, user=${config.username}`);
        client.connect(config);
      } catch (err) {
        reject(new ConnectionException(`Failed to initiate SSH connection to ${host}: ${errorMessage(err)}`));
      }
    });

    const channel = await new Promise<ClientChannel>((resolve, reject) => {
      client.shell({ term: 'vt100', cols: 511, rows: 24 }, (err, stream) => {
        if (err) {
          reject(new ConnectionException(`Cannot open shell on ${host}: ${err.message}`));
          return;
        }
        resolve(stream);
      });
    });

    const decoder = new StringDecoder('utf8');
    channel.on('data', (data: Buffer) => {
      const text = decoder.write(data);
      if (text.length > 0) this.receive(text);
    });
    channel.on('error', (err: Error) => this.channelClosed(err.message));
    channel.on('close', () => this.channelClosed(`SSH channel to ${host} closed`));
    this.channel = channel;
  }

  protected writeChannel(data: string | Buffer): void {
    if (!this.channel) {
      throw new ConnectionClosedException(`SSH channel to ${this.params.host} is not open`);
    }
    this.channel.write(data);
  }

  protected destroyChannel(): void {
    const { client, channel } = this;
    this.client = null;
    this.channel = null;

    if (channel) {
      channel.removeAllListeners();
      channel.on('error', (err: Error) => logger.debug('SSH', 'Channel error after close:', err.message));
      channel.end();
    }
    if (client) {
      client.removeAllListeners();
      client.on('error', (err) => logger.debug('SSH', 'Client error after close:', err.message));
      client.end();
    }
  }

  isAlive(): AliveState {
    const channel = this.channel;
    if (!this.client || !channel || !this.established) {
      return { isAlive: false };
    }
    try {
      channel.write('\0');
      return { isAlive: channel.writable && !channel.destroyed };
    } catch (e) {
      logger.debug('SSH', 'Liveness probe failed:', errorMessage(e));
      return { isAlive: false };
    }
  }
}
