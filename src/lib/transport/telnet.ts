import net from 'net';
import { StringDecoder } from 'string_decoder';
import { ConnectionClosedException, ConnectionException, errorMessage } from '../errors';
import { logger } from '../logger';
import { CliSession } from './session';
import type { AliveState } from './types';

export const IAC = 0xff;
export const DONT = 0xfe;
export const DO = 0xfd;
export const WONT = 0xfc;
export const WILL = 0xfb;
export const SB = 0xfa;
export const NOP = 0xf1;
export const SE = 0xf0;

type IacState = 'data' | 'iac' | 'option' | 'sub' | 'sub-iac';

/**
 * Strips telnet negotiation from a byte stream, refusing every option the
 * peer asks for. Sequences split across chunks carry over to the next call.
 */
export class TelnetNegotiator {
  private state: IacState = 'data';
  private verb = 0;

  constructor(private readonly reply: (bytes: Buffer) => void) {}

  feed(chunk: Buffer): Buffer {
    const out: number[] = [];
    for (const byte of chunk) {
      switch (this.state) {
        case 'data':
          if (byte === IAC) this.state = 'iac';
          else out.push(byte);
          break;
        case 'iac':
          if (byte === IAC) {
            out.push(IAC);
            this.state = 'data';
          } else if (byte === DO || byte === DONT || byte === WILL || byte === WONT) {
            this.verb = byte;
            this.state = 'option';
          } else if (byte === SB) {
            this.state = 'sub';
          } else {
            this.state = 'data';
          }
          break;
        case 'option':
          if (this.verb === DO) this.reply(Buffer.from([IAC, WONT, byte]));
          else if (this.verb === WILL) this.reply(Buffer.from([IAC, DONT, byte]));
          this.state = 'data';
          break;
        case 'sub':
          if (byte === IAC) this.state = 'sub-iac';
          break;
        case 'sub-iac':
          this.state = byte === SE ? 'data' : 'sub';
          break;
      }
    }
    return Buffer.from(out);
  }
}

export class TelnetTransport extends CliSession {
  readonly kind = 'telnet' as const;
  protected readonly tag = 'Telnet';
  protected readonly newline = '\r\n';

  private socket: net.Socket | null = null;

  protected async connectChannel(): Promise<void> {
    const { host, port } = this.params;
    const socket = new net.Socket();
    this.socket = socket;
    const negotiator = new TelnetNegotiator(bytes => socket.write(bytes));

    await new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        socket.destroy();
        reject(new ConnectionException(`Telnet connection to ${host}:${port} timed out`));
      }, this.params.timeout * 1000);

      socket.once('connect', () => {
        clearTimeout(timer);
        resolve();
      });
      socket.on('error', (err) => {
        clearTimeout(timer);
        reject(new ConnectionException(`Telnet connection to ${host}:${port} failed: ${err.message}`));
        this.channelClosed(err.message);
      });
      socket.on('close', () => {
        clearTimeout(timer);
        reject(new ConnectionException(`Telnet connection to ${host}:${port} closed`));
        this.channelClosed(`Telnet connection to ${host} closed`);
      });

      socket.connect(port, host);
    });

    if (this.params.keepalive > 0) {
      socket.setKeepAlive(true, this.params.keepalive * 1000);
    }
    // One decoder per connection so a character split across segments survives
    const decoder = new StringDecoder('utf8');
    socket.on('data', (chunk: Buffer) => {
      const text = decoder.write(negotiator.feed(chunk));
      if (text.length > 0) this.receive(text);
    });
  }

  protected writeChannel(data: string | Buffer): void {
    if (!this.socket || this.socket.destroyed) {
      throw new ConnectionClosedException(`Telnet connection to ${this.params.host} is not open`);
    }
    this.socket.write(data);
  }

  protected destroyChannel(): void {
    const socket = this.socket;
    this.socket = null;
    if (!socket) return;
    socket.removeAllListeners();
    socket.on('error', err => logger.debug('Telnet', 'Socket error after close:', err.message));
    socket.destroy();
  }

  isAlive(): AliveState {
    const socket = this.socket;
    if (!socket || socket.destroyed || !this.established) {
      return { isAlive: false };
    }
    try {
      socket.write(Buffer.from([IAC, NOP]));
      return { isAlive: true };
    } catch (e) {
      logger.debug('Telnet', 'Liveness probe failed:', errorMessage(e));
      return { isAlive: false };
    }
  }
}
