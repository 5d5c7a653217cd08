import type { ConnectionParams, TransportKind } from '../config';
import { ConnectionClosedException, ConnectionException, errorMessage } from '../errors';
import { logger } from '../logger';
import type { AliveState, Transport } from './types';

// eslint-disable-next-line no-control-regex
const CONTROL_SEQUENCES = /\x1b\[[0-9;?]*[A-Za-z]|\x1b[()][A-Z0-9]|\x1b[=>]|[\x00\x07\r]|.\x08/g;
const PAGER_AT_END = /(?:--More--|More: <space>)[^\n]*$/;
const LOGIN_PROMPT = /(?:user(?:name)?|login)[ \t]*:[ \t]*$/i;
const PASSWORD_PROMPT = /password[ \t]*:[ \t]*$/i;
const ANY_PROMPT = /[\w.\-()/:@]+[>#][ \t]*$/;

interface PendingRead {
  pattern: RegExp;
  resolve: (text: string) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function stripControl(text: string): string {
  return text.replace(CONTROL_SEQUENCES, '');
}

function lastLineOf(text: string): string {
  const lines = text.split('\n');
  return lines[lines.length - 1].trim();
}

/** Pattern for `<base>#`, `<base>>` and config modes such as `<base>(config-if)#`. */
export function promptPatternFor(promptLine: string): RegExp {
  const base = promptLine.trim().replace(/(?:\([\w-]*\))?[>#]$/, '');
  return new RegExp(`${escapeRegExp(base)}(?:\\([\\w-]*\\))?[>#][ \\t]*$`);
}

/**
 * Removes the echoed command and the trailing prompt from raw channel text.
 */
export function cleanOutput(raw: string, command: string, prompt: RegExp): string {
  const lines = stripControl(raw).split('\n');
  if (lines.length > 0 && lines[0].trim().endsWith(command.trim())) {
    lines.shift();
  }
  if (lines.length > 0 && prompt.test(lines[lines.length - 1])) {
    lines.pop();
  }
  return lines.join('\n').trimEnd();
}

/**
 * Prompt-driven request/response over an interactive channel. Subclasses
 * provide the byte pipe; this class owns login, privilege escalation,
 * paging, command framing and the closed-connection semantics.
 */
export abstract class CliSession implements Transport {
  abstract readonly kind: TransportKind;
  protected abstract readonly tag: string;
  protected readonly newline: string = '\n';

  private buffer = '';
  private pending: PendingRead | null = null;
  private queue: Promise<unknown> = Promise.resolve();
  private promptPattern: RegExp = ANY_PROMPT;
  private currentPrompt = '';
  private closedReason: string | null = null;
  protected established = false;

  constructor(protected readonly params: ConnectionParams) {}

  protected get readTimeoutMs(): number {
    return this.params.timeout * 1000 * this.params.globalDelayFactor;
  }

  /** Establish the byte pipe and wire receive()/channelClosed(). */
  protected abstract connectChannel(): Promise<void>;
  protected abstract writeChannel(data: string | Buffer): void;
  /** Tear the pipe down without emitting channelClosed(). */
  protected abstract destroyChannel(): void;
  abstract isAlive(): AliveState;

  get prompt(): string {
    return this.currentPrompt;
  }

  async open(): Promise<void> {
    if (this.established) return;
    const target = `${this.params.host}:${this.params.port}`;
    logger.info(this.tag, `Connecting to ${target} as ${this.params.username}...`);

    this.closedReason = null;
    this.buffer = '';
    try {
      await this.connectChannel();
      await this.login();
      await this.enable();
      await this.execute('terminal length 0');
    } catch (e) {
      this.teardown();
      logger.error(this.tag, `Failed to open session to ${target}:`, errorMessage(e));
      if (e instanceof ConnectionException) throw e;
      throw new ConnectionException(`Cannot open ${this.kind} session to ${target}: ${errorMessage(e)}`);
    }

    this.established = true;
    logger.info(this.tag, `Connected to ${target} (${this.currentPrompt})`);
  }

  async close(): Promise<void> {
    if (this.established) {
      logger.info(this.tag, `Closing session to ${this.params.host}`);
    }
    this.teardown();
  }

  writeRaw(data: string | Buffer): void {
    this.assertOpen();
    this.writeChannel(data);
  }

  sendCommand(command: string): Promise<string> {
    const run = this.queue.then(() => {
      this.assertOpen();
      return this.execute(command);
    });
    // Keep the chain alive after a failure; the caller still sees the rejection
    this.queue = run.catch(() => undefined);
    return run;
  }

  /** Feed decoded channel text. */
  protected receive(chunk: string): void {
    this.buffer += stripControl(chunk);
    if (PAGER_AT_END.test(this.buffer)) {
      this.buffer = this.buffer.replace(PAGER_AT_END, '');
      this.writeChannel(' ');
    }
    this.settlePending();
  }

  /** The pipe went away underneath an established or opening session. */
  protected channelClosed(reason: string): void {
    if (this.closedReason) return;
    this.closedReason = reason;
    const wasEstablished = this.established;
    this.established = false;
    if (wasEstablished) {
      logger.warn(this.tag, `Connection to ${this.params.host} lost: ${reason}`);
    }
    this.rejectPending(new ConnectionClosedException(reason));
  }

  /**
   * Gives up on the channel after a read timeout. Output still in flight
   * would otherwise be read as the reply to the next command.
   */
  private abandon(reason: string): void {
    this.channelClosed(reason);
    try {
      this.destroyChannel();
    } catch (e) {
      logger.debug(this.tag, 'Error while abandoning channel:', errorMessage(e));
    }
  }

  private assertOpen(): void {
    if (this.established) return;
    if (this.closedReason) throw new ConnectionClosedException(this.closedReason);
    throw new ConnectionException(`No open ${this.kind} session to ${this.params.host}`);
  }

  private teardown(): void {
    this.established = false;
    this.rejectPending(new ConnectionClosedException('Session closed'));
    try {
      this.destroyChannel();
    } catch (e) {
      logger.debug(this.tag, 'Error while tearing down channel:', errorMessage(e));
    }
    this.buffer = '';
    this.closedReason = null;
  }

  private settlePending(): void {
    if (!this.pending) return;
    const match = this.pending.pattern.exec(this.buffer);
    if (!match) return;

    const end = match.index + match[0].length;
    const text = this.buffer.slice(0, end);
    this.buffer = this.buffer.slice(end);

    const { resolve, timer } = this.pending;
    clearTimeout(timer);
    this.pending = null;
    resolve(text);
  }

  private rejectPending(error: Error): void {
    if (!this.pending) return;
    const { reject, timer } = this.pending;
    clearTimeout(timer);
    this.pending = null;
    reject(error);
  }

  protected readUntil(pattern: RegExp, timeoutMs: number = this.readTimeoutMs): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      if (this.closedReason) {
        reject(new ConnectionClosedException(this.closedReason));
        return;
      }
      const timer = setTimeout(() => {
        this.abandon(`Timed out after ${timeoutMs}ms waiting for ${this.params.host}`);
      }, timeoutMs);
      this.pending = { pattern, resolve, reject, timer };
      this.settlePending();
    });
  }

  private async login(): Promise<void> {
    const waitFor = new RegExp(`${LOGIN_PROMPT.source}|${PASSWORD_PROMPT.source}|${ANY_PROMPT.source}`, 'i');
    // Some images ask again inside an authenticated SSH shell; telnet always asks
    for (let round = 0; round < 4; round++) {
      const line = lastLineOf(await this.readUntil(waitFor));
      if (LOGIN_PROMPT.test(line)) {
        this.writeChannel(this.params.username + this.newline);
      } else if (PASSWORD_PROMPT.test(line)) {
        this.writeChannel(this.params.password + this.newline);
      } else {
        this.currentPrompt = line;
        this.promptPattern = promptPatternFor(line);
        return;
      }
    }
    throw new ConnectionException(`Authentication to ${this.params.host} failed`);
  }

  private async enable(): Promise<void> {
    if (this.currentPrompt.endsWith('#')) return;

    this.writeChannel('enable' + this.newline);
    const waitFor = new RegExp(`${PASSWORD_PROMPT.source}|${this.promptPattern.source}`, 'i');
    let line = lastLineOf(await this.readUntil(waitFor));
    if (PASSWORD_PROMPT.test(line)) {
      this.writeChannel((this.params.secret || this.params.password) + this.newline);
      line = lastLineOf(await this.readUntil(this.promptPattern));
    }

    this.currentPrompt = line;
    if (!line.endsWith('#')) {
      throw new ConnectionException(`Could not enter privileged mode on ${this.params.host}`);
    }
  }

  private async execute(command: string): Promise<string> {
    logger[this.params.verbose ? 'info' : 'debug'](this.tag, `>> ${command}`);
    this.buffer = '';
    this.writeChannel(command + this.newline);
    const raw = await this.readUntil(this.promptPattern);
    this.currentPrompt = lastLineOf(raw);
    return cleanOutput(raw, command, this.promptPattern);
  }
}
