import type { TransportKind } from '../config';

export interface AliveState {
  isAlive: boolean;
}

/**
 * One interactive CLI session. Implementations allow a single command in
 * flight; concurrent sendCommand calls are queued.
 */
export interface Transport {
  readonly kind: TransportKind;
  open(): Promise<void>;
  /** Safe to call repeatedly and after a failed open(). */
  close(): Promise<void>;
  isAlive(): AliveState;
  writeRaw(data: string | Buffer): void;
  sendCommand(command: string): Promise<string>;
}
