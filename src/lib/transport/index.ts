import type { ConnectionParams } from '../config';
import { SshTransport } from './ssh';
import { TelnetTransport } from './telnet';
import type { Transport } from './types';

export type { AliveState, Transport } from './types';

export function createTransport(params: ConnectionParams): Transport {
  switch (params.kind) {
    case 'ssh':
      return new SshTransport(params);
    case 'telnet':
      return new TelnetTransport(params);
  }
}
