import { UnsupportedCommandException } from './errors';
import { logger } from './logger';
import type { Transport } from './transport';

export const INVALID_MARKER = '% Invalid';

export interface DispatcherOptions {
  /** Throw when every variant is rejected instead of returning the last response. */
  strictCommands: boolean;
}

/**
 * Sends a command, or the first accepted of several spellings of one, over a
 * transport. Firmware releases disagree on some keywords (`show process cpu`
 * versus `show proc cpu`), so callers may pass every known variant.
 */
export class CommandDispatcher {
  constructor(
    private readonly transport: Transport,
    private readonly options: DispatcherOptions = { strictCommands: true },
  ) {}

  async send(command: string | readonly string[]): Promise<string> {
    const candidates = typeof command === 'string' ? [command] : [...command];
    if (candidates.length === 0) {
      throw new Error('No command given');
    }

    let output = '';
    for (const candidate of candidates) {
      output = await this.transport.sendCommand(candidate);
      if (!output.includes(INVALID_MARKER)) {
        return output;
      }
      logger.debug('Dispatcher', `Device rejected '${candidate}'`);
    }

    if (this.options.strictCommands) {
      throw new UnsupportedCommandException(candidates, output);
    }
    logger.warn('Dispatcher', `Every variant of '${candidates[0]}' was rejected; returning the last response`);
    return output;
  }
}
