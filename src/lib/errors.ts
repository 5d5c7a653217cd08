export class DriverError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The session could not be established (DNS, auth, refused, ready timeout). */
export class ConnectionException extends DriverError {}

/** An established session was lost: socket error, end of stream or read timeout. */
export class ConnectionClosedException extends DriverError {}

export class CommandErrorException extends DriverError {}

export class UnsupportedCommandException extends CommandErrorException {
  constructor(
    public readonly commands: string[],
    public readonly lastOutput: string,
  ) {
    super(`Device rejected every command variant: ${commands.map(c => `'${c}'`).join(', ')}`);
  }
}

/**
 * A structurally required field was missing or malformed in device output.
 * Optional fields never raise this; they fall back to their defaults.
 */
export class ParseError extends DriverError {
  constructor(
    public readonly field: string,
    message: string,
  ) {
    super(`${field}: ${message}`);
  }
}

export class ConfigError extends DriverError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
