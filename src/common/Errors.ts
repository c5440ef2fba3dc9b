/**
 * Error types shared by the engine, the protocol layer and the CLI.
 *
 * Protocol errors are answered on the connection that caused them; the
 * others end whatever operation raised them.
 */

export class ChanstoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ChanstoreError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends ChanstoreError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ChannelClosedError extends ChanstoreError {
  constructor(message: string = 'Channel closed') {
    super(message);
    this.name = 'ChannelClosedError';
  }
}

export class StorageEngineStoppedError extends ChannelClosedError {
  constructor() {
    super('Storage engine stopped');
    this.name = 'StorageEngineStoppedError';
  }
}

/** A request line the protocol cannot make sense of. */
export class ParseError extends ChanstoreError {
  constructor(reason: string) {
    super(`parse error: ${reason}`);
    this.name = 'ParseError';
  }
}

export class ValueTooLongError extends ChanstoreError {
  public readonly maxLength: number;

  constructor(maxLength: number) {
    super(`value is too long, max allowed length is ${maxLength} bytes`);
    this.name = 'ValueTooLongError';
    this.maxLength = maxLength;
  }
}
