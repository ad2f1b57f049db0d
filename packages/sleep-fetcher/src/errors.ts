type FetcherErrorCode =
  | 'config'
  | 'invalid-cursor'
  | 'store-write'
  | 'stalled-cursor';

class FetcherError extends Error {
  readonly code: FetcherErrorCode;

  constructor(code: FetcherErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'FetcherError';
    this.code = code;
  }
}

class ConfigurationError extends FetcherError {
  constructor(message: string, options?: ErrorOptions) {
    super('config', message, options);
    this.name = 'ConfigurationError';
  }
}

class InvalidCursorError extends FetcherError {
  readonly cursor: unknown;

  constructor(cursor: unknown) {
    super(
      'invalid-cursor',
      `Cursor must be a positive integer timestamp in milliseconds, got ${String(cursor)}`,
    );
    this.name = 'InvalidCursorError';
    this.cursor = cursor;
  }
}

class StoreWriteError extends FetcherError {
  readonly path: string;

  constructor(path: string, options?: ErrorOptions) {
    const reason =
      options?.cause instanceof Error ? options.cause.message : 'unknown error';
    super('store-write', `Failed to write ${path}: ${reason}`, options);
    this.name = 'StoreWriteError';
    this.path = path;
  }
}

class StalledCursorError extends FetcherError {
  readonly cursor: number;
  readonly batchMinFromTime: number;

  constructor(cursor: number, batchMinFromTime: number) {
    super(
      'stalled-cursor',
      `Endpoint returned a page starting at ${batchMinFromTime}, not before cursor ${cursor}; refusing to fetch the same page again`,
    );
    this.name = 'StalledCursorError';
    this.cursor = cursor;
    this.batchMinFromTime = batchMinFromTime;
  }
}

export {
  FetcherError,
  ConfigurationError,
  InvalidCursorError,
  StoreWriteError,
  StalledCursorError,
};
export type { FetcherErrorCode };
