export class OracleError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OracleError';
  }
}

/** A value the canonical encoder cannot render deterministically. */
export class EncodingError extends OracleError {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(`${message} at ${path}`);
    this.name = 'EncodingError';
  }
}

export class KeyLoadError extends OracleError {
  constructor(
    message: string,
    public readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(`${message}: ${filePath}`, options);
    this.name = 'KeyLoadError';
  }
}

export class InvalidKeyError extends OracleError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidKeyError';
  }
}

export class InvalidDigestError extends OracleError {
  constructor(public readonly length: number) {
    super(`Digest must be 32 bytes, got ${length}`);
    this.name = 'InvalidDigestError';
  }
}

export class OracleIOError extends OracleError {
  constructor(
    message: string,
    public readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(`${message}: ${filePath}`, options);
    this.name = 'OracleIOError';
  }
}

export class ValidationError extends OracleError {
  constructor(
    message: string,
    public readonly errors: string[],
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class EnvelopeFormatError extends ValidationError {
  constructor(
    public readonly filePath: string,
    errors: string[],
  ) {
    super(`Malformed signed-record file ${filePath}: ${errors.join('; ')}`, errors);
    this.name = 'EnvelopeFormatError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
