export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export type FetchErrorKind = 'transport' | 'unexpected-status' | 'decode' | 'mismatch' | 'empty';

export class FetchError extends Error {
  readonly status?: number;

  constructor(
    public readonly kind: FetchErrorKind,
    public readonly target: string,
    message: string,
    options: { status?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'FetchError';
    this.status = options.status;
  }
}

export type ScanErrorKind = 'transport' | 'unexpected-status' | 'auth-redirect';

export class ScanError extends Error {
  readonly status?: number;

  constructor(
    public readonly kind: ScanErrorKind,
    public readonly packageName: string,
    message: string,
    options: { status?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'ScanError';
    this.status = options.status;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
