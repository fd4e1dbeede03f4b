/**
 * Error taxonomy shared by the dialogue and the external clients.
 */

/** Bad user input (party size, amount token). Always answered with a corrective prompt. */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** A programming-level precondition failed (e.g. dividing by zero people). */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/** The conversation is not in the stage the input belongs to. */
export class StateMismatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StateMismatchError';
  }
}

export type ProviderErrorKind = 'rate_limited' | 'permission_denied' | 'unknown';

/** OCR provider or transport failure. */
export class ProviderError extends Error {
  readonly kind: ProviderErrorKind;
  readonly status: number | undefined;
  /** Network or timeout failure: the request may not have reached the provider. */
  readonly transient: boolean;

  constructor(
    kind: ProviderErrorKind,
    message: string,
    options: { status?: number; transient?: boolean; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'ProviderError';
    this.kind = kind;
    this.status = options.status;
    this.transient = options.transient ?? false;
  }

  get retryable(): boolean {
    return this.transient || this.kind === 'rate_limited' || (this.status !== undefined && this.status >= 500);
  }
}
