export class ThrottleError extends Error {
  readonly retryable: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Settings that can never produce a decision (non-positive window or burst,
 * an unknown rps sentinel, a malformed counter window). Not retryable: the
 * caller or the operator has to fix the knobs.
 */
export class InvalidConfigurationError extends ThrottleError {}

/**
 * The shared store could not run the atomic unit. No allow/deny decision was
 * made and no key was changed; whether to retry, fail open or fail closed is
 * up to the caller.
 */
export class StoreUnavailableError extends ThrottleError {
  override readonly retryable = true;
}

export class ThrottleNotFoundError extends ThrottleError {}
