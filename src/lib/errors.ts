export class DigestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network-level failure, or a 2xx body that could not be decoded. Retryable. */
export class TransportFailure extends DigestError {}

/** HTTP 429. `retryAfterMs` is the server hint, when one was sent and could be parsed. */
export class RateLimited extends DigestError {
  constructor(
    message: string,
    readonly retryAfterMs: number | null
  ) {
    super(message);
  }
}

/** Any other non-2xx answer. Terminal. */
export class SourceRejected extends DigestError {
  constructor(
    message: string,
    readonly status: number,
    readonly body = ""
  ) {
    super(message);
  }
}

export class SourceUnavailable extends DigestError {}

export class FetchExhausted extends SourceUnavailable {
  constructor(
    message: string,
    readonly attempts: number,
    readonly lastError: Error
  ) {
    super(message, { cause: lastError });
  }
}

export class MalformedRecord extends DigestError {
  constructor(
    message: string,
    readonly field: string,
    readonly value: unknown
  ) {
    super(message);
  }
}

export type PublishFailureKind = "conflict" | "unavailable" | "rejected";

export class PublishError extends DigestError {
  constructor(
    message: string,
    readonly kind: PublishFailureKind,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ConfigError extends DigestError {}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
