import type { FailureKind } from './config.js';

export class SDKError extends Error {
  override name: string;
  override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    this.cause = cause;
  }
}

export class ConfigurationError extends SDKError {}

export class InvalidInputError extends SDKError {}

export class AbortError extends SDKError {}

export class RequestTimeoutError extends SDKError {}

export class NetworkError extends SDKError {}

export class StreamError extends SDKError {}

export class EmptyResponseError extends SDKError {
  constructor(message = 'Response has no choices') {
    super(message);
  }
}

export class SchemaMismatchError extends SDKError {
  readonly raw: unknown;

  constructor(message: string, raw: unknown, cause?: Error) {
    super(message, cause);
    this.raw = raw;
  }
}

export class RetryExhaustedError extends SDKError {
  readonly attempts: number;
  readonly lastKind: FailureKind;

  constructor(attempts: number, lastKind: FailureKind, cause: Error) {
    super(`Gave up after ${attempts} attempt(s), last failure (${lastKind}): ${cause.message}`, cause);
    this.attempts = attempts;
    this.lastKind = lastKind;
  }
}

/**
 * Raised when a stream fails after some chunks already reached the caller.
 * Never retried: replaying would duplicate delivered output.
 */
export class StreamInterruptedError extends StreamError {
  readonly chunksDelivered: number;

  constructor(chunksDelivered: number, cause: Error) {
    super(`Stream failed after ${chunksDelivered} chunk(s): ${cause.message}`, cause);
    this.chunksDelivered = chunksDelivered;
  }
}

export class ProviderError extends SDKError {
  readonly statusCode: number;
  readonly retryable: boolean;
  readonly retryAfter: number | null;
  readonly provider: string;
  readonly errorCode: string | null;
  readonly raw: unknown;

  constructor(
    message: string,
    statusCode: number,
    retryable: boolean,
    provider: string,
    errorCode: string | null = null,
    raw: unknown = null,
    retryAfter: number | null = null,
  ) {
    super(message);
    this.statusCode = statusCode;
    this.retryable = retryable;
    this.retryAfter = retryAfter;
    this.provider = provider;
    this.errorCode = errorCode;
    this.raw = raw;
  }
}

export class AuthenticationError extends ProviderError {
  constructor(
    message: string,
    statusCode: number,
    provider: string,
    errorCode: string | null = null,
    raw: unknown = null,
  ) {
    super(message, statusCode, false, provider, errorCode, raw);
  }
}

export class AccessDeniedError extends ProviderError {
  constructor(
    message: string,
    statusCode: number,
    provider: string,
    errorCode: string | null = null,
    raw: unknown = null,
  ) {
    super(message, statusCode, false, provider, errorCode, raw);
  }
}

export class NotFoundError extends ProviderError {
  constructor(
    message: string,
    statusCode: number,
    provider: string,
    errorCode: string | null = null,
    raw: unknown = null,
  ) {
    super(message, statusCode, false, provider, errorCode, raw);
  }
}

export class InvalidRequestError extends ProviderError {
  constructor(
    message: string,
    statusCode: number,
    provider: string,
    errorCode: string | null = null,
    raw: unknown = null,
  ) {
    super(message, statusCode, false, provider, errorCode, raw);
  }
}

export class ContextLengthError extends InvalidRequestError {}

export class ContentFilterError extends InvalidRequestError {}

export class RateLimitError extends ProviderError {
  constructor(
    message: string,
    statusCode: number,
    provider: string,
    errorCode: string | null = null,
    raw: unknown = null,
    retryAfter: number | null = null,
  ) {
    super(message, statusCode, true, provider, errorCode, raw, retryAfter);
  }
}

export class ServerError extends ProviderError {
  constructor(
    message: string,
    statusCode: number,
    provider: string,
    errorCode: string | null = null,
    raw: unknown = null,
    retryAfter: number | null = null,
  ) {
    super(message, statusCode, true, provider, errorCode, raw, retryAfter);
  }
}
