import { z } from 'zod';
import {
  AuthenticationError,
  AccessDeniedError,
  NotFoundError,
  InvalidRequestError,
  ContextLengthError,
  RateLimitError,
  ContentFilterError,
  ServerError,
  ProviderError,
  RequestTimeoutError,
  type SDKError,
} from '../types/error.js';

export type MapHttpErrorOptions = {
  readonly statusCode: number;
  readonly body: string;
  readonly provider: string;
  readonly headers: Headers;
};

const errorEnvelopeSchema = z.object({
  error: z.object({
    message: z.string().optional(),
    code: z.union([z.string(), z.number()]).nullable().optional(),
    type: z.string().nullable().optional(),
  }),
});

/**
 * Parses the Retry-After header from response headers.
 * Returns milliseconds, or null if header is not present.
 *
 * - Numeric value (seconds): parsed as int and converted to ms
 * - HTTP date string: computed as delta from now in ms
 */
export function parseRetryAfter(headers: Headers): number | null {
  const retryAfter = headers.get('Retry-After');
  if (!retryAfter) {
    return null;
  }

  if (/^\d+$/.test(retryAfter)) {
    return Number(retryAfter) * 1000;
  }

  const retryDate = new Date(retryAfter);
  if (!isNaN(retryDate.getTime())) {
    return Math.max(0, retryDate.getTime() - Date.now());
  }

  return null;
}

/**
 * Pulls `error.code` (falling back to `error.type`) out of an OpenAI-style
 * error body. Returns null for anything else.
 */
export function parseErrorCode(body: string): string | null {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return null;
  }

  const parsed = errorEnvelopeSchema.safeParse(json);
  if (!parsed.success) {
    return null;
  }

  const { code, type } = parsed.data.error;
  if (code !== null && code !== undefined) {
    return String(code);
  }
  return type ?? null;
}

/**
 * Maps HTTP status codes and response bodies to typed errors.
 * Uses status code-based classification with message-based fallback for ambiguous codes.
 */
export function mapHttpError(options: MapHttpErrorOptions): SDKError {
  const { statusCode, body, provider, headers } = options;
  const retryAfter = parseRetryAfter(headers);
  const errorCode = parseErrorCode(body);

  switch (statusCode) {
    case 400:
      return classifyHttp400(body, provider, errorCode, statusCode);

    case 401:
      return new AuthenticationError(`Authentication failed: ${body}`, statusCode, provider, errorCode, body);

    case 403:
      return new AccessDeniedError(`Access denied: ${body}`, statusCode, provider, errorCode, body);

    case 404:
      return new NotFoundError(`Resource not found: ${body}`, statusCode, provider, errorCode, body);

    case 408:
      return new RequestTimeoutError(`Request timed out upstream: ${body}`);

    case 413:
      return new ContextLengthError(`Context length exceeded: ${body}`, statusCode, provider, errorCode, body);

    case 422:
      return new InvalidRequestError(`Unprocessable entity: ${body}`, statusCode, provider, errorCode, body);

    case 429:
      return new RateLimitError(`Rate limit exceeded: ${body}`, statusCode, provider, errorCode, body, retryAfter);

    default:
      if (statusCode >= 500) {
        return new ServerError(`Server error: ${body}`, statusCode, provider, errorCode, body, retryAfter);
      }

      return new ProviderError(`HTTP ${statusCode}: ${body}`, statusCode, false, provider, errorCode, body);
  }
}

/**
 * Distinguishes content filter errors, context length errors and generic
 * invalid requests among HTTP 400 responses.
 */
function classifyHttp400(
  body: string,
  provider: string,
  errorCode: string | null,
  statusCode: number,
): ProviderError {
  const lowerBody = body.toLowerCase();

  if (
    lowerBody.includes('content_filter') ||
    lowerBody.includes('content_policy') ||
    lowerBody.includes('safety')
  ) {
    return new ContentFilterError(`Content filtered: ${body}`, statusCode, provider, errorCode, body);
  }

  if (
    lowerBody.includes('context_length') ||
    lowerBody.includes('too many tokens') ||
    lowerBody.includes('maximum context')
  ) {
    return new ContextLengthError(`Context length exceeded: ${body}`, statusCode, provider, errorCode, body);
  }

  return new InvalidRequestError(`Invalid request: ${body}`, statusCode, provider, errorCode, body);
}
