import {
  AbortError,
  NetworkError,
  RequestTimeoutError,
  SchemaMismatchError,
  SDKError,
} from '../types/error.js';
import type { TimeoutConfig } from '../types/config.js';
import { mapHttpError } from './error-mapping.js';

export type FetchOptions = {
  readonly url: string;
  readonly method?: string;
  readonly headers?: Record<string, string>;
  readonly body?: unknown;
  readonly timeout?: TimeoutConfig;
  readonly signal?: AbortSignal;
  /** Name reported on mapped HTTP errors. */
  readonly provider?: string;
};

export type FetchResult = {
  readonly response: globalThis.Response;
  readonly body: unknown;
};

/**
 * Fetches with timeout support, header merging, and JSON body serialization.
 * Returns both the raw response and parsed JSON body.
 */
export async function fetchWithTimeout(
  options: FetchOptions,
): Promise<FetchResult> {
  return sendRequest(options, async (response) => {
    const text = await response.text();
    try {
      return { response, body: JSON.parse(text) };
    } catch (err) {
      throw new SchemaMismatchError(
        'Response body is not valid JSON',
        text,
        err instanceof Error ? err : undefined,
      );
    }
  });
}

/**
 * Fetches and returns the raw Response object for streaming.
 * Does not read the body; the timeout only covers getting the response headers.
 */
export async function fetchStream(
  options: FetchOptions,
): Promise<globalThis.Response> {
  return sendRequest(options, async (response) => response);
}

async function sendRequest<T>(
  options: FetchOptions,
  onResponse: (response: globalThis.Response) => Promise<T>,
): Promise<T> {
  const {
    url,
    method = 'GET',
    headers: customHeaders = {},
    body: bodyData,
    timeout,
    signal: externalSignal,
    provider = 'unknown',
  } = options;

  if (externalSignal?.aborted) {
    throw new AbortError('Signal was already aborted');
  }

  const timeoutController = new AbortController();
  const linked = linkSignals(externalSignal, timeoutController.signal);

  let timedOut = false;
  let timeoutId: ReturnType<typeof setTimeout> | null = null;
  if (timeout?.requestMs) {
    timeoutId = setTimeout(() => {
      timedOut = true;
      timeoutController.abort();
    }, timeout.requestMs);
  }

  const toTransportError = (err: unknown): SDKError =>
    classifyTransportError(err, timedOut ? timeout?.requestMs : undefined);

  try {
    const mergedHeaders: Record<string, string> = {
      'Content-Type': 'application/json',
      ...customHeaders,
    };

    const body = bodyData !== undefined ? JSON.stringify(bodyData) : undefined;

    let response: globalThis.Response;
    try {
      response = await fetch(url, {
        method,
        headers: mergedHeaders,
        body,
        signal: linked.signal,
      });
    } catch (err) {
      throw toTransportError(err);
    }

    if (!response.ok) {
      const text = await response.text().catch((err: unknown) => {
        throw toTransportError(err);
      });
      throw mapHttpError({
        statusCode: response.status,
        body: text,
        provider,
        headers: response.headers,
      });
    }

    // Body reads fail the same ways fetch does: reset connections and the timeout abort
    return await onResponse(response).catch((err: unknown) => {
      throw toTransportError(err);
    });
  } finally {
    if (timeoutId !== null) {
      clearTimeout(timeoutId);
    }
    linked.dispose();
  }
}

/**
 * Turns a failure of fetch or of reading a body into a typed error. Errors
 * that are already typed pass through. `timeoutMs` is set when the request
 * timeout caused the abort.
 */
export function classifyTransportError(err: unknown, timeoutMs?: number): SDKError {
  if (err instanceof SDKError) {
    return err;
  }
  const cause = err instanceof Error ? err : undefined;
  if (isAbort(err)) {
    if (timeoutMs !== undefined) {
      return new RequestTimeoutError(`Request timed out after ${timeoutMs}ms`, cause);
    }
    return new AbortError('Fetch was aborted', cause);
  }
  // undici reports DNS failures, refused and reset connections as TypeError('fetch failed') or TypeError('terminated')
  return new NetworkError(`Network request failed: ${cause ? cause.message : String(err)}`, cause);
}

function isAbort(err: unknown): boolean {
  return (err instanceof Error || err instanceof DOMException) && err.name === 'AbortError';
}

type LinkedSignal = {
  readonly signal: AbortSignal;
  readonly dispose: () => void;
};

/**
 * Links two abort signals so that either one being aborted triggers the
 * target. `dispose` detaches the listener from the caller's signal.
 */
function linkSignals(
  externalSignal: AbortSignal | undefined,
  targetSignal: AbortSignal,
): LinkedSignal {
  if (!externalSignal) {
    return { signal: targetSignal, dispose: () => {} };
  }

  const controller = new AbortController();
  const abort = () => controller.abort();

  externalSignal.addEventListener('abort', abort, { once: true });
  targetSignal.addEventListener('abort', abort, { once: true });

  return {
    signal: controller.signal,
    dispose: () => {
      externalSignal.removeEventListener('abort', abort);
      targetSignal.removeEventListener('abort', abort);
    },
  };
}
