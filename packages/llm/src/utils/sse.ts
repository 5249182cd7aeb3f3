import { EventSourceParserStream } from 'eventsource-parser/stream';
import { StreamError } from '../types/error.js';
import { classifyTransportError } from './http.js';

export type SSEEvent = {
  readonly event: string;
  readonly data: string;
  readonly id?: string;
};

/**
 * Creates an async iterable of SSE events from a Response body.
 * Pipes the response body through EventSourceParserStream and yields parsed events.
 *
 * Stopping iteration early cancels the body, which releases the connection.
 * A body that fails mid-read surfaces as NetworkError, or AbortError when the
 * caller aborted.
 */
export async function* createSSEStream(
  response: globalThis.Response,
): AsyncGenerator<SSEEvent> {
  const body = response.body;
  if (!body) {
    throw new StreamError('Response body is null or undefined');
  }

  const reader = body
    .pipeThrough(new TextDecoderStream())
    .pipeThrough(new EventSourceParserStream())
    .getReader();

  let finished = false;
  try {
    while (true) {
      const result = await reader.read().catch((err: unknown) => {
        finished = true;
        throw classifyTransportError(err);
      });

      if (result.done) {
        finished = true;
        return;
      }

      const { value } = result;
      yield {
        event: value.event || '',
        data: value.data || '',
        ...(value.id && { id: value.id }),
      };
    }
  } finally {
    if (!finished) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}
