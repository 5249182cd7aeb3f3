import type { ChatTransport, ChatRequest, ChatCompletionChunk } from '../types/index.js';
import { StreamInterruptedError } from '../types/index.js';
import { retry } from '../utils/retry.js';
import { DEFAULT_RETRY_POLICY } from './constants.js';
import type { ExecuteOptions } from './execute.js';

/**
 * Streams one request as a single-pass sequence of chunks.
 *
 * Nothing is sent until the first pull. Opening the stream and reading its
 * first chunk are retried together; after a chunk has been handed out, a
 * failure ends the sequence with StreamInterruptedError. Leaving the loop
 * early closes the underlying stream.
 */
export async function* executeStream(
  transport: ChatTransport,
  request: ChatRequest,
  options: ExecuteOptions = {},
): AsyncGenerator<ChatCompletionChunk> {
  const opened = await retry(
    async () => {
      const iterator = transport.stream(request)[Symbol.asyncIterator]();
      try {
        const first = await iterator.next();
        return { iterator, first };
      } catch (error) {
        await iterator.return?.();
        throw error;
      }
    },
    {
      policy: options.policy ?? DEFAULT_RETRY_POLICY,
      onRetry: options.onRetry,
    },
  );

  const { iterator } = opened;
  let result = opened.first;
  let delivered = 0;
  let settled = false;

  try {
    while (!result.done) {
      yield result.value;
      delivered += 1;

      try {
        result = await iterator.next();
      } catch (error) {
        settled = true;
        throw new StreamInterruptedError(
          delivered,
          error instanceof Error ? error : new Error(String(error)),
        );
      }
    }
    settled = true;
  } finally {
    if (!settled) {
      await iterator.return?.();
    }
  }
}
