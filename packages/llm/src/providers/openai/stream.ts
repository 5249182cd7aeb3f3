import type { SSEEvent } from '../../utils/sse.js';
import type { ChatCompletionChunk } from '../../types/index.js';
import { SchemaMismatchError, toFinishReason } from '../../types/index.js';
import { chunkSchema } from './schema.js';

export function translateChunk(raw: unknown): ChatCompletionChunk {
  const parsed = chunkSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SchemaMismatchError(
      `Unexpected stream chunk: ${parsed.error.message}`,
      raw,
      parsed.error,
    );
  }

  const { id, object, created, model, choices } = parsed.data;

  return {
    id,
    object,
    created,
    model,
    choices: choices.map((choice) => ({
      index: choice.index,
      delta: {
        role: choice.delta.role ?? null,
        content: choice.delta.content ?? null,
        functionCall: choice.delta.function_call ?? null,
      },
      finishReason: choice.finish_reason ? toFinishReason(choice.finish_reason) : null,
    })),
  };
}

/**
 * Turns `data:` frames into chunks, one per frame, in arrival order.
 * `[DONE]` ends the stream.
 */
export async function* translateStream(
  sseStream: AsyncIterable<SSEEvent>,
): AsyncGenerator<ChatCompletionChunk> {
  for await (const event of sseStream) {
    if (!event.data) {
      continue;
    }

    if (event.data === '[DONE]') {
      return;
    }

    let data: unknown;
    try {
      data = JSON.parse(event.data);
    } catch (err) {
      throw new SchemaMismatchError(
        'Stream frame is not valid JSON',
        event.data,
        err instanceof Error ? err : undefined,
      );
    }

    yield translateChunk(data);
  }
}
