import type { ChatCompletion, Choice } from '../../types/index.js';
import { SchemaMismatchError, toFinishReason } from '../../types/index.js';
import { completionSchema } from './schema.js';

export function translateResponse(raw: unknown): ChatCompletion {
  const parsed = completionSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SchemaMismatchError(
      `Unexpected completion payload: ${parsed.error.message}`,
      raw,
      parsed.error,
    );
  }

  const { id, object, created, model, choices, usage } = parsed.data;

  return {
    id,
    object,
    created,
    model,
    choices: choices.map(
      (choice): Choice => ({
        index: choice.index,
        role: choice.message.role,
        content: choice.message.content ?? '',
        finishReason: toFinishReason(choice.finish_reason),
        functionCall: choice.message.function_call ?? null,
      }),
    ),
    usage: usage
      ? {
          promptTokens: usage.prompt_tokens,
          completionTokens: usage.completion_tokens,
          totalTokens: usage.total_tokens,
        }
      : null,
  };
}
