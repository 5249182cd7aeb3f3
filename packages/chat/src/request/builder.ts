import { z } from 'zod';
import {
  InvalidInputError,
  systemMessage,
  userMessage,
  type ChatMessage,
  type ChatRequest,
  type CompletionOptions,
  type FunctionDefinition,
  type TimeoutConfig,
} from '@tipchat/llm';
import { formatIssues } from '../utils/issues.js';

/** A bare string is shorthand for a user message. */
export type UserInput = string | ChatMessage;

export type BuildRequestInput = {
  readonly model: string;
  readonly userMessages: ReadonlyArray<UserInput>;
  readonly options?: CompletionOptions;
  readonly systemTip?: string;
  readonly functions?: ReadonlyArray<FunctionDefinition>;
  readonly timeout?: TimeoutConfig;
  readonly signal?: AbortSignal;
};

const messageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant', 'function']),
  content: z.string(),
  name: z.string().optional(),
});

const functionSchema = z.object({
  name: z.string().min(1, 'function name must not be empty'),
  description: z.string().optional(),
  parameters: z.record(z.unknown()),
});

function toMessage(input: unknown, index: number): ChatMessage {
  if (typeof input === 'string') {
    return userMessage(input);
  }

  const parsed = messageSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidInputError(`Invalid message at index ${index}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function toFunctions(input: ReadonlyArray<FunctionDefinition>): FunctionDefinition[] {
  const parsed = z.array(functionSchema).safeParse(input);
  if (!parsed.success) {
    throw new InvalidInputError(`Invalid functions: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Assembles the request payload: the system tip (when non-empty) first, then
 * the caller's messages in order.
 */
export function buildRequest(input: BuildRequestInput): ChatRequest {
  const { userMessages } = input;

  if (userMessages.length === 0) {
    throw new InvalidInputError('userMessages must contain at least one message');
  }

  const messages: ChatMessage[] = [];
  if (input.systemTip) {
    messages.push(systemMessage(input.systemTip));
  }
  userMessages.forEach((message, index) => {
    messages.push(toMessage(message, index));
  });

  return {
    model: input.model,
    messages,
    options: input.options ?? {},
    ...(input.functions && input.functions.length > 0 ? { functions: toFunctions(input.functions) } : {}),
    ...(input.timeout ? { timeout: input.timeout } : {}),
    ...(input.signal ? { signal: input.signal } : {}),
  };
}
