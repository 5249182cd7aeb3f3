import type { FunctionCall } from './function.js';
import type { Role } from './message.js';

export type FinishReason = 'stop' | 'length' | 'function_call' | 'tool_calls' | 'content_filter' | 'unknown';

export type Usage = {
  readonly promptTokens: number;
  readonly completionTokens: number;
  readonly totalTokens: number;
};

export type Choice = {
  readonly index: number;
  readonly role: Role;
  readonly content: string;
  readonly finishReason: FinishReason;
  readonly functionCall: FunctionCall | null;
};

export type ChatCompletion = {
  readonly id: string;
  readonly object: string;
  readonly created: number;
  readonly model: string;
  readonly choices: ReadonlyArray<Choice>;
  readonly usage: Usage | null;
};

export function toFinishReason(raw: string | null | undefined): FinishReason {
  switch (raw) {
    case 'stop':
    case 'length':
    case 'function_call':
    case 'tool_calls':
    case 'content_filter':
      return raw;
    default:
      return 'unknown';
  }
}
