import type { ChatMessage } from './message.js';
import type { FunctionDefinition } from './function.js';
import type { TimeoutConfig } from './config.js';

/** API parameters sent alongside the messages, keyed by their wire name. */
export type CompletionOptions = Readonly<Record<string, unknown>>;

export type ChatRequest = {
  readonly model: string;
  readonly messages: ReadonlyArray<ChatMessage>;
  readonly options: CompletionOptions;
  readonly functions?: ReadonlyArray<FunctionDefinition>;
  readonly timeout?: TimeoutConfig;
  readonly signal?: AbortSignal;
};
