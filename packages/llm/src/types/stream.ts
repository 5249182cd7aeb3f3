import type { FunctionCall } from './function.js';
import type { FinishReason } from './response.js';
import type { Role } from './message.js';

export type ChunkDelta = {
  readonly role: Role | null;
  readonly content: string | null;
  /** Partial call: `arguments` arrives in pieces across chunks. */
  readonly functionCall: Partial<FunctionCall> | null;
};

export type ChunkChoice = {
  readonly index: number;
  readonly delta: ChunkDelta;
  readonly finishReason: FinishReason | null;
};

export type ChatCompletionChunk = {
  readonly id: string;
  readonly object: string;
  readonly created: number;
  readonly model: string;
  readonly choices: ReadonlyArray<ChunkChoice>;
};
