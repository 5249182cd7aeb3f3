import type { ChatRequest } from './request.js';
import type { ChatCompletion } from './response.js';
import type { ChatCompletionChunk } from './stream.js';

export interface ChatTransport {
  readonly name: string;
  complete(request: ChatRequest): Promise<ChatCompletion>;
  stream(request: ChatRequest): AsyncIterable<ChatCompletionChunk>;
}
