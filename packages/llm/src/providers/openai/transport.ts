import type { ChatTransport, ChatRequest, ChatCompletion, ChatCompletionChunk } from '../../types/index.js';
import { fetchWithTimeout, fetchStream } from '../../utils/http.js';
import { createSSEStream } from '../../utils/sse.js';
import { translateRequest } from './request.js';
import { translateResponse } from './response.js';
import { translateStream } from './stream.js';

export type ChatEndpoint = {
  readonly url: string;
  readonly headers: Record<string, string>;
  readonly includeModel: boolean;
};

/**
 * Shared Chat Completions wire handling. Subclasses only decide where the
 * request goes and how it authenticates.
 */
export abstract class ChatCompletionsTransport implements ChatTransport {
  abstract readonly name: string;

  protected abstract endpoint(): ChatEndpoint;

  async complete(request: ChatRequest): Promise<ChatCompletion> {
    const { url, headers, includeModel } = this.endpoint();

    const result = await fetchWithTimeout({
      url,
      method: 'POST',
      headers,
      body: translateRequest(request, { streaming: false, includeModel }),
      timeout: request.timeout,
      signal: request.signal,
      provider: this.name,
    });

    return translateResponse(result.body);
  }

  async* stream(request: ChatRequest): AsyncGenerator<ChatCompletionChunk> {
    const { url, headers, includeModel } = this.endpoint();

    const response = await fetchStream({
      url,
      method: 'POST',
      headers,
      body: translateRequest(request, { streaming: true, includeModel }),
      timeout: request.timeout,
      signal: request.signal,
      provider: this.name,
    });

    yield* translateStream(createSSEStream(response));
  }
}

export function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}
