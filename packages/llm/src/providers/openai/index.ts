import { ChatCompletionsTransport, trimTrailingSlash, type ChatEndpoint } from './transport.js';

export const OPENAI_DEFAULT_BASE_URL = 'https://api.openai.com/v1';

export class OpenAIChatTransport extends ChatCompletionsTransport {
  readonly name = 'openai';
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(apiKey: string, options?: { readonly baseUrl?: string }) {
    super();
    this.apiKey = apiKey;
    this.baseUrl = trimTrailingSlash(options?.baseUrl || OPENAI_DEFAULT_BASE_URL);
  }

  protected endpoint(): ChatEndpoint {
    return {
      url: `${this.baseUrl}/chat/completions`,
      headers: { Authorization: `Bearer ${this.apiKey}` },
      includeModel: true,
    };
  }
}

export { ChatCompletionsTransport, type ChatEndpoint } from './transport.js';
export { translateRequest } from './request.js';
export { translateResponse } from './response.js';
export { translateStream, translateChunk } from './stream.js';
