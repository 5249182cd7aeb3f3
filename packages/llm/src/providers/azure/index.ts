import { ChatCompletionsTransport, trimTrailingSlash, type ChatEndpoint } from '../openai/transport.js';

export type AzureTransportOptions = {
  readonly baseUrl: string;
  readonly deploymentId: string;
  readonly apiVersion: string;
};

/**
 * Azure OpenAI deployment of the Chat Completions API. The deployment in the
 * URL selects the model, and the key travels in an `api-key` header.
 */
export class AzureChatTransport extends ChatCompletionsTransport {
  readonly name = 'azure';
  private readonly apiKey: string;
  private readonly options: AzureTransportOptions;

  constructor(apiKey: string, options: AzureTransportOptions) {
    super();
    this.apiKey = apiKey;
    this.options = { ...options, baseUrl: trimTrailingSlash(options.baseUrl) };
  }

  protected endpoint(): ChatEndpoint {
    const { baseUrl, deploymentId, apiVersion } = this.options;
    return {
      url: `${baseUrl}/openai/deployments/${encodeURIComponent(deploymentId)}/chat/completions?api-version=${encodeURIComponent(apiVersion)}`,
      headers: { 'api-key': this.apiKey },
      includeModel: false,
    };
  }
}
