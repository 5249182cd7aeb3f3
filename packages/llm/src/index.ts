export * from './types/index.js';
export { execute, type ExecuteOptions } from './api/execute.js';
export { executeStream } from './api/execute-stream.js';
export { DEFAULT_RETRY_POLICY } from './api/constants.js';
export { retry, classifyFailure, calculateBackoff, type RetryOptions, type RetryListener } from './utils/retry.js';
export { mapHttpError, parseRetryAfter, parseErrorCode } from './utils/error-mapping.js';
export { createSSEStream, type SSEEvent } from './utils/sse.js';
export {
  OpenAIChatTransport,
  OPENAI_DEFAULT_BASE_URL,
  ChatCompletionsTransport,
  type ChatEndpoint,
} from './providers/openai/index.js';
export { AzureChatTransport, type AzureTransportOptions } from './providers/azure/index.js';
