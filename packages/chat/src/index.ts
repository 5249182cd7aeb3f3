export { ChatAPI, createChatAPI, type CallOptions, type ChatAPIFunction } from './client/chat-api.js';
export {
  resolveConfig,
  createTransport,
  SUPPORTED_API_TYPES,
  DEFAULT_MODEL_NAME,
  DEFAULT_REQUEST_TIMEOUT_MS,
  type ApiType,
  type ChatAPIOptions,
  type ClientConfig,
} from './config/config.js';
export { createLogger, LOGGER_NAME, type LoggerOptions } from './logging/logger.js';
export { PromptScopes, type TipStack } from './prompt/scopes.js';
export { resolveSystemTip } from './prompt/resolve.js';
export { buildRequest, type BuildRequestInput, type UserInput } from './request/builder.js';
export { validateOptions, type ValidatedOptions } from './request/options.js';
export { ChatResponse, ChatResponseChunk } from './response/response.js';
export {
  SDKError,
  ConfigurationError,
  InvalidInputError,
  AbortError,
  RequestTimeoutError,
  NetworkError,
  StreamError,
  StreamInterruptedError,
  EmptyResponseError,
  SchemaMismatchError,
  RetryExhaustedError,
  ProviderError,
  AuthenticationError,
  AccessDeniedError,
  NotFoundError,
  InvalidRequestError,
  ContextLengthError,
  ContentFilterError,
  RateLimitError,
  ServerError,
  DEFAULT_RETRY_POLICY,
  systemMessage,
  userMessage,
  assistantMessage,
  functionMessage,
  type ChatMessage,
  type FunctionDefinition,
  type RetryPolicy,
  type FailureKind,
} from '@tipchat/llm';
