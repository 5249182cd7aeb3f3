import {
  InvalidInputError,
  execute,
  executeStream,
  type ChatRequest,
  type ChatTransport,
  type FunctionDefinition,
  type RetryListener,
} from '@tipchat/llm';
import type { Logger } from 'pino';
import { createTransport, resolveConfig, type ChatAPIOptions, type ClientConfig } from '../config/config.js';
import { createLogger } from '../logging/logger.js';
import { PromptScopes } from '../prompt/scopes.js';
import { resolveSystemTip } from '../prompt/resolve.js';
import { buildRequest, type UserInput } from '../request/builder.js';
import { validateOptions } from '../request/options.js';
import { ChatResponse, ChatResponseChunk } from '../response/response.js';

export type CallOptions = {
  /** Completion parameters such as `temperature` or `max_tokens`, by wire name. */
  readonly options?: Readonly<Record<string, unknown>>;
  /** Overrides every scoped and default tip for this call only. */
  readonly systemTip?: string;
  readonly functions?: ReadonlyArray<FunctionDefinition>;
  readonly signal?: AbortSignal;
};

function elapsedSince(startedAt: number): number {
  return Math.round(performance.now() - startedAt);
}

export class ChatAPI {
  readonly config: Readonly<ClientConfig>;
  private readonly transport: ChatTransport;
  private readonly logger: Logger | undefined;
  private readonly scopes = new PromptScopes();
  private readonly onRetry: RetryListener | undefined;

  constructor(options: ChatAPIOptions = {}) {
    this.config = resolveConfig(options);
    this.transport = options.transport ?? createTransport(this.config);
    this.logger = createLogger({
      enableLogging: this.config.enableLogging,
      logFile: this.config.logFile,
      logger: options.logger,
    });

    const logger = this.logger;
    this.onRetry = logger
      ? (err, kind, attempt, delayMs) => {
          logger.warn({ err, kind, attempt, delayMs: Math.round(delayMs) }, 'retrying request');
        }
      : undefined;
  }

  /** The tip a call made here, without a per-call override, would send. */
  currentSystemTip(): string | undefined {
    return resolveSystemTip(undefined, this.scopes.snapshot(), this.config.systemTip);
  }

  /** Number of override scopes active in the current async context. */
  scopeDepth(): number {
    return this.scopes.depth();
  }

  /**
   * Runs `fn` with `tip` as the system tip for every call it makes, sync or
   * async. An empty or missing tip defers to the enclosing scope.
   */
  overrideSystemTip<T>(tip: string | undefined, fn: () => T): T {
    return this.scopes.run(tip, fn);
  }

  /** Wraps a function so each invocation runs under `tip`. */
  withSystemTip(tip: string | undefined): <A extends unknown[], R>(fn: (...args: A) => R) => (...args: A) => R {
    return <A extends unknown[], R>(fn: (...args: A) => R) => this.scopes.wrap(tip, fn);
  }

  async call(userMessages: ReadonlyArray<UserInput>, callOptions: CallOptions = {}): Promise<ChatResponse> {
    const request = this.prepareRequest(userMessages, callOptions, false);
    const startedAt = performance.now();

    try {
      const completion = await execute(this.transport, request, {
        policy: this.config.retryPolicy,
        onRetry: this.onRetry,
      });
      this.logger?.info(
        {
          request: { model: request.model, messages: request.messages, options: request.options },
          response: completion,
          responseTimeMs: elapsedSince(startedAt),
        },
        'completion finished',
      );
      return new ChatResponse(completion);
    } catch (err) {
      this.logger?.error({ err, responseTimeMs: elapsedSince(startedAt) }, 'completion failed');
      throw err;
    }
  }

  /**
   * Streams a completion. Input is checked and the system tip resolved right
   * away; the request goes out on the first pull.
   */
  stream(
    userMessages: ReadonlyArray<UserInput>,
    callOptions: CallOptions = {},
  ): AsyncGenerator<ChatResponseChunk, void, undefined> {
    const request = this.prepareRequest(userMessages, callOptions, true);
    return this.streamChunks(request);
  }

  private async *streamChunks(request: ChatRequest): AsyncGenerator<ChatResponseChunk, void, undefined> {
    const startedAt = performance.now();
    let chunks = 0;

    try {
      for await (const chunk of executeStream(this.transport, request, {
        policy: this.config.retryPolicy,
        onRetry: this.onRetry,
      })) {
        chunks += 1;
        yield new ChatResponseChunk(chunk);
      }
      this.logger?.info(
        { model: request.model, chunks, responseTimeMs: elapsedSince(startedAt) },
        'stream finished',
      );
    } catch (err) {
      this.logger?.error({ err, chunks, responseTimeMs: elapsedSince(startedAt) }, 'stream failed');
      throw err;
    }
  }

  private prepareRequest(
    userMessages: ReadonlyArray<UserInput>,
    callOptions: CallOptions,
    streaming: boolean,
  ): ChatRequest {
    const { options, warnings } = validateOptions(callOptions.options);

    if (warnings.length > 0) {
      this.logger?.warn({ warnings }, 'completion options outside documented ranges');
    }

    if (!streaming && options['stream'] === true) {
      throw new InvalidInputError("The 'stream' option is not allowed in call(); use stream() instead");
    }
    if (streaming && options['stream'] === false) {
      this.logger?.warn("The 'stream' option is ignored by stream(), which always streams");
    }

    return buildRequest({
      model: this.config.modelName,
      userMessages,
      options: { ...options, stream: streaming },
      systemTip: resolveSystemTip(callOptions.systemTip, this.scopes.snapshot(), this.config.systemTip),
      functions: callOptions.functions,
      timeout: this.config.timeout,
      signal: callOptions.signal,
    });
  }
}

export type ChatAPIFunction = ChatAPI['call'] & {
  readonly api: ChatAPI;
  readonly stream: ChatAPI['stream'];
  readonly overrideSystemTip: ChatAPI['overrideSystemTip'];
  readonly withSystemTip: ChatAPI['withSystemTip'];
};

/** Callable form: `chat(['hi'])` is `api.call(['hi'])`. */
export function createChatAPI(options: ChatAPIOptions = {}): ChatAPIFunction {
  const api = new ChatAPI(options);
  return Object.assign(
    (userMessages: ReadonlyArray<UserInput>, callOptions?: CallOptions) => api.call(userMessages, callOptions),
    {
      api,
      stream: api.stream.bind(api),
      overrideSystemTip: api.overrideSystemTip.bind(api),
      withSystemTip: api.withSystemTip.bind(api),
    },
  );
}
