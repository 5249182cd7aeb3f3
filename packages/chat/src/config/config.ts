import { z } from 'zod';
import {
  ALL_FAILURE_KINDS,
  AzureChatTransport,
  ConfigurationError,
  DEFAULT_RETRY_POLICY,
  OPENAI_DEFAULT_BASE_URL,
  OpenAIChatTransport,
  type ChatTransport,
  type RetryPolicy,
} from '@tipchat/llm';
import type { Logger } from 'pino';
import { formatIssues } from '../utils/issues.js';

export const SUPPORTED_API_TYPES = ['openai', 'azure'] as const;
export type ApiType = (typeof SUPPORTED_API_TYPES)[number];

export const DEFAULT_MODEL_NAME = 'gpt-3.5-turbo';
export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

export type ChatAPIOptions = {
  readonly modelName?: string;
  /** Falls back to OPENAI_API_KEY. */
  readonly apiKey?: string;
  /** `openai` (default) or `azure`; falls back to OPENAI_API_TYPE. */
  readonly apiType?: string;
  /** Falls back to OPENAI_API_BASE, then the public OpenAI endpoint. */
  readonly apiBase?: string;
  /** Azure only; falls back to OPENAI_API_VERSION. */
  readonly apiVersion?: string;
  /** Azure deployment name; defaults to the model name. */
  readonly deploymentId?: string;
  /** Default system tip, used when no scope or call overrides it. */
  readonly systemTip?: string;
  readonly enableLogging?: boolean;
  /** Write the JSON log here instead of stdout. */
  readonly logFile?: string;
  /** Use this logger; implies logging. */
  readonly logger?: Logger;
  readonly requestTimeoutMs?: number;
  readonly retryPolicy?: Partial<RetryPolicy>;
  /** Replaces the HTTP transport, e.g. with an in-memory one. */
  readonly transport?: ChatTransport;
  /** Environment to read defaults from; `process.env` unless given. */
  readonly env?: Readonly<Record<string, string | undefined>>;
};

const failureKindSchema = z.enum(ALL_FAILURE_KINDS);

const retryPolicySchema = z.object({
  maxAttempts: z.number().int().min(1),
  initialDelayMs: z.number().min(0),
  maxDelayMs: z.number().min(0),
  backoffMultiplier: z.number().min(1),
  jitterRatio: z.number().min(0).max(1),
  retryableKinds: z.array(failureKindSchema),
});

const baseSchema = z.object({
  modelName: z.string().min(1, 'modelName must not be empty'),
  apiKey: z
    .string({ required_error: 'API key is required (pass apiKey or set OPENAI_API_KEY)' })
    .min(1, 'API key is required (pass apiKey or set OPENAI_API_KEY)'),
  deploymentId: z.string().min(1),
  systemTip: z.string().optional(),
  enableLogging: z.boolean(),
  logFile: z.string().min(1).optional(),
  timeout: z.object({
    requestMs: z.number().int().positive(),
  }),
  retryPolicy: retryPolicySchema,
});

const clientConfigSchema = z.discriminatedUnion('apiType', [
  baseSchema.extend({
    apiType: z.literal('openai'),
    apiBase: z.string().url(),
    apiVersion: z.string().optional(),
  }),
  baseSchema.extend({
    apiType: z.literal('azure'),
    apiBase: z
      .string({ required_error: 'apiBase is required for azure (pass apiBase or set OPENAI_API_BASE)' })
      .url(),
    apiVersion: z
      .string({ required_error: 'apiVersion is required for azure (pass apiVersion or set OPENAI_API_VERSION)' })
      .min(1),
  }),
]);

export type ClientConfig = z.infer<typeof clientConfigSchema>;

function isApiType(value: string): value is ApiType {
  return SUPPORTED_API_TYPES.some((type) => type === value);
}

function readEnv(env: Readonly<Record<string, string | undefined>>, name: string): string | undefined {
  const value = env[name];
  return value && value.length > 0 ? value : undefined;
}

/**
 * Layers constructor options over environment variables and defaults,
 * validates the result and freezes it.
 */
export function resolveConfig(options: ChatAPIOptions = {}): Readonly<ClientConfig> {
  const env = options.env ?? process.env;

  const apiType = options.apiType ?? readEnv(env, 'OPENAI_API_TYPE') ?? 'openai';
  if (!isApiType(apiType)) {
    throw new ConfigurationError(
      `Unsupported API type '${apiType}'. Supported types are: ${SUPPORTED_API_TYPES.join(', ')}`,
    );
  }

  const modelName = options.modelName ?? DEFAULT_MODEL_NAME;

  const parsed = clientConfigSchema.safeParse({
    modelName,
    apiKey: options.apiKey ?? readEnv(env, 'OPENAI_API_KEY'),
    apiType,
    apiBase:
      options.apiBase ??
      readEnv(env, 'OPENAI_API_BASE') ??
      (apiType === 'openai' ? OPENAI_DEFAULT_BASE_URL : undefined),
    apiVersion: options.apiVersion ?? readEnv(env, 'OPENAI_API_VERSION'),
    deploymentId: options.deploymentId ?? modelName,
    systemTip: options.systemTip,
    enableLogging: options.enableLogging ?? false,
    logFile: options.logFile,
    timeout: { requestMs: options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS },
    retryPolicy: { ...DEFAULT_RETRY_POLICY, ...options.retryPolicy },
  });

  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }

  return Object.freeze(parsed.data);
}

export function createTransport(config: Readonly<ClientConfig>): ChatTransport {
  if (config.apiType === 'azure') {
    return new AzureChatTransport(config.apiKey, {
      baseUrl: config.apiBase,
      deploymentId: config.deploymentId,
      apiVersion: config.apiVersion,
    });
  }
  return new OpenAIChatTransport(config.apiKey, { baseUrl: config.apiBase });
}
