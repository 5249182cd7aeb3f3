import type { ChatTransport, ChatRequest, ChatCompletion, RetryPolicy } from '../types/index.js';
import { retry, type RetryListener } from '../utils/retry.js';
import { DEFAULT_RETRY_POLICY } from './constants.js';

export type ExecuteOptions = {
  readonly policy?: RetryPolicy;
  readonly onRetry?: RetryListener;
};

/**
 * Sends one non-streaming request, retrying transient failures per policy.
 */
export async function execute(
  transport: ChatTransport,
  request: ChatRequest,
  options: ExecuteOptions = {},
): Promise<ChatCompletion> {
  return retry(() => transport.complete(request), {
    policy: options.policy ?? DEFAULT_RETRY_POLICY,
    onRetry: options.onRetry,
  });
}
