import type { TipStack } from './scopes.js';

/**
 * Picks the system tip for one call: a non-empty per-call tip wins, then the
 * innermost non-empty scope, then the client default. Empty strings count as
 * absent at every level.
 */
export function resolveSystemTip(
  callTip: string | null | undefined,
  stack: TipStack,
  fallback: string | undefined,
): string | undefined {
  if (callTip) {
    return callTip;
  }

  for (let i = stack.length - 1; i >= 0; i--) {
    const tip = stack[i];
    if (tip) {
      return tip;
    }
  }

  return fallback ? fallback : undefined;
}
