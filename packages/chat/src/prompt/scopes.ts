import { AsyncLocalStorage } from 'node:async_hooks';

export type TipStack = ReadonlyArray<string | undefined>;

/**
 * Stack of system-tip overrides scoped to the current async context.
 *
 * Each `run` pushes a frame for the duration of its callback, including
 * every promise continuation the callback starts, and the frame disappears
 * when the callback settles. Concurrent tasks never see each other's frames.
 */
export class PromptScopes {
  private readonly storage = new AsyncLocalStorage<TipStack>();

  snapshot(): TipStack {
    return this.storage.getStore() ?? [];
  }

  depth(): number {
    return this.snapshot().length;
  }

  run<T>(tip: string | undefined, fn: () => T): T {
    return this.storage.run([...this.snapshot(), tip], fn);
  }

  wrap<A extends unknown[], R>(tip: string | undefined, fn: (...args: A) => R): (...args: A) => R {
    return (...args: A) => this.run(tip, () => fn(...args));
  }
}
