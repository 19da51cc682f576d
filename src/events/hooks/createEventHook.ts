/**
 * Typed listener registry for one gateway event.
 *
 * seyfert allows a single `createEvent` per event name; hooks let several
 * feature listeners subscribe to it. A failing listener is logged and does
 * not stop the others.
 */
export type HookListener<Args extends unknown[]> = (...args: Args) => Promise<void> | void;

export interface EventHook<Args extends unknown[]> {
  /** Subscribes; returns the matching unsubscribe function. */
  on(listener: HookListener<Args>): () => void;
  once(listener: HookListener<Args>): () => void;
  off(listener: HookListener<Args>): void;
  emit(...args: Args): Promise<void>;
  clear(): void;
}

export function createEventHook<Args extends unknown[]>(
  options: { name?: string } = {},
): EventHook<Args> {
  const label = options.name ?? "hook";
  const listeners = new Set<HookListener<Args>>();

  const off = (listener: HookListener<Args>) => {
    listeners.delete(listener);
  };

  const on = (listener: HookListener<Args>) => {
    listeners.add(listener);
    return () => off(listener);
  };

  const once = (listener: HookListener<Args>) => {
    const wrapped: HookListener<Args> = async (...args) => {
      off(wrapped);
      await listener(...args);
    };
    return on(wrapped);
  };

  const emit = async (...args: Args) => {
    for (const listener of [...listeners]) {
      try {
        await listener(...args);
      } catch (error) {
        console.error(`[hooks:${label}] listener failed`, error);
      }
    }
  };

  const clear = () => {
    listeners.clear();
  };

  return { on, once, off, emit, clear };
}
