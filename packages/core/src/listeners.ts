import { reportErrorDev } from "./dev.js";

export type Listener<T> = (value: T) => void;
export type Unsubscribe = () => void;

export type ListenerSet<T> = Readonly<{
  subscribe: (listener: Listener<T>) => Unsubscribe;
  emit: (value: T) => void;
}>;

/**
 * Ordered listener registry. Every listener runs even when an earlier one
 * throws; the first error is rethrown once the queue is drained.
 *
 * An `emit` from inside a listener is queued behind the value being
 * delivered, so every listener sees values in emission order and the last
 * value it receives is the latest one.
 */
export function createListenerSet<T>(label: string): ListenerSet<T> {
  const listeners = new Set<Listener<T>>();
  const queue: { value: T }[] = [];
  let draining = false;

  function drain(): void {
    let failed = false;
    let firstError: unknown;
    for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
      const { value } = next;
      for (const listener of [...listeners]) {
        try {
          listener(value);
        } catch (err) {
          reportErrorDev(`${label} listener threw`, err);
          if (!failed) {
            failed = true;
            firstError = err;
          }
        }
      }
    }
    if (failed) throw firstError;
  }

  return Object.freeze({
    subscribe(listener: Listener<T>): Unsubscribe {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    emit(value: T): void {
      queue.push({ value });
      if (draining) return;
      draining = true;
      try {
        drain();
      } finally {
        draining = false;
      }
    },
  });
}
