/**
 * Pending navigation results keyed by the screen that will produce them.
 *
 * A result is settled exactly once: by `complete`, or by `cancel` (with
 * `null`) when its screen leaves the tree.
 */

import { warnDev } from "../dev.js";

export type NavigationResultBroker = Readonly<{
  /**
   * Wait for `screenKey`'s result. A second request for the same key
   * settles the first with `null`.
   */
  request: (screenKey: string) => Promise<unknown>;
  /** Returns false when nothing was waiting on `screenKey`. */
  complete: (screenKey: string, result: unknown) => boolean;
  cancel: (screenKey: string) => boolean;
  has: (screenKey: string) => boolean;
  pendingKeys: () => readonly string[];
}>;

export function createNavigationResultBroker(): NavigationResultBroker {
  const pending = new Map<string, (result: unknown) => void>();

  const settle = (screenKey: string, result: unknown): boolean => {
    const resolve = pending.get(screenKey);
    if (!resolve) return false;
    pending.delete(screenKey);
    resolve(result);
    return true;
  };

  return Object.freeze({
    request(screenKey: string): Promise<unknown> {
      if (pending.has(screenKey)) {
        warnDev(`result for screen "${screenKey}" requested twice; the earlier request gets null`);
        settle(screenKey, null);
      }
      return new Promise<unknown>((resolve) => {
        pending.set(screenKey, resolve);
      });
    },
    complete: (screenKey: string, result: unknown) => settle(screenKey, result),
    cancel: (screenKey: string) => settle(screenKey, null),
    has: (screenKey: string) => pending.has(screenKey),
    pendingKeys: () => Object.freeze([...pending.keys()]),
  });
}
