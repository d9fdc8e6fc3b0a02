/**
 * Per-screen lifecycle callbacks driven by tree changes.
 *
 * The manager remembers the last tree it was synced to. Each `sync` diffs
 * that tree against the new one and dispatches, in order:
 *
 *   exit     the previously active screen, when it is still in the tree
 *   destroy  every screen that left the tree (its registrations are dropped)
 *   enter    the newly active screen
 *
 * Syncing to the tree last seen dispatches nothing. A change made from
 * inside a callback syncs itself, so the outer sync does not replay it.
 */

import { reportErrorDev } from "../dev.js";
import { throwNodeNotFound } from "../errors.js";
import type { Unsubscribe } from "../listeners.js";
import { activeLeaf, findNodeOfKind } from "../tree/traversal.js";
import type { NavNode } from "../tree/types.js";
import { computeTreeDiff } from "./diff.js";

export type ScreenLifecycle = Readonly<{
  /** The screen became the active leaf. */
  onEnter?: () => void;
  /** Another screen became active; this one is still in the tree. */
  onExit?: () => void;
  /** The screen left the tree. Called once, after which the registration is gone. */
  onDestroy?: () => void;
}>;

export type LifecycleEvent = "enter" | "exit" | "destroy";

export type NavigationLifecycleManager = Readonly<{
  /**
   * Attach `lifecycle` to the screen at `screenKey`. `onEnter` runs at once
   * when that screen is the active leaf.
   */
  register: (screenKey: string, lifecycle: ScreenLifecycle) => Unsubscribe;
  sync: (next: NavNode) => void;
  registeredKeys: () => readonly string[];
}>;

export function createNavigationLifecycleManager(initial: NavNode): NavigationLifecycleManager {
  const byScreen = new Map<string, Set<ScreenLifecycle>>();
  let current = initial;

  const callbacksOf = (screenKey: string): readonly ScreenLifecycle[] => [
    ...(byScreen.get(screenKey) ?? []),
  ];

  function dispatch(calls: readonly (readonly [string, LifecycleEvent])[]): void {
    let failed = false;
    let firstError: unknown;
    for (const [screenKey, event] of calls) {
      const lifecycles = callbacksOf(screenKey);
      if (event === "destroy") byScreen.delete(screenKey);
      for (const lifecycle of lifecycles) {
        try {
          if (event === "enter") lifecycle.onEnter?.();
          else if (event === "exit") lifecycle.onExit?.();
          else lifecycle.onDestroy?.();
        } catch (err) {
          reportErrorDev(`lifecycle ${event} for screen "${screenKey}" threw`, err);
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
    register(screenKey: string, lifecycle: ScreenLifecycle): Unsubscribe {
      if (findNodeOfKind(current, screenKey, "screen") === null) throwNodeNotFound(screenKey);
      let set = byScreen.get(screenKey);
      if (!set) {
        set = new Set();
        byScreen.set(screenKey, set);
      }
      set.add(lifecycle);
      if (activeLeaf(current)?.key === screenKey) lifecycle.onEnter?.();
      return () => {
        const registered = byScreen.get(screenKey);
        registered?.delete(lifecycle);
        if (registered?.size === 0) byScreen.delete(screenKey);
      };
    },

    sync(next: NavNode): void {
      const prev = current;
      if (prev === next) return;
      current = next;

      const removed = new Set(computeTreeDiff(prev, next).removedScreenKeys);
      const prevActive = activeLeaf(prev)?.key ?? null;
      const nextActive = activeLeaf(next)?.key ?? null;
      const calls: (readonly [string, LifecycleEvent])[] = [];

      if (prevActive !== null && prevActive !== nextActive && !removed.has(prevActive)) {
        calls.push([prevActive, "exit"]);
      }
      for (const key of removed) calls.push([key, "destroy"]);
      if (nextActive !== null && nextActive !== prevActive) calls.push([nextActive, "enter"]);

      dispatch(calls);
    },

    registeredKeys: () => Object.freeze([...byScreen.keys()]),
  });
}
