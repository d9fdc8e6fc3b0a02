/**
 * Transition state machine.
 *
 *   idle --startAnimation--> animating --completeAnimation--> idle(target)
 *   idle --startProposed---> proposed  --commitProposed----> animating(backward)
 *                                      --cancelProposed----> idle(current)
 *
 * `updateProgress` clamps to [0, 1] in proposed and animating and is ignored
 * while idle. Any other call out of order throws `NAVTREE_INVALID_TRANSITION`.
 */

import { NavTreeError, throwInvalidArgument } from "../errors.js";
import { type Listener, type Unsubscribe, createListenerSet } from "../listeners.js";
import type { NavNode } from "../tree/types.js";
import {
  type TransitionDirection,
  type TransitionState,
  animatingState,
  idleState,
  proposedState,
} from "./state.js";

export type TransitionStateManager = Readonly<{
  state: () => TransitionState;
  startAnimation: (target: NavNode, direction: TransitionDirection) => void;
  startProposed: (proposed: NavNode) => void;
  updateProgress: (progress: number) => void;
  commitProposed: () => void;
  cancelProposed: () => void;
  completeAnimation: () => void;
  forceIdle: (current: NavNode) => void;
  subscribe: (listener: Listener<TransitionState>) => Unsubscribe;
}>;

function clampProgress(progress: number): number {
  if (!Number.isFinite(progress)) {
    throwInvalidArgument(`transition progress must be finite, got ${String(progress)}`);
  }
  if (progress < 0) return 0;
  if (progress > 1) return 1;
  return progress;
}

function invalidTransition(op: string, state: TransitionState): never {
  throw new NavTreeError("NAVTREE_INVALID_TRANSITION", `cannot ${op} while ${state.kind}`);
}

export function createTransitionStateManager(initial: NavNode): TransitionStateManager {
  let current: TransitionState = idleState(initial);
  const listeners = createListenerSet<TransitionState>("transition");

  const set = (next: TransitionState): void => {
    if (next === current) return;
    current = next;
    listeners.emit(next);
  };

  return Object.freeze({
    state: () => current,

    startAnimation(target: NavNode, direction: TransitionDirection): void {
      if (current.kind !== "idle") invalidTransition("start animation", current);
      set(animatingState(current.current, target, 0, direction));
    },

    startProposed(proposed: NavNode): void {
      if (current.kind !== "idle") invalidTransition("start proposed", current);
      set(proposedState(current.current, proposed, 0));
    },

    updateProgress(progress: number): void {
      const clamped = clampProgress(progress);
      switch (current.kind) {
        case "idle":
          return;
        case "proposed":
          if (current.progress === clamped) return;
          set(proposedState(current.current, current.proposed, clamped));
          return;
        case "animating":
          if (current.progress === clamped) return;
          set(animatingState(current.current, current.target, clamped, current.direction));
          return;
      }
    },

    commitProposed(): void {
      if (current.kind !== "proposed") invalidTransition("commit", current);
      set(animatingState(current.current, current.proposed, current.progress, "backward"));
    },

    cancelProposed(): void {
      if (current.kind !== "proposed") invalidTransition("cancel", current);
      set(idleState(current.current));
    },

    completeAnimation(): void {
      if (current.kind !== "animating") invalidTransition("complete", current);
      set(idleState(current.target));
    },

    forceIdle(tree: NavNode): void {
      if (current.kind === "idle" && current.current === tree) return;
      set(idleState(tree));
    },

    subscribe: listeners.subscribe,
  });
}
