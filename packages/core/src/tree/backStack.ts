/**
 * Linear back-stack projection of the active stack, for consumers that
 * predate the tree model. Entry ids are node keys.
 */

import type { TransitionState } from "../transition/state.js";
import { activeLeaf, activeStack } from "./traversal.js";
import type { BackStackEntry, NavNode } from "./types.js";

const NO_SAVED_STATE: Readonly<Record<string, unknown>> = Object.freeze({});

function isPoppingState(state: TransitionState | undefined): boolean {
  if (!state) return false;
  if (state.kind === "proposed") return true;
  return state.kind === "animating" && state.direction === "backward";
}

/**
 * One entry per child of the active stack that resolves to a screen. The
 * top entry is marked popping while a back transition is proposed or
 * animating.
 */
export function backStackEntries(
  root: NavNode,
  transition?: TransitionState,
): readonly BackStackEntry[] {
  const stack = activeStack(root);
  if (!stack) return Object.freeze([]);

  const popping = isPoppingState(transition);
  const entries: BackStackEntry[] = [];
  const last = stack.children.length - 1;
  stack.children.forEach((child, i) => {
    const leaf = activeLeaf(child);
    if (!leaf) return;
    entries.push(
      Object.freeze({
        id: child.key,
        destination: leaf.destination,
        savedState: NO_SAVED_STATE,
        transition: null,
        isPopping: popping && i === last,
      }),
    );
  });
  return Object.freeze(entries);
}
