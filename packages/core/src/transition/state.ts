/**
 * Transition state values and the read-only queries a renderer runs
 * against them.
 */

import { findNodeOfKind } from "../tree/traversal.js";
import { PANE_ROLES, type NavNode } from "../tree/types.js";

export type TransitionDirection = "forward" | "backward" | "none";

/** Settled on `current`. */
export type IdleTransitionState = Readonly<{
  kind: "idle";
  current: NavNode;
}>;

/** A back gesture previewing `proposed`; not yet committed. */
export type ProposedTransitionState = Readonly<{
  kind: "proposed";
  current: NavNode;
  proposed: NavNode;
  progress: number;
}>;

/** Animating from `current` to `target`. */
export type AnimatingTransitionState = Readonly<{
  kind: "animating";
  current: NavNode;
  target: NavNode;
  progress: number;
  direction: TransitionDirection;
}>;

export type TransitionState =
  | IdleTransitionState
  | ProposedTransitionState
  | AnimatingTransitionState;

export function idleState(current: NavNode): IdleTransitionState {
  return Object.freeze({ kind: "idle", current });
}

export function proposedState(
  current: NavNode,
  proposed: NavNode,
  progress: number,
): ProposedTransitionState {
  return Object.freeze({ kind: "proposed", current, proposed, progress });
}

export function animatingState(
  current: NavNode,
  target: NavNode,
  progress: number,
  direction: TransitionDirection,
): AnimatingTransitionState {
  return Object.freeze({ kind: "animating", current, target, progress, direction });
}

export function transitionDirection(state: TransitionState): TransitionDirection {
  switch (state.kind) {
    case "idle":
      return "none";
    case "proposed":
      return "backward";
    case "animating":
      return state.direction;
  }
}

export function transitionProgress(state: TransitionState): number {
  return state.kind === "idle" ? 0 : state.progress;
}

/** The tree the transition settles on. */
export function effectiveTarget(state: TransitionState): NavNode {
  switch (state.kind) {
    case "idle":
      return state.current;
    case "proposed":
      return state.proposed;
    case "animating":
      return state.target;
  }
}

/** `[from, to]`; `to` is null while idle. */
export function animationPair(state: TransitionState): readonly [NavNode, NavNode | null] {
  return [state.current, state.kind === "idle" ? null : effectiveTarget(state)];
}

/** Whether the stack at `stackKey` gains, loses or replaces its top child. */
export function affectsStack(state: TransitionState, stackKey: string): boolean {
  if (state.kind === "idle") return false;
  return changedStackKeys(state.current, effectiveTarget(state)).has(stackKey);
}

export function affectsTab(state: TransitionState, tabKey: string): boolean {
  if (state.kind === "idle") return false;
  const from = findNodeOfKind(state.current, tabKey, "tab");
  const to = findNodeOfKind(effectiveTarget(state), tabKey, "tab");
  return from !== null && to !== null && from.activeIndex !== to.activeIndex;
}

/** Same tab selected on both sides of the transition. */
export function isIntraTabNavigation(state: TransitionState, tabKey: string): boolean {
  if (state.kind === "idle") return false;
  const from = findNodeOfKind(state.current, tabKey, "tab");
  const to = findNodeOfKind(effectiveTarget(state), tabKey, "tab");
  return from !== null && to !== null && from.activeIndex === to.activeIndex;
}

export function isIntraPaneNavigation(state: TransitionState, paneKey: string): boolean {
  if (state.kind === "idle") return false;
  return (
    findNodeOfKind(state.current, paneKey, "pane") !== null &&
    findNodeOfKind(effectiveTarget(state), paneKey, "pane") !== null
  );
}

/** Root kinds differ between the two trees. */
export function isCrossNodeTypeNavigation(state: TransitionState): boolean {
  return state.kind !== "idle" && state.current.kind !== effectiveTarget(state).kind;
}

/**
 * The child a renderer should show beneath the incoming one: the current
 * top for forward moves and gestures, the entry under it for backward
 * animations.
 */
export function previousChildOf(state: TransitionState, stackKey: string): NavNode | null {
  if (state.kind === "idle") return null;
  const stack = findNodeOfKind(state.current, stackKey, "stack");
  if (!stack) return null;
  const { children } = stack;
  if (state.kind === "proposed") return children[children.length - 1] ?? null;
  switch (state.direction) {
    case "forward":
      return children[children.length - 1] ?? null;
    case "backward":
      return children[children.length - 2] ?? null;
    case "none":
      return null;
  }
}

export function previousTabIndex(state: TransitionState, tabKey: string): number | null {
  if (state.kind === "idle") return null;
  return findNodeOfKind(state.current, tabKey, "tab")?.activeIndex ?? null;
}

function changedStackKeys(from: NavNode, to: NavNode): ReadonlySet<string> {
  const changed = new Set<string>();
  compareStacks(from, to, changed);
  return changed;
}

function compareStacks(from: NavNode | null, to: NavNode | null, out: Set<string>): void {
  if (!from || !to || from.key !== to.key) return;
  if (from.kind === "stack" && to.kind === "stack") {
    const fromTop = from.children[from.children.length - 1] ?? null;
    const toTop = to.children[to.children.length - 1] ?? null;
    if (from.children.length !== to.children.length || fromTop?.key !== toTop?.key) {
      out.add(from.key);
    }
    compareStacks(fromTop, toTop, out);
    return;
  }
  if (from.kind === "tab" && to.kind === "tab") {
    const count = Math.min(from.stacks.length, to.stacks.length);
    for (let i = 0; i < count; i++) {
      compareStacks(from.stacks[i] ?? null, to.stacks[i] ?? null, out);
    }
    return;
  }
  if (from.kind === "pane" && to.kind === "pane") {
    for (const role of PANE_ROLES) {
      compareStacks(from.panes[role]?.content ?? null, to.panes[role]?.content ?? null, out);
    }
  }
}
