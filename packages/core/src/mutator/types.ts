import type { NavNode, PaneRole } from "../tree/types.js";

/**
 * What `pop` does when it empties the active stack.
 *
 * - `preserveEmpty`: leave the stack in place with no children.
 * - `cascade`: remove the emptied stack from its parent, repeating upward.
 *   A tab's or pane's own stack is cleared instead of removed.
 */
export type PopBehavior = "cascade" | "preserveEmpty";

export type PopResult =
  | Readonly<{ kind: "popped"; tree: NavNode }>
  | Readonly<{ kind: "paneEmpty"; role: PaneRole }>
  | Readonly<{ kind: "cannotPop" }>
  /** Only the presentation layer can resolve this back press. */
  | Readonly<{ kind: "requiresScaffoldChange" }>;

export type BackResult =
  | Readonly<{ kind: "handled"; tree: NavNode }>
  /** Nothing left to pop; the host decides (for example, exit). */
  | Readonly<{ kind: "delegateToSystem" }>
  | Readonly<{ kind: "cannotHandle" }>;

/** Where a scope-aware push lands. */
export type PushStrategy =
  | Readonly<{ kind: "pushToStack"; stackKey: string }>
  | Readonly<{ kind: "switchToTab"; tabKey: string; index: number }>
  | Readonly<{ kind: "pushToPaneStack"; paneKey: string; role: PaneRole }>
  | Readonly<{ kind: "pushOutOfScope"; stackKey: string }>;

export const CANNOT_POP: PopResult = Object.freeze({ kind: "cannotPop" });
export const REQUIRES_SCAFFOLD_CHANGE: PopResult = Object.freeze({
  kind: "requiresScaffoldChange",
});
export const DELEGATE_TO_SYSTEM: BackResult = Object.freeze({ kind: "delegateToSystem" });
export const CANNOT_HANDLE: BackResult = Object.freeze({ kind: "cannotHandle" });

export function popped(tree: NavNode): PopResult {
  return Object.freeze({ kind: "popped", tree });
}

export function paneEmpty(role: PaneRole): PopResult {
  return Object.freeze({ kind: "paneEmpty", role });
}

export function handled(tree: NavNode): BackResult {
  return Object.freeze({ kind: "handled", tree });
}
