/**
 * Tree-aware back resolution.
 *
 * The active stack pops while it has history. Once it is at its root, back
 * removes the nearest removable ancestor: a nested stack, a tab container or
 * a pane container that has siblings in its parent stack. Reaching the root
 * stack with a single child delegates to the host.
 */

import {
  activeLeaf,
  activeStack,
  findByKey,
  paneContent,
  stackCanGoBack,
} from "../tree/traversal.js";
import {
  type Destination,
  type NavNode,
  PANE_ROLES,
  type PaneNode,
  type StackNode,
  type TabNode,
} from "../tree/types.js";
import { removeNode } from "./nodeOps.js";
import { popWithPaneBehavior } from "./panes.js";
import { pop } from "./pop.js";
import { type BackResult, CANNOT_HANDLE, DELEGATE_TO_SYSTEM, handled } from "./types.js";

export function canGoBack(root: NavNode): boolean {
  const stack = activeStack(root);
  return stack !== null && stackCanGoBack(stack);
}

export function currentDestination(root: NavNode): Destination | null {
  return activeLeaf(root)?.destination ?? null;
}

/** Destination under the top of the active stack. */
export function previousDestination(root: NavNode): Destination | null {
  const stack = activeStack(root);
  if (!stack) return null;
  const previous = stack.children[stack.children.length - 2];
  return previous ? currentDestination(previous) : null;
}

/**
 * Resolve a back press. `isCompact` selects how a pane container on the
 * back path is handled: compact layouts step through the pane's back
 * behavior first, expanded layouts leave the whole pane.
 */
export function popWithTabBehavior(root: NavNode, isCompact = true): BackResult {
  const stack = activeStack(root);
  if (!stack) return CANNOT_HANDLE;

  if (stackCanGoBack(stack)) {
    const next = pop(root);
    return next === null ? CANNOT_HANDLE : handled(next);
  }

  if (stack.parentKey === null) {
    if (stack.children.length <= 1) return DELEGATE_TO_SYSTEM;
    const next = pop(root);
    return next === null ? CANNOT_HANDLE : handled(next);
  }

  const parent = findByKey(root, stack.parentKey);
  switch (parent?.kind) {
    case "tab":
      return tabBack(root, parent);
    case "stack":
      return nestedStackBack(root, parent, stack);
    case "pane":
      return paneBack(root, parent, isCompact);
    default:
      return CANNOT_HANDLE;
  }
}

/** Remove `child` from `parent`, or walk further up when it is the only child. */
function nestedStackBack(root: NavNode, parent: StackNode, child: NavNode): BackResult {
  if (parent.children.length > 1) return removeOrCannot(root, child.key);
  if (parent.parentKey === null) return DELEGATE_TO_SYSTEM;
  return ancestorBack(root, parent);
}

function tabBack(root: NavNode, tab: TabNode): BackResult {
  if (tab.parentKey === null) return DELEGATE_TO_SYSTEM;
  const parent = findByKey(root, tab.parentKey);
  switch (parent?.kind) {
    case "stack":
      return nestedStackBack(root, parent, tab);
    case "tab":
      return tabBack(root, parent);
    default:
      return DELEGATE_TO_SYSTEM;
  }
}

function paneBack(root: NavNode, pane: PaneNode, isCompact: boolean): BackResult {
  if (!isCompact) return leavePane(root, pane);

  const result = popWithPaneBehavior(root);
  switch (result.kind) {
    case "popped":
      return handled(result.tree);
    case "cannotPop":
    case "paneEmpty":
      return leavePane(root, pane);
    case "requiresScaffoldChange":
      return CANNOT_HANDLE;
  }
}

function leavePane(root: NavNode, pane: PaneNode): BackResult {
  if (pane.parentKey === null) return DELEGATE_TO_SYSTEM;
  const parent = findByKey(root, pane.parentKey);
  if (!parent) return DELEGATE_TO_SYSTEM;
  if (parent.kind === "stack") return nestedStackBack(root, parent, pane);

  const content = paneContent(pane, pane.activePaneRole);
  if (!content || activeStack(content) === null) return DELEGATE_TO_SYSTEM;
  switch (parent.kind) {
    case "tab":
      return tabBack(root, parent);
    case "pane":
      return paneBack(root, parent, true);
    default:
      return DELEGATE_TO_SYSTEM;
  }
}

/** Continue from a single-child, non-root stack to whatever holds it. */
function ancestorBack(root: NavNode, stack: StackNode): BackResult {
  if (stack.parentKey === null) return DELEGATE_TO_SYSTEM;
  const grandparent = findByKey(root, stack.parentKey);
  switch (grandparent?.kind) {
    case "stack":
      return nestedStackBack(root, grandparent, stack);
    case "tab":
      return tabBack(root, grandparent);
    case "pane":
      return paneBack(root, grandparent, true);
    default:
      return DELEGATE_TO_SYSTEM;
  }
}

function removeOrCannot(root: NavNode, key: string): BackResult {
  const next = removeNode(root, key);
  return next === null ? CANNOT_HANDLE : handled(next);
}

/** Whether a back press would change the tree rather than delegate. */
export function canHandleBackNavigation(root: NavNode): boolean {
  const stack = activeStack(root);
  if (!stack) return false;
  if (stackCanGoBack(stack)) return true;
  if (stack.parentKey === null) return false;

  const parent = findByKey(root, stack.parentKey);
  switch (parent?.kind) {
    case "tab":
      return hasSiblingsInStack(root, parent);
    case "stack":
      return stackCanGoBack(parent);
    case "pane": {
      for (const role of PANE_ROLES) {
        const content = paneContent(parent, role);
        const roleStack = content ? activeStack(content) : null;
        if (roleStack !== null && stackCanGoBack(roleStack)) return true;
      }
      return hasSiblingsInStack(root, parent);
    }
    default:
      return false;
  }
}

function hasSiblingsInStack(root: NavNode, node: NavNode): boolean {
  if (node.parentKey === null) return false;
  const parent = findByKey(root, node.parentKey);
  return parent?.kind === "stack" && parent.children.length > 1;
}
