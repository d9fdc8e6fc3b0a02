/**
 * Pop operations on the active stack.
 */

import { withStackChildren } from "../tree/nodes.js";
import { activeStack, findByKey, requireNodeOfKind } from "../tree/traversal.js";
import type { NavNode, StackNode } from "../tree/types.js";
import { removeNode, replaceNode } from "./nodeOps.js";
import type { PopBehavior } from "./types.js";

/**
 * Remove the top of the active stack.
 *
 * Returns `null` when there is nothing to pop, or when a cascade would
 * empty the root stack itself.
 */
export function pop(root: NavNode, behavior: PopBehavior = "preserveEmpty"): NavNode | null {
  const stack = activeStack(root);
  if (!stack || stack.children.length === 0) return null;

  const emptied = withStackChildren(stack, stack.children.slice(0, -1));
  if (emptied.children.length > 0 || behavior === "preserveEmpty") {
    return replaceNode(root, stack.key, emptied);
  }
  if (stack.parentKey === null) return null;
  return cascade(replaceNode(root, stack.key, emptied), emptied);
}

/**
 * Remove `emptied` from its parent stack, then keep removing each parent
 * stack the removal empties. Stops at a tab's or pane's own stack, which is
 * left cleared, and at the root, which is left empty.
 */
function cascade(root: NavNode, emptied: StackNode): NavNode {
  let tree = root;
  let current = emptied;
  while (current.parentKey !== null) {
    const parent = findByKey(tree, current.parentKey);
    if (parent?.kind !== "stack") return tree;
    const next = removeNode(tree, current.key);
    if (next === null) return tree;
    tree = next;
    const updated = requireNodeOfKind(tree, parent.key, "stack");
    if (updated.children.length > 0) return tree;
    current = updated;
  }
  return tree;
}

/**
 * Truncate the active stack above the last child matching `predicate`,
 * dropping the match too when `inclusive`. Returns `root` unchanged when
 * nothing matches or the truncation would leave the stack empty.
 */
export function popTo(
  root: NavNode,
  predicate: (node: NavNode) => boolean,
  inclusive = false,
): NavNode {
  const stack = activeStack(root);
  if (!stack) return root;

  let match = -1;
  for (let i = stack.children.length - 1; i >= 0; i--) {
    const child = stack.children[i];
    if (child && predicate(child)) {
      match = i;
      break;
    }
  }
  if (match === -1) return root;

  const keep = inclusive ? match : match + 1;
  if (keep === 0 || keep === stack.children.length) return root;
  return replaceNode(root, stack.key, withStackChildren(stack, stack.children.slice(0, keep)));
}

export function popToKey(root: NavNode, key: string, inclusive = false): NavNode {
  return popTo(root, (node) => node.key === key, inclusive);
}

export function popToRoute(root: NavNode, route: string, inclusive = false): NavNode {
  return popTo(
    root,
    (node) => node.kind === "screen" && node.destination.route === route,
    inclusive,
  );
}
