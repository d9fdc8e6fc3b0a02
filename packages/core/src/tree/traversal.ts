/**
 * Read-only tree queries. All are pure; none allocate more than the result.
 */

import { throwInvalidArgument, throwNodeNotFound } from "../errors.js";
import {
  type NavNode,
  type NavNodeKind,
  type NavNodeOfKind,
  PANE_ROLES,
  type PaneNode,
  type PaneRole,
  type ScreenNode,
  type StackNode,
  type TabNode,
} from "./types.js";

const NO_CHILDREN: readonly NavNode[] = Object.freeze([]);

export function paneContent(pane: PaneNode, role: PaneRole): NavNode | null {
  return pane.panes[role]?.content ?? null;
}

/** Configured roles in `PANE_ROLES` order. */
export function configuredPaneRoles(pane: PaneNode): readonly PaneRole[] {
  return PANE_ROLES.filter((role) => pane.panes[role] !== undefined);
}

/** Direct children. Pane contents are listed in role order. */
export function childrenOf(node: NavNode): readonly NavNode[] {
  switch (node.kind) {
    case "screen":
      return NO_CHILDREN;
    case "stack":
      return node.children;
    case "tab":
      return node.stacks;
    case "pane": {
      const out: NavNode[] = [];
      for (const role of PANE_ROLES) {
        const content = paneContent(node, role);
        if (content) out.push(content);
      }
      return out;
    }
  }
}

/** The single child the active path follows, or null at a leaf or empty stack. */
export function activeChildOf(node: NavNode): NavNode | null {
  switch (node.kind) {
    case "screen":
      return null;
    case "stack":
      return node.children[node.children.length - 1] ?? null;
    case "tab":
      return node.stacks[node.activeIndex] ?? null;
    case "pane":
      return paneContent(node, node.activePaneRole);
  }
}

/**
 * Depth-first, pre-order visit. Return `false` from `visit` to skip a
 * node's subtree.
 */
export function forEachNode(
  root: NavNode,
  visit: (node: NavNode, depth: number) => boolean | void,
): void {
  const walk = (node: NavNode, depth: number): void => {
    if (visit(node, depth) === false) return;
    for (const child of childrenOf(node)) walk(child, depth + 1);
  };
  walk(root, 0);
}

export function findByKey(root: NavNode, key: string): NavNode | null {
  if (root.key === key) return root;
  for (const child of childrenOf(root)) {
    const found = findByKey(child, key);
    if (found) return found;
  }
  return null;
}

export function findNodeOfKind<K extends NavNodeKind>(
  root: NavNode,
  key: string,
  kind: K,
): NavNodeOfKind<K> | null {
  const node = findByKey(root, key);
  return isKind(node, kind) ? node : null;
}

/**
 * Like `findNodeOfKind` but throws on an unknown key or a node of another
 * kind.
 */
export function requireNodeOfKind<K extends NavNodeKind>(
  root: NavNode,
  key: string,
  kind: K,
): NavNodeOfKind<K> {
  const node = findByKey(root, key);
  if (!node) throwNodeNotFound(key);
  if (!isKind(node, kind)) {
    throwInvalidArgument(`node "${key}" is a ${node.kind}, expected a ${kind}`);
  }
  return node;
}

function isKind<K extends NavNodeKind>(
  node: NavNode | null,
  kind: K,
): node is NavNodeOfKind<K> {
  return node?.kind === kind;
}

/** Root first, ending at a screen, an empty stack or an unfilled pane. */
export function activePathToLeaf(root: NavNode): readonly NavNode[] {
  const path: NavNode[] = [];
  let node: NavNode | null = root;
  while (node) {
    path.push(node);
    node = activeChildOf(node);
  }
  return path;
}

export function activeLeaf(root: NavNode): ScreenNode | null {
  const path = activePathToLeaf(root);
  const last = path[path.length - 1];
  return last?.kind === "screen" ? last : null;
}

/**
 * The stack that receives the next push or pop. A pane whose active content
 * is a bare screen has none of its own.
 */
export function activeStack(node: NavNode): StackNode | null {
  switch (node.kind) {
    case "screen":
      return null;
    case "stack": {
      const top = node.children[node.children.length - 1];
      return (top ? activeStack(top) : null) ?? node;
    }
    case "tab": {
      const stack = node.stacks[node.activeIndex];
      return stack ? activeStack(stack) : null;
    }
    case "pane": {
      const content = paneContent(node, node.activePaneRole);
      return content ? activeStack(content) : null;
    }
  }
}

/** First node of `kind` on the active path, nearest the root. */
export function firstOnActivePath<K extends NavNodeKind>(
  root: NavNode,
  kind: K,
): NavNodeOfKind<K> | null {
  for (const node of activePathToLeaf(root)) {
    if (isKind(node, kind)) return node;
  }
  return null;
}

/** Deepest node of `kind` on the active path. */
export function deepestOnActivePath<K extends NavNodeKind>(
  root: NavNode,
  kind: K,
): NavNodeOfKind<K> | null {
  const path = activePathToLeaf(root);
  for (let i = path.length - 1; i >= 0; i--) {
    const node = path[i];
    if (node && isKind(node, kind)) return node;
  }
  return null;
}

function collect<K extends NavNodeKind>(root: NavNode, kind: K): NavNodeOfKind<K>[] {
  const out: NavNodeOfKind<K>[] = [];
  forEachNode(root, (node) => {
    if (isKind(node, kind)) out.push(node);
  });
  return out;
}

export function allScreens(root: NavNode): readonly ScreenNode[] {
  return collect(root, "screen");
}

export function allStackNodes(root: NavNode): readonly StackNode[] {
  return collect(root, "stack");
}

export function allTabNodes(root: NavNode): readonly TabNode[] {
  return collect(root, "tab");
}

export function allPaneNodes(root: NavNode): readonly PaneNode[] {
  return collect(root, "pane");
}

export function nodeCount(root: NavNode): number {
  let count = 0;
  forEachNode(root, () => {
    count++;
  });
  return count;
}

/** Depth of the deepest node; a lone root is depth 0. */
export function treeDepth(root: NavNode): number {
  let max = 0;
  forEachNode(root, (_node, depth) => {
    if (depth > max) max = depth;
  });
  return max;
}

export function stackCanGoBack(stack: StackNode): boolean {
  return stack.children.length > 1;
}

/**
 * Whether popping this node's own state is meaningful without involving
 * its parent.
 */
export function canHandleBackInternally(node: NavNode): boolean {
  switch (node.kind) {
    case "screen":
      return false;
    case "stack":
      return stackCanGoBack(node);
    case "tab": {
      const stack = activeStack(node);
      return (stack !== null && stackCanGoBack(stack)) || node.activeIndex !== 0;
    }
    case "pane":
      return configuredPaneRoles(node).some((role) => {
        const content = paneContent(node, role);
        const stack = content ? activeStack(content) : null;
        return stack !== null && stackCanGoBack(stack);
      });
  }
}
