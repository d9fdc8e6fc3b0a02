/**
 * Structural-sharing primitives. Only the ancestors of the changed key are
 * rebuilt; every other subtree is reused by reference.
 */

import { throwInvalidArgument, throwKeyCollision, throwNodeNotFound } from "../errors.js";
import {
  withParentKey,
  withPaneContent,
  withStackChildren,
  withTabStacks,
} from "../tree/nodes.js";
import { findByKey, forEachNode } from "../tree/traversal.js";
import { type KeyGenerator, PANE_ROLES, type NavNode, type StackNode } from "../tree/types.js";

/**
 * Keys for the nodes one operation adds. Every key is checked against
 * `root` and against the keys already handed out, so a batch cannot collide
 * with itself either.
 */
export type KeyClaimer = Readonly<{
  claim: () => string;
  /** Take the keys of `node`'s descendants, which a builder derived itself. */
  reserveDescendants: (node: NavNode) => void;
}>;

export function createKeyClaimer(root: NavNode, generateKey: KeyGenerator): KeyClaimer {
  const taken = new Set<string>();
  const take = (key: string): string => {
    if (taken.has(key) || findByKey(root, key) !== null) throwKeyCollision(key);
    taken.add(key);
    return key;
  };

  return Object.freeze({
    claim: () => take(generateKey()),
    reserveDescendants(node: NavNode): void {
      forEachNode(node, (child, depth) => {
        if (depth > 0) take(child.key);
      });
    },
  });
}

/**
 * Replace the node at `key`. The replacement is re-parented onto the old
 * node's parent. Throws `NAVTREE_NODE_NOT_FOUND` for an unknown key.
 */
export function replaceNode(root: NavNode, key: string, replacement: NavNode): NavNode {
  const next = replaceIn(root, key, replacement);
  if (next === null) throwNodeNotFound(key);
  return next;
}

function replaceIn(node: NavNode, key: string, replacement: NavNode): NavNode | null {
  if (node.key === key) {
    return node === replacement ? node : withParentKey(replacement, node.parentKey);
  }

  switch (node.kind) {
    case "screen":
      return null;
    case "stack": {
      const { children } = node;
      for (let i = 0; i < children.length; i++) {
        const child = children[i];
        if (!child) continue;
        const next = replaceIn(child, key, replacement);
        if (next === null) continue;
        if (next === child) return node;
        const copy = children.slice();
        copy[i] = next;
        return withStackChildren(node, copy);
      }
      return null;
    }
    case "tab": {
      const { stacks } = node;
      for (let i = 0; i < stacks.length; i++) {
        const stack = stacks[i];
        if (!stack) continue;
        const next = replaceIn(stack, key, replacement);
        if (next === null) continue;
        if (next === stack) return node;
        if (next.kind !== "stack") {
          throwInvalidArgument(`tab "${node.key}" children must be stacks, got a ${next.kind}`);
        }
        const copy: StackNode[] = stacks.slice();
        copy[i] = next;
        return withTabStacks(node, copy);
      }
      return null;
    }
    case "pane": {
      for (const role of PANE_ROLES) {
        const config = node.panes[role];
        if (!config) continue;
        const next = replaceIn(config.content, key, replacement);
        if (next === null) continue;
        if (next === config.content) return node;
        return withPaneContent(node, role, next);
      }
      return null;
    }
  }
}

/**
 * Remove the node at `key` from its parent stack.
 *
 * Returns `null` when `key` is the root. A tab's stack and a pane's content
 * cannot be removed directly: they are part of the container's shape.
 */
export function removeNode(root: NavNode, key: string): NavNode | null {
  if (root.key === key) return null;
  const next = removeIn(root, key);
  if (next === null) throwNodeNotFound(key);
  return next;
}

function removeIn(node: NavNode, key: string): NavNode | null {
  switch (node.kind) {
    case "screen":
      return null;
    case "stack": {
      const { children } = node;
      for (let i = 0; i < children.length; i++) {
        const child = children[i];
        if (!child) continue;
        if (child.key === key) {
          return withStackChildren(node, [...children.slice(0, i), ...children.slice(i + 1)]);
        }
        const next = removeIn(child, key);
        if (next === null) continue;
        const copy = children.slice();
        copy[i] = next;
        return withStackChildren(node, copy);
      }
      return null;
    }
    case "tab": {
      const { stacks } = node;
      for (let i = 0; i < stacks.length; i++) {
        const stack = stacks[i];
        if (!stack) continue;
        if (stack.key === key) {
          throwInvalidArgument(
            `cannot remove stack "${key}" from tab "${node.key}"; clear it instead`,
          );
        }
        const next = removeIn(stack, key);
        if (next === null) continue;
        if (next.kind !== "stack") {
          throwInvalidArgument(`tab "${node.key}" children must be stacks, got a ${next.kind}`);
        }
        const copy: StackNode[] = stacks.slice();
        copy[i] = next;
        return withTabStacks(node, copy);
      }
      return null;
    }
    case "pane": {
      for (const role of PANE_ROLES) {
        const config = node.panes[role];
        if (!config) continue;
        if (config.content.key === key) {
          throwInvalidArgument(
            `cannot remove content "${key}" from pane "${node.key}"; clear the role instead`,
          );
        }
        const next = removeIn(config.content, key);
        if (next === null) continue;
        return withPaneContent(node, role, next);
      }
      return null;
    }
  }
}
