/**
 * Structural invariant checks for navigation trees.
 */

import { NavTreeError } from "../errors.js";
import { PANE_ROLES, type NavNode } from "./types.js";

const MAX_REPORTED_VIOLATIONS = 5;

/**
 * Collect every shape violation in `root`. An empty result means the tree
 * satisfies all invariants.
 */
export function collectTreeViolations(root: NavNode): readonly string[] {
  const violations: string[] = [];
  const seen = new Set<string>();

  if (root.parentKey !== null) {
    violations.push(`root "${root.key}" has parentKey "${root.parentKey}", expected null`);
  }

  const visit = (node: NavNode, parentKey: string | null): void => {
    if (seen.has(node.key)) {
      violations.push(`duplicate key "${node.key}"`);
    }
    seen.add(node.key);

    if (parentKey !== null && node.parentKey !== parentKey) {
      violations.push(
        `node "${node.key}" has parentKey "${String(node.parentKey)}", expected "${parentKey}"`,
      );
    }

    switch (node.kind) {
      case "screen":
        return;
      case "stack":
        for (const child of node.children) visit(child, node.key);
        return;
      case "tab":
        if (node.stacks.length === 0) {
          violations.push(`tab "${node.key}" has no stacks`);
        } else if (
          !Number.isInteger(node.activeIndex) ||
          node.activeIndex < 0 ||
          node.activeIndex >= node.stacks.length
        ) {
          const bounds = `[0, ${String(node.stacks.length)})`;
          violations.push(
            `tab "${node.key}" activeIndex ${String(node.activeIndex)} out of bounds ${bounds}`,
          );
        }
        for (const stack of node.stacks) {
          if (stack.kind !== "stack") {
            violations.push(`tab "${node.key}" child "${stack.key}" is not a stack`);
          }
          visit(stack, node.key);
        }
        return;
      case "pane":
        if (node.panes.primary === undefined) {
          violations.push(`pane "${node.key}" has no primary configuration`);
        }
        if (node.panes[node.activePaneRole] === undefined) {
          violations.push(
            `pane "${node.key}" active role "${node.activePaneRole}" is not configured`,
          );
        }
        for (const role of PANE_ROLES) {
          const config = node.panes[role];
          if (config !== undefined) visit(config.content, node.key);
        }
        return;
    }
  };

  visit(root, null);
  return violations;
}

/**
 * Throw `NAVTREE_INVARIANT_VIOLATION` when `root` breaks a shape invariant.
 */
export function assertValidTree(root: NavNode): void {
  const violations = collectTreeViolations(root);
  if (violations.length === 0) return;
  const shown = violations.slice(0, MAX_REPORTED_VIOLATIONS).join("; ");
  const more =
    violations.length > MAX_REPORTED_VIOLATIONS
      ? ` (+${String(violations.length - MAX_REPORTED_VIOLATIONS)} more)`
      : "";
  throw new NavTreeError("NAVTREE_INVARIANT_VIOLATION", `invalid navigation tree: ${shown}${more}`);
}
