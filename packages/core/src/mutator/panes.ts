/**
 * Pane operations and pane-aware back resolution.
 */

import { throwInvalidArgument, throwInvalidState } from "../errors.js";
import {
  createScreenNode,
  defaultKeyGenerator,
  withActivePaneRole,
  withPaneConfiguration,
  withPaneContent,
  withStackChildren,
  withoutPaneConfiguration,
} from "../tree/nodes.js";
import {
  activeStack,
  configuredPaneRoles,
  deepestOnActivePath,
  findByKey,
  firstOnActivePath,
  paneContent,
  requireNodeOfKind,
} from "../tree/traversal.js";
import type {
  Destination,
  KeyGenerator,
  NavNode,
  PaneConfiguration,
  PaneNode,
  PaneRole,
  StackNode,
} from "../tree/types.js";
import { createKeyClaimer, replaceNode } from "./nodeOps.js";
import { pop } from "./pop.js";
import {
  CANNOT_POP,
  type PopResult,
  REQUIRES_SCAFFOLD_CHANGE,
  paneEmpty,
  popped,
} from "./types.js";

export type NavigateToPaneOptions = Readonly<{
  /** Focus `role` after pushing. Default true. */
  switchFocus?: boolean;
  generateKey?: KeyGenerator;
}>;

function requireRoleContent(pane: PaneNode, role: PaneRole): NavNode {
  const content = paneContent(pane, role);
  if (!content) {
    throwInvalidArgument(`pane "${pane.key}" has no "${role}" configuration`);
  }
  return content;
}

/** The stack a role's content pushes onto: the content itself or its active stack. */
function roleStack(content: NavNode): StackNode | null {
  return content.kind === "stack" ? content : activeStack(content);
}

function popResultOf(tree: NavNode | null): PopResult {
  return tree === null ? CANNOT_POP : popped(tree);
}

/**
 * Append a screen to `role`'s stack in the pane at `paneKey`, focusing the
 * role unless `switchFocus` is false.
 */
export function navigateToPane(
  root: NavNode,
  paneKey: string,
  role: PaneRole,
  destination: Destination,
  opts: NavigateToPaneOptions = {},
): NavNode {
  const pane = requireNodeOfKind(root, paneKey, "pane");
  const stack = roleStack(requireRoleContent(pane, role));
  if (!stack) throwInvalidState(`pane "${paneKey}" role "${role}" has no stack`);

  const keys = createKeyClaimer(root, opts.generateKey ?? defaultKeyGenerator);
  const screen = createScreenNode({ key: keys.claim(), parentKey: stack.key, destination });
  const next = replaceNode(root, stack.key, withStackChildren(stack, [...stack.children, screen]));

  if (opts.switchFocus === false || pane.activePaneRole === role) return next;
  return switchActivePane(next, paneKey, role);
}

/** Focus `role`. Returns `root` itself when the role is already active. */
export function switchActivePane(root: NavNode, paneKey: string, role: PaneRole): NavNode {
  const pane = requireNodeOfKind(root, paneKey, "pane");
  const next = withActivePaneRole(pane, role);
  if (next === pane) return root;
  return replaceNode(root, pane.key, next);
}

/**
 * Pop `role`'s stack, never below its first entry. Returns `null` when the
 * stack is at its root or the role has no stack.
 */
export function popPane(root: NavNode, paneKey: string, role: PaneRole): NavNode | null {
  const pane = requireNodeOfKind(root, paneKey, "pane");
  const stack = roleStack(requireRoleContent(pane, role));
  if (!stack || stack.children.length <= 1) return null;
  return replaceNode(root, stack.key, withStackChildren(stack, stack.children.slice(0, -1)));
}

/**
 * Empty `role`'s stack. Only applies when the role's content is itself a
 * stack; otherwise `root` is returned unchanged.
 */
export function clearPaneStack(root: NavNode, paneKey: string, role: PaneRole): NavNode {
  const pane = findByKey(root, paneKey);
  if (pane?.kind !== "pane") return root;
  const content = paneContent(pane, role);
  if (content?.kind !== "stack" || content.children.length === 0) return root;
  return replaceNode(root, pane.key, withPaneContent(pane, role, withStackChildren(content, [])));
}

/** Add or replace `role`'s configuration. The content is re-parented onto the pane. */
export function setPaneConfiguration(
  root: NavNode,
  paneKey: string,
  role: PaneRole,
  config: PaneConfiguration,
): NavNode {
  const pane = requireNodeOfKind(root, paneKey, "pane");
  return replaceNode(root, pane.key, withPaneConfiguration(pane, role, config));
}

/**
 * Unconfigure a secondary role. Removing primary throws
 * `NAVTREE_INVALID_ARGUMENT`; focus returns to primary when the removed role
 * was active.
 */
export function removePaneConfiguration(root: NavNode, paneKey: string, role: PaneRole): NavNode {
  const pane = requireNodeOfKind(root, paneKey, "pane");
  if (pane.panes[role] === undefined && role !== "primary") return root;
  return replaceNode(root, pane.key, withoutPaneConfiguration(pane, role));
}

function focusPrimaryAfterClear(root: NavNode, pane: PaneNode, role: PaneRole): NavNode {
  return switchActivePane(clearPaneStack(root, pane.key, role), pane.key, "primary");
}

/**
 * Back within the deepest pane on the active path, following the pane's
 * `backBehavior` once the active role's stack is at its root.
 */
export function popWithPaneBehavior(root: NavNode): PopResult {
  const pane = deepestOnActivePath(root, "pane");
  if (!pane) return popResultOf(pop(root));

  const stack = activeStack(root);
  if (!stack) return CANNOT_POP;
  if (stack.children.length > 1) return popResultOf(pop(root));

  switch (pane.backBehavior) {
    case "popLatest":
      return popResultOf(pop(root));

    case "popUntilScaffoldValueChange":
      if (pane.activePaneRole !== "primary") {
        return popped(switchActivePane(root, pane.key, "primary"));
      }
      return REQUIRES_SCAFFOLD_CHANGE;

    case "popUntilCurrentDestinationChange": {
      const next = configuredPaneRoles(pane).find((role) => {
        if (role === pane.activePaneRole) return false;
        const content = paneContent(pane, role);
        const roleActive = content ? activeStack(content) : null;
        return roleActive !== null && roleActive.children.length > 0;
      });
      if (next === undefined) return paneEmpty(pane.activePaneRole);
      return popped(switchActivePane(root, pane.key, next));
    }

    case "popUntilContentChange":
      return popUntilContentChange(root, pane);
  }
}

function popUntilContentChange(root: NavNode, pane: PaneNode): PopResult {
  const poppable = configuredPaneRoles(pane).filter((role) => {
    const content = paneContent(pane, role);
    const roleActive = content ? activeStack(content) : null;
    return roleActive !== null && roleActive.children.length > 1;
  });

  const target = poppable.includes(pane.activePaneRole) ? pane.activePaneRole : poppable[0];
  if (target === undefined) {
    if (pane.activePaneRole === "primary") return paneEmpty("primary");
    return popped(focusPrimaryAfterClear(root, pane, pane.activePaneRole));
  }

  const next = popPane(root, pane.key, target);
  if (next === null) return paneEmpty(pane.activePaneRole);
  if (target === "primary") return popped(next);

  // A secondary role back at its root is cleared and focus returns to primary.
  const updated = findByKey(next, pane.key);
  const content = updated?.kind === "pane" ? paneContent(updated, target) : null;
  const roleActive = content ? activeStack(content) : null;
  if (roleActive !== null && roleActive.children.length <= 1) {
    return popped(focusPrimaryAfterClear(next, pane, target));
  }
  return popped(next);
}

/**
 * Pane back for a given presentation. Compact layouts show one pane at a
 * time, so back pops the active pane like a plain stack; expanded layouts
 * use `popWithPaneBehavior`.
 */
export function popPaneAdaptive(root: NavNode, isCompact: boolean): PopResult {
  const pane = firstOnActivePath(root, "pane");
  if (!pane) return popResultOf(pop(root));
  if (!isCompact) return popWithPaneBehavior(root);

  const role = pane.activePaneRole;
  const content = paneContent(pane, role);
  const stack = content ? activeStack(content) : null;
  if (!stack) return paneEmpty(role);

  if (stack.children.length <= 1) {
    if (role === "primary") return paneEmpty(role);
    return popped(focusPrimaryAfterClear(root, pane, role));
  }
  const next = withStackChildren(stack, stack.children.slice(0, -1));
  return popped(replaceNode(root, stack.key, next));
}

