/**
 * Push operations.
 */

import { throwInvalidState } from "../errors.js";
import { EMPTY_PANE_ROLE_REGISTRY, EMPTY_SCOPE_REGISTRY } from "../registry/registries.js";
import type { PaneRoleRegistry, ScopeRegistry } from "../registry/types.js";
import {
  createScreenNode,
  defaultKeyGenerator,
  withActivePaneRole,
  withPaneContent,
  withStackChildren,
} from "../tree/nodes.js";
import {
  activePathToLeaf,
  activeStack,
  paneContent,
  requireNodeOfKind,
} from "../tree/traversal.js";
import type {
  Destination,
  KeyGenerator,
  NavNode,
  PaneNode,
  PaneRole,
  ScreenNode,
  StackNode,
  TabNode,
} from "../tree/types.js";
import { type KeyClaimer, createKeyClaimer, replaceNode } from "./nodeOps.js";
import { switchTab } from "./tabs.js";
import type { PushStrategy } from "./types.js";

export type PushScopedOptions = Readonly<{
  paneRoleRegistry?: PaneRoleRegistry;
  generateKey?: KeyGenerator;
}>;

function requireActiveStack(root: NavNode): StackNode {
  const stack = activeStack(root);
  if (!stack) throwInvalidState("no active stack in tree");
  return stack;
}

function newScreen(keys: KeyClaimer, parentKey: string, destination: Destination): ScreenNode {
  return createScreenNode({ key: keys.claim(), parentKey, destination });
}

function freshScreen(
  root: NavNode,
  parentKey: string,
  destination: Destination,
  generateKey: KeyGenerator,
): ScreenNode {
  return newScreen(createKeyClaimer(root, generateKey), parentKey, destination);
}

function appendTo(
  root: NavNode,
  stack: StackNode,
  destinations: readonly Destination[],
  generateKey: KeyGenerator,
): NavNode {
  if (destinations.length === 0) return root;
  const keys = createKeyClaimer(root, generateKey);
  const added = destinations.map((destination) => newScreen(keys, stack.key, destination));
  return replaceNode(root, stack.key, withStackChildren(stack, [...stack.children, ...added]));
}

/**
 * Append a screen to the active stack. Throws `NAVTREE_INVALID_STATE` when
 * the tree has no active stack or a generated key is already taken.
 */
export function push(
  root: NavNode,
  destination: Destination,
  generateKey: KeyGenerator = defaultKeyGenerator,
): NavNode {
  return appendTo(root, requireActiveStack(root), [destination], generateKey);
}

export function pushToStack(
  root: NavNode,
  stackKey: string,
  destination: Destination,
  generateKey: KeyGenerator = defaultKeyGenerator,
): NavNode {
  return appendTo(root, requireNodeOfKind(root, stackKey, "stack"), [destination], generateKey);
}

/** Append several screens to the active stack in order. */
export function pushAll(
  root: NavNode,
  destinations: readonly Destination[],
  generateKey: KeyGenerator = defaultKeyGenerator,
): NavNode {
  if (destinations.length === 0) return root;
  return appendTo(root, requireActiveStack(root), destinations, generateKey);
}

/** Replace the active stack's history with a single screen. */
export function clearAndPush(
  root: NavNode,
  destination: Destination,
  generateKey: KeyGenerator = defaultKeyGenerator,
): NavNode {
  const stack = requireActiveStack(root);
  return replaceNode(
    root,
    stack.key,
    withStackChildren(stack, [freshScreen(root, stack.key, destination, generateKey)]),
  );
}

export function clearStackAndPush(
  root: NavNode,
  stackKey: string,
  destination: Destination,
  generateKey: KeyGenerator = defaultKeyGenerator,
): NavNode {
  const stack = requireNodeOfKind(root, stackKey, "stack");
  return replaceNode(
    root,
    stack.key,
    withStackChildren(stack, [freshScreen(root, stack.key, destination, generateKey)]),
  );
}

/** Swap the top of the active stack for a new screen. */
export function replaceCurrent(
  root: NavNode,
  destination: Destination,
  generateKey: KeyGenerator = defaultKeyGenerator,
): NavNode {
  const stack = requireActiveStack(root);
  if (stack.children.length === 0) {
    throwInvalidState(`cannot replace the top of empty stack "${stack.key}"`);
  }
  return replaceNode(
    root,
    stack.key,
    withStackChildren(stack, [
      ...stack.children.slice(0, -1),
      freshScreen(root, stack.key, destination, generateKey),
    ]),
  );
}

// ---------------------------------------------------------------------------
// Scope-aware push
// ---------------------------------------------------------------------------

/**
 * Push honoring container scopes.
 *
 * Walks the active path from the deepest node up. The first scoped
 * container that does not accept `destination` redirects the push to the
 * stack holding that container. An in-scope tab whose other tab already
 * shows a screen of the same route is switched to instead. An in-scope pane
 * with a role registered for the destination receives it on that role's
 * stack. Otherwise the destination lands on the active stack.
 *
 * With both registries empty this is exactly `push`.
 */
export function pushScoped(
  root: NavNode,
  destination: Destination,
  scopeRegistry: ScopeRegistry,
  opts: PushScopedOptions = {},
): NavNode {
  const paneRoleRegistry = opts.paneRoleRegistry ?? EMPTY_PANE_ROLE_REGISTRY;
  const generateKey = opts.generateKey ?? defaultKeyGenerator;
  if (scopeRegistry === EMPTY_SCOPE_REGISTRY && paneRoleRegistry === EMPTY_PANE_ROLE_REGISTRY) {
    return push(root, destination, generateKey);
  }

  const strategy = resolvePushStrategy(root, destination, scopeRegistry, paneRoleRegistry);
  switch (strategy.kind) {
    case "pushToStack":
    case "pushOutOfScope":
      return pushToStack(root, strategy.stackKey, destination, generateKey);
    case "switchToTab":
      return switchTab(root, strategy.tabKey, strategy.index);
    case "pushToPaneStack":
      return pushToPaneStack(root, strategy.paneKey, strategy.role, destination, generateKey);
  }
}

export function resolvePushStrategy(
  root: NavNode,
  destination: Destination,
  scopeRegistry: ScopeRegistry,
  paneRoleRegistry: PaneRoleRegistry = EMPTY_PANE_ROLE_REGISTRY,
): PushStrategy {
  const target = requireActiveStack(root);
  const path = activePathToLeaf(root);

  for (let i = path.length - 1; i >= 0; i--) {
    const node = path[i];
    if (!node || node.kind === "screen") continue;
    const parent = path[i - 1];
    const outOfScope =
      node.scopeKey !== undefined && !scopeRegistry.isInScope(node.scopeKey, destination);

    if (outOfScope) {
      if (parent?.kind === "stack") {
        return Object.freeze({ kind: "pushOutOfScope", stackKey: parent.key });
      }
      continue;
    }

    if (node.kind === "tab") {
      const index = findTabWithRoute(node, destination.route);
      if (index !== -1 && index !== node.activeIndex) {
        return Object.freeze({ kind: "switchToTab", tabKey: node.key, index });
      }
    } else if (node.kind === "pane" && node.scopeKey !== undefined) {
      const role = paneRoleRegistry.getPaneRole(node.scopeKey, destination);
      if (role !== null && node.panes[role] !== undefined) {
        return Object.freeze({ kind: "pushToPaneStack", paneKey: node.key, role });
      }
    }
  }

  return Object.freeze({ kind: "pushToStack", stackKey: target.key });
}

/** Index of the first tab whose stack directly holds a screen of `route`. */
function findTabWithRoute(tab: TabNode, route: string): number {
  return tab.stacks.findIndex((stack) =>
    stack.children.some((child) => child.kind === "screen" && child.destination.route === route),
  );
}

/**
 * Append to a pane role's stack and focus that role. A role whose content
 * is not a stack is left unchanged.
 */
function pushToPaneStack(
  root: NavNode,
  paneKey: string,
  role: PaneRole,
  destination: Destination,
  generateKey: KeyGenerator,
): NavNode {
  const pane: PaneNode = requireNodeOfKind(root, paneKey, "pane");
  const content = paneContent(pane, role);
  if (content?.kind !== "stack") return root;
  const stack = withStackChildren(content, [
    ...content.children,
    freshScreen(root, content.key, destination, generateKey),
  ]);
  return replaceNode(root, pane.key, withActivePaneRole(withPaneContent(pane, role, stack), role));
}
