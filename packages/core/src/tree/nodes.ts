/**
 * Node and destination constructors.
 *
 * Constructors validate shape invariants, re-parent children onto the new
 * node's key and return frozen values. Children whose `parentKey` already
 * matches are reused by reference.
 */

import { nanoid } from "nanoid/non-secure";
import { warnDev } from "../dev.js";
import { throwInvalidArgument } from "../errors.js";
import {
  type AdaptStrategy,
  DEFAULT_PANE_BACK_BEHAVIOR,
  type Destination,
  type DestinationParams,
  type KeyGenerator,
  type NavNode,
  type NavNodeKind,
  type NavNodeOfKind,
  PANE_ROLES,
  type PaneBackBehavior,
  type PaneConfiguration,
  type PaneConfigurations,
  type PaneNode,
  type PaneRole,
  type ScreenNode,
  type StackNode,
  type TabNode,
} from "./types.js";

const DEFAULT_KEY_LENGTH = 8;
const EMPTY_PARAMS: DestinationParams = Object.freeze({});

/** Random 8-character keys. */
export const defaultKeyGenerator: KeyGenerator = () => nanoid(DEFAULT_KEY_LENGTH);

/**
 * Deterministic `${prefix}${n}` keys, starting at 1.
 */
export function createSequentialKeyGenerator(prefix = "n"): KeyGenerator {
  let next = 1;
  return () => `${prefix}${String(next++)}`;
}

// ---------------------------------------------------------------------------
// Destinations
// ---------------------------------------------------------------------------

function normalizeRoute(route: string): string {
  const normalized = route.trim();
  if (!normalized) {
    throwInvalidArgument("destination route must be a non-empty string");
  }
  return normalized;
}

/**
 * Params as a frozen object whose keys are in code-unit order, so two equal
 * param sets serialize identically. Non-string values are stringified.
 */
export function normalizeParams(params: DestinationParams | undefined): DestinationParams {
  const keys = params ? Object.keys(params).sort() : [];
  if (!params || keys.length === 0) return EMPTY_PARAMS;

  const normalized: Record<string, string> = {};
  for (const key of keys) {
    const value: unknown = params[key];
    if (typeof value !== "string") {
      warnDev(`destination param "${key}" is a ${typeof value}; stored as "${String(value)}"`);
    }
    normalized[key] = String(value);
  }
  return Object.freeze(normalized);
}

export function createDestination(route: string, params?: DestinationParams): Destination {
  return Object.freeze({ route: normalizeRoute(route), params: normalizeParams(params) });
}

export function paramsEqual(a: DestinationParams, b: DestinationParams): boolean {
  const aKeys = Object.keys(a);
  const bKeys = Object.keys(b);
  if (aKeys.length !== bKeys.length) return false;
  for (const key of aKeys) {
    if (a[key] !== b[key]) return false;
  }
  return true;
}

export function destinationsEqual(a: Destination, b: Destination): boolean {
  return a === b || (a.route === b.route && paramsEqual(a.params, b.params));
}

// ---------------------------------------------------------------------------
// Node kinds
// ---------------------------------------------------------------------------

export function isNodeKind<K extends NavNodeKind>(
  node: NavNode | null | undefined,
  kind: K,
): node is NavNodeOfKind<K> {
  return node?.kind === kind;
}

/**
 * Return `node` with `parentKey` replaced. Returns the same reference when
 * the key already matches.
 */
export function withParentKey(node: ScreenNode, parentKey: string | null): ScreenNode;
export function withParentKey(node: StackNode, parentKey: string | null): StackNode;
export function withParentKey(node: TabNode, parentKey: string | null): TabNode;
export function withParentKey(node: PaneNode, parentKey: string | null): PaneNode;
export function withParentKey(node: NavNode, parentKey: string | null): NavNode;
export function withParentKey(node: NavNode, parentKey: string | null): NavNode {
  if (node.parentKey === parentKey) return node;
  return Object.freeze({ ...node, parentKey });
}

function freezeChildren<N extends NavNode>(
  children: readonly N[],
  parentKey: string,
): readonly N[] {
  const out: N[] = [];
  for (const child of children) {
    out.push(child.parentKey === parentKey ? child : reparentSame(child, parentKey));
  }
  return Object.freeze(out);
}

function reparentSame<N extends NavNode>(node: N, parentKey: string): N {
  const copy: N = { ...node, parentKey };
  Object.freeze(copy);
  return copy;
}

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

export type ScreenNodeInit = Readonly<{
  key: string;
  parentKey?: string | null;
  destination: Destination;
}>;

export function createScreenNode(init: ScreenNodeInit): ScreenNode {
  return Object.freeze({
    kind: "screen",
    key: requireKey(init.key),
    parentKey: init.parentKey ?? null,
    destination: init.destination,
  });
}

export type StackNodeInit = Readonly<{
  key: string;
  parentKey?: string | null;
  children?: readonly NavNode[];
  scopeKey?: string;
}>;

export function createStackNode(init: StackNodeInit): StackNode {
  const key = requireKey(init.key);
  return Object.freeze({
    kind: "stack",
    key,
    parentKey: init.parentKey ?? null,
    children: freezeChildren(init.children ?? [], key),
    ...(init.scopeKey === undefined ? {} : { scopeKey: init.scopeKey }),
  });
}

export type TabNodeInit = Readonly<{
  key: string;
  parentKey?: string | null;
  stacks: readonly StackNode[];
  activeIndex?: number;
  scopeKey?: string;
  wrapperKey?: string;
}>;

export function createTabNode(init: TabNodeInit): TabNode {
  const key = requireKey(init.key);
  const activeIndex = init.activeIndex ?? 0;
  if (init.stacks.length === 0) {
    throwInvalidArgument(`tab "${key}" must have at least one stack`);
  }
  assertIndexInBounds(activeIndex, init.stacks.length, `tab "${key}" activeIndex`);
  return Object.freeze({
    kind: "tab",
    key,
    parentKey: init.parentKey ?? null,
    stacks: freezeChildren(init.stacks, key),
    activeIndex,
    ...(init.scopeKey === undefined ? {} : { scopeKey: init.scopeKey }),
    ...(init.wrapperKey === undefined ? {} : { wrapperKey: init.wrapperKey }),
  });
}

export type PaneNodeInit = Readonly<{
  key: string;
  parentKey?: string | null;
  panes: PaneConfigurations;
  activePaneRole?: PaneRole;
  backBehavior?: PaneBackBehavior;
  scopeKey?: string;
}>;

export function createPaneNode(init: PaneNodeInit): PaneNode {
  const key = requireKey(init.key);
  const activePaneRole = init.activePaneRole ?? "primary";
  const panes = freezePanes(init.panes, key);
  if (panes[activePaneRole] === undefined) {
    throwInvalidArgument(`pane "${key}" active role "${activePaneRole}" is not configured`);
  }
  return Object.freeze({
    kind: "pane",
    key,
    parentKey: init.parentKey ?? null,
    panes,
    activePaneRole,
    backBehavior: init.backBehavior ?? DEFAULT_PANE_BACK_BEHAVIOR,
    ...(init.scopeKey === undefined ? {} : { scopeKey: init.scopeKey }),
  });
}

export function createPaneConfiguration(
  content: NavNode,
  adaptStrategy: AdaptStrategy = "hide",
): PaneConfiguration {
  return Object.freeze({ content, adaptStrategy });
}

function freezePanes(panes: PaneConfigurations, parentKey: string): PaneConfigurations {
  const out: { -readonly [R in PaneRole]?: PaneConfiguration } = {};
  for (const role of PANE_ROLES) {
    const config = panes[role];
    if (config === undefined) continue;
    out[role] =
      config.content.parentKey === parentKey
        ? config
        : createPaneConfiguration(withParentKey(config.content, parentKey), config.adaptStrategy);
  }
  const primary = out.primary;
  if (primary === undefined) {
    throwInvalidArgument(`pane "${parentKey}" must configure the primary role`);
  }
  return Object.freeze({ ...out, primary });
}

// ---------------------------------------------------------------------------
// Copy-on-write updates used by the mutators
// ---------------------------------------------------------------------------

export function withStackChildren(stack: StackNode, children: readonly NavNode[]): StackNode {
  return Object.freeze({ ...stack, children: freezeChildren(children, stack.key) });
}

export function withTabStacks(tab: TabNode, stacks: readonly StackNode[]): TabNode {
  return Object.freeze({ ...tab, stacks: freezeChildren(stacks, tab.key) });
}

export function withActiveIndex(tab: TabNode, activeIndex: number): TabNode {
  assertIndexInBounds(activeIndex, tab.stacks.length, `tab "${tab.key}" index`);
  if (activeIndex === tab.activeIndex) return tab;
  return Object.freeze({ ...tab, activeIndex });
}

export function withPaneContent(pane: PaneNode, role: PaneRole, content: NavNode): PaneNode {
  const config = pane.panes[role];
  if (config === undefined) {
    throwInvalidArgument(`pane "${pane.key}" has no "${role}" configuration`);
  }
  return withPaneConfiguration(pane, role, createPaneConfiguration(content, config.adaptStrategy));
}

export function withPaneConfiguration(
  pane: PaneNode,
  role: PaneRole,
  config: PaneConfiguration,
): PaneNode {
  const reparented =
    config.content.parentKey === pane.key
      ? config
      : createPaneConfiguration(withParentKey(config.content, pane.key), config.adaptStrategy);
  return Object.freeze({ ...pane, panes: setPaneRole(pane.panes, role, reparented) });
}

/**
 * Drop a secondary role. Focus moves to primary when the dropped role was
 * active.
 */
export function withoutPaneConfiguration(pane: PaneNode, role: PaneRole): PaneNode {
  if (role === "primary") {
    throwInvalidArgument(`pane "${pane.key}" cannot remove the primary role`);
  }
  const out: { -readonly [R in PaneRole]?: PaneConfiguration } = {};
  for (const r of PANE_ROLES) {
    const config = pane.panes[r];
    if (r !== role && config !== undefined) out[r] = config;
  }
  const panes: PaneConfigurations = Object.freeze({ ...out, primary: pane.panes.primary });
  return Object.freeze({
    ...pane,
    panes,
    activePaneRole: pane.activePaneRole === role ? "primary" : pane.activePaneRole,
  });
}

function setPaneRole(
  panes: PaneConfigurations,
  role: PaneRole,
  config: PaneConfiguration,
): PaneConfigurations {
  switch (role) {
    case "primary":
      return Object.freeze({ ...panes, primary: config });
    case "supporting":
      return Object.freeze({ ...panes, supporting: config });
    case "extra":
      return Object.freeze({ ...panes, extra: config });
  }
}

export function withActivePaneRole(pane: PaneNode, role: PaneRole): PaneNode {
  if (pane.panes[role] === undefined) {
    throwInvalidArgument(`pane "${pane.key}" has no "${role}" configuration`);
  }
  if (pane.activePaneRole === role) return pane;
  return Object.freeze({ ...pane, activePaneRole: role });
}

// ---------------------------------------------------------------------------
// Validation helpers
// ---------------------------------------------------------------------------

function requireKey(key: string): string {
  if (typeof key !== "string" || key.length === 0) {
    throwInvalidArgument("node key must be a non-empty string");
  }
  return key;
}

function assertIndexInBounds(index: number, length: number, what: string): void {
  if (!Number.isInteger(index) || index < 0 || index >= length) {
    throwInvalidArgument(`${what} ${String(index)} out of bounds [0, ${String(length)})`);
  }
}
