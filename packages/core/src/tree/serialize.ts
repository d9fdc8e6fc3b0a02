/**
 * JSON-safe snapshots of navigation trees.
 *
 * Trees are already plain data, so serialization is a versioned envelope.
 * Deserialization validates every field and the tree invariants before
 * rebuilding frozen nodes.
 */

import { NavTreeError } from "../errors.js";
import {
  createDestination,
  createPaneConfiguration,
  createPaneNode,
  createScreenNode,
  createStackNode,
  createTabNode,
} from "./nodes.js";
import {
  type AdaptStrategy,
  type Destination,
  type NavNode,
  PANE_ROLES,
  type PaneBackBehavior,
  type PaneConfiguration,
  type PaneRole,
  type StackNode,
} from "./types.js";
import { collectTreeViolations } from "./validate.js";

export const NAV_TREE_SNAPSHOT_VERSION = 1;

export type NavTreeSnapshot = Readonly<{
  version: typeof NAV_TREE_SNAPSHOT_VERSION;
  root: NavNode;
}>;

const ADAPT_STRATEGIES: readonly AdaptStrategy[] = ["hide", "levitate", "reflow"];
const PANE_BACK_BEHAVIORS: readonly PaneBackBehavior[] = [
  "popUntilScaffoldValueChange",
  "popUntilCurrentDestinationChange",
  "popUntilContentChange",
  "popLatest",
];

export function serializeNavTree(root: NavNode): NavTreeSnapshot {
  return Object.freeze({ version: NAV_TREE_SNAPSHOT_VERSION, root });
}

export function deserializeNavTree(snapshot: unknown): NavNode {
  if (!isRecord(snapshot)) invalid("snapshot must be an object");
  if (snapshot["version"] !== NAV_TREE_SNAPSHOT_VERSION) {
    invalid(`unsupported snapshot version ${String(snapshot["version"])}`);
  }

  const root = readRoot(snapshot["root"]);
  const violations = collectTreeViolations(root);
  const first = violations[0];
  if (first !== undefined) invalid(first);
  return root;
}

function readRoot(value: unknown): NavNode {
  try {
    return readNode(value, null, "root");
  } catch (err) {
    // Constructor shape errors surface as snapshot errors.
    if (err instanceof NavTreeError && err.code !== "NAVTREE_INVALID_SNAPSHOT") {
      invalid(err.message);
    }
    throw err;
  }
}

function invalid(detail: string): never {
  throw new NavTreeError("NAVTREE_INVALID_SNAPSHOT", `invalid navigation snapshot: ${detail}`);
}

function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(obj: Readonly<Record<string, unknown>>, field: string, at: string): string {
  const value = obj[field];
  if (typeof value !== "string") invalid(`${at}.${field} must be a string`);
  return value;
}

function readOptionalString(
  obj: Readonly<Record<string, unknown>>,
  field: string,
  at: string,
): string | undefined {
  const value = obj[field];
  if (value === undefined) return undefined;
  if (typeof value !== "string") invalid(`${at}.${field} must be a string when present`);
  return value;
}

function readOneOf<T extends string>(value: unknown, allowed: readonly T[], at: string): T {
  for (const option of allowed) {
    if (value === option) return option;
  }
  invalid(`${at} must be one of ${allowed.join(", ")}`);
}

function readDestination(value: unknown, at: string): Destination {
  if (!isRecord(value)) invalid(`${at} must be an object`);
  const route = readString(value, "route", at);
  const params = value["params"];
  if (params === undefined) return createDestination(route);
  if (!isRecord(params)) invalid(`${at}.params must be an object`);
  const out: Record<string, string> = {};
  for (const [key, param] of Object.entries(params)) {
    if (typeof param !== "string") invalid(`${at}.params.${key} must be a string`);
    out[key] = param;
  }
  return createDestination(route, out);
}

function readNode(value: unknown, parentKey: string | null, at: string): NavNode {
  if (!isRecord(value)) invalid(`${at} must be an object`);
  const key = readString(value, "key", at);
  const actualParent = value["parentKey"];
  if (actualParent !== parentKey) {
    invalid(`${at}.parentKey must be ${parentKey === null ? "null" : `"${parentKey}"`}`);
  }
  const kind = readOneOf(value["kind"], ["screen", "stack", "tab", "pane"], `${at}.kind`);
  const scopeKey = readOptionalString(value, "scopeKey", at);

  switch (kind) {
    case "screen":
      return createScreenNode({
        key,
        parentKey,
        destination: readDestination(value["destination"], `${at}.destination`),
      });
    case "stack":
      return readStack(value, key, parentKey, scopeKey, at);
    case "tab": {
      const stacks = value["stacks"];
      if (!Array.isArray(stacks)) invalid(`${at}.stacks must be an array`);
      const activeIndex = value["activeIndex"];
      if (typeof activeIndex !== "number") invalid(`${at}.activeIndex must be a number`);
      const wrapperKey = readOptionalString(value, "wrapperKey", at);
      return createTabNode({
        key,
        parentKey,
        stacks: stacks.map((stack: unknown, i) => {
          const node = readNode(stack, key, `${at}.stacks[${String(i)}]`);
          if (node.kind !== "stack") invalid(`${at}.stacks[${String(i)}] must be a stack`);
          return node;
        }),
        activeIndex,
        ...(scopeKey === undefined ? {} : { scopeKey }),
        ...(wrapperKey === undefined ? {} : { wrapperKey }),
      });
    }
    case "pane": {
      const panes = value["panes"];
      if (!isRecord(panes)) invalid(`${at}.panes must be an object`);
      const configs: { -readonly [R in PaneRole]?: PaneConfiguration } = {};
      for (const role of PANE_ROLES) {
        const config = panes[role];
        if (config === undefined) continue;
        if (!isRecord(config)) invalid(`${at}.panes.${role} must be an object`);
        configs[role] = createPaneConfiguration(
          readNode(config["content"], key, `${at}.panes.${role}.content`),
          readOneOf(config["adaptStrategy"], ADAPT_STRATEGIES, `${at}.panes.${role}.adaptStrategy`),
        );
      }
      const primary = configs.primary;
      if (primary === undefined) invalid(`${at}.panes.primary is required`);
      return createPaneNode({
        key,
        parentKey,
        panes: { ...configs, primary },
        activePaneRole: readOneOf(value["activePaneRole"], PANE_ROLES, `${at}.activePaneRole`),
        backBehavior: readOneOf(value["backBehavior"], PANE_BACK_BEHAVIORS, `${at}.backBehavior`),
        ...(scopeKey === undefined ? {} : { scopeKey }),
      });
    }
  }
}

function readStack(
  value: Readonly<Record<string, unknown>>,
  key: string,
  parentKey: string | null,
  scopeKey: string | undefined,
  at: string,
): StackNode {
  const children = value["children"];
  if (!Array.isArray(children)) invalid(`${at}.children must be an array`);
  return createStackNode({
    key,
    parentKey,
    children: children.map((child: unknown, i) =>
      readNode(child, key, `${at}.children[${String(i)}]`),
    ),
    ...(scopeKey === undefined ? {} : { scopeKey }),
  });
}
