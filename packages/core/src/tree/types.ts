/**
 * Navigation tree types.
 *
 * A navigation state is a single immutable tree of four node kinds. Every
 * value reachable from a tree is frozen; operations return new trees and
 * share unchanged subtrees by reference.
 */

/** Destination params: frozen, key-sorted string map. */
export type DestinationParams = Readonly<Record<string, string>>;

/**
 * What a screen shows. `route` identifies the destination type; params are
 * the typed arguments flattened to strings.
 */
export type Destination = Readonly<{
  route: string;
  params: DestinationParams;
}>;

export type NavNodeKind = "screen" | "stack" | "tab" | "pane";

export type ScreenNode = Readonly<{
  kind: "screen";
  key: string;
  parentKey: string | null;
  destination: Destination;
}>;

/** Ordered history. The last child is active. */
export type StackNode = Readonly<{
  kind: "stack";
  key: string;
  parentKey: string | null;
  children: readonly NavNode[];
  scopeKey?: string;
}>;

/** Parallel stacks with one selected. Always has at least one stack. */
export type TabNode = Readonly<{
  kind: "tab";
  key: string;
  parentKey: string | null;
  stacks: readonly StackNode[];
  activeIndex: number;
  scopeKey?: string;
  wrapperKey?: string;
}>;

export type PaneRole = "primary" | "supporting" | "extra";

/** Fixed iteration order for pane roles. */
export const PANE_ROLES: readonly PaneRole[] = Object.freeze(["primary", "supporting", "extra"]);

/** How a pane adapts when the presentation cannot show it side by side. */
export type AdaptStrategy = "hide" | "levitate" | "reflow";

export type PaneBackBehavior =
  | "popUntilScaffoldValueChange"
  | "popUntilCurrentDestinationChange"
  | "popUntilContentChange"
  | "popLatest";

export const DEFAULT_PANE_BACK_BEHAVIOR: PaneBackBehavior = "popUntilScaffoldValueChange";

export type PaneConfiguration = Readonly<{
  content: NavNode;
  adaptStrategy: AdaptStrategy;
}>;

export type PaneConfigurations = Readonly<{
  primary: PaneConfiguration;
  supporting?: PaneConfiguration;
  extra?: PaneConfiguration;
}>;

/** Role-keyed layout. Primary is always configured; the active role always is. */
export type PaneNode = Readonly<{
  kind: "pane";
  key: string;
  parentKey: string | null;
  panes: PaneConfigurations;
  activePaneRole: PaneRole;
  backBehavior: PaneBackBehavior;
  scopeKey?: string;
}>;

export type NavNode = ScreenNode | StackNode | TabNode | PaneNode;

export type NavNodeOfKind<K extends NavNodeKind> = Extract<NavNode, { kind: K }>;

/** Generates unique node keys. Injected to keep mutations deterministic in tests. */
export type KeyGenerator = () => string;

/**
 * Legacy linear view of the active stack.
 */
export type BackStackEntry = Readonly<{
  id: string;
  destination: Destination;
  savedState: Readonly<Record<string, unknown>>;
  transition: string | null;
  isPopping: boolean;
}>;
