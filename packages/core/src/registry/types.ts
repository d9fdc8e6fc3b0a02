import type {
  AdaptStrategy,
  Destination,
  PaneBackBehavior,
  PaneNode,
  PaneRole,
  TabNode,
} from "../tree/types.js";

/**
 * Decides which destinations belong inside a scoped container.
 */
export type ScopeRegistry = Readonly<{
  isInScope: (scopeKey: string, destination: Destination) => boolean;
  getScopeKey: (destination: Destination) => string | null;
}>;

/** Maps destinations to the pane role they open in, per pane scope. */
export type PaneRoleRegistry = Readonly<{
  getPaneRole: (scopeKey: string, destination: Destination) => PaneRole | null;
}>;

export type TabContainerInfo = Readonly<{
  kind: "tabs";
  scopeKey: string;
  initialTabIndex: number;
  build: (key: string, parentKey: string, initialIndex: number) => TabNode;
}>;

export type PaneContainerInfo = Readonly<{
  kind: "panes";
  scopeKey: string;
  initialPane: PaneRole;
  build: (key: string, parentKey: string) => PaneNode;
}>;

/** How to wrap a destination in its container on first navigation into it. */
export type ContainerInfo = TabContainerInfo | PaneContainerInfo;

export type ContainerRegistry = Readonly<{
  getContainerInfo: (destination: Destination) => ContainerInfo | null;
}>;

// ---------------------------------------------------------------------------
// Table definitions accepted by the registry factories
// ---------------------------------------------------------------------------

/** scopeKey -> routes that belong to the scope. */
export type ScopeTable = Readonly<Record<string, readonly string[]>>;

/** scopeKey -> route -> role. */
export type PaneRoleTable = Readonly<Record<string, Readonly<Record<string, PaneRole>>>>;

export type TabContainerDefinition = Readonly<{
  kind: "tabs";
  /** Route that opens the container. */
  route: string;
  /** Defaults to `route`. */
  scopeKey?: string;
  /** Root destination of each tab, in order. */
  tabs: readonly Destination[];
  initialTab?: number;
  wrapperKey?: string;
}>;

export type PaneDefinition = Readonly<{
  root: Destination;
  adaptStrategy?: AdaptStrategy;
}>;

export type PaneContainerDefinition = Readonly<{
  kind: "panes";
  route: string;
  scopeKey?: string;
  panes: Readonly<{
    primary: PaneDefinition;
    supporting?: PaneDefinition;
    extra?: PaneDefinition;
  }>;
  initialPane?: PaneRole;
  backBehavior?: PaneBackBehavior;
}>;

export type ContainerDefinition = TabContainerDefinition | PaneContainerDefinition;
