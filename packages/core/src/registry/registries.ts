/**
 * Table-backed registry implementations.
 *
 * Each factory validates its table once and returns a frozen lookup object.
 * The `EMPTY_*` registries are compared by identity: pushing with both
 * empty registries skips scope resolution entirely.
 */

import { throwInvalidArgument } from "../errors.js";
import {
  createPaneConfiguration,
  createPaneNode,
  createScreenNode,
  createStackNode,
  createTabNode,
} from "../tree/nodes.js";
import {
  PANE_ROLES,
  type Destination,
  type PaneConfiguration,
  type PaneRole,
  type StackNode,
} from "../tree/types.js";
import type {
  ContainerDefinition,
  ContainerInfo,
  ContainerRegistry,
  PaneContainerDefinition,
  PaneDefinition,
  PaneRoleRegistry,
  PaneRoleTable,
  ScopeRegistry,
  ScopeTable,
  TabContainerDefinition,
} from "./types.js";

/** Every destination is in every scope. */
export const EMPTY_SCOPE_REGISTRY: ScopeRegistry = Object.freeze({
  isInScope: () => true,
  getScopeKey: () => null,
});

export const EMPTY_PANE_ROLE_REGISTRY: PaneRoleRegistry = Object.freeze({
  getPaneRole: () => null,
});

export const EMPTY_CONTAINER_REGISTRY: ContainerRegistry = Object.freeze({
  getContainerInfo: () => null,
});

/**
 * Scope membership by route. An unknown scope key contains nothing; when a
 * route is listed by several scopes, the first declared scope owns it.
 */
export function createScopeRegistry(table: ScopeTable): ScopeRegistry {
  const members = new Map<string, ReadonlySet<string>>();
  const owner = new Map<string, string>();
  for (const [scopeKey, routes] of Object.entries(table)) {
    if (!scopeKey) throwInvalidArgument("scope key must be a non-empty string");
    members.set(scopeKey, new Set(routes));
    for (const route of routes) {
      if (!owner.has(route)) owner.set(route, scopeKey);
    }
  }

  return Object.freeze({
    isInScope: (scopeKey: string, destination: Destination) =>
      members.get(scopeKey)?.has(destination.route) ?? false,
    getScopeKey: (destination: Destination) => owner.get(destination.route) ?? null,
  });
}

export function createPaneRoleRegistry(table: PaneRoleTable): PaneRoleRegistry {
  const roles = new Map<string, ReadonlyMap<string, PaneRole>>();
  for (const [scopeKey, byRoute] of Object.entries(table)) {
    const map = new Map<string, PaneRole>();
    for (const [route, role] of Object.entries(byRoute)) {
      if (!PANE_ROLES.includes(role)) {
        throwInvalidArgument(`unknown pane role "${String(role)}" for route "${route}"`);
      }
      map.set(route, role);
    }
    roles.set(scopeKey, map);
  }

  return Object.freeze({
    getPaneRole: (scopeKey: string, destination: Destination) =>
      roles.get(scopeKey)?.get(destination.route) ?? null,
  });
}

/**
 * Container routing table. A definition answers for its own route and for
 * each of its member routes: tab roots open the container on that tab, pane
 * roots open it focused on that pane.
 */
export function createContainerRegistry(
  definitions: readonly ContainerDefinition[],
): ContainerRegistry {
  const byRoute = new Map<string, ContainerInfo>();

  const register = (route: string, info: ContainerInfo): void => {
    if (byRoute.has(route)) {
      throwInvalidArgument(`route "${route}" is claimed by more than one container`);
    }
    byRoute.set(route, info);
  };

  for (const def of definitions) {
    if (def.kind === "tabs") {
      const initial = def.initialTab ?? 0;
      register(def.route, tabContainerInfo(def, initial));
      def.tabs.forEach((tab, i) => {
        if (tab.route !== def.route) register(tab.route, tabContainerInfo(def, i));
      });
    } else {
      register(def.route, paneContainerInfo(def, def.initialPane ?? "primary"));
      for (const role of PANE_ROLES) {
        const pane = def.panes[role];
        if (pane && pane.root.route !== def.route) {
          register(pane.root.route, paneContainerInfo(def, role));
        }
      }
    }
  }

  return Object.freeze({
    getContainerInfo: (destination: Destination) => byRoute.get(destination.route) ?? null,
  });
}

function rootStack(key: string, parentKey: string, root: Destination): StackNode {
  return createStackNode({
    key,
    parentKey,
    children: [createScreenNode({ key: `${key}/root`, parentKey: key, destination: root })],
  });
}

function tabContainerInfo(def: TabContainerDefinition, initialTabIndex: number): ContainerInfo {
  if (def.tabs.length === 0) {
    throwInvalidArgument(`tab container "${def.route}" must declare at least one tab`);
  }
  if (
    !Number.isInteger(initialTabIndex) ||
    initialTabIndex < 0 ||
    initialTabIndex >= def.tabs.length
  ) {
    throwInvalidArgument(
      `tab container "${def.route}" initial tab ${String(initialTabIndex)} out of bounds`,
    );
  }
  const scopeKey = def.scopeKey ?? def.route;
  return Object.freeze({
    kind: "tabs",
    scopeKey,
    initialTabIndex,
    build: (key: string, parentKey: string, initialIndex: number) =>
      createTabNode({
        key,
        parentKey,
        stacks: def.tabs.map((tab, i) => rootStack(`${key}/tab-${String(i)}`, key, tab)),
        activeIndex: initialIndex,
        scopeKey,
        ...(def.wrapperKey === undefined ? {} : { wrapperKey: def.wrapperKey }),
      }),
  });
}

function paneContainerInfo(def: PaneContainerDefinition, initialPane: PaneRole): ContainerInfo {
  if (def.panes[initialPane] === undefined) {
    throwInvalidArgument(`pane container "${def.route}" has no "${initialPane}" pane`);
  }
  const scopeKey = def.scopeKey ?? def.route;
  return Object.freeze({
    kind: "panes",
    scopeKey,
    initialPane,
    build: (key: string, parentKey: string) => {
      const config = (role: PaneRole, pane: PaneDefinition): PaneConfiguration =>
        createPaneConfiguration(rootStack(`${key}/${role}`, key, pane.root), pane.adaptStrategy);
      const { supporting, extra } = def.panes;
      return createPaneNode({
        key,
        parentKey,
        panes: {
          primary: config("primary", def.panes.primary),
          ...(supporting === undefined ? {} : { supporting: config("supporting", supporting) }),
          ...(extra === undefined ? {} : { extra: config("extra", extra) }),
        },
        activePaneRole: initialPane,
        scopeKey,
        ...(def.backBehavior === undefined ? {} : { backBehavior: def.backBehavior }),
      });
    },
  });
}
