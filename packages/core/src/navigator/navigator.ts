/**
 * Navigator facade.
 *
 * Holds the current tree and transition state, applies intents through the
 * pure mutators, and publishes a new immutable snapshot to subscribers
 * after every change.
 */

import { traceDebug } from "../dev.js";
import { NavTreeError, throwInvalidArgument, throwInvalidState } from "../errors.js";
import { type Listener, type Unsubscribe, createListenerSet } from "../listeners.js";
import {
  canHandleBackNavigation,
  clearAndPush,
  createKeyClaimer,
  currentDestination,
  navigateToPane as navigateToPaneIn,
  popPane,
  popPaneAdaptive,
  popToRoute,
  popWithTabBehavior,
  previousDestination,
  pushScoped,
  replaceCurrent,
  replaceNode,
  setPaneConfiguration,
  switchActivePane,
  switchActiveTab,
  switchTab as switchTabIn,
} from "../mutator/index.js";
import type { DeepLinkRegistry } from "../registry/deepLinks.js";
import {
  EMPTY_CONTAINER_REGISTRY,
  EMPTY_PANE_ROLE_REGISTRY,
  EMPTY_SCOPE_REGISTRY,
} from "../registry/registries.js";
import type {
  ContainerInfo,
  ContainerRegistry,
  PaneRoleRegistry,
  ScopeRegistry,
} from "../registry/types.js";
import { createTransitionStateManager } from "../transition/manager.js";
import type { TransitionDirection, TransitionState } from "../transition/state.js";
import { backStackEntries } from "../tree/backStack.js";
import {
  createPaneConfiguration,
  createScreenNode,
  createStackNode,
  defaultKeyGenerator,
  withStackChildren,
} from "../tree/nodes.js";
import {
  activeChildOf,
  activeLeaf,
  activeStack,
  allPaneNodes,
  firstOnActivePath,
  paneContent,
} from "../tree/traversal.js";
import type {
  BackStackEntry,
  Destination,
  KeyGenerator,
  NavNode,
  PaneNode,
  PaneRole,
  StackNode,
} from "../tree/types.js";
import { assertValidTree } from "../tree/validate.js";
import { computeTreeDiff } from "./diff.js";
import { type ScreenLifecycle, createNavigationLifecycleManager } from "./lifecycle.js";
import { createNavigationResultBroker } from "./results.js";

/** Animation descriptor attached to an intent. The engine only carries it. */
export type NavigationTransition = Readonly<{
  id: string;
  durationMs?: number;
}>;

/** Return true to consume the back press. */
export type BackHandler = () => boolean;

export type NavigatorOptions = Readonly<{
  initialState?: NavNode;
  scopeRegistry?: ScopeRegistry;
  containerRegistry?: ContainerRegistry;
  paneRoleRegistry?: PaneRoleRegistry;
  deepLinkRegistry?: DeepLinkRegistry;
  generateKey?: KeyGenerator;
  /** Single-surface presentation. Default true. */
  compact?: boolean;
  /** Trace each applied intent through `console.debug`. */
  debug?: boolean;
}>;

export type NavigatorSnapshot = Readonly<{
  tree: NavNode;
  transitionState: TransitionState;
  /** Descriptor of the running animation, if one was requested. */
  transition: NavigationTransition | null;
  currentDestination: Destination | null;
  previousDestination: Destination | null;
  canNavigateBack: boolean;
}>;

export type NavigateToPaneIntentOptions = Readonly<{
  switchFocus?: boolean;
  transition?: NavigationTransition;
}>;

export type Navigator = Readonly<{
  state: () => NavNode;
  transitionState: () => TransitionState;
  currentDestination: () => Destination | null;
  previousDestination: () => Destination | null;
  canNavigateBack: () => boolean;
  snapshot: () => NavigatorSnapshot;
  backStack: () => readonly BackStackEntry[];
  subscribe: (listener: Listener<NavigatorSnapshot>) => Unsubscribe;

  navigate: (destination: Destination, transition?: NavigationTransition) => void;
  /** Navigate to the destination a URI resolves to. False when nothing matches. */
  handleDeepLink: (uri: string, transition?: NavigationTransition) => boolean;
  navigateBack: (transition?: NavigationTransition) => boolean;
  navigateAndReplace: (destination: Destination, transition?: NavigationTransition) => void;
  navigateAndClearAll: (destination: Destination) => void;
  navigateAndClearTo: (
    destination: Destination,
    clearRoute: string | null,
    inclusive: boolean,
  ) => void;
  switchTab: (index: number, tabKey?: string) => void;
  activeTabIndex: () => number | null;

  navigateToPane: (
    role: PaneRole,
    destination: Destination,
    opts?: NavigateToPaneIntentOptions,
  ) => void;
  switchPane: (role: PaneRole) => void;
  isPaneAvailable: (role: PaneRole) => boolean;
  paneContent: (role: PaneRole) => NavNode | null;
  navigateBackInPane: (role: PaneRole) => boolean;
  clearPane: (role: PaneRole) => void;

  updateState: (tree: NavNode, transition?: NavigationTransition) => void;
  setCompact: (isCompact: boolean) => void;
  isCompact: () => boolean;
  addBackHandler: (handler: BackHandler) => Unsubscribe;
  /** Attach lifecycle callbacks to a screen, by default the active one. */
  registerLifecycle: (lifecycle: ScreenLifecycle, screenKey?: string) => Unsubscribe;

  updateTransitionProgress: (progress: number) => void;
  completeTransition: () => void;
  startPredictiveBack: () => boolean;
  updatePredictiveBack: (progress: number) => void;
  cancelPredictiveBack: () => void;
  commitPredictiveBack: () => void;

  navigateForResult: (
    destination: Destination,
    transition?: NavigationTransition,
  ) => Promise<unknown>;
  navigateBackWithResult: (result: unknown, transition?: NavigationTransition) => boolean;
}>;

function createRootStack(initial: NavNode | undefined, generateKey: KeyGenerator): StackNode {
  if (initial === undefined) return createStackNode({ key: generateKey() });
  if (initial.kind === "stack" && initial.parentKey === null) return initial;
  return createStackNode({ key: generateKey(), children: [initial] });
}

/** Scope of the container the active path is currently inside, if any. */
function currentScopeKey(node: NavNode): string | null {
  switch (node.kind) {
    case "tab":
    case "pane":
      return node.scopeKey ?? null;
    case "stack": {
      const top = node.children[node.children.length - 1];
      return top ? currentScopeKey(top) : null;
    }
    case "screen":
      return null;
  }
}

/** The stack a new container is pushed onto: the one holding the current container. */
function containerParentStack(node: NavNode): StackNode | null {
  if (node.kind !== "stack") return null;
  const active = activeChildOf(node);
  if (active?.kind === "stack") return containerParentStack(active) ?? node;
  return node;
}

function validateOptions(opts: NavigatorOptions): void {
  if (opts.compact !== undefined && typeof opts.compact !== "boolean") {
    throwInvalidArgument("compact must be a boolean when provided");
  }
  if (opts.debug !== undefined && typeof opts.debug !== "boolean") {
    throwInvalidArgument("debug must be a boolean when provided");
  }
  if (opts.generateKey !== undefined && typeof opts.generateKey !== "function") {
    throwInvalidArgument("generateKey must be a function when provided");
  }
}

export function createNavigator(opts: NavigatorOptions = {}): Navigator {
  validateOptions(opts);
  const scopeRegistry = opts.scopeRegistry ?? EMPTY_SCOPE_REGISTRY;
  const containerRegistry = opts.containerRegistry ?? EMPTY_CONTAINER_REGISTRY;
  const paneRoleRegistry = opts.paneRoleRegistry ?? EMPTY_PANE_ROLE_REGISTRY;
  const deepLinkRegistry = opts.deepLinkRegistry ?? null;
  const generateKey = opts.generateKey ?? defaultKeyGenerator;
  const debug = opts.debug === true;
  let compact = opts.compact ?? true;

  let tree: NavNode = createRootStack(opts.initialState, generateKey);
  assertValidTree(tree);

  const transitions = createTransitionStateManager(tree);
  const lifecycle = createNavigationLifecycleManager(tree);
  const results = createNavigationResultBroker();
  const listeners = createListenerSet<NavigatorSnapshot>("navigator");
  const backHandlers: BackHandler[] = [];
  let activeTransition: NavigationTransition | null = null;
  let snapshot = computeSnapshot();

  function computeSnapshot(): NavigatorSnapshot {
    return Object.freeze({
      tree,
      transitionState: transitions.state(),
      transition: activeTransition,
      currentDestination: currentDestination(tree),
      previousDestination: previousDestination(tree),
      canNavigateBack: canHandleBackNavigation(tree),
    });
  }

  function emit(): void {
    snapshot = computeSnapshot();
    listeners.emit(snapshot);
  }

  /** Emit, then bring screen lifecycles up to the tree held now. */
  function emitTreeChange(): void {
    try {
      emit();
    } finally {
      lifecycle.sync(tree);
    }
  }

  /** Swap the held tree and settle results of screens that left it. */
  function setTree(next: NavNode, intent: string): void {
    const prev = tree;
    tree = next;
    for (const key of computeTreeDiff(prev, next).removedScreenKeys) {
      results.cancel(key);
    }
    if (debug) {
      traceDebug(
        `${intent}: ${activeLeaf(prev)?.key ?? "-"} -> ${activeLeaf(next)?.key ?? "-"}`,
      );
    }
  }

  function publish(
    next: NavNode,
    intent: string,
    transition: NavigationTransition | undefined,
    direction: TransitionDirection,
  ): void {
    if (next === tree && transition === undefined && transitions.state().kind === "idle") return;
    const prev = tree;
    setTree(next, intent);
    if (transition === undefined) {
      transitions.forceIdle(next);
      activeTransition = null;
    } else {
      transitions.forceIdle(prev);
      transitions.startAnimation(next, direction);
      activeTransition = transition;
    }
    emitTreeChange();
  }

  function pushContainer(root: NavNode, info: ContainerInfo): NavNode {
    const stack = containerParentStack(root);
    if (!stack) throwInvalidState("no stack to hold a new container");
    const keys = createKeyClaimer(root, generateKey);
    const key = keys.claim();
    const container =
      info.kind === "tabs"
        ? info.build(key, stack.key, info.initialTabIndex)
        : info.build(key, stack.key);
    keys.reserveDescendants(container);
    return replaceNode(root, stack.key, withStackChildren(stack, [...stack.children, container]));
  }

  /** Back without user handlers; null when the host should decide. */
  function resolveBack(root: NavNode): NavNode | null {
    const result = popWithTabBehavior(root, compact);
    switch (result.kind) {
      case "handled":
        return result.tree;
      case "delegateToSystem":
        return null;
      case "cannotHandle": {
        const fallback = popPaneAdaptive(root, compact);
        return fallback.kind === "popped" ? fallback.tree : null;
      }
    }
  }

  function targetPane(): PaneNode | null {
    return firstOnActivePath(tree, "pane") ?? allPaneNodes(tree)[0] ?? null;
  }

  function requirePane(): PaneNode {
    const pane = targetPane();
    if (!pane) throwInvalidState("no pane node in the current tree");
    return pane;
  }

  function navigate(destination: Destination, transition?: NavigationTransition): void {
    const info = containerRegistry.getContainerInfo(destination);
    const next =
      info !== null && currentScopeKey(tree) !== info.scopeKey
        ? pushContainer(tree, info)
        : pushScoped(tree, destination, scopeRegistry, { paneRoleRegistry, generateKey });
    publish(next, `navigate(${destination.route})`, transition, "forward");
  }

  function navigateBack(transition?: NavigationTransition): boolean {
    for (let i = backHandlers.length - 1; i >= 0; i--) {
      const handler = backHandlers[i];
      if (handler?.()) return true;
    }
    const next = resolveBack(tree);
    if (next === null) return false;
    publish(next, "back", transition, "backward");
    return true;
  }

  return Object.freeze({
    state: () => tree,
    transitionState: () => transitions.state(),
    currentDestination: () => snapshot.currentDestination,
    previousDestination: () => snapshot.previousDestination,
    canNavigateBack: () => snapshot.canNavigateBack,
    snapshot: () => snapshot,
    backStack: () => backStackEntries(tree, transitions.state()),
    subscribe: listeners.subscribe,

    navigate,
    navigateBack,

    handleDeepLink(uri: string, transition?: NavigationTransition): boolean {
      const destination = deepLinkRegistry?.resolve(uri) ?? null;
      if (destination === null) return false;
      navigate(destination, transition);
      return true;
    },

    navigateAndReplace(destination: Destination, transition?: NavigationTransition): void {
      publish(replaceCurrent(tree, destination, generateKey), "replace", transition, "forward");
    },

    navigateAndClearAll(destination: Destination): void {
      publish(clearAndPush(tree, destination, generateKey), "clearAll", undefined, "forward");
    },

    navigateAndClearTo(
      destination: Destination,
      clearRoute: string | null,
      inclusive: boolean,
    ): void {
      const cleared = clearRoute === null ? tree : popToRoute(tree, clearRoute, inclusive);
      const next = pushScoped(cleared, destination, scopeRegistry, {
        paneRoleRegistry,
        generateKey,
      });
      publish(next, `clearTo(${clearRoute ?? "-"})`, undefined, "forward");
    },

    switchTab(index: number, tabKey?: string): void {
      const next =
        tabKey === undefined ? switchActiveTab(tree, index) : switchTabIn(tree, tabKey, index);
      publish(next, `switchTab(${String(index)})`, undefined, "none");
    },

    activeTabIndex: () => firstOnActivePath(tree, "tab")?.activeIndex ?? null,

    navigateToPane(
      role: PaneRole,
      destination: Destination,
      paneOpts: NavigateToPaneIntentOptions = {},
    ): void {
      const pane = requirePane();
      const switchFocus = paneOpts.switchFocus ?? true;
      let next: NavNode;
      if (pane.panes[role] !== undefined) {
        next = navigateToPaneIn(tree, pane.key, role, destination, { switchFocus, generateKey });
      } else {
        // Unconfigured role: give it a fresh stack holding the destination.
        const keys = createKeyClaimer(tree, generateKey);
        const stackKey = keys.claim();
        const stack = createStackNode({
          key: stackKey,
          parentKey: pane.key,
          children: [createScreenNode({ key: keys.claim(), parentKey: stackKey, destination })],
        });
        next = setPaneConfiguration(tree, pane.key, role, createPaneConfiguration(stack));
        if (switchFocus) next = switchActivePane(next, pane.key, role);
      }
      publish(next, `navigateToPane(${role})`, paneOpts.transition, "forward");
    },

    switchPane(role: PaneRole): void {
      const pane = requirePane();
      publish(switchActivePane(tree, pane.key, role), `switchPane(${role})`, undefined, "none");
    },

    isPaneAvailable: (role: PaneRole) => targetPane()?.panes[role] !== undefined,

    paneContent(role: PaneRole): NavNode | null {
      const pane = targetPane();
      return pane ? paneContent(pane, role) : null;
    },

    navigateBackInPane(role: PaneRole): boolean {
      const pane = targetPane();
      if (!pane || pane.panes[role] === undefined) return false;
      const next = popPane(tree, pane.key, role);
      if (next === null) return false;
      publish(next, `backInPane(${role})`, undefined, "backward");
      return true;
    },

    clearPane(role: PaneRole): void {
      const pane = requirePane();
      const content = paneContent(pane, role);
      if (!content) throwInvalidArgument(`pane "${pane.key}" has no "${role}" configuration`);
      // Back to the role's first entry.
      const target = content.kind === "stack" ? content : activeStack(content);
      if (!target || target.children.length <= 1) return;
      const rooted = withStackChildren(target, target.children.slice(0, 1));
      publish(replaceNode(tree, target.key, rooted), `clearPane(${role})`, undefined, "none");
    },

    updateState(next: NavNode, transition?: NavigationTransition): void {
      assertValidTree(next);
      publish(next, "updateState", transition, "none");
    },

    setCompact(isCompact: boolean): void {
      compact = isCompact;
    },

    isCompact: () => compact,

    registerLifecycle(screenLifecycle: ScreenLifecycle, screenKey?: string): Unsubscribe {
      const key = screenKey ?? activeLeaf(tree)?.key;
      if (key === undefined) throwInvalidState("no active screen to attach a lifecycle to");
      return lifecycle.register(key, screenLifecycle);
    },

    addBackHandler(handler: BackHandler): Unsubscribe {
      backHandlers.push(handler);
      return () => {
        const index = backHandlers.lastIndexOf(handler);
        if (index !== -1) backHandlers.splice(index, 1);
      };
    },

    updateTransitionProgress(progress: number): void {
      const before = transitions.state();
      transitions.updateProgress(progress);
      if (transitions.state() !== before) emit();
    },

    completeTransition(): void {
      if (transitions.state().kind === "idle") return;
      transitions.completeAnimation();
      activeTransition = null;
      emit();
    },

    startPredictiveBack(): boolean {
      const before = transitions.state();
      if (before.kind === "animating") {
        transitions.forceIdle(tree);
        activeTransition = null;
      }
      const proposed = resolveBack(tree);
      if (proposed === null) {
        if (transitions.state() !== before) emit();
        return false;
      }
      transitions.startProposed(proposed);
      activeTransition = null;
      emit();
      return true;
    },

    updatePredictiveBack(progress: number): void {
      const before = transitions.state();
      if (before.kind !== "proposed") return;
      transitions.updateProgress(progress);
      if (transitions.state() !== before) emit();
    },

    cancelPredictiveBack(): void {
      transitions.cancelProposed();
      emit();
    },

    commitPredictiveBack(): void {
      const state = transitions.state();
      if (state.kind !== "proposed") {
        throw new NavTreeError(
          "NAVTREE_INVALID_TRANSITION",
          `cannot commit predictive back while ${state.kind}`,
        );
      }
      transitions.commitProposed();
      setTree(state.proposed, "commitPredictiveBack");
      emitTreeChange();
    },

    navigateForResult(
      destination: Destination,
      transition?: NavigationTransition,
    ): Promise<unknown> {
      navigate(destination, transition);
      const leaf = activeLeaf(tree);
      if (!leaf) throwInvalidState("navigation produced no active screen to await");
      return results.request(leaf.key);
    },

    navigateBackWithResult(result: unknown, transition?: NavigationTransition): boolean {
      const leaf = activeLeaf(tree);
      if (leaf) results.complete(leaf.key, result);
      return navigateBack(transition);
    },
  });
}
