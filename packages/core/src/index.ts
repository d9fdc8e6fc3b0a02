/**
 * @navtree/core
 *
 * Immutable navigation-state engine: a tree of screens, stacks, tabs and
 * panes, pure reducers over it, a gesture/transition state machine and a
 * navigator facade that ties them together.
 * This package performs no I/O and owns no timers.
 */

// =============================================================================
// Errors
// =============================================================================

export { NavTreeError, isNavTreeError, type NavTreeErrorCode } from "./errors.js";
export type { Listener, Unsubscribe } from "./listeners.js";

// =============================================================================
// Tree model
// =============================================================================

export {
  DEFAULT_PANE_BACK_BEHAVIOR,
  PANE_ROLES,
  type AdaptStrategy,
  type BackStackEntry,
  type Destination,
  type DestinationParams,
  type KeyGenerator,
  type NavNode,
  type NavNodeKind,
  type NavNodeOfKind,
  type PaneBackBehavior,
  type PaneConfiguration,
  type PaneConfigurations,
  type PaneNode,
  type PaneRole,
  type ScreenNode,
  type StackNode,
  type TabNode,
} from "./tree/types.js";

export {
  createDestination,
  createPaneConfiguration,
  createPaneNode,
  createScreenNode,
  createSequentialKeyGenerator,
  createStackNode,
  createTabNode,
  defaultKeyGenerator,
  destinationsEqual,
  isNodeKind,
  normalizeParams,
  paramsEqual,
  withParentKey,
  type PaneNodeInit,
  type ScreenNodeInit,
  type StackNodeInit,
  type TabNodeInit,
} from "./tree/nodes.js";

export {
  activeChildOf,
  activeLeaf,
  activePathToLeaf,
  activeStack,
  allPaneNodes,
  allScreens,
  allStackNodes,
  allTabNodes,
  canHandleBackInternally,
  childrenOf,
  configuredPaneRoles,
  deepestOnActivePath,
  findByKey,
  findNodeOfKind,
  firstOnActivePath,
  forEachNode,
  nodeCount,
  paneContent,
  requireNodeOfKind,
  stackCanGoBack,
  treeDepth,
} from "./tree/traversal.js";

export { assertValidTree, collectTreeViolations } from "./tree/validate.js";
export {
  NAV_TREE_SNAPSHOT_VERSION,
  deserializeNavTree,
  serializeNavTree,
  type NavTreeSnapshot,
} from "./tree/serialize.js";
export { backStackEntries } from "./tree/backStack.js";

// =============================================================================
// Mutators
// =============================================================================

export * from "./mutator/index.js";

// =============================================================================
// Registries
// =============================================================================

export {
  EMPTY_CONTAINER_REGISTRY,
  EMPTY_PANE_ROLE_REGISTRY,
  EMPTY_SCOPE_REGISTRY,
  createContainerRegistry,
  createPaneRoleRegistry,
  createScopeRegistry,
} from "./registry/registries.js";
export type {
  ContainerDefinition,
  ContainerInfo,
  ContainerRegistry,
  PaneContainerDefinition,
  PaneContainerInfo,
  PaneDefinition,
  PaneRoleRegistry,
  PaneRoleTable,
  ScopeRegistry,
  ScopeTable,
  TabContainerDefinition,
  TabContainerInfo,
} from "./registry/types.js";
export {
  DEFAULT_DEEP_LINK_SCHEME,
  createDeepLinkRegistry,
  parseDeepLink,
  type DeepLink,
  type DeepLinkFactory,
  type DeepLinkRegistry,
} from "./registry/deepLinks.js";

// =============================================================================
// Transitions
// =============================================================================

export {
  affectsStack,
  affectsTab,
  animatingState,
  animationPair,
  effectiveTarget,
  idleState,
  isCrossNodeTypeNavigation,
  isIntraPaneNavigation,
  isIntraTabNavigation,
  previousChildOf,
  previousTabIndex,
  proposedState,
  transitionDirection,
  transitionProgress,
  type AnimatingTransitionState,
  type IdleTransitionState,
  type ProposedTransitionState,
  type TransitionDirection,
  type TransitionState,
} from "./transition/state.js";
export {
  createTransitionStateManager,
  type TransitionStateManager,
} from "./transition/manager.js";

// =============================================================================
// Navigator
// =============================================================================

export {
  createNavigator,
  type BackHandler,
  type NavigateToPaneIntentOptions,
  type NavigationTransition,
  type Navigator,
  type NavigatorOptions,
  type NavigatorSnapshot,
} from "./navigator/navigator.js";
export {
  createNavigationResultBroker,
  type NavigationResultBroker,
} from "./navigator/results.js";
export { computeTreeDiff, type TreeDiff } from "./navigator/diff.js";
export {
  createNavigationLifecycleManager,
  type LifecycleEvent,
  type NavigationLifecycleManager,
  type ScreenLifecycle,
} from "./navigator/lifecycle.js";
