export { createKeyClaimer, removeNode, replaceNode, type KeyClaimer } from "./nodeOps.js";
export {
  clearAndPush,
  clearStackAndPush,
  push,
  pushAll,
  pushScoped,
  pushToStack,
  replaceCurrent,
  resolvePushStrategy,
  type PushScopedOptions,
} from "./push.js";
export { pop, popTo, popToKey, popToRoute } from "./pop.js";
export { switchActiveTab, switchTab } from "./tabs.js";
export {
  clearPaneStack,
  navigateToPane,
  popPane,
  popPaneAdaptive,
  popWithPaneBehavior,
  removePaneConfiguration,
  setPaneConfiguration,
  switchActivePane,
  type NavigateToPaneOptions,
} from "./panes.js";
export {
  canGoBack,
  canHandleBackNavigation,
  currentDestination,
  popWithTabBehavior,
  previousDestination,
} from "./back.js";
export type { BackResult, PopBehavior, PopResult, PushStrategy } from "./types.js";
