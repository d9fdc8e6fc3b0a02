import { throwInvalidState } from "../errors.js";
import { withActiveIndex } from "../tree/nodes.js";
import { firstOnActivePath, requireNodeOfKind } from "../tree/traversal.js";
import type { NavNode } from "../tree/types.js";
import { replaceNode } from "./nodeOps.js";

/**
 * Select tab `index` of the tab node at `tabKey`. Returns `root` itself when
 * the tab is already selected.
 */
export function switchTab(root: NavNode, tabKey: string, index: number): NavNode {
  const tab = requireNodeOfKind(root, tabKey, "tab");
  const next = withActiveIndex(tab, index);
  if (next === tab) return root;
  return replaceNode(root, tab.key, next);
}

/** `switchTab` on the first tab node of the active path. */
export function switchActiveTab(root: NavNode, index: number): NavNode {
  const tab = firstOnActivePath(root, "tab");
  if (!tab) throwInvalidState("no tab node on the active path");
  return switchTab(root, tab.key, index);
}
