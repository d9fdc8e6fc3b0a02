import { allScreens } from "../tree/traversal.js";
import type { NavNode } from "../tree/types.js";

export type TreeDiff = Readonly<{
  addedScreenKeys: readonly string[];
  removedScreenKeys: readonly string[];
}>;

const NO_DIFF: TreeDiff = Object.freeze({
  addedScreenKeys: Object.freeze([]),
  removedScreenKeys: Object.freeze([]),
});

/**
 * Screen keys that appear in only one of two trees, in pre-order of the
 * tree they belong to.
 */
export function computeTreeDiff(prev: NavNode, next: NavNode): TreeDiff {
  if (prev === next) return NO_DIFF;
  const prevKeys = allScreens(prev).map((screen) => screen.key);
  const nextKeys = allScreens(next).map((screen) => screen.key);
  const prevSet = new Set(prevKeys);
  const nextSet = new Set(nextKeys);
  return Object.freeze({
    addedScreenKeys: Object.freeze(nextKeys.filter((key) => !prevSet.has(key))),
    removedScreenKeys: Object.freeze(prevKeys.filter((key) => !nextSet.has(key))),
  });
}
