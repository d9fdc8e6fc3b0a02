import { assert, describe, test } from "@navtree/testkit";
import { isNavTreeError, screen, stack, tabs } from "../../__tests__/trees.js";
import { activeLeaf, findByKey } from "../../tree/traversal.js";
import { switchActiveTab, switchTab } from "../tabs.js";

function tabbed() {
  return stack("root", [
    tabs("main", [
      stack("t0", [screen("home", "home")]),
      stack("t1", [screen("search", "search")]),
      stack("t2", [screen("me", "me")]),
    ]),
  ]);
}

describe("switchTab", () => {
  test("selects the tab and shares every stack", () => {
    const root = tabbed();
    const next = switchTab(root, "main", 2);
    assert.equal(activeLeaf(next)?.key, "me");
    for (const key of ["t0", "t1", "t2"]) {
      assert.equal(findByKey(next, key), findByKey(root, key));
    }
  });

  test("selecting the current tab returns the same tree", () => {
    const root = tabbed();
    assert.equal(switchTab(root, "main", 0), root);
  });

  test("rejects out-of-range indices and unknown tabs", () => {
    assert.throws(
      () => switchTab(tabbed(), "main", 3),
      isNavTreeError("NAVTREE_INVALID_ARGUMENT"),
    );
    assert.throws(
      () => switchTab(tabbed(), "nope", 0),
      isNavTreeError("NAVTREE_NODE_NOT_FOUND"),
    );
  });
});

describe("switchActiveTab", () => {
  test("uses the tab on the active path", () => {
    assert.equal(activeLeaf(switchActiveTab(tabbed(), 1))?.key, "search");
  });

  test("throws when no tab is on the active path", () => {
    assert.throws(
      () => switchActiveTab(stack("root", [screen("a", "a")]), 0),
      isNavTreeError("NAVTREE_INVALID_STATE"),
    );
  });
});
