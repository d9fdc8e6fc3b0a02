import { assert, describe, test } from "@navtree/testkit";
import { dest, isNavTreeError, panes, screen, stack, tabs } from "../../__tests__/trees.js";
import {
  createDestination,
  createPaneNode,
  createScreenNode,
  createSequentialKeyGenerator,
  createStackNode,
  createTabNode,
  destinationsEqual,
  defaultKeyGenerator,
  isNodeKind,
  normalizeParams,
  paramsEqual,
  withActiveIndex,
  withActivePaneRole,
  withParentKey,
  withoutPaneConfiguration,
} from "../nodes.js";

describe("destinations", () => {
  test("trims the route and sorts params", () => {
    const d = createDestination("  detail ", { z: "1", a: "2" });
    assert.equal(d.route, "detail");
    assert.deepEqual(Object.keys(d.params), ["a", "z"]);
    assert.deepFrozen(d);
  });

  test("rejects an empty route", () => {
    assert.throws(() => createDestination("   "), isNavTreeError("NAVTREE_INVALID_ARGUMENT"));
  });

  test("equality compares route and params", () => {
    assert.equal(destinationsEqual(dest("a", { id: "1" }), dest("a", { id: "1" })), true);
    assert.equal(destinationsEqual(dest("a", { id: "1" }), dest("a", { id: "2" })), false);
    assert.equal(destinationsEqual(dest("a"), dest("b")), false);
  });

  test("paramsEqual ignores key order and compares values", () => {
    assert.equal(paramsEqual({ a: "1", b: "2" }, { b: "2", a: "1" }), true);
    assert.equal(paramsEqual({ a: "1" }, { a: "1", b: "2" }), false);
    assert.equal(paramsEqual({ a: "1" }, { a: "2" }), false);
    assert.equal(paramsEqual({}, {}), true);
  });

  test("normalizeParams shares one empty object and orders keys", () => {
    assert.equal(normalizeParams(undefined), normalizeParams({}));
    assert.deepEqual(Object.keys(normalizeParams({ b: "1", a: "2", B: "3" })), ["B", "a", "b"]);
  });
});

describe("node constructors", () => {
  test("stack re-parents children and reuses matching ones", () => {
    const loose = screen("s1", "home");
    const owned = createScreenNode({ key: "s2", parentKey: "root", destination: dest("x") });
    const root = createStackNode({ key: "root", children: [loose, owned] });

    assert.equal(root.parentKey, null);
    assert.equal(root.children[0]?.parentKey, "root");
    assert.notEqual(root.children[0], loose);
    assert.equal(root.children[1], owned);
    assert.deepFrozen(root);
  });

  test("tab requires at least one stack", () => {
    assert.throws(
      () => createTabNode({ key: "t", stacks: [] }),
      isNavTreeError("NAVTREE_INVALID_ARGUMENT"),
    );
  });

  test("tab rejects an out-of-range active index", () => {
    const stacks = [stack("a", []), stack("b", [])];
    assert.throws(
      () => createTabNode({ key: "t", stacks, activeIndex: 2 }),
      isNavTreeError("NAVTREE_INVALID_ARGUMENT"),
    );
    assert.throws(
      () => createTabNode({ key: "t", stacks, activeIndex: 0.5 }),
      isNavTreeError("NAVTREE_INVALID_ARGUMENT"),
    );
  });

  test("tab stacks are re-parented onto the tab", () => {
    const tab = tabs("t", [stack("a", []), stack("b", [])], 1);
    assert.deepEqual(
      tab.stacks.map((s) => s.parentKey),
      ["t", "t"],
    );
    assert.equal(tab.activeIndex, 1);
  });

  test("pane active role must be configured", () => {
    assert.throws(
      () =>
        createPaneNode({
          key: "p",
          panes: { primary: { content: stack("ps", []), adaptStrategy: "hide" } },
          activePaneRole: "supporting",
        }),
      isNavTreeError("NAVTREE_INVALID_ARGUMENT"),
    );
  });

  test("pane defaults to primary focus and scaffold-value back behavior", () => {
    const pane = panes("p", { primary: stack("ps", []) });
    assert.equal(pane.activePaneRole, "primary");
    assert.equal(pane.backBehavior, "popUntilScaffoldValueChange");
    assert.equal(pane.panes.primary.content.parentKey, "p");
    assert.equal(pane.panes.supporting, undefined);
  });

  test("rejects empty keys", () => {
    assert.throws(() => stack("", []), isNavTreeError("NAVTREE_INVALID_ARGUMENT"));
  });
});

describe("isNodeKind", () => {
  test("narrows by kind and rejects absent nodes", () => {
    const node = stack("root", [screen("a", "a")]);
    assert.equal(isNodeKind(node, "stack"), true);
    assert.equal(isNodeKind(node, "screen"), false);
    assert.equal(isNodeKind(null, "stack"), false);
    assert.equal(isNodeKind(undefined, "screen"), false);
  });
});

describe("copy-on-write helpers", () => {
  test("withParentKey returns the same node when unchanged", () => {
    const node = screen("s", "home");
    assert.equal(withParentKey(node, null), node);
    const moved = withParentKey(node, "p");
    assert.equal(moved.parentKey, "p");
    assert.equal(moved.destination, node.destination);
  });

  test("withActiveIndex validates and short-circuits", () => {
    const tab = tabs("t", [stack("a", []), stack("b", [])]);
    assert.equal(withActiveIndex(tab, 0), tab);
    assert.equal(withActiveIndex(tab, 1).activeIndex, 1);
    assert.throws(() => withActiveIndex(tab, -1), isNavTreeError("NAVTREE_INVALID_ARGUMENT"));
  });

  test("withActivePaneRole rejects unconfigured roles", () => {
    const pane = panes("p", { primary: stack("ps", []) });
    assert.throws(
      () => withActivePaneRole(pane, "extra"),
      isNavTreeError("NAVTREE_INVALID_ARGUMENT"),
    );
  });

  test("removing the active secondary role refocuses primary", () => {
    const pane = panes(
      "p",
      { primary: stack("ps", []), supporting: stack("ss", []) },
      { activePaneRole: "supporting" },
    );
    const next = withoutPaneConfiguration(pane, "supporting");
    assert.equal(next.activePaneRole, "primary");
    assert.equal(next.panes.supporting, undefined);
    assert.equal(next.panes.primary, pane.panes.primary);
    assert.throws(
      () => withoutPaneConfiguration(pane, "primary"),
      isNavTreeError("NAVTREE_INVALID_ARGUMENT"),
    );
  });
});

describe("key generators", () => {
  test("sequential keys are prefixed and start at 1", () => {
    const next = createSequentialKeyGenerator("k");
    assert.deepEqual([next(), next(), next()], ["k1", "k2", "k3"]);
  });

  test("default keys are 8 characters", () => {
    const a = defaultKeyGenerator();
    const b = defaultKeyGenerator();
    assert.equal(a.length, 8);
    assert.notEqual(a, b);
  });
});
