import { assert, describe, test } from "@navtree/testkit";
import { childKeys, dest, isNavTreeError, panes, screen, stack } from "../../__tests__/trees.js";
import { createPaneConfiguration, createSequentialKeyGenerator } from "../../tree/nodes.js";
import { findByKey } from "../../tree/traversal.js";
import type { PaneBackBehavior, PaneNode, PaneRole, StackNode } from "../../tree/types.js";
import {
  clearPaneStack,
  navigateToPane,
  popPane,
  popPaneAdaptive,
  popWithPaneBehavior,
  removePaneConfiguration,
  setPaneConfiguration,
  switchActivePane,
} from "../panes.js";
import type { PopResult } from "../types.js";

type Contents = Readonly<{ primary: readonly string[]; supporting?: readonly string[] }>;

/** root -> [home, pane "p"]; each role holds a stack of screens named by `contents`. */
function paneTree(
  contents: Contents,
  opts: Readonly<{ activePaneRole?: PaneRole; backBehavior?: PaneBackBehavior }> = {},
): StackNode {
  const roleStack = (key: string, names: readonly string[]) =>
    stack(
      key,
      names.map((name) => screen(name, name)),
    );
  return stack("root", [
    screen("home", "home"),
    panes(
      "p",
      {
        primary: roleStack("ps", contents.primary),
        ...(contents.supporting === undefined
          ? {}
          : { supporting: roleStack("ss", contents.supporting) }),
      },
      opts,
    ),
  ]);
}

function paneOf(result: PopResult): PaneNode {
  assert.ok(result.kind === "popped");
  const pane = findByKey(result.tree, "p");
  assert.ok(pane?.kind === "pane");
  return pane;
}

function keysOf(result: PopResult, key: string): readonly string[] {
  assert.ok(result.kind === "popped");
  return childKeys(findByKey(result.tree, key));
}

describe("navigateToPane", () => {
  test("appends to the role's stack and focuses it", () => {
    const root = paneTree({ primary: ["a"], supporting: [] });
    const next = navigateToPane(root, "p", "supporting", dest("detail"), {
      generateKey: createSequentialKeyGenerator("k"),
    });
    assert.deepEqual(childKeys(findByKey(next, "ss")), ["k1"]);
    const pane = findByKey(next, "p");
    assert.ok(pane?.kind === "pane");
    assert.equal(pane.activePaneRole, "supporting");
  });

  test("keeps focus when switchFocus is false", () => {
    const root = paneTree({ primary: ["a"], supporting: [] });
    const next = navigateToPane(root, "p", "supporting", dest("detail"), {
      switchFocus: false,
      generateKey: createSequentialKeyGenerator("k"),
    });
    const pane = findByKey(next, "p");
    assert.ok(pane?.kind === "pane");
    assert.equal(pane.activePaneRole, "primary");
  });

  test("rejects unconfigured roles and roles without a stack", () => {
    const root = paneTree({ primary: ["a"] });
    assert.throws(
      () => navigateToPane(root, "p", "extra", dest("x")),
      isNavTreeError("NAVTREE_INVALID_ARGUMENT"),
    );
    const bare = stack("root", [panes("p", { primary: screen("only", "only") })]);
    assert.throws(
      () => navigateToPane(bare, "p", "primary", dest("x")),
      isNavTreeError("NAVTREE_INVALID_STATE"),
    );
  });
});

describe("pane primitives", () => {
  test("switchActivePane is a no-op for the active role", () => {
    const root = paneTree({ primary: ["a"], supporting: ["b"] });
    assert.equal(switchActivePane(root, "p", "primary"), root);
    assert.throws(
      () => switchActivePane(root, "p", "extra"),
      isNavTreeError("NAVTREE_INVALID_ARGUMENT"),
    );
  });

  test("popPane never pops a role's root entry", () => {
    const root = paneTree({ primary: ["a", "b"], supporting: ["c"] });
    const next = popPane(root, "p", "primary");
    assert.deepEqual(childKeys(findByKey(next ?? root, "ps")), ["a"]);
    assert.equal(popPane(root, "p", "supporting"), null);
  });

  test("clearPaneStack empties a stack content", () => {
    const root = paneTree({ primary: ["a"], supporting: ["b", "c"] });
    assert.deepEqual(childKeys(findByKey(clearPaneStack(root, "p", "supporting"), "ss")), []);
    assert.equal(clearPaneStack(root, "missing", "supporting"), root);
    const cleared = clearPaneStack(root, "p", "supporting");
    assert.equal(clearPaneStack(cleared, "p", "supporting"), cleared);
  });

  test("setPaneConfiguration adds a role and re-parents its content", () => {
    const root = paneTree({ primary: ["a"] });
    const next = setPaneConfiguration(
      root,
      "p",
      "extra",
      createPaneConfiguration(stack("es", []), "levitate"),
    );
    const pane = findByKey(next, "p");
    assert.ok(pane?.kind === "pane");
    assert.equal(pane.panes.extra?.content.parentKey, "p");
    assert.equal(pane.panes.extra?.adaptStrategy, "levitate");
  });

  test("removePaneConfiguration refocuses primary and rejects primary", () => {
    const root = paneTree({ primary: ["a"], supporting: ["b"] }, { activePaneRole: "supporting" });
    const next = removePaneConfiguration(root, "p", "supporting");
    const pane = findByKey(next, "p");
    assert.ok(pane?.kind === "pane");
    assert.equal(pane.activePaneRole, "primary");
    assert.equal(pane.panes.supporting, undefined);
    assert.equal(removePaneConfiguration(next, "p", "supporting"), next);
    assert.throws(
      () => removePaneConfiguration(root, "p", "primary"),
      isNavTreeError("NAVTREE_INVALID_ARGUMENT"),
    );
  });
});

describe("popWithPaneBehavior", () => {
  test("pops normally while the active role has history", () => {
    const root = paneTree({ primary: ["a", "b"] }, { backBehavior: "popUntilScaffoldValueChange" });
    assert.deepEqual(keysOf(popWithPaneBehavior(root), "ps"), ["a"]);
  });

  test("without a pane it pops the active stack", () => {
    const root = stack("root", [screen("a", "a"), screen("b", "b")]);
    assert.deepEqual(keysOf(popWithPaneBehavior(root), "root"), ["a"]);
  });

  test("popLatest pops the role's last entry", () => {
    const root = paneTree({ primary: ["a"] }, { backBehavior: "popLatest" });
    assert.deepEqual(keysOf(popWithPaneBehavior(root), "ps"), []);
  });

  test("scaffold-value change returns to primary, then asks the presentation layer", () => {
    const onSupporting = paneTree(
      { primary: ["a"], supporting: ["b"] },
      { activePaneRole: "supporting" },
    );
    assert.equal(paneOf(popWithPaneBehavior(onSupporting)).activePaneRole, "primary");

    const onPrimary = paneTree({ primary: ["a"], supporting: ["b"] });
    assert.deepEqual(popWithPaneBehavior(onPrimary), { kind: "requiresScaffoldChange" });
  });

  test("destination change focuses the first other non-empty role", () => {
    const root = paneTree(
      { primary: ["a"], supporting: ["b"] },
      { activePaneRole: "supporting", backBehavior: "popUntilCurrentDestinationChange" },
    );
    assert.equal(paneOf(popWithPaneBehavior(root)).activePaneRole, "primary");

    const alone = paneTree(
      { primary: [], supporting: ["b"] },
      { activePaneRole: "supporting", backBehavior: "popUntilCurrentDestinationChange" },
    );
    assert.deepEqual(popWithPaneBehavior(alone), { kind: "paneEmpty", role: "supporting" });
  });

  test("content change pops another role and clears it once back at its root", () => {
    const root = paneTree(
      { primary: ["a"], supporting: ["b", "c"] },
      { backBehavior: "popUntilContentChange" },
    );
    const result = popWithPaneBehavior(root);
    assert.deepEqual(keysOf(result, "ss"), []);
    assert.equal(paneOf(result).activePaneRole, "primary");
  });

  test("content change pops the active role first", () => {
    const root = paneTree(
      { primary: ["a", "b"], supporting: ["c", "d", "e"] },
      { activePaneRole: "supporting", backBehavior: "popUntilContentChange" },
    );
    const result = popWithPaneBehavior(root);
    assert.deepEqual(keysOf(result, "ss"), ["c", "d"]);
    assert.deepEqual(keysOf(result, "ps"), ["a", "b"]);
    assert.equal(paneOf(result).activePaneRole, "supporting");
  });

  test("content change with nothing to pop", () => {
    const onPrimary = paneTree(
      { primary: ["a"], supporting: ["b"] },
      { backBehavior: "popUntilContentChange" },
    );
    assert.deepEqual(popWithPaneBehavior(onPrimary), { kind: "paneEmpty", role: "primary" });

    const onSupporting = paneTree(
      { primary: ["a"], supporting: ["b"] },
      { activePaneRole: "supporting", backBehavior: "popUntilContentChange" },
    );
    const result = popWithPaneBehavior(onSupporting);
    assert.deepEqual(keysOf(result, "ss"), []);
    assert.equal(paneOf(result).activePaneRole, "primary");
  });
});

describe("popPaneAdaptive", () => {
  test("compact pops the active role like a stack", () => {
    const root = paneTree(
      { primary: ["a"], supporting: ["b", "c"] },
      { activePaneRole: "supporting" },
    );
    assert.deepEqual(keysOf(popPaneAdaptive(root, true), "ss"), ["b"]);
  });

  test("compact at a secondary root clears it and focuses primary", () => {
    const root = paneTree({ primary: ["a"], supporting: ["b"] }, { activePaneRole: "supporting" });
    const result = popPaneAdaptive(root, true);
    assert.deepEqual(keysOf(result, "ss"), []);
    assert.equal(paneOf(result).activePaneRole, "primary");
  });

  test("compact at the primary root reports an empty pane", () => {
    const root = paneTree({ primary: ["a"] });
    assert.deepEqual(popPaneAdaptive(root, true), { kind: "paneEmpty", role: "primary" });
  });

  test("expanded defers to the pane's back behavior", () => {
    const root = paneTree({ primary: ["a"], supporting: ["b"] });
    assert.deepEqual(popPaneAdaptive(root, false), { kind: "requiresScaffoldChange" });
  });
});
