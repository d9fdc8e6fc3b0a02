import { assert, describe, test } from "@navtree/testkit";
import {
  childKeys,
  dest,
  isNavTreeError,
  panes,
  screen,
  stack,
  tabs,
} from "../../__tests__/trees.js";
import { createDeepLinkRegistry } from "../../registry/deepLinks.js";
import { createContainerRegistry, createScopeRegistry } from "../../registry/registries.js";
import { createSequentialKeyGenerator } from "../../tree/nodes.js";
import { findByKey } from "../../tree/traversal.js";
import { type NavigatorSnapshot, createNavigator } from "../navigator.js";

function keys() {
  return createSequentialKeyGenerator("k");
}

function homeAndDetail() {
  return stack("root", [screen("s0", "home"), screen("s1", "detail")]);
}

describe("createNavigator - initial state", () => {
  test("defaults to an empty root stack", () => {
    const nav = createNavigator({ generateKey: keys() });
    const tree = nav.state();
    assert.ok(tree.kind === "stack");
    assert.equal(tree.key, "k1");
    assert.deepEqual(tree.children, []);
    assert.equal(nav.currentDestination(), null);
    assert.equal(nav.canNavigateBack(), false);
    assert.equal(nav.transitionState().kind, "idle");
    assert.equal(nav.isCompact(), true);
  });

  test("wraps a non-stack initial state in a root stack", () => {
    const nav = createNavigator({
      initialState: tabs("main", [stack("a", [screen("x", "x")])]),
      generateKey: keys(),
    });
    assert.equal(nav.state().key, "k1");
    assert.deepEqual(childKeys(nav.state()), ["main"]);
    assert.equal(findByKey(nav.state(), "main")?.parentKey, "k1");
    assert.equal(nav.currentDestination()?.route, "x");
  });

  test("uses a root stack as given", () => {
    const initial = homeAndDetail();
    assert.equal(createNavigator({ initialState: initial }).state(), initial);
  });

  test("rejects an invalid initial tree", () => {
    assert.throws(
      () => createNavigator({ initialState: stack("root", [screen("a", "a"), screen("a", "b")]) }),
      isNavTreeError("NAVTREE_INVARIANT_VIOLATION"),
    );
  });
});

describe("createNavigator - stack intents", () => {
  test("push, pop, pop to the last screen, then delegate", () => {
    const nav = createNavigator({
      initialState: stack("root", [screen("s0", "home")]),
      generateKey: keys(),
    });

    nav.navigate(dest("detail"));
    assert.deepEqual(childKeys(nav.state()), ["s0", "k1"]);
    assert.equal(nav.currentDestination()?.route, "detail");
    assert.equal(nav.previousDestination()?.route, "home");
    assert.equal(nav.canNavigateBack(), true);

    assert.equal(nav.navigateBack(), true);
    assert.deepEqual(childKeys(nav.state()), ["s0"]);
    assert.equal(nav.canNavigateBack(), false);

    const before = nav.state();
    assert.equal(nav.navigateBack(), false);
    assert.equal(nav.state(), before);
  });

  test("replace and clear intents", () => {
    const nav = createNavigator({
      initialState: stack("root", [screen("s0", "home")]),
      generateKey: keys(),
    });

    nav.navigateAndReplace(dest("login"));
    assert.deepEqual(childKeys(nav.state()), ["k1"]);

    nav.navigate(dest("a"));
    nav.navigate(dest("b"));
    nav.navigateAndClearAll(dest("dashboard"));
    assert.deepEqual(childKeys(nav.state()), ["k4"]);

    nav.navigate(dest("list"));
    nav.navigate(dest("item"));
    nav.navigateAndClearTo(dest("edit"), "dashboard", false);
    assert.deepEqual(childKeys(nav.state()), ["k4", "k7"]);

    nav.navigateAndClearTo(dest("final"), null, false);
    assert.deepEqual(childKeys(nav.state()), ["k4", "k7", "k8"]);
  });

  test("back handlers run newest first and can consume the press", () => {
    const nav = createNavigator({ initialState: homeAndDetail() });
    const calls: string[] = [];
    nav.addBackHandler(() => {
      calls.push("first");
      return false;
    });
    const removeSecond = nav.addBackHandler(() => {
      calls.push("second");
      return true;
    });

    const before = nav.state();
    assert.equal(nav.navigateBack(), true);
    assert.equal(nav.state(), before);
    assert.deepEqual(calls, ["second"]);

    removeSecond();
    assert.equal(nav.navigateBack(), true);
    assert.deepEqual(calls, ["second", "first"]);
    assert.deepEqual(childKeys(nav.state()), ["s0"]);
  });

  test("backStack lists the active stack", () => {
    const nav = createNavigator({ initialState: homeAndDetail() });
    assert.deepEqual(
      nav.backStack().map((entry) => [entry.id, entry.destination.route]),
      [
        ["s0", "home"],
        ["s1", "detail"],
      ],
    );
  });
});

describe("createNavigator - containers and scopes", () => {
  test("routes container members, switches tabs and escapes scopes", () => {
    const nav = createNavigator({
      initialState: stack("root", [screen("s0", "home")]),
      generateKey: keys(),
      containerRegistry: createContainerRegistry([
        { kind: "tabs", route: "main", tabs: [dest("feed"), dest("search")] },
      ]),
      scopeRegistry: createScopeRegistry({ main: ["feed", "search", "post"] }),
    });

    nav.navigate(dest("search"));
    assert.deepEqual(childKeys(nav.state()), ["s0", "k1"]);
    assert.equal(nav.activeTabIndex(), 1);
    assert.equal(nav.currentDestination()?.route, "search");

    nav.navigate(dest("feed"));
    assert.equal(nav.activeTabIndex(), 0);
    assert.equal(nav.currentDestination()?.route, "feed");

    nav.navigate(dest("post"));
    assert.deepEqual(childKeys(findByKey(nav.state(), "k1/tab-0")), ["k1/tab-0/root", "k2"]);

    nav.navigate(dest("settings"));
    assert.deepEqual(childKeys(nav.state()), ["s0", "k1", "k3"]);

    nav.navigateBack();
    assert.equal(nav.currentDestination()?.route, "post");
    nav.navigateBack();
    assert.equal(nav.currentDestination()?.route, "feed");
    nav.navigateBack();
    assert.deepEqual(childKeys(nav.state()), ["s0"]);
    assert.equal(nav.activeTabIndex(), null);
  });

  test("a container key that is already taken leaves the tree unchanged", () => {
    const containerRegistry = createContainerRegistry([
      { kind: "tabs", route: "main", tabs: [dest("feed")] },
    ]);
    const taken = createNavigator({
      initialState: stack("root", [screen("s0", "home")]),
      generateKey: () => "s0",
      containerRegistry,
    });
    assert.throws(() => taken.navigate(dest("feed")), isNavTreeError("NAVTREE_INVALID_STATE"));

    const derived = createNavigator({
      initialState: stack("root", [screen("k1/tab-0/root", "home")]),
      generateKey: keys(),
      containerRegistry,
    });
    const before = derived.state();
    assert.throws(() => derived.navigate(dest("feed")), isNavTreeError("NAVTREE_INVALID_STATE"));
    assert.equal(derived.state(), before);
  });

  test("switchTab targets the active tab or a named one", () => {
    const nav = createNavigator({
      initialState: stack("root", [
        tabs("main", [stack("a", [screen("x", "x")]), stack("b", [screen("y", "y")])]),
      ]),
    });
    nav.switchTab(1);
    assert.equal(nav.currentDestination()?.route, "y");
    nav.switchTab(0, "main");
    assert.equal(nav.currentDestination()?.route, "x");
    assert.throws(() => nav.switchTab(5), isNavTreeError("NAVTREE_INVALID_ARGUMENT"));
  });
});

describe("createNavigator - panes", () => {
  function paneNavigator() {
    return createNavigator({
      initialState: stack("root", [panes("p", { primary: stack("ps", [screen("list", "list")]) })]),
      generateKey: keys(),
    });
  }

  function activeRole(nav: ReturnType<typeof createNavigator>): string {
    const pane = findByKey(nav.state(), "p");
    assert.ok(pane?.kind === "pane");
    return pane.activePaneRole;
  }

  test("navigating to an unconfigured role creates its stack", () => {
    const nav = paneNavigator();
    nav.navigateToPane("supporting", dest("detail"));
    assert.equal(activeRole(nav), "supporting");
    assert.equal(nav.isPaneAvailable("supporting"), true);
    assert.equal(nav.isPaneAvailable("extra"), false);
    assert.equal(nav.paneContent("supporting")?.key, "k1");
    assert.deepEqual(childKeys(nav.paneContent("supporting")), ["k2"]);
    assert.equal(nav.currentDestination()?.route, "detail");
  });

  test("a new role's stack and screen cannot share a key", () => {
    const nav = createNavigator({
      initialState: stack("root", [panes("p", { primary: stack("ps", [screen("list", "list")]) })]),
      generateKey: () => "dup",
    });
    const before = nav.state();
    assert.throws(
      () => nav.navigateToPane("supporting", dest("detail")),
      isNavTreeError("NAVTREE_INVALID_STATE"),
    );
    assert.equal(nav.state(), before);
    assert.equal(nav.isPaneAvailable("supporting"), false);
  });

  test("pane history pops and clears per role", () => {
    const nav = paneNavigator();
    nav.navigateToPane("supporting", dest("detail"));
    nav.navigateToPane("supporting", dest("more"));
    assert.deepEqual(childKeys(nav.paneContent("supporting")), ["k2", "k3"]);

    assert.equal(nav.navigateBackInPane("supporting"), true);
    assert.deepEqual(childKeys(nav.paneContent("supporting")), ["k2"]);
    assert.equal(nav.navigateBackInPane("supporting"), false);
    assert.equal(nav.navigateBackInPane("extra"), false);

    nav.navigateToPane("supporting", dest("a"));
    nav.navigateToPane("supporting", dest("b"));
    nav.clearPane("supporting");
    assert.deepEqual(childKeys(nav.paneContent("supporting")), ["k2"]);
  });

  test("switchPane and unfocused pane pushes", () => {
    const nav = paneNavigator();
    nav.navigateToPane("supporting", dest("detail"));
    nav.switchPane("primary");
    assert.equal(nav.currentDestination()?.route, "list");

    nav.navigateToPane("extra", dest("tools"), { switchFocus: false });
    assert.equal(activeRole(nav), "primary");
    assert.deepEqual(childKeys(nav.paneContent("extra")), ["k4"]);
  });

  test("pane intents need a pane", () => {
    const nav = createNavigator({ initialState: homeAndDetail() });
    assert.throws(() => nav.switchPane("primary"), isNavTreeError("NAVTREE_INVALID_STATE"));
    assert.equal(nav.isPaneAvailable("primary"), false);
    assert.equal(nav.paneContent("primary"), null);
  });

  test("compact back stays inside the pane; expanded back leaves it", () => {
    const nav = createNavigator({
      initialState: stack("root", [
        screen("a", "a"),
        panes("p", { primary: stack("ps", [screen("x", "x")]) }),
      ]),
    });
    assert.equal(nav.navigateBack(), false);
    assert.deepEqual(childKeys(nav.state()), ["a", "p"]);

    nav.setCompact(false);
    assert.equal(nav.isCompact(), false);
    assert.equal(nav.navigateBack(), true);
    assert.deepEqual(childKeys(nav.state()), ["a"]);
  });
});

describe("createNavigator - publishing", () => {
  test("subscribers see one snapshot per change", () => {
    const nav = createNavigator({
      initialState: stack("root", [screen("s0", "home")]),
      generateKey: keys(),
    });
    const seen: NavigatorSnapshot[] = [];
    nav.subscribe((snapshot) => {
      seen.push(snapshot);
    });

    nav.navigate(dest("detail"));
    nav.updateState(nav.state());
    assert.equal(seen.length, 1);
    assert.equal(seen[0]?.tree, nav.state());
    assert.equal(seen[0]?.currentDestination?.route, "detail");
    assert.equal(seen[0], nav.snapshot());
  });

  test("a transition descriptor starts an animation until completed", () => {
    const nav = createNavigator({
      initialState: stack("root", [screen("s0", "home")]),
      generateKey: keys(),
    });
    const before = nav.state();
    let emitted = 0;
    nav.subscribe(() => {
      emitted++;
    });

    nav.navigate(dest("detail"), { id: "slide" });
    const animating = nav.transitionState();
    assert.ok(animating.kind === "animating");
    assert.equal(animating.current, before);
    assert.equal(animating.target, nav.state());
    assert.equal(animating.direction, "forward");
    assert.deepEqual(nav.snapshot().transition, { id: "slide" });

    nav.updateTransitionProgress(0.5);
    nav.completeTransition();
    const idle = nav.transitionState();
    assert.ok(idle.kind === "idle");
    assert.equal(idle.current, nav.state());
    assert.equal(nav.snapshot().transition, null);
    assert.equal(emitted, 3);

    nav.completeTransition();
    assert.equal(emitted, 3);
  });

  test("a subscriber redirect reaches later subscribers last", () => {
    const nav = createNavigator({
      initialState: stack("root", [screen("s0", "home")]),
      generateKey: keys(),
    });
    nav.subscribe((snapshot) => {
      if (snapshot.currentDestination?.route === "login") nav.navigateAndReplace(dest("home2"));
    });
    const routes: (string | undefined)[] = [];
    nav.subscribe((snapshot) => {
      routes.push(snapshot.currentDestination?.route);
    });

    nav.navigate(dest("login"));
    assert.deepEqual(routes, ["login", "home2"]);
    assert.equal(nav.currentDestination()?.route, "home2");
    assert.deepEqual(childKeys(nav.state()), ["s0", "k2"]);
  });

  test("updateState validates the replacement tree", () => {
    const nav = createNavigator({ initialState: homeAndDetail() });
    assert.throws(
      () => nav.updateState(stack("root", [screen("a", "a"), screen("a", "b")])),
      isNavTreeError("NAVTREE_INVARIANT_VIOLATION"),
    );
    const replacement = stack("root", [screen("z", "zen")]);
    nav.updateState(replacement);
    assert.equal(nav.state(), replacement);
    assert.equal(nav.currentDestination()?.route, "zen");
  });
});

describe("createNavigator - deep links", () => {
  test("navigates to the destination a link resolves to", () => {
    const nav = createNavigator({
      initialState: stack("root", [screen("s0", "home")]),
      generateKey: keys(),
      deepLinkRegistry: createDeepLinkRegistry({ "product/{id}": "product" }),
    });

    assert.equal(nav.handleDeepLink("app://product/42"), true);
    assert.equal(nav.currentDestination()?.route, "product");
    assert.equal(nav.currentDestination()?.params["id"], "42");
    assert.equal(nav.handleDeepLink("app://nowhere"), false);
    assert.deepEqual(childKeys(nav.state()), ["s0", "k1"]);
  });

  test("without a registry no link is handled", () => {
    const nav = createNavigator({ initialState: homeAndDetail() });
    assert.equal(nav.handleDeepLink("app://product/42"), false);
  });
});
