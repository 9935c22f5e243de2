import { expect, test } from "vitest";

import { TypeHandlerRegistry, typeTagOf } from "../src/handlers.js";
import { createMenuLogger } from "../src/log.js";
import { MenuTree } from "../src/node.js";

type Owner = { name: string };

function setup() {
  const warnings: string[] = [];
  const owner: Owner = { name: "owner" };
  const registry = new TypeHandlerRegistry<Owner>(owner, createMenuLogger("test", { warn: (line) => warnings.push(line) }));
  const tree = new MenuTree();
  const root = tree.createRoot(0);
  const item = tree.createChild(root, 1, 0);
  return { warnings, owner, registry, tree, root, item };
}

test("type tags default to standard", () => {
  const { tree, item } = setup();
  expect(typeTagOf(item)).toBe("standard");
  tree.setProperty(item, "type", 3);
  expect(typeTagOf(item)).toBe("standard");
  tree.setProperty(item, "type", "separator");
  expect(typeTagOf(item)).toBe("separator");
});

test("a tag can only be registered once", () => {
  const { registry, warnings } = setup();
  expect(registry.register("separator", () => true)).toBe(true);
  expect(registry.register("separator", () => false)).toBe(false);
  expect(registry.size).toBe(1);
  expect(warnings).toEqual(["[menu:test] type handler for 'separator' already registered"]);
});

test("dispatch passes node, parent and owner and reports whether the handler claimed the node", () => {
  const { registry, tree, root, item, owner } = setup();
  const seen: Array<[number, number | null, Owner]> = [];
  registry.register("standard", (node, parent, who) => {
    seen.push([node.id, parent?.id ?? null, who]);
  });
  registry.register("separator", () => true);

  expect(registry.dispatch(item, root)).toBe(false);
  expect(seen).toEqual([[1, 0, owner]]);

  tree.setProperty(item, "type", "separator");
  expect(registry.dispatch(item, root)).toBe(true);
  tree.setProperty(item, "type", "slider");
  expect(registry.dispatch(item, root)).toBe(false);
});

test("a throwing handler counts as not handled", () => {
  const { registry, item, root, warnings } = setup();
  registry.register("standard", () => {
    throw new Error("widget factory missing");
  });
  expect(registry.dispatch(item, root)).toBe(false);
  expect(warnings).toEqual(["[menu:test] type handler for 'standard' failed on item 1: widget factory missing"]);
});

test("unregister and clear call release hooks", () => {
  const { registry, owner, warnings } = setup();
  const released: Array<[string, Owner]> = [];
  const release = (type: string, who: Owner) => {
    released.push([type, who]);
  };
  registry.register("a", { realize: () => true, release });
  registry.register("b", { realize: () => true, release });
  registry.register("c", {
    realize: () => true,
    release: () => {
      throw new Error("boom");
    },
  });

  expect(registry.unregister("a")).toBe(true);
  expect(registry.unregister("a")).toBe(false);
  registry.clear();

  expect(released).toEqual([
    ["a", owner],
    ["b", owner],
  ]);
  expect(registry.size).toBe(0);
  expect(warnings).toEqual(["[menu:test] releasing type handler for 'c' failed: boom"]);
});
