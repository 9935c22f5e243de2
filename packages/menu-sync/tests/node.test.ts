import { expect, test } from "vitest";

import { MenuTree, propertyValuesEqual, type MenuNode } from "../src/node.js";

function buildTree(events: string[] = []) {
  const tree = new MenuTree({
    childMoved: (parent, child, position, oldPosition) =>
      events.push(`moved ${child.id} in ${parent.id} ${oldPosition}->${position}`),
    childRemoved: (parent, child) => events.push(`removed ${child.id} from ${parent.id}`),
    propertyChanged: (node, key, value) => events.push(`prop ${node.id} ${key}=${JSON.stringify(value)}`),
    nodeRealized: (node) => events.push(`realized ${node.id}`),
  });
  const root = tree.createRoot(0);
  const a = tree.createChild(root, 1, 0);
  const b = tree.createChild(root, 2, 1);
  const c = tree.createChild(a, 3, 0);
  return { tree, root, a, b, c };
}

test("children keep their insertion positions", () => {
  const { tree, root, a } = buildTree();
  tree.createChild(root, 4, 1);
  expect(root.children).toEqual([1, 4, 2]);
  expect(tree.childrenOf(root).map((n) => n.id)).toEqual([1, 4, 2]);
  expect(tree.parentOf(a)).toBe(root);
  expect(tree.parentOf(root)).toBeNull();
});

test("creating an id that is already mapped throws", () => {
  const { tree, root } = buildTree();
  expect(() => tree.createChild(root, 3, 0)).toThrow("menu item 3 already exists in this tree");
});

test("moveChild reports old and new positions, and nothing when the slot is unchanged", () => {
  const events: string[] = [];
  const { tree, root, a, b } = buildTree(events);
  tree.moveChild(root, b, 0);
  tree.moveChild(root, a, 1);
  expect(root.children).toEqual([2, 1]);
  expect(events).toEqual(["moved 2 in 0 1->0"]);
});

test("removing a child frees its whole subtree", () => {
  const events: string[] = [];
  const { tree, root, a, b, c } = buildTree(events);
  tree.removeChild(root, a);

  expect(events).toEqual(["removed 1 from 0"]);
  expect(root.children).toEqual([2]);
  expect(tree.isLive(a)).toBe(false);
  expect(tree.isLive(c)).toBe(false);
  expect(tree.isLive(b)).toBe(true);
  expect(tree.size).toBe(2);
});

test("free leaves a newer instance with the same id alone", () => {
  const { tree, root, a, c } = buildTree();
  root.removeChild(a.id);
  tree.free(c);
  const fresh = tree.createChild(root, 3, 0);
  tree.free(a);
  expect(tree.get(3)).toBe(fresh);
  expect(tree.get(1)).toBeUndefined();
});

test("detach removes a node from its parent", () => {
  const events: string[] = [];
  const { tree, a, c } = buildTree(events);
  tree.detach(c);
  expect(a.children).toEqual([]);
  expect(tree.get(3)).toBeUndefined();
  expect(events).toEqual(["removed 3 from 1"]);
});

test("property writes only report real changes", () => {
  const events: string[] = [];
  const { tree, b } = buildTree(events);
  tree.setProperty(b, "label", "Open");
  tree.setProperty(b, "label", "Open");
  tree.setProperty(b, "icon-data", new Uint8Array([1, 2]));
  tree.setProperty(b, "icon-data", new Uint8Array([1, 2]));
  tree.removeProperty(b, "missing");
  tree.removeProperty(b, "label");

  expect(events).toEqual([
    'prop 2 label="Open"',
    'prop 2 icon-data={"0":1,"1":2}',
    "prop 2 label=undefined",
  ]);
  expect(b.propertyKeys()).toEqual(["icon-data"]);
});

test("replaceProperties drops keys absent from the new map", () => {
  const { tree, b } = buildTree();
  tree.mergeProperties(b, { label: "Save", enabled: false });
  tree.replaceProperties(b, { label: "Save as", visible: true });
  expect(b.properties()).toEqual({ label: "Save as", visible: true });
});

test("markRealized fires once", () => {
  const events: string[] = [];
  const { tree, a } = buildTree(events);
  tree.markRealized(a);
  tree.markRealized(a);
  expect(a.realized).toBe(true);
  expect(events).toEqual(["realized 1"]);
});

test("walk visits nodes in menu order", () => {
  const { tree, root } = buildTree();
  expect(tree.walk(root).map((n: MenuNode) => n.id)).toEqual([0, 1, 3, 2]);
});

test("propertyValuesEqual compares nested values structurally", () => {
  expect(propertyValuesEqual({ a: [1, "x"] }, { a: [1, "x"] })).toBe(true);
  expect(propertyValuesEqual({ a: [1, "x"] }, { a: [1, "y"] })).toBe(false);
  expect(propertyValuesEqual(new Uint8Array([1]), [1])).toBe(false);
  expect(propertyValuesEqual(1, "1")).toBe(false);
});
