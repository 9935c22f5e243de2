import type { MenuNode, MenuTree } from "./node.js";
import type { MenuClient } from "./session.js";
import type { PropertyValue, Unsubscribe } from "./types.js";

export type DumpValue = string | number | boolean | DumpValue[] | { [key: string]: DumpValue };

export type DumpedItem = { [key: string]: DumpValue };

export function base64urlEncode(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64").replace(/\+/g, "-").replace(/\//g, "_").replace(/=+$/g, "");
}

export function toDumpValue(value: PropertyValue): DumpValue {
  if (value instanceof Uint8Array) return base64urlEncode(value);
  if (Array.isArray(value)) return value.map((v) => toDumpValue(v));
  if (typeof value === "object") {
    const out: { [key: string]: DumpValue } = {};
    for (const key of Object.keys(value).sort()) {
      const v = value[key];
      if (v !== undefined) out[key] = toDumpValue(v);
    }
    return out;
  }
  return value;
}

function dumpItem(node: MenuNode): DumpedItem {
  const item: DumpedItem = { id: node.id };
  for (const key of node.propertyKeys().sort()) {
    const value = node.property(key);
    if (value !== undefined) item[key] = toDumpValue(value);
  }
  return item;
}

/**
 * `{ id, ...properties sorted by key, submenu }` for `root` and everything below it. Leaves carry
 * no `submenu` key.
 */
export function formatMenuDump(tree: MenuTree, root: MenuNode): DumpedItem {
  const top = dumpItem(root);
  const stack: Array<{ node: MenuNode; item: DumpedItem }> = [{ node: root, item: top }];

  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) break;
    const children = tree.childrenOf(entry.node);
    if (children.length === 0) continue;

    const submenu: DumpedItem[] = [];
    for (const child of children) {
      const item = dumpItem(child);
      submenu.push(item);
      stack.push({ node: child, item });
    }
    entry.item.submenu = submenu;
  }

  return top;
}

export function renderMenuDump(tree: MenuTree, root: MenuNode): string {
  return JSON.stringify(formatMenuDump(tree, root), null, 2);
}

/** Resolves with the root once a root exists and every node below it has realized. */
export function waitForRealizedTree(client: MenuClient, timeoutMs: number): Promise<MenuNode> {
  return new Promise((resolve, reject) => {
    const unsubscribes: Unsubscribe[] = [];
    let settled = false;

    const finish = () => {
      settled = true;
      clearTimeout(timer);
      for (const unsubscribe of unsubscribes) unsubscribe();
    };

    const check = () => {
      if (settled) return;
      const root = client.root;
      if (!root) return;
      if (!client.tree.walk(root).every((node) => node.realized)) return;
      finish();
      resolve(root);
    };

    const timer = setTimeout(() => {
      if (settled) return;
      finish();
      reject(new Error(`menu did not finish loading within ${timeoutMs}ms`));
    }, timeoutMs);

    unsubscribes.push(
      client.on("nodeRealized", check),
      client.on("layoutUpdated", check),
      client.on("rootChanged", check)
    );
    check();
  });
}
