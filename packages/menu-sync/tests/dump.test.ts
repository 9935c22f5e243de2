import { expect, test } from "vitest";

import { base64urlEncode, formatMenuDump, renderMenuDump, toDumpValue, waitForRealizedTree } from "../src/dump.js";
import { createInMemoryMenuLink } from "../src/in-memory.js";
import { MenuClient } from "../src/session.js";
import type { PropertyMap } from "../src/types.js";
import { FakeMenuRemote, layout } from "./fake-remote.js";

const PROPERTIES: Record<number, PropertyMap> = {
  0: { "children-display": "submenu" },
  1: { label: "Open", enabled: true },
  2: { label: "Recent", "children-display": "submenu" },
  3: { label: "a.txt", "icon-data": new Uint8Array([0xfb, 0xff]) },
};

test("bytes are written as unpadded base64url", () => {
  expect(base64urlEncode(new Uint8Array([0xfb, 0xff]))).toBe("-_8");
  expect(toDumpValue({ z: 1, a: [new Uint8Array([0])] })).toEqual({ a: ["AA"], z: 1 });
});

test("a realized menu dumps with sorted properties and nested submenus", async () => {
  const link = createInMemoryMenuLink({
    handlers: {
      GetLayout: () => ({ revision: 1, layout: layout(0, [layout(1), layout(2, [layout(3)])]) }),
      GetGroupProperties: ({ ids }) => ({ items: ids.map((id) => ({ id, properties: PROPERTIES[id] ?? {} })) }),
      Event: () => ({}),
      AboutToShow: () => ({ needUpdate: false }),
    },
  });
  const client = new MenuClient(link.remote);
  client.start();

  const root = await waitForRealizedTree(client, 1000);
  const dump = formatMenuDump(client.tree, root);

  expect(dump).toEqual({
    id: 0,
    "children-display": "submenu",
    submenu: [
      { id: 1, enabled: true, label: "Open" },
      {
        id: 2,
        "children-display": "submenu",
        label: "Recent",
        submenu: [{ id: 3, "icon-data": "-_8", label: "a.txt" }],
      },
    ],
  });
  const recent = Array.isArray(dump.submenu) ? dump.submenu[1] : undefined;
  expect(recent && typeof recent === "object" ? Object.keys(recent) : []).toEqual([
    "id",
    "children-display",
    "label",
    "submenu",
  ]);
  expect(JSON.parse(renderMenuDump(client.tree, root))).toEqual(dump);

  client.dispose();
  link.detach();
});

test("waiting gives up when the menu never finishes realizing", async () => {
  const remote = new FakeMenuRemote();
  remote.holdGroupCalls = true;
  const client = new MenuClient(remote);
  client.start();
  remote.answerLayout(0, 1, layout(0, [layout(1)]));

  await expect(waitForRealizedTree(client, 20)).rejects.toThrow("menu did not finish loading within 20ms");
  client.dispose();
});
