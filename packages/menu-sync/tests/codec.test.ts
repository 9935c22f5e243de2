import { expect, test } from "vitest";

import { decodeCbor, encodeCbor, menuWireCodecV0 } from "../src/codec.js";
import { createInMemoryDuplex, wrapDuplexTransportWithCodec } from "../src/transport.js";
import type { MenuEnvelope } from "../src/types.js";
import { assertUniqueLayoutIds, parseLayoutNode, parseMenuEnvelope } from "../src/validate.js";

function protocolMessage(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ProtocolMismatch") return err.message;
    throw err;
  }
  throw new Error("expected a protocol error");
}

test("a signal envelope survives encoding, bytes included", () => {
  const envelope: MenuEnvelope = {
    v: 0,
    menuPath: "/menu",
    payload: {
      case: "signal",
      value: {
        case: "itemsPropertiesUpdated",
        value: {
          updated: [{ id: 2, properties: { "icon-data": new Uint8Array([137, 80]), shortcut: [["Control", "q"]] } }],
          removed: [{ id: 3, keys: ["label"] }],
        },
      },
    },
  };
  expect(menuWireCodecV0.decode(menuWireCodecV0.encode(envelope))).toEqual(envelope);
});

test("encoding is deterministic regardless of key order", () => {
  expect(encodeCbor({ b: 1, a: 2 })).toEqual(encodeCbor({ a: 2, b: 1 }));
});

test("envelopes are validated on decode", () => {
  expect(protocolMessage(() => menuWireCodecV0.decode(encodeCbor({ v: 1, menuPath: "/menu", payload: {} })))).toBe(
    "unsupported envelope version: 1"
  );
  expect(protocolMessage(() => parseMenuEnvelope({ v: 0, menuPath: "/menu", payload: { case: "shout" } }))).toBe(
    "unknown payload: shout"
  );
  expect(
    protocolMessage(() =>
      parseMenuEnvelope({
        v: 0,
        menuPath: "/menu",
        payload: { case: "call", value: { callId: 1, method: "Explode", params: {} } },
      })
    )
  ).toBe("unknown method: Explode");
  expect(
    protocolMessage(() =>
      parseMenuEnvelope({
        v: 0,
        menuPath: "/menu",
        payload: { case: "signal", value: { case: "itemUpdated", value: { id: 1.5 } } },
      })
    )
  ).toBe("id must be a non-negative integer, got: 1.5");
  expect(
    protocolMessage(() =>
      parseMenuEnvelope({
        v: 0,
        menuPath: "/menu",
        payload: {
          case: "signal",
          value: { case: "itemPropertyUpdated", value: { id: 1, key: "label", value: null } },
        },
      })
    )
  ).toBe("value is not a valid property value");
});

test("layouts parse leaves without children and reject repeated ids", () => {
  expect(parseLayoutNode({ id: 0, children: [{ id: 1 }, { id: 2, children: [{ id: 3 }] }] })).toEqual({
    id: 0,
    children: [
      { id: 1, children: [] },
      { id: 2, children: [{ id: 3, children: [] }] },
    ],
  });
  expect(protocolMessage(() => parseLayoutNode({ id: 0, children: [{ id: "1" }] }))).toBe(
    "layout.children[0].id must be a non-negative integer, got: 1"
  );
  expect(protocolMessage(() => assertUniqueLayoutIds({ id: 0, children: [{ id: 0, children: [] }] }))).toBe(
    "layout repeats id 0"
  );
});

test("undecodable frames go to onDecodeError instead of the handler", async () => {
  const [raw, peer] = createInMemoryDuplex<Uint8Array>();
  const errors: string[] = [];
  const received: MenuEnvelope[] = [];
  const decoded = wrapDuplexTransportWithCodec(peer, menuWireCodecV0, {
    onDecodeError: (err) => errors.push(err instanceof Error ? err.message : String(err)),
  });
  decoded.onMessage((msg) => received.push(msg));

  await raw.send(encodeCbor({ v: 0, menuPath: "/menu" }));
  await raw.send(encodeCbor({ v: 0, menuPath: "/menu", payload: { case: "reply", value: { callId: 4, result: 1 } } }));
  await new Promise<void>((resolve) => queueMicrotask(resolve));

  expect(errors).toEqual(["payload must be a map"]);
  expect(received).toEqual([{ v: 0, menuPath: "/menu", payload: { case: "reply", value: { callId: 4, result: 1 } } }]);
  expect(decodeCbor(encodeCbor([1, "two"]))).toEqual([1, "two"]);
});
