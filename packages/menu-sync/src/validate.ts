import { MenuSyncError } from "./errors.js";
import type {
  ItemProperties,
  ItemPropertyKeys,
  LayoutNode,
  LayoutReply,
  MenuCall,
  MenuEnvelope,
  MenuMethod,
  MenuMethods,
  MenuMessagePayload,
  MenuSignal,
  PropertyMap,
  PropertyValue,
} from "./types.js";

function protocolError(message: string): MenuSyncError {
  return new MenuSyncError("ProtocolMismatch", message);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value) && !(value instanceof Uint8Array);
}

export function assertRecord(value: unknown, field: string): Record<string, unknown> {
  if (!isRecord(value)) throw protocolError(`${field} must be a map`);
  return value;
}

export function assertId(value: unknown, field: string): number {
  if (typeof value !== "number" || !Number.isSafeInteger(value) || value < 0) {
    throw protocolError(`${field} must be a non-negative integer, got: ${String(value)}`);
  }
  return value;
}

export function assertString(value: unknown, field: string): string {
  if (typeof value !== "string") throw protocolError(`${field} must be a string`);
  return value;
}

function assertBoolean(value: unknown, field: string): boolean {
  if (typeof value !== "boolean") throw protocolError(`${field} must be a boolean`);
  return value;
}

function assertArray(value: unknown, field: string): unknown[] {
  if (!Array.isArray(value)) throw protocolError(`${field} must be an array`);
  return value;
}

export function isPropertyValue(value: unknown): value is PropertyValue {
  if (typeof value === "string" || typeof value === "boolean") return true;
  if (typeof value === "number") return Number.isFinite(value);
  if (value instanceof Uint8Array) return true;
  if (Array.isArray(value)) return value.every((v) => isPropertyValue(v));
  if (isRecord(value)) return Object.values(value).every((v) => isPropertyValue(v));
  return false;
}

export function assertPropertyValue(value: unknown, field: string): PropertyValue {
  if (!isPropertyValue(value)) throw protocolError(`${field} is not a valid property value`);
  return value;
}

export function parsePropertyMap(value: unknown, field: string): PropertyMap {
  const record = assertRecord(value, field);
  const out: PropertyMap = {};
  for (const [key, v] of Object.entries(record)) {
    out[key] = assertPropertyValue(v, `${field}.${key}`);
  }
  return out;
}

export function parseItemProperties(value: unknown, field: string): ItemProperties {
  const record = assertRecord(value, field);
  return {
    id: assertId(record.id, `${field}.id`),
    properties: parsePropertyMap(record.properties, `${field}.properties`),
  };
}

function parseItemPropertyKeys(value: unknown, field: string): ItemPropertyKeys {
  const record = assertRecord(value, field);
  return {
    id: assertId(record.id, `${field}.id`),
    keys: assertArray(record.keys, `${field}.keys`).map((k, i) => assertString(k, `${field}.keys[${i}]`)),
  };
}

/**
 * Walks with an explicit stack so deeply nested menus cannot exhaust the call stack.
 * A missing `children` field reads as a leaf.
 */
export function parseLayoutNode(value: unknown, field = "layout"): LayoutNode {
  const rootRecord = assertRecord(value, field);
  const root: LayoutNode = { id: assertId(rootRecord.id, `${field}.id`), children: [] };
  const stack: Array<{ raw: Record<string, unknown>; node: LayoutNode; path: string }> = [
    { raw: rootRecord, node: root, path: field },
  ];

  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) break;
    if (entry.raw.children === undefined) continue;

    const children = assertArray(entry.raw.children, `${entry.path}.children`);
    children.forEach((child, i) => {
      const path = `${entry.path}.children[${i}]`;
      const raw = assertRecord(child, path);
      const node: LayoutNode = { id: assertId(raw.id, `${path}.id`), children: [] };
      entry.node.children.push(node);
      stack.push({ raw, node, path });
    });
  }

  return root;
}

/** Rejects layouts that reuse an id anywhere in the tree. */
export function assertUniqueLayoutIds(layout: LayoutNode): void {
  const seen = new Set<number>();
  const stack: LayoutNode[] = [layout];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    if (seen.has(node.id)) throw protocolError(`layout repeats id ${node.id}`);
    seen.add(node.id);
    for (const child of node.children) stack.push(child);
  }
}

export function parseLayoutReply(value: unknown): LayoutReply {
  const record = assertRecord(value, "GetLayout result");
  return {
    revision: assertId(record.revision, "GetLayout result.revision"),
    layout: parseLayoutNode(record.layout),
  };
}

export const resultParsers: { [M in MenuMethod]: (value: unknown) => MenuMethods[M]["result"] } = {
  GetLayout: parseLayoutReply,
  GetGroupProperties: (value) => {
    const record = assertRecord(value, "GetGroupProperties result");
    const items = assertArray(record.items, "GetGroupProperties result.items");
    return { items: items.map((item, i) => parseItemProperties(item, `items[${i}]`)) };
  },
  Event: (value) => {
    assertRecord(value, "Event result");
    return {};
  },
  AboutToShow: (value) => {
    const record = assertRecord(value, "AboutToShow result");
    return { needUpdate: assertBoolean(record.needUpdate, "AboutToShow result.needUpdate") };
  },
};

function parseCall(value: unknown): MenuCall {
  const record = assertRecord(value, "call");
  const callId = assertId(record.callId, "call.callId");
  const params = assertRecord(record.params, "call.params");

  switch (record.method) {
    case "GetLayout":
      return { callId, method: "GetLayout", params: { parentId: assertId(params.parentId, "parentId") } };
    case "GetGroupProperties":
      return {
        callId,
        method: "GetGroupProperties",
        params: {
          ids: assertArray(params.ids, "ids").map((id, i) => assertId(id, `ids[${i}]`)),
          propertyNames: assertArray(params.propertyNames, "propertyNames").map((name, i) =>
            assertString(name, `propertyNames[${i}]`)
          ),
        },
      };
    case "Event":
      return {
        callId,
        method: "Event",
        params: {
          id: assertId(params.id, "id"),
          eventId: assertString(params.eventId, "eventId"),
          data: assertPropertyValue(params.data, "data"),
          timestamp: assertId(params.timestamp, "timestamp"),
        },
      };
    case "AboutToShow":
      return { callId, method: "AboutToShow", params: { id: assertId(params.id, "id") } };
    default:
      throw protocolError(`unknown method: ${String(record.method)}`);
  }
}

export function parseMenuSignal(value: unknown): MenuSignal {
  const record = assertRecord(value, "signal");
  const body = assertRecord(record.value, "signal.value");

  switch (record.case) {
    case "layoutUpdated":
      return {
        case: "layoutUpdated",
        value: {
          revision: assertId(body.revision, "revision"),
          parentId: assertId(body.parentId, "parentId"),
        },
      };
    case "itemPropertyUpdated":
      return {
        case: "itemPropertyUpdated",
        value: {
          id: assertId(body.id, "id"),
          key: assertString(body.key, "key"),
          value: assertPropertyValue(body.value, "value"),
        },
      };
    case "itemsPropertiesUpdated":
      return {
        case: "itemsPropertiesUpdated",
        value: {
          updated: assertArray(body.updated, "updated").map((item, i) => parseItemProperties(item, `updated[${i}]`)),
          removed: assertArray(body.removed, "removed").map((item, i) => parseItemPropertyKeys(item, `removed[${i}]`)),
        },
      };
    case "itemUpdated":
      return { case: "itemUpdated", value: { id: assertId(body.id, "id") } };
    case "itemActivationRequested":
      return {
        case: "itemActivationRequested",
        value: { id: assertId(body.id, "id"), timestamp: assertId(body.timestamp, "timestamp") },
      };
    default:
      throw protocolError(`unknown signal: ${String(record.case)}`);
  }
}

function parsePayload(value: unknown): MenuMessagePayload {
  const record = assertRecord(value, "payload");

  switch (record.case) {
    case "call":
      return { case: "call", value: parseCall(record.value) };
    case "reply": {
      const body = assertRecord(record.value, "reply");
      return { case: "reply", value: { callId: assertId(body.callId, "reply.callId"), result: body.result } };
    }
    case "fault": {
      const body = assertRecord(record.value, "fault");
      return {
        case: "fault",
        value: { callId: assertId(body.callId, "fault.callId"), message: assertString(body.message, "fault.message") },
      };
    }
    case "signal":
      return { case: "signal", value: parseMenuSignal(record.value) };
    default:
      throw protocolError(`unknown payload: ${String(record.case)}`);
  }
}

export function parseMenuEnvelope(value: unknown): MenuEnvelope {
  const record = assertRecord(value, "envelope");
  if (record.v !== 0) throw protocolError(`unsupported envelope version: ${String(record.v)}`);
  return {
    v: 0,
    menuPath: assertString(record.menuPath, "menuPath"),
    payload: parsePayload(record.payload),
  };
}
