export * from "./types.js";
export * from "./errors.js";
export * from "./log.js";
export * from "./transport.js";
export * from "./codec.js";
export * from "./node.js";
export * from "./batcher.js";
export * from "./handlers.js";
export * from "./reconcile.js";
export * from "./session.js";
export * from "./rpc.js";
export * from "./in-memory.js";
export * from "./websocket.js";
export * from "./dump.js";
export {
  assertUniqueLayoutIds,
  isPropertyValue,
  parseLayoutNode,
  parseLayoutReply,
  parseMenuEnvelope,
  parseMenuSignal,
  parsePropertyMap,
} from "./validate.js";
