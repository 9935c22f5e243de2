import { errorMessage, MenuSyncError, toTransportFailure } from "./errors.js";
import { createMenuLogger, type MenuLogOptions } from "./log.js";
import type { DuplexTransport } from "./transport.js";
import type {
  MenuCall,
  MenuEnvelope,
  MenuMessagePayload,
  MenuMethod,
  MenuMethods,
  MenuRemote,
  MenuSignal,
  Unsubscribe,
} from "./types.js";
import { resultParsers } from "./validate.js";

export const DEFAULT_MENU_PATH = "/menu";

/** Per-method call timeouts. `Infinity` (or anything not positive) waits forever. */
export const DEFAULT_CALL_TIMEOUTS_MS: Readonly<Record<MenuMethod, number>> = {
  GetLayout: Infinity,
  GetGroupProperties: Infinity,
  Event: 1000,
  AboutToShow: Infinity,
};

export type MenuRemoteOptions = MenuLogOptions & {
  menuPath?: string;
  timeoutsMs?: Partial<Record<MenuMethod, number>>;
};

export type MenuRemoteClient = MenuRemote & {
  readonly menuPath: string;
  pendingCalls: () => number;
  close: () => void;
};

type PendingCall = {
  method: MenuMethod;
  resolve: (result: unknown) => void;
  reject: (err: MenuSyncError) => void;
  timer: ReturnType<typeof setTimeout> | null;
};

/**
 * Client half of the menu protocol over a message transport. Calls are matched to replies by
 * `callId`; signals fan out to `onSignal` subscribers.
 */
export function createMenuRemote(
  transport: DuplexTransport<MenuEnvelope>,
  opts: MenuRemoteOptions = {}
): MenuRemoteClient {
  const menuPath = opts.menuPath ?? DEFAULT_MENU_PATH;
  const logger = createMenuLogger(menuPath, opts);
  const timeouts: Record<MenuMethod, number> = { ...DEFAULT_CALL_TIMEOUTS_MS, ...opts.timeoutsMs };
  const pending = new Map<number, PendingCall>();
  const signalHandlers = new Set<(signal: MenuSignal) => void>();
  let nextCallId = 1;
  let closed = false;

  const take = (callId: number): PendingCall | null => {
    const entry = pending.get(callId);
    if (!entry) return null;
    pending.delete(callId);
    if (entry.timer) clearTimeout(entry.timer);
    return entry;
  };

  const detach = transport.onMessage((msg) => {
    if (msg.menuPath !== menuPath) return;
    const payload = msg.payload;

    switch (payload.case) {
      case "reply": {
        const entry = take(payload.value.callId);
        if (!entry) {
          logger.debug(`discarding reply to call ${payload.value.callId}, no longer pending`);
          return;
        }
        entry.resolve(payload.value.result);
        return;
      }
      case "fault": {
        const entry = take(payload.value.callId);
        if (!entry) {
          logger.debug(`discarding fault for call ${payload.value.callId}, no longer pending`);
          return;
        }
        entry.reject(new MenuSyncError("TransportFailure", `${entry.method} failed: ${payload.value.message}`));
        return;
      }
      case "signal":
        for (const handler of signalHandlers) {
          try {
            handler(payload.value);
          } catch (err) {
            logger.warn(`signal handler for ${payload.value.case} failed: ${errorMessage(err)}`);
          }
        }
        return;
      case "call":
        logger.debug(`ignoring ${payload.value.method} call sent to the client side`);
        return;
      default: {
        const _exhaustive: never = payload;
        throw new Error(`unknown payload: ${String(_exhaustive)}`);
      }
    }
  });

  function call<T>(build: (callId: number) => MenuCall, parse: (result: unknown) => T): Promise<T> {
    if (closed) return Promise.reject(new MenuSyncError("Shutdown", "menu remote closed"));

    const callId = nextCallId++;
    const message = build(callId);
    const method = message.method;

    return new Promise<T>((resolve, reject) => {
      const entry: PendingCall = {
        method,
        resolve: (result) => {
          try {
            resolve(parse(result));
          } catch (err) {
            reject(err);
          }
        },
        reject,
        timer: null,
      };

      const ms = timeouts[method];
      if (Number.isFinite(ms) && ms > 0) {
        entry.timer = setTimeout(() => {
          if (take(callId)) reject(new MenuSyncError("TransportFailure", `timeout after ${ms}ms: ${method}`));
        }, ms);
      }
      pending.set(callId, entry);

      const fail = (err: unknown) => {
        if (take(callId)) reject(toTransportFailure(err));
      };
      try {
        void transport.send({ v: 0, menuPath, payload: { case: "call", value: message } }).catch(fail);
      } catch (err) {
        fail(err);
      }
    });
  }

  return {
    menuPath,
    getLayout: (parentId) =>
      call((callId) => ({ callId, method: "GetLayout", params: { parentId } }), resultParsers.GetLayout),
    getGroupProperties: async (ids, propertyNames) => {
      const result = await call(
        (callId) => ({ callId, method: "GetGroupProperties", params: { ids, propertyNames } }),
        resultParsers.GetGroupProperties
      );
      return result.items;
    },
    event: async (id, eventId, data, timestamp) => {
      await call(
        (callId) => ({ callId, method: "Event", params: { id, eventId, data, timestamp } }),
        resultParsers.Event
      );
    },
    aboutToShow: async (id) => {
      const result = await call(
        (callId) => ({ callId, method: "AboutToShow", params: { id } }),
        resultParsers.AboutToShow
      );
      return result.needUpdate;
    },
    onSignal: (handler) => {
      signalHandlers.add(handler);
      return () => signalHandlers.delete(handler);
    },
    pendingCalls: () => pending.size,
    close: () => {
      if (closed) return;
      closed = true;
      detach();
      signalHandlers.clear();
      const shutdown = new MenuSyncError("Shutdown", "menu remote closed");
      for (const callId of Array.from(pending.keys())) take(callId)?.reject(shutdown);
    },
  };
}

export type MenuResponderHandlers = {
  [M in MenuMethod]: (params: MenuMethods[M]["params"]) => Promise<MenuMethods[M]["result"]> | MenuMethods[M]["result"];
};

export type MenuResponder = {
  emit: (signal: MenuSignal) => Promise<void>;
  detach: Unsubscribe;
};

/**
 * Server half: answers calls arriving on `transport` with `handlers`. A handler that throws is
 * reported back to the caller as a fault.
 */
export function attachMenuResponder(
  transport: DuplexTransport<MenuEnvelope>,
  handlers: MenuResponderHandlers,
  opts: MenuLogOptions & { menuPath?: string } = {}
): MenuResponder {
  const menuPath = opts.menuPath ?? DEFAULT_MENU_PATH;
  const logger = createMenuLogger(`${menuPath}:responder`, opts);

  const invoke = async (msg: MenuCall): Promise<unknown> => {
    switch (msg.method) {
      case "GetLayout":
        return handlers.GetLayout(msg.params);
      case "GetGroupProperties":
        return handlers.GetGroupProperties(msg.params);
      case "Event":
        return handlers.Event(msg.params);
      case "AboutToShow":
        return handlers.AboutToShow(msg.params);
      default: {
        const _exhaustive: never = msg;
        throw new Error(`unknown method: ${String(_exhaustive)}`);
      }
    }
  };

  const answer = async (msg: MenuCall): Promise<void> => {
    let payload: MenuMessagePayload;
    try {
      payload = { case: "reply", value: { callId: msg.callId, result: await invoke(msg) } };
    } catch (err) {
      logger.debug(`${msg.method} handler failed: ${errorMessage(err)}`);
      payload = { case: "fault", value: { callId: msg.callId, message: errorMessage(err) } };
    }

    try {
      await transport.send({ v: 0, menuPath, payload });
    } catch (err) {
      logger.warn(`failed to answer ${msg.method} call ${msg.callId}: ${errorMessage(err)}`);
    }
  };

  const detach = transport.onMessage((msg) => {
    if (msg.menuPath !== menuPath) return;
    if (msg.payload.case !== "call") return;
    void answer(msg.payload.value);
  });

  return {
    emit: (signal) => transport.send({ v: 0, menuPath, payload: { case: "signal", value: signal } }),
    detach,
  };
}
