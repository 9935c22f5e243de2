import WebSocket from "ws";

import { errorMessage } from "./errors.js";
import { createMenuLogger, type MenuLogOptions } from "./log.js";
import type { DuplexTransport } from "./transport.js";
import type { Unsubscribe } from "./types.js";

/** The part of a `ws` socket the transport touches. */
export interface WebSocketLike {
  send(data: Uint8Array, options: { binary: boolean }, cb?: (err?: Error) => void): void;
  on(event: "message", listener: (data: WebSocket.RawData) => void): unknown;
  off(event: "message", listener: (data: WebSocket.RawData) => void): unknown;
}

function toUint8Array(data: WebSocket.RawData): Uint8Array {
  if (data instanceof Uint8Array) return data;
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return Buffer.concat(data);
}

export function createWebSocketTransport(ws: WebSocketLike): DuplexTransport<Uint8Array> {
  return {
    send: (bytes) =>
      new Promise<void>((resolve, reject) => {
        try {
          ws.send(bytes, { binary: true }, (err) => (err ? reject(err) : resolve()));
        } catch (err) {
          reject(err instanceof Error ? err : new Error(String(err)));
        }
      }),
    onMessage: (handler) => {
      const onMessage = (data: WebSocket.RawData) => handler(toUint8Array(data));
      ws.on("message", onMessage);
      return () => {
        ws.off("message", onMessage);
      };
    },
  };
}

export type MenuWebSocketConnection = {
  socket: WebSocket;
  transport: DuplexTransport<Uint8Array>;
  onClose: (handler: () => void) => Unsubscribe;
  close: () => void;
};

export type MenuWebSocketOptions = MenuLogOptions & {
  maxPayloadBytes?: number;
};

/** Opens `url` and resolves once the socket is connected. */
export function connectMenuWebSocket(url: string, opts: MenuWebSocketOptions = {}): Promise<MenuWebSocketConnection> {
  const logger = createMenuLogger("websocket", opts);
  const maxPayload = opts.maxPayloadBytes ?? 10 * 1024 * 1024;

  return new Promise((resolve, reject) => {
    const socket = new WebSocket(url, { maxPayload });

    const onError = (err: Error) => {
      socket.off("open", onOpen);
      reject(err);
    };
    const onOpen = () => {
      socket.off("error", onError);
      socket.on("error", (err) => logger.warn(`socket error: ${errorMessage(err)}`));
      logger.debug(`connected to ${url}`);
      resolve({
        socket,
        transport: createWebSocketTransport(socket),
        onClose: (handler) => {
          const listener = () => handler();
          socket.on("close", listener);
          return () => {
            socket.off("close", listener);
          };
        },
        close: () => socket.close(),
      });
    };

    socket.once("open", onOpen);
    socket.once("error", onError);
  });
}
