import { MenuSyncError } from "./errors.js";
import type { Unsubscribe } from "./types.js";

export interface DuplexTransport<M> {
  send(msg: M): Promise<void>;
  onMessage(handler: (msg: M) => void): Unsubscribe;
}

export type WireCodec<Message, Wire> = {
  encode(message: Message): Wire;
  decode(wire: Wire): Message;
};

export function wrapDuplexTransportWithCodec<Wire, Message>(
  transport: DuplexTransport<Wire>,
  codec: WireCodec<Message, Wire>,
  opts: { onDecodeError?: (err: unknown) => void } = {}
): DuplexTransport<Message> {
  return {
    send: async (msg) => transport.send(codec.encode(msg)),
    onMessage: (handler) =>
      transport.onMessage((wire) => {
        let msg: Message;
        try {
          msg = codec.decode(wire);
        } catch (err) {
          if (opts.onDecodeError) {
            opts.onDecodeError(err);
            return;
          }
          throw err;
        }
        handler(msg);
      }),
  };
}

/** One side of an in-memory link. After `close()` sends reject and nothing more is delivered. */
export type InMemoryEndpoint<M> = DuplexTransport<M> & {
  readonly closed: boolean;
  close(): void;
};

type Mailbox<M> = { handlers: Set<(msg: M) => void>; open: boolean };

function endpoint<M>(inbox: Mailbox<M>, outbox: Mailbox<M>, name: string): InMemoryEndpoint<M> {
  return {
    get closed() {
      return !inbox.open;
    },
    async send(msg) {
      if (!inbox.open || !outbox.open) throw new MenuSyncError("Shutdown", `in-memory link ${name} is closed`);
      queueMicrotask(() => {
        if (!outbox.open) return;
        for (const h of outbox.handlers) h(msg);
      });
    },
    onMessage(handler) {
      inbox.handlers.add(handler);
      return () => inbox.handlers.delete(handler);
    },
    close() {
      inbox.open = false;
      inbox.handlers.clear();
    },
  };
}

/** Two endpoints joined back to back; messages arrive on a later microtask, in send order. */
export function createInMemoryDuplex<M>(): [InMemoryEndpoint<M>, InMemoryEndpoint<M>] {
  const a: Mailbox<M> = { handlers: new Set(), open: true };
  const b: Mailbox<M> = { handlers: new Set(), open: true };
  return [endpoint(a, b, "a"), endpoint(b, a, "b")];
}
