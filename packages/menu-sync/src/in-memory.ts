import { menuWireCodecV0 } from "./codec.js";
import { errorMessage } from "./errors.js";
import { createMenuLogger, type MenuLogOptions } from "./log.js";
import {
  attachMenuResponder,
  createMenuRemote,
  DEFAULT_MENU_PATH,
  type MenuRemoteClient,
  type MenuRemoteOptions,
  type MenuResponder,
  type MenuResponderHandlers,
} from "./rpc.js";
import type { DuplexTransport, WireCodec } from "./transport.js";
import { createInMemoryDuplex, wrapDuplexTransportWithCodec } from "./transport.js";
import type { MenuEnvelope } from "./types.js";

export type InMemoryMenuLink = {
  remote: MenuRemoteClient;
  responder: MenuResponder;
  clientTransport: DuplexTransport<MenuEnvelope>;
  serverTransport: DuplexTransport<MenuEnvelope>;
  detach: () => void;
};

/**
 * A client and a responder joined by an in-memory duplex. Every message goes through `codec`, so
 * what the client sees is exactly what would have crossed a socket.
 */
export function createInMemoryMenuLink(opts: {
  handlers: MenuResponderHandlers;
  menuPath?: string;
  codec?: WireCodec<MenuEnvelope, Uint8Array>;
  remoteOptions?: Omit<MenuRemoteOptions, "menuPath">;
  log?: MenuLogOptions;
}): InMemoryMenuLink {
  const menuPath = opts.menuPath ?? DEFAULT_MENU_PATH;
  const codec = opts.codec ?? menuWireCodecV0;
  const logger = createMenuLogger(`${menuPath}:link`, opts.log);
  const onDecodeError = (err: unknown) => logger.warn(`dropping undecodable message: ${errorMessage(err)}`);

  const [wireClient, wireServer] = createInMemoryDuplex<Uint8Array>();
  const clientTransport = wrapDuplexTransportWithCodec(wireClient, codec, { onDecodeError });
  const serverTransport = wrapDuplexTransportWithCodec(wireServer, codec, { onDecodeError });

  const remote = createMenuRemote(clientTransport, { ...opts.log, ...opts.remoteOptions, menuPath });
  const responder = attachMenuResponder(serverTransport, opts.handlers, { ...opts.log, menuPath });

  return {
    remote,
    responder,
    clientTransport,
    serverTransport,
    detach: () => {
      remote.close();
      responder.detach();
      wireClient.close();
      wireServer.close();
    },
  };
}
