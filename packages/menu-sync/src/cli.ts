#!/usr/bin/env node
import { menuWireCodecV0 } from "./codec.js";
import { renderMenuDump, waitForRealizedTree } from "./dump.js";
import { errorMessage } from "./errors.js";
import { createMenuRemote, DEFAULT_MENU_PATH } from "./rpc.js";
import { MenuClient } from "./session.js";
import { wrapDuplexTransportWithCodec } from "./transport.js";
import { connectMenuWebSocket } from "./websocket.js";

async function main() {
  const url = process.env.MENU_URL;
  const menuPath = process.env.MENU_PATH ?? DEFAULT_MENU_PATH;
  const timeoutMs = Number(process.env.MENU_DUMP_TIMEOUT_MS ?? "5000");
  const debug = process.env.MENU_DEBUG === "1";

  if (!url) throw new Error("MENU_URL is required (e.g. ws://127.0.0.1:8787/menu)");
  if (!menuPath.startsWith("/")) throw new Error(`invalid MENU_PATH: ${menuPath}`);
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new Error(`invalid MENU_DUMP_TIMEOUT_MS: ${process.env.MENU_DUMP_TIMEOUT_MS}`);
  }

  const connection = await connectMenuWebSocket(url, { debug });
  const transport = wrapDuplexTransportWithCodec(connection.transport, menuWireCodecV0, {
    onDecodeError: (err) => console.warn(`dropping undecodable message: ${errorMessage(err)}`),
  });
  const remote = createMenuRemote(transport, { menuPath, debug });
  const client = new MenuClient(remote, { menuPath, debug });
  const stopClose = connection.onClose(() => client.onConnectionLost());
  const stop = client.start();

  try {
    const root = await waitForRealizedTree(client, timeoutMs);
    process.stdout.write(`${renderMenuDump(client.tree, root)}\n`);
  } finally {
    stop();
    stopClose();
    client.dispose();
    remote.close();
    connection.close();
  }
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
