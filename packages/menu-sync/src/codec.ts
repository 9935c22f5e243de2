import { decode as cborDecode, encode as cborEncode, rfc8949EncodeOptions } from "cborg";

import type { WireCodec } from "./transport.js";
import type { MenuEnvelope } from "./types.js";
import { parseMenuEnvelope } from "./validate.js";

export function encodeCbor(value: unknown): Uint8Array {
  return cborEncode(value, rfc8949EncodeOptions);
}

export function decodeCbor(bytes: Uint8Array): unknown {
  return cborDecode(bytes);
}

export const menuWireCodecV0: WireCodec<MenuEnvelope, Uint8Array> = {
  encode: (message) => encodeCbor(message),
  decode: (wire) => parseMenuEnvelope(decodeCbor(wire)),
};
