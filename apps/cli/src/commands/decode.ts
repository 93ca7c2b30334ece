/**
 * nglog decode <input>
 *
 * Undo the world-variant XOR and return the raw decoded bytes, unchecked as
 * UTF-8 or as a log. --hex dumps them as hex instead.
 */

import { bytesToHex } from "@noble/hashes/utils";
import { decodeWorldBytes } from "@nglog/core";

export interface DecodeOpts {
  hex?: boolean;
}

export function decodeCommand(input: Uint8Array, opts: DecodeOpts = {}): Uint8Array {
  const decoded = decodeWorldBytes(input);
  if (opts.hex) {
    return new TextEncoder().encode(bytesToHex(decoded) + "\n");
  }
  return decoded;
}
