/**
 * World-variant decoder.
 *
 * World logs store each plaintext byte as a pair (b0, b1) with b0 ^ b1 = byte.
 * This is the scheme Unreal Tournament uses for the copy it sends to the
 * world server; no other obfuscation variants are handled.
 */

import { WORLD_PAIR_SIZE } from "./constants.js";
import { MalformedInputError } from "./errors.js";

/**
 * Undo the pairwise XOR. Output is exactly half the input length.
 *
 * @throws MalformedInputError if the input length is odd
 */
export function decodeWorldBytes(data: Uint8Array): Uint8Array {
  if (data.length % WORLD_PAIR_SIZE !== 0) {
    throw new MalformedInputError(
      `Non-even log length: ${data.length} bytes`,
    );
  }

  const decoded = new Uint8Array(data.length / WORLD_PAIR_SIZE);
  for (let i = 0; i < decoded.length; i++) {
    const offset = i * WORLD_PAIR_SIZE;
    decoded[i] = (data[offset] ?? 0) ^ (data[offset + 1] ?? 0);
  }
  return decoded;
}
