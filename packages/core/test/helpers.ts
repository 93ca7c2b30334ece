/**
 * Test-only world encoder. The library never encodes; this builds fixtures.
 *
 * Each plaintext byte b becomes the pair (b ^ key, key).
 */

export const WORLD_TEST_KEY = 0x2a;

export function worldEncode(
  plain: Uint8Array,
  key: number = WORLD_TEST_KEY,
): Uint8Array {
  const out = new Uint8Array(plain.length * 2);
  plain.forEach((b, i) => {
    out[i * 2] = b ^ key;
    out[i * 2 + 1] = key;
  });
  return out;
}

export function worldEncodeText(text: string, key?: number): Uint8Array {
  return worldEncode(new TextEncoder().encode(text), key);
}

/** Yield a buffer in fixed-size chunks, like a file stream would. */
export async function* chunked(
  bytes: Uint8Array,
  size: number,
): AsyncGenerator<Uint8Array> {
  for (let offset = 0; offset < bytes.length; offset += size) {
    yield bytes.slice(offset, offset + size);
  }
}
