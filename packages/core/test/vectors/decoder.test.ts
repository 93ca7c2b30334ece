/**
 * World-variant decoder — pairwise XOR.
 */

import { describe, it, expect } from "vitest";
import { decodeWorldBytes } from "../../src/decoder.js";
import { MalformedInputError } from "../../src/errors.js";
import { worldEncode } from "../helpers.js";

describe("decodeWorldBytes", () => {
  it("emits b0 ^ b1 for each pair", () => {
    const data = new Uint8Array([0x0f, 0xf0, 0xaa, 0xaa, 0x12, 0x00]);
    expect(decodeWorldBytes(data)).toEqual(new Uint8Array([0xff, 0x00, 0x12]));
  });

  it("output is half the input length", () => {
    const data = new Uint8Array(64).map((_, i) => i * 7);
    const decoded = decodeWorldBytes(data);
    expect(decoded).toHaveLength(32);
    for (let i = 0; i < decoded.length; i++) {
      expect(decoded[i]).toBe(data[2 * i]! ^ data[2 * i + 1]!);
    }
  });

  it("decodes empty input to empty output", () => {
    expect(decodeWorldBytes(new Uint8Array(0))).toHaveLength(0);
  });

  it("undoes the (b ^ k, k) pairing for any key", () => {
    const plain = new Uint8Array([0x00, 0x41, 0x7f, 0x80, 0xff]);
    for (const key of [0x00, 0x2a, 0xff]) {
      expect(decodeWorldBytes(worldEncode(plain, key))).toEqual(plain);
    }
  });

  it("a ^ b ^ b == a holds for every byte", () => {
    for (let a = 0; a < 256; a += 17) {
      for (let b = 0; b < 256; b += 31) {
        expect(decodeWorldBytes(new Uint8Array([a ^ b, b]))[0]).toBe(a);
      }
    }
  });

  it("returns a new buffer", () => {
    const data = new Uint8Array([1, 1]);
    const decoded = decodeWorldBytes(data);
    decoded[0] = 9;
    expect(data).toEqual(new Uint8Array([1, 1]));
  });

  it.each([1, 3, 5, 101])("rejects odd length %i", (length) => {
    expect(() => decodeWorldBytes(new Uint8Array(length))).toThrow(
      MalformedInputError,
    );
    expect(() => decodeWorldBytes(new Uint8Array(length))).toThrow(
      `Non-even log length: ${length} bytes`,
    );
  });
});
