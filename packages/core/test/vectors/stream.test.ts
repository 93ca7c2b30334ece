/**
 * Reader entry points — whole input collected, then parsed.
 */

import { Readable } from "node:stream";
import { describe, it, expect } from "vitest";
import {
  readAll,
  parseLocalStream,
  parseWorldStream,
  parseLog,
  EncodingError,
  MalformedInputError,
} from "../../src/index.js";
import { chunked, worldEncodeText } from "../helpers.js";

const plain = "0.00\tInfo\tLog_Standard\tngLog\n3.50\tplayer_connect\n";

describe("readAll", () => {
  it("concatenates chunks in order", async () => {
    const bytes = new Uint8Array([1, 2, 3, 4, 5, 6, 7]);
    expect(await readAll(chunked(bytes, 3))).toEqual(bytes);
  });

  it("empty source gives an empty buffer", async () => {
    expect(await readAll(chunked(new Uint8Array(0), 4))).toHaveLength(0);
  });

  it("reads a Node Readable", async () => {
    const stream = Readable.from([Buffer.from("ab"), Buffer.from("cd")]);
    expect(new TextDecoder().decode(await readAll(stream))).toBe("abcd");
  });
});

describe("parseLocalStream", () => {
  it("parses a chunked local log", async () => {
    const bytes = new TextEncoder().encode(plain);
    expect(await parseLocalStream(chunked(bytes, 5))).toEqual(parseLog(plain));
  });

  it("handles a multi-byte character split across chunks", async () => {
    const bytes = new TextEncoder().encode("1\tName\tZoë\n");
    // "ë" is two bytes; a 10-byte chunk ends between them.
    expect((await parseLocalStream(chunked(bytes, 10))).events[0]!.event_id).toBe("Zoë");
  });

  it("rejects invalid UTF-8", async () => {
    await expect(
      parseLocalStream(chunked(new Uint8Array([0x31, 0x09, 0x80]), 2)),
    ).rejects.toBeInstanceOf(EncodingError);
  });
});

describe("parseWorldStream", () => {
  it("parses a chunked world log", async () => {
    // Odd chunk size: pairs straddle chunk boundaries.
    const world = worldEncodeText(plain);
    expect(await parseWorldStream(chunked(world, 7))).toEqual(parseLog(plain));
  });

  it("rejects odd total length", async () => {
    await expect(
      parseWorldStream(chunked(new Uint8Array(5), 2)),
    ).rejects.toBeInstanceOf(MalformedInputError);
  });
});
