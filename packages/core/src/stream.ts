/**
 * Reader entry points.
 *
 * Accept anything that yields byte chunks (a Node Readable, process.stdin,
 * a web ReadableStream). The input is collected in full before parsing;
 * there is no incremental mode.
 */

import { parseLocalLog, parseWorldLog } from "./parser.js";
import type { NgLog } from "./schemas/log.js";

/** Concatenate every chunk of a byte source into one buffer. */
export async function readAll(
  source: AsyncIterable<Uint8Array>,
): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  let total = 0;
  for await (const chunk of source) {
    chunks.push(chunk);
    total += chunk.length;
  }

  const result = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}

export async function parseLocalStream(
  source: AsyncIterable<Uint8Array>,
): Promise<NgLog> {
  return parseLocalLog(await readAll(source));
}

export async function parseWorldStream(
  source: AsyncIterable<Uint8Array>,
): Promise<NgLog> {
  return parseWorldLog(await readAll(source));
}
