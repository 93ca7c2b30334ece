/**
 * Input/output helpers. "-" means stdin / stdout.
 */

import { readFile, writeFile } from "node:fs/promises";
import { readAll } from "@nglog/core";

export const STDIO = "-";

/** Read a whole file, or stdin for "-". */
export async function readInput(path: string): Promise<Uint8Array> {
  if (path === STDIO) {
    return readAll(process.stdin);
  }
  return new Uint8Array(await readFile(path));
}

/** Write to a file, or stdout when no path (or "-") is given. */
export async function writeOutput(
  data: Uint8Array | string,
  path?: string,
): Promise<void> {
  if (path === undefined || path === STDIO) {
    await new Promise<void>((resolve, reject) => {
      process.stdout.write(data, (err) => (err ? reject(err) : resolve()));
    });
    return;
  }
  await writeFile(path, data);
}
