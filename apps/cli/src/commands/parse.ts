/**
 * nglog parse <input>
 *
 * Read a local or world log → print canonical text or a JSON dump.
 */

import { parseLocalLog, parseWorldLog, serializeLog, type NgLog } from "@nglog/core";
import type { OutputFormat, Variant } from "../lib/config.js";

export interface ParseOpts {
  variant: Variant;
  format: OutputFormat;
}

export function parseBytes(input: Uint8Array, variant: Variant): NgLog {
  return variant === "world" ? parseWorldLog(input) : parseLocalLog(input);
}

export function parseCommand(input: Uint8Array, opts: ParseOpts): string {
  const log = parseBytes(input, opts.variant);
  if (opts.format === "json") {
    return JSON.stringify(log, null, 2) + "\n";
  }
  return serializeLog(log);
}
