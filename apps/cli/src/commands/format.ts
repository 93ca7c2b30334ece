/**
 * nglog format <input>
 *
 * JSON log (as printed by `parse --format json`) → canonical text.
 */

import { decodeUtf8, serializeLog, validateLog, MalformedInputError } from "@nglog/core";

export function formatCommand(input: Uint8Array): string {
  let value: unknown;
  try {
    value = JSON.parse(decodeUtf8(input));
  } catch (err) {
    if (!(err instanceof SyntaxError)) throw err;
    throw new MalformedInputError(`Invalid JSON: ${err.message}`);
  }
  return serializeLog(validateLog(value));
}
