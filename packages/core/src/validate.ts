/**
 * Structural validation of an NgLog received as JSON.
 * Only shape is checked; event IDs and params stay opaque.
 */

import { Value } from "@sinclair/typebox/value";
import { MalformedInputError } from "./errors.js";
import { createLog } from "./parser.js";
import { NgLog } from "./schemas/log.js";

/**
 * Check a decoded JSON value against the NgLog schema and return a fresh copy.
 *
 * @throws MalformedInputError naming the first failing path
 */
export function validateLog(value: unknown): NgLog {
  if (Value.Check(NgLog, value)) {
    return createLog(value.events);
  }

  const first = Value.Errors(NgLog, value).First();
  const where = first ? `${first.path || "/"}: ${first.message}` : "unknown error";
  throw new MalformedInputError(`Invalid log JSON at ${where}`);
}
