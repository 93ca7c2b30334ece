/**
 * Serializer — NgEvent / NgLog → canonical local text.
 *
 * Output is always the plain (local) form; world encoding is never applied.
 * Nothing is validated: a hand-built event serializes by the same rule as a
 * parsed one.
 */

import { FIELD_SEPARATOR, LINE_TERMINATOR } from "./constants.js";
import type { NgEvent, NgLog } from "./schemas/log.js";

/**
 * timestamp, [class], id, params… joined by TAB. No trailing TAB.
 */
export function serializeEvent(event: NgEvent): string {
  const fields: string[] = [event.timestamp];
  if (event.event_class !== null) fields.push(event.event_class);
  fields.push(event.event_id, ...event.event_params);
  return fields.join(FIELD_SEPARATOR);
}

/**
 * One line per event, every line terminated — including the last.
 * An empty log serializes to "".
 */
export function serializeLog(log: NgLog): string {
  const lines: string[] = [];
  for (const event of log.events) {
    lines.push(serializeEvent(event), LINE_TERMINATOR);
  }
  return lines.join("");
}
