/**
 * Parser — text or bytes → NgLog.
 *
 * Entry points:
 *   - parseLocalLog(): UTF-8 bytes of a local log
 *   - parseWorldLog(): XOR-paired bytes of a world log
 *   - parseLog():      already-decoded text
 *   - parseEvent():    a single line
 *
 * Parsing is fail-fast: the first bad line aborts the whole log.
 */

import {
  CLASSED_EVENT_FIELDS,
  FIELD_SEPARATOR,
  MIN_EVENT_FIELDS,
} from "./constants.js";
import { decodeWorldBytes } from "./decoder.js";
import { MalformedInputError } from "./errors.js";
import type { NgEvent, NgLog } from "./schemas/log.js";
import { decodeUtf8, splitLines } from "./text.js";

// ── Construction ───────────────────────────────────────────────────

/**
 * Build an event by hand. Params are copied; nothing is validated.
 */
export function createEvent(
  timestamp: string,
  eventClass: string | null,
  eventId: string,
  params: readonly string[] = [],
): NgEvent {
  return {
    timestamp,
    event_class: eventClass,
    event_id: eventId,
    event_params: [...params],
  };
}

/** Build a log from existing events, copying each one. */
export function createLog(events: readonly NgEvent[] = []): NgLog {
  return {
    events: events.map((e) =>
      createEvent(e.timestamp, e.event_class, e.event_id, e.event_params),
    ),
  };
}

// ── Lines ──────────────────────────────────────────────────────────

/**
 * Parse one tab-separated line.
 *
 * Two fields are timestamp + id. Three or more are timestamp + class + id,
 * followed by params. A three-field line therefore always has a class and
 * no params.
 *
 * @param lineNumber - 1-based position, reported in the error when given
 * @throws MalformedInputError if the line has fewer than two fields
 */
export function parseEvent(line: string, lineNumber?: number): NgEvent {
  const [timestamp, ...rest] = line.split(FIELD_SEPARATOR);

  if (timestamp === undefined || rest.length < MIN_EVENT_FIELDS - 1) {
    throw new MalformedInputError(
      lineNumber === undefined
        ? "Bad event string"
        : `Bad event string at line ${lineNumber}`,
      lineNumber,
    );
  }

  if (rest.length < CLASSED_EVENT_FIELDS - 1) {
    const [eventId = ""] = rest;
    return createEvent(timestamp, null, eventId);
  }

  const [eventClass = "", eventId = "", ...params] = rest;
  return createEvent(timestamp, eventClass, eventId, params);
}

// ── Logs ───────────────────────────────────────────────────────────

/**
 * Parse a whole log from text, one event per line.
 *
 * @throws MalformedInputError for the first line with fewer than two fields
 */
export function parseLog(text: string): NgLog {
  const events = splitLines(text).map((line, index) =>
    parseEvent(line, index + 1),
  );
  return { events };
}

/**
 * Parse a local log from raw bytes.
 *
 * @throws EncodingError if the bytes are not UTF-8
 * @throws MalformedInputError for a bad line
 */
export function parseLocalLog(bytes: Uint8Array): NgLog {
  return parseLog(decodeUtf8(bytes));
}

/**
 * Parse a world log from raw (encoded) bytes.
 * The length check runs before anything is decoded.
 *
 * @throws MalformedInputError for an odd length or a bad line
 * @throws EncodingError if the decoded bytes are not UTF-8
 */
export function parseWorldLog(bytes: Uint8Array): NgLog {
  return parseLog(decodeUtf8(decodeWorldBytes(bytes)));
}
