/**
 * Format constants.
 *
 * These are fixed by the files games already write; changing any of them
 * breaks compatibility with existing logs.
 */

// ── Text layout ────────────────────────────────────────────────────
export const FIELD_SEPARATOR = "\t";
export const LINE_TERMINATOR = "\n";
export const CARRIAGE_RETURN = "\r";

/** Timestamp + event ID. A class and params are optional. */
export const MIN_EVENT_FIELDS = 2;
/** From this many fields on, field 1 is the event class. */
export const CLASSED_EVENT_FIELDS = 3;

// ── World variant ──────────────────────────────────────────────────
export const WORLD_PAIR_SIZE = 2; // one plaintext byte per encoded pair
