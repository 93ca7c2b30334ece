/**
 * NgEvent / NgLog — structured form of a parsed log.
 *
 * Field names follow the wire layout of a line:
 *   timestamp \t [event_class \t] event_id [\t param]*
 *
 * event_class is null (not missing) when the line had exactly two fields,
 * so a JSON dump keeps the distinction explicit.
 */

import { Type, type Static } from "@sinclair/typebox";

// ── NgEvent ────────────────────────────────────────────────────────

export const NgEvent = Type.Object(
  {
    /** Seconds since gameplay began. Opaque text, never parsed. */
    timestamp: Type.String(),
    /** Category of the event; null for two-field lines. */
    event_class: Type.Union([Type.String(), Type.Null()]),
    /** Type of event. */
    event_id: Type.String(),
    /** Free-form data points, in line order. */
    event_params: Type.Array(Type.String()),
  },
  { additionalProperties: false },
);

export type NgEvent = Static<typeof NgEvent>;

// ── NgLog ──────────────────────────────────────────────────────────

export const NgLog = Type.Object(
  {
    /** Events in source line order. */
    events: Type.Array(NgEvent),
  },
  { additionalProperties: false },
);

export type NgLog = Static<typeof NgLog>;
