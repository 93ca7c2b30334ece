/**
 * @nglog/core — ngLog decoding, parsing and serialization.
 *
 * ngLog is a tab-separated, one-event-per-line log of gameplay events.
 * Games write a local copy as plain UTF-8 and a world copy whose bytes are
 * XOR-paired. This package reads both and writes the local form.
 *
 * No I/O, no logging, no state: callers supply bytes or text.
 */

// Errors
export {
  NgLogError,
  EncodingError,
  MalformedInputError,
  type NgLogErrorKind,
} from "./errors.js";

// World-variant decoding
export { decodeWorldBytes } from "./decoder.js";

// Text helpers
export { decodeUtf8, splitLines } from "./text.js";

// Construction + parsing
export {
  createEvent,
  createLog,
  parseEvent,
  parseLog,
  parseLocalLog,
  parseWorldLog,
} from "./parser.js";

// Reader entry points (whole input buffered)
export { readAll, parseLocalStream, parseWorldStream } from "./stream.js";

// Serialization (local form only)
export { serializeEvent, serializeLog } from "./serializer.js";

// JSON validation
export { validateLog } from "./validate.js";

// All schemas
export * from "./schemas/index.js";

// Constants
export * from "./constants.js";
