/**
 * Text helpers — strict UTF-8 decoding and line splitting.
 */

import { CARRIAGE_RETURN, LINE_TERMINATOR } from "./constants.js";
import { EncodingError } from "./errors.js";

// fatal: reject invalid sequences instead of substituting U+FFFD.
// ignoreBOM: a leading BOM stays in the text, so the first timestamp is verbatim.
const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Interpret bytes as UTF-8.
 *
 * @throws EncodingError carrying the decoder failure as `cause`
 */
export function decodeUtf8(bytes: Uint8Array): string {
  try {
    return utf8.decode(bytes);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new EncodingError(`Invalid UTF-8: ${detail}`, { cause: err });
  }
}

/**
 * Split text into lines.
 *
 * Lines end at "\n"; a "\r" directly before it is dropped too. A final
 * terminator does not start an empty line, so "" yields no lines and
 * "a\n" yields ["a"]. Empty lines in between are kept.
 */
export function splitLines(text: string): string[] {
  const lines: string[] = [];
  let start = 0;

  while (start < text.length) {
    const end = text.indexOf(LINE_TERMINATOR, start);
    if (end === -1) {
      lines.push(text.slice(start));
      break;
    }
    const line = text.slice(start, end);
    lines.push(line.endsWith(CARRIAGE_RETURN) ? line.slice(0, -1) : line);
    start = end + LINE_TERMINATOR.length;
  }

  return lines;
}
