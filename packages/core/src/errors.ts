/**
 * Error types thrown by the core.
 *
 * Every failure is one of two kinds: the bytes are not text, or the content
 * is not a log. Nothing is logged or retried here; callers decide.
 */

export type NgLogErrorKind = "encoding" | "malformed_input";

export class NgLogError extends Error {
  readonly kind: NgLogErrorKind;

  constructor(kind: NgLogErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "NgLogError";
    this.kind = kind;
  }
}

/** Bytes presented as text are not valid UTF-8. */
export class EncodingError extends NgLogError {
  constructor(message: string, options?: ErrorOptions) {
    super("encoding", message, options);
    this.name = "EncodingError";
  }
}

/** Structurally invalid input: odd world length, short event line, bad JSON log. */
export class MalformedInputError extends NgLogError {
  /** 1-based source line, when the failure belongs to one. */
  readonly line: number | undefined;

  constructor(message: string, line?: number) {
    super("malformed_input", message);
    this.name = "MalformedInputError";
    this.line = line;
  }
}
