/**
 * FQDN error hierarchy.
 *
 * Every validation failure is an FqdnError with a stable `code`, so callers
 * can either `instanceof`-check the subclass or switch on the code.
 */

export type FqdnErrorCode =
  | "EmptyLabel"
  | "LabelTooLong"
  | "NameTooLong"
  | "InvalidCharacter"
  | "InvalidHyphenPlacement"
  | "CodecFailure"
  | "MalformedSeparators"
  | "InvalidStructure"
  | "MissingTerminator";

/** Base error for all FQDN validation errors. */
export class FqdnError extends Error {
  readonly code: FqdnErrorCode;

  constructor(code: FqdnErrorCode, message?: string) {
    super(message);
    this.code = code;
    this.name = "FqdnError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Raised when a label between two separators has zero length. */
export class EmptyLabelError extends FqdnError {
  constructor(message = "empty label found in FQDN") {
    super("EmptyLabel", message);
    this.name = "EmptyLabelError";
  }
}

/** Raised when a label exceeds the active label length cap. */
export class LabelTooLongError extends FqdnError {
  readonly length: number;
  readonly limit: number;

  constructor(length: number, limit: number) {
    super("LabelTooLong", `label of ${length} octets exceeds ${limit}`);
    this.name = "LabelTooLongError";
    this.length = length;
    this.limit = limit;
  }
}

/** Raised when the encoded name exceeds the active name length cap. */
export class NameTooLongError extends FqdnError {
  readonly length: number;
  readonly limit: number;

  constructor(length: number, limit: number) {
    super("NameTooLong", `encoded name of ${length} octets exceeds ${limit}`);
    this.name = "NameTooLongError";
    this.length = length;
    this.limit = limit;
  }
}

/** Raised when a label holds a character outside the permitted charset. */
export class InvalidCharacterError extends FqdnError {
  readonly char: string;

  constructor(char: string) {
    super("InvalidCharacter", `invalid character ${JSON.stringify(char)} in FQDN label`);
    this.name = "InvalidCharacterError";
    this.char = char;
  }
}

/** Raised when a label starts or ends with a hyphen. */
export class InvalidHyphenPlacementError extends FqdnError {
  readonly position: "start" | "end";

  constructor(position: "start" | "end") {
    super("InvalidHyphenPlacement", `FQDN label can't ${position} with a hyphen`);
    this.name = "InvalidHyphenPlacementError";
    this.position = position;
  }
}

/** Raised when the IDN codec rejects a label. */
export class CodecFailureError extends FqdnError {
  constructor(label: string, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : "";
    super("CodecFailure", `cannot transcode label ${JSON.stringify(label)}${reason}`);
    this.name = "CodecFailureError";
  }
}

/** Raised on a leading separator or more than one trailing separator. */
export class MalformedSeparatorsError extends FqdnError {
  constructor(message = "misplaced separator in FQDN") {
    super("MalformedSeparators", message);
    this.name = "MalformedSeparatorsError";
  }
}

/** Raised when wire-format length octets don't match the buffer. */
export class InvalidStructureError extends FqdnError {
  constructor(message = "invalid FQDN byte sequence") {
    super("InvalidStructure", message);
    this.name = "InvalidStructureError";
  }
}

/** Raised when wire-format input lacks its terminal zero octet. */
export class MissingTerminatorError extends FqdnError {
  constructor() {
    super("MissingTerminator", "the trailing nul byte of the FQDN bytes is missing");
    this.name = "MissingTerminatorError";
  }
}
