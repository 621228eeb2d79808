/**
 * A single dot-separated segment of a domain name.
 *
 * Labels handed out by an Fqdn are views into that Fqdn's canonical buffer;
 * Label.parse() gives a standalone label backed by its own small buffer.
 */

import { encodeLabel, decodeLabel, isAscii, punycodeCodec, type LabelCodec } from "./codec.js";
import {
  CodecFailureError,
  EmptyLabelError,
  InvalidCharacterError,
  InvalidHyphenPlacementError,
  LabelTooLongError,
} from "./errors.js";
import { DEFAULT_RULES, type RuleSet } from "./rules.js";
import {
  ACE_PREFIX,
  LABEL_LENGTH_CEILING,
  MAX_LABEL_LENGTH,
  attempt,
  type Result,
} from "./types.js";

/** Options shared by every parsing entry point. */
export interface ParseOptions {
  /** Rule set to validate against (DEFAULT_RULES when omitted). */
  readonly rules?: RuleSet;
  /** IDN codec; `null` rejects non-ASCII input outright. */
  readonly codec?: LabelCodec | null;
}

export interface ResolvedOptions {
  readonly rules: RuleSet;
  readonly codec: LabelCodec | null;
}

export function resolveOptions(options: ParseOptions = {}): ResolvedOptions {
  return {
    rules: options.rules ?? DEFAULT_RULES,
    codec: options.codec === undefined ? punycodeCodec : options.codec,
  };
}

function isPermitted(code: number, rules: RuleSet): boolean {
  return (
    (code >= 0x61 && code <= 0x7a) || // a-z
    (code >= 0x41 && code <= 0x5a) || // A-Z
    (code >= 0x30 && code <= 0x39) || // 0-9
    code === 0x2d || // -
    (code === 0x5f && !rules.restrictedCharset) // _
  );
}

/**
 * Validate one label and return its ASCII form, original case kept.
 *
 * Non-ASCII labels are lowercased and transcoded first; the encoded label
 * is then held to the same rules as any other.
 *
 * @throws {FqdnError} The first rule the label breaks.
 */
export function validateLabel(raw: string, options: ResolvedOptions): string {
  if (raw.length === 0) {
    throw new EmptyLabelError();
  }

  let text = raw;
  if (!isAscii(raw)) {
    if (options.codec === null) {
      const offending = [...raw].find((ch) => !isAscii(ch)) ?? raw;
      throw new InvalidCharacterError(offending);
    }
    const lowered = raw.toLowerCase();
    text = encodeLabel(options.codec, lowered);
    if (text.length === 0) {
      throw new CodecFailureError(lowered, new Error("codec returned an empty label"));
    }
  }

  const { rules } = options;
  const limit = rules.labelLength63 ? MAX_LABEL_LENGTH : LABEL_LENGTH_CEILING;
  if (text.length > limit) {
    throw new LabelTooLongError(text.length, limit);
  }

  for (let i = 0; i < text.length; i++) {
    if (!isPermitted(text.charCodeAt(i), rules)) {
      throw new InvalidCharacterError(text[i]);
    }
  }

  if (rules.noEdgeHyphen) {
    if (text.startsWith("-")) throw new InvalidHyphenPlacementError("start");
    if (text.endsWith("-")) throw new InvalidHyphenPlacementError("end");
  }

  return text;
}

/**
 * ASCII-only lowercase fold into `target` at `offset`.
 */
export function writeLowercase(text: string, target: Uint8Array, offset: number): void {
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    target[offset + i] = code >= 0x41 && code <= 0x5a ? code | 0x20 : code;
  }
}

export class Label {
  private readonly buffer: Uint8Array;
  private readonly offset: number;

  /** Length in octets. */
  readonly length: number;

  /** ASCII form in its original casing. */
  readonly text: string;

  private constructor(buffer: Uint8Array, offset: number, length: number, text: string) {
    this.buffer = buffer;
    this.offset = offset;
    this.length = length;
    this.text = text;
  }

  /**
   * Wrap `length` canonical bytes of `buffer` starting at `offset`.
   *
   * @internal Used by Fqdn; the caller guarantees the bytes were validated.
   */
  static view(buffer: Uint8Array, offset: number, length: number, text: string): Label {
    return new Label(buffer, offset, length, text);
  }

  /**
   * Parse and validate a single label.
   *
   * @throws {FqdnError} If the label breaks the active rules.
   */
  static parse(text: string, options?: ParseOptions): Label {
    const ascii = validateLabel(text, resolveOptions(options));
    const buffer = new Uint8Array(ascii.length);
    writeLowercase(ascii, buffer, 0);
    return new Label(buffer, 0, ascii.length, ascii);
  }

  static tryParse(text: string, options?: ParseOptions): Result<Label> {
    return attempt(() => Label.parse(text, options));
  }

  /** Canonical ASCII-lowercased bytes (a fresh copy). */
  toLowercaseView(): Uint8Array {
    return this.buffer.slice(this.offset, this.offset + this.length);
  }

  /** Canonical lowercase text. */
  get canonical(): string {
    return String.fromCharCode(...this.buffer.subarray(this.offset, this.offset + this.length));
  }

  /** True for punycode (`xn--`) labels. */
  get isIdn(): boolean {
    return this.canonical.startsWith(ACE_PREFIX);
  }

  /**
   * Unicode rendering of this label; labels without the ACE prefix come back unchanged.
   *
   * @throws {CodecFailureError} If the ACE payload is malformed.
   */
  toUnicode(codec: LabelCodec = punycodeCodec): string {
    return this.isIdn ? decodeLabel(codec, this.canonical) : this.text;
  }

  equals(other: Label): boolean {
    if (this.length !== other.length) return false;
    for (let i = 0; i < this.length; i++) {
      if (this.buffer[this.offset + i] !== other.buffer[other.offset + i]) return false;
    }
    return true;
  }

  toString(): string {
    return this.text;
  }
}
