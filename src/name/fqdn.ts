/**
 * Fully qualified domain names.
 *
 * An Fqdn keeps its name in RFC 1035 wire layout: each label prefixed by its
 * length octet, the whole terminated by a zero octet. `github.com.` is
 * stored as `\x06github\x03com\x00`. That buffer is ASCII-lowercased and is
 * the only thing equality, hashing, ordering and subdomain checks look at;
 * the original casing is kept on the side purely for display.
 */

import { punycodeCodec, type LabelCodec } from "./codec.js";
import {
  InvalidStructureError,
  MissingTerminatorError,
  NameTooLongError,
} from "./errors.js";
import {
  Label,
  resolveOptions,
  validateLabel,
  writeLowercase,
  type ParseOptions,
  type ResolvedOptions,
} from "./label.js";
import type { RuleSet } from "./rules.js";
import { joinParts, renderName, splitName } from "./text.js";
import {
  MAX_NAME_LENGTH,
  NAME_LENGTH_CEILING,
  attempt,
  type Result,
} from "./types.js";

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

function nameLimit(rules: RuleSet): number {
  return rules.nameLength255 ? MAX_NAME_LENGTH : NAME_LENGTH_CEILING;
}

export class Fqdn {
  private readonly bytes: Uint8Array;
  private readonly display: readonly string[];

  /** Rules this name was validated under. */
  readonly rules: RuleSet;

  private constructor(bytes: Uint8Array, display: readonly string[], rules: RuleSet) {
    this.bytes = bytes;
    this.display = display;
    this.rules = rules;
    Object.freeze(this);
  }

  // -------------------------------------------------------------------------
  // Construction
  // -------------------------------------------------------------------------

  /**
   * Validate raw labels and encode them.
   *
   * Every label is checked before the buffer is allocated, so a failure
   * never leaves a half-built value behind.
   */
  private static build(raw: readonly string[], options: ResolvedOptions): Fqdn {
    const display = raw.map((label) => validateLabel(label, options));

    const size = display.reduce((total, label) => total + label.length + 1, 1);
    const limit = nameLimit(options.rules);
    if (size > limit) {
      throw new NameTooLongError(size, limit);
    }

    const bytes = new Uint8Array(size);
    let pos = 0;
    for (const label of display) {
      bytes[pos] = label.length;
      writeLowercase(label, bytes, pos + 1);
      pos += label.length + 1;
    }
    // bytes[size - 1] is already the terminal zero
    return new Fqdn(bytes, Object.freeze(display), options.rules);
  }

  /**
   * Parse dotted text.
   *
   * The trailing dot is optional whatever the rules say: a missing one is
   * implied. `""` and `"."` both give the root.
   *
   * @throws {FqdnError} If the text is not a valid name under the rules.
   */
  static parse(text: string, options?: ParseOptions): Fqdn {
    return Fqdn.build(splitName(text), resolveOptions(options));
  }

  static tryParse(text: string, options?: ParseOptions): Result<Fqdn> {
    return attempt(() => Fqdn.parse(text, options));
  }

  /**
   * Build a name label by label, most specific first.
   *
   * @throws {FqdnError} If any label is invalid (including empty ones).
   */
  static fromLabels(labels: readonly string[], options?: ParseOptions): Fqdn {
    return Fqdn.build(labels, resolveOptions(options));
  }

  /**
   * Decode a wire-format name (`[len][label]...[0]`).
   *
   * Uppercase letters are folded; non-ASCII octets are rejected since wire
   * labels are already ASCII-compatible.
   *
   * @throws {FqdnError} MissingTerminator, InvalidStructure, or any label error.
   */
  static fromWire(bytes: Uint8Array, options?: ParseOptions): Fqdn {
    if (bytes.length === 0 || bytes[bytes.length - 1] !== 0) {
      throw new MissingTerminatorError();
    }

    const resolved = resolveOptions(options);
    const limit = nameLimit(resolved.rules);
    if (bytes.length > limit) {
      throw new NameTooLongError(bytes.length, limit);
    }

    const labels: string[] = [];
    const end = bytes.length - 1;
    let pos = 0;
    while (pos < end) {
      const len = bytes[pos];
      if (len === 0) {
        throw new InvalidStructureError("zero length octet before the end of the name");
      }
      if (pos + 1 + len > end) {
        throw new InvalidStructureError(
          `label length ${len} at offset ${pos} overruns the buffer`
        );
      }
      labels.push(String.fromCharCode(...bytes.subarray(pos + 1, pos + 1 + len)));
      pos += len + 1;
    }
    return Fqdn.build(labels, { rules: resolved.rules, codec: null });
  }

  static tryFromWire(bytes: Uint8Array, options?: ParseOptions): Result<Fqdn> {
    return attempt(() => Fqdn.fromWire(bytes, options));
  }

  /** The root name, `.`. */
  static root(options?: ParseOptions): Fqdn {
    return Fqdn.build([], resolveOptions(options));
  }

  /** Comparator for Array.prototype.sort. */
  static compare(a: Fqdn, b: Fqdn): -1 | 0 | 1 {
    return a.compare(b);
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  /** Number of labels, root excluded. */
  get depth(): number {
    return this.display.length;
  }

  isRoot(): boolean {
    return this.bytes[0] === 0;
  }

  isTld(): boolean {
    return this.depth === 1;
  }

  /**
   * Immediate parent: this name without its leftmost label.
   * `null` for the root.
   */
  parent(): Fqdn | null {
    if (this.isRoot()) {
      return null;
    }
    return new Fqdn(this.bytes.subarray(this.bytes[0] + 1), this.display.slice(1), this.rules);
  }

  /**
   * This name followed by each of its ancestors, down to the TLD.
   * The root is not yielded.
   */
  *hierarchy(): IterableIterator<Fqdn> {
    let current: Fqdn | null = this;
    while (current !== null && !current.isRoot()) {
      yield current;
      current = current.parent();
    }
  }

  /** Top-level domain (`com.` for `github.com.`); `null` for the root. */
  tld(): Fqdn | null {
    let last: Fqdn | null = null;
    for (const name of this.hierarchy()) {
      last = name;
    }
    return last;
  }

  /** Label views, most specific first. */
  *labels(): IterableIterator<Label> {
    let pos = 0;
    for (const text of this.display) {
      const len = this.bytes[pos];
      yield Label.view(this.bytes, pos + 1, len, text);
      pos += len + 1;
    }
  }

  /**
   * True iff `other` is this name or one of its ancestors.
   */
  isSubdomainOf(other: Fqdn): boolean {
    const diff = this.bytes.length - other.bytes.length;
    if (diff < 0) {
      return false;
    }
    // walk label boundaries so the suffix can only match on one
    let pos = 0;
    while (pos < diff) {
      pos += this.bytes[pos] + 1;
    }
    if (pos !== diff) {
      return false;
    }
    for (let i = 0; i < other.bytes.length; i++) {
      if (this.bytes[diff + i] !== other.bytes[i]) return false;
    }
    return true;
  }

  /**
   * Case-insensitive equality. Strings are parsed under this name's rules;
   * an unparsable string is never equal.
   */
  equals(other: Fqdn | string): boolean {
    if (typeof other === "string") {
      const parsed = Fqdn.tryParse(other, { rules: this.rules });
      return parsed.ok && this.equals(parsed.value);
    }
    if (this.bytes.length !== other.bytes.length) {
      return false;
    }
    for (let i = 0; i < this.bytes.length; i++) {
      if (this.bytes[i] !== other.bytes[i]) return false;
    }
    return true;
  }

  /** Byte-wise order over the canonical buffers. */
  compare(other: Fqdn): -1 | 0 | 1 {
    const n = Math.min(this.bytes.length, other.bytes.length);
    for (let i = 0; i < n; i++) {
      const a = this.bytes[i];
      const b = other.bytes[i];
      if (a !== b) return a < b ? -1 : 1;
    }
    if (this.bytes.length === other.bytes.length) return 0;
    return this.bytes.length < other.bytes.length ? -1 : 1;
  }

  /** 32-bit FNV-1a over the canonical buffer. */
  hash(): number {
    let h = FNV_OFFSET;
    for (const b of this.bytes) {
      h ^= b;
      h = Math.imul(h, FNV_PRIME) >>> 0;
    }
    return h;
  }

  /** Canonical lowercase text, always absolute. Suitable as a Map key. */
  get key(): string {
    return renderName(
      Array.from(this.labels(), (label) => label.canonical),
      true
    );
  }

  // -------------------------------------------------------------------------
  // Rendering
  // -------------------------------------------------------------------------

  /** Copy of the canonical wire buffer. */
  toWire(): Uint8Array {
    return this.bytes.slice();
  }

  /**
   * Dotted text in original casing, with a trailing dot iff the rules ask
   * for one. The root is always `.`.
   */
  toString(): string {
    return renderName(this.display, this.rules.trailingDot);
  }

  /**
   * Like toString() with `xn--` labels decoded to Unicode, label by label
   * as Label.toUnicode() does; other labels keep their original casing.
   *
   * @throws {CodecFailureError} If a stored ACE label cannot be decoded.
   */
  toUnicode(codec: LabelCodec = punycodeCodec): string {
    return renderName(
      Array.from(this.labels(), (label) => label.toUnicode(codec)),
      this.rules.trailingDot
    );
  }

  toJSON(): string {
    return this.toString();
  }
}

/**
 * Parse dotted parts into a single Fqdn, e.g. `fqdn("octo-org", "github.io")`.
 * A trailing dot on the last part is accepted; no argument gives the root.
 *
 * @throws {FqdnError} If the joined text is not a valid name.
 */
export function fqdn(...parts: string[]): Fqdn {
  return Fqdn.parse(joinParts(parts));
}
