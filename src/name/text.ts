/**
 * Text boundary: dotted text <-> label segments.
 *
 * No escape sequences are recognised; `.` is always a separator and a
 * backslash is just another character for label validation to reject.
 */

import { EmptyLabelError, MalformedSeparatorsError } from "./errors.js";
import { SEPARATOR } from "./types.js";

/**
 * Split dotted text into label segments, root excluded.
 *
 * `""` and `"."` are the root. A single trailing separator marks the root
 * and is dropped; an empty segment between two labels is an EmptyLabel,
 * any other empty segment is a separator error.
 *
 * @throws {EmptyLabelError | MalformedSeparatorsError}
 */
export function splitName(text: string): string[] {
  if (text === "" || text === SEPARATOR) {
    return [];
  }

  const segments = text.split(SEPARATOR);
  if (segments[segments.length - 1] === "") {
    segments.pop();
  }

  if (segments[0] === "") {
    throw new MalformedSeparatorsError(`leading separator in ${JSON.stringify(text)}`);
  }
  if (segments[segments.length - 1] === "") {
    throw new MalformedSeparatorsError(`repeated trailing separator in ${JSON.stringify(text)}`);
  }
  if (segments.includes("")) {
    throw new EmptyLabelError();
  }
  return segments;
}

/**
 * Join labels back into dotted text. The root is always ".".
 */
export function renderName(labels: readonly string[], trailingDot: boolean): string {
  if (labels.length === 0) {
    return SEPARATOR;
  }
  const joined = labels.join(SEPARATOR);
  return trailingDot ? joined + SEPARATOR : joined;
}

/**
 * Concatenate dotted parts into one name: every part is followed by a
 * separator, and a trailing dot on the last part is not doubled.
 */
export function joinParts(parts: readonly string[]): string {
  const joined = parts.map((part) => part + SEPARATOR).join("");
  if (joined.length <= 1) {
    return SEPARATOR;
  }
  return joined.endsWith(SEPARATOR + SEPARATOR) ? joined.slice(0, -1) : joined;
}
