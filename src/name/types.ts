/**
 * Core types and constants for FQDN handling.
 */

import { FqdnError } from "./errors.js";

/** Label separator in textual names. */
export const SEPARATOR = ".";

/** RFC 1035 label cap (octets). */
export const MAX_LABEL_LENGTH = 63;

/** RFC 1035 name cap, terminal zero octet included. */
export const MAX_NAME_LENGTH = 255;

/** Largest label a single length octet can describe. */
export const LABEL_LENGTH_CEILING = 255;

/** Encoded-name ceiling when the 255-octet rule is off. */
export const NAME_LENGTH_CEILING = 65535;

/** ACE prefix of punycode-encoded labels. */
export const ACE_PREFIX = "xn--";

/** Outcome of a non-throwing parse. */
export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: FqdnError };

/**
 * Run `fn`, turning a thrown FqdnError into a failed Result.
 *
 * Anything that is not an FqdnError is rethrown.
 */
export function attempt<T>(fn: () => T): Result<T> {
  try {
    return { ok: true, value: fn() };
  } catch (err) {
    if (err instanceof FqdnError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}

/**
 * Render bytes as lowercase hex, optionally space-separated.
 */
export function toHex(bytes: Uint8Array, separator = ""): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join(separator);
}
