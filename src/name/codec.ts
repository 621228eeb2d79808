/**
 * Codec bridge between Unicode labels and their ASCII-compatible encoding.
 *
 * Only labels holding non-ASCII characters go through the codec. The default
 * implementation is punycode (RFC 3492) with the `xn--` ACE prefix.
 */

import punycode from "punycode/";

import { CodecFailureError } from "./errors.js";
import { ACE_PREFIX } from "./types.js";

export interface LabelCodec {
  /** Unicode label -> ASCII label. */
  encode(label: string): string;
  /** ASCII label -> Unicode label. ASCII labels without the ACE prefix pass through. */
  decode(label: string): string;
}

const NON_ASCII_RE = /[^\x00-\x7f]/;

export function isAscii(text: string): boolean {
  return !NON_ASCII_RE.test(text);
}

export const punycodeCodec: LabelCodec = {
  encode(label: string): string {
    try {
      return ACE_PREFIX + punycode.encode(label);
    } catch (err) {
      throw new CodecFailureError(label, err);
    }
  },

  decode(label: string): string {
    if (!label.toLowerCase().startsWith(ACE_PREFIX)) {
      return label;
    }
    try {
      return punycode.decode(label.slice(ACE_PREFIX.length));
    } catch (err) {
      throw new CodecFailureError(label, err);
    }
  },
};

/**
 * Encode a label through `codec`, wrapping any failure as CodecFailureError.
 */
export function encodeLabel(codec: LabelCodec, label: string): string {
  try {
    return codec.encode(label);
  } catch (err) {
    if (err instanceof CodecFailureError) throw err;
    throw new CodecFailureError(label, err);
  }
}

/**
 * Decode a label through `codec`, wrapping any failure as CodecFailureError.
 */
export function decodeLabel(codec: LabelCodec, label: string): string {
  try {
    return codec.decode(label);
  } catch (err) {
    if (err instanceof CodecFailureError) throw err;
    throw new CodecFailureError(label, err);
  }
}
