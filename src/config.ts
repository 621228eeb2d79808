/**
 * Process-level configuration: which rule set and codec names are parsed with.
 *
 * Priority (highest wins): constructor arg > env var > default.
 */

import { punycodeCodec, type LabelCodec } from "./name/codec.js";
import type { ParseOptions } from "./name/label.js";
import { DEFAULT_RULES, rulesFromString, type RuleSet } from "./name/rules.js";

const FALSY = new Set(["0", "false", "no", "off"]);

export class FqdnConfig {
  readonly rules: RuleSet;
  readonly codec: LabelCodec | null;

  constructor(
    options: {
      rules?: RuleSet | string | null;
      idn?: boolean | null;
      codec?: LabelCodec;
    } = {}
  ) {
    // Rules: constructor arg > FQDN_RULES > default
    const rules = options.rules ?? process.env["FQDN_RULES"];
    if (rules === undefined) {
      this.rules = DEFAULT_RULES;
    } else if (typeof rules === "string") {
      this.rules = rulesFromString(rules);
    } else {
      this.rules = rules;
    }

    // IDN: constructor arg > FQDN_IDN > enabled
    let idn = options.idn ?? true;
    const envIdn = process.env["FQDN_IDN"];
    if (options.idn == null && envIdn) {
      idn = !FALSY.has(envIdn.trim().toLowerCase());
    }

    this.codec = idn ? (options.codec ?? punycodeCodec) : null;
  }

  /** Options to hand to Fqdn.parse / Label.parse. */
  get parseOptions(): ParseOptions {
    return { rules: this.rules, codec: this.codec };
  }
}
