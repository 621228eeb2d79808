/**
 * Rule sets: the five toggles that decide how strictly names are validated.
 *
 * By default only the edge-hyphen rule is on, so underscores and long labels
 * (as seen in service discovery names) pass. STRICT_RULES turns on every
 * restriction from RFC 1035/952/1123.
 */

export interface RuleSet {
  /** Caps each label at 63 octets. */
  readonly labelLength63: boolean;
  /** Caps the encoded name at 255 octets, terminal zero included. */
  readonly nameLength255: boolean;
  /** Labels accept only `[A-Za-z0-9-]`. */
  readonly restrictedCharset: boolean;
  /** Rendering ends with `.`. */
  readonly trailingDot: boolean;
  /** Labels must not start or end with `-`. */
  readonly noEdgeHyphen: boolean;
}

export type RuleName = keyof RuleSet;

/** Kebab-case names, as written in FQDN_RULES and on the command line. */
const RULE_NAMES: ReadonlyArray<readonly [string, RuleName]> = [
  ["label-length-63", "labelLength63"],
  ["name-length-255", "nameLength255"],
  ["restricted-charset", "restrictedCharset"],
  ["trailing-dot", "trailingDot"],
  ["no-edge-hyphen", "noEdgeHyphen"],
];

export const DEFAULT_RULES: RuleSet = Object.freeze({
  labelLength63: false,
  nameLength255: false,
  restrictedCharset: false,
  trailingDot: false,
  noEdgeHyphen: true,
});

export const STRICT_RULES: RuleSet = Object.freeze({
  labelLength63: true,
  nameLength255: true,
  restrictedCharset: true,
  trailingDot: true,
  noEdgeHyphen: true,
});

/**
 * Build a frozen rule set from overrides on top of DEFAULT_RULES.
 */
export function defineRules(overrides: Partial<RuleSet> = {}): RuleSet {
  return Object.freeze({ ...DEFAULT_RULES, ...overrides });
}

/**
 * Parse a rule description: `strict`, `default`, `none`, or a comma-separated
 * list of rule names (every listed rule on, every other off).
 *
 * @throws {Error} On an unknown rule name.
 */
export function rulesFromString(raw: string): RuleSet {
  const value = raw.trim().toLowerCase();
  if (value === "strict") return STRICT_RULES;
  if (value === "default" || value === "") return DEFAULT_RULES;

  const rules: Record<RuleName, boolean> = {
    labelLength63: false,
    nameLength255: false,
    restrictedCharset: false,
    trailingDot: false,
    noEdgeHyphen: false,
  };
  if (value === "none") return Object.freeze(rules);

  for (const part of value.split(",")) {
    const name = part.trim();
    if (!name) continue;
    const entry = RULE_NAMES.find(([kebab]) => kebab === name);
    if (!entry) {
      throw new Error(
        `Unknown FQDN rule '${name}'. ` +
          `Must be one of: ${JSON.stringify(RULE_NAMES.map(([kebab]) => kebab))}`
      );
    }
    rules[entry[1]] = true;
  }
  return Object.freeze(rules);
}

/**
 * Inverse of rulesFromString.
 */
export function describeRules(rules: RuleSet): string {
  const enabled = RULE_NAMES.filter(([, key]) => rules[key]).map(([kebab]) => kebab);
  if (enabled.length === RULE_NAMES.length) return "strict";
  if (sameRules(rules, DEFAULT_RULES)) return "default";
  if (enabled.length === 0) return "none";
  return enabled.join(",");
}

export function sameRules(a: RuleSet, b: RuleSet): boolean {
  return RULE_NAMES.every(([, key]) => a[key] === b[key]);
}
