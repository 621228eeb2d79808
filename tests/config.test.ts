/**
 * Tests for FqdnConfig.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { FqdnConfig } from "../src/config.js";
import { punycodeCodec, type LabelCodec } from "../src/name/codec.js";
import { InvalidCharacterError } from "../src/name/errors.js";
import { Fqdn } from "../src/name/fqdn.js";
import { DEFAULT_RULES, STRICT_RULES, defineRules } from "../src/name/rules.js";

describe("FqdnConfig", () => {
  // Save and restore env vars
  const savedEnv: Record<string, string | undefined> = {};
  const envKeys = ["FQDN_RULES", "FQDN_IDN"];

  beforeEach(() => {
    for (const key of envKeys) {
      savedEnv[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of envKeys) {
      if (savedEnv[key] !== undefined) {
        process.env[key] = savedEnv[key];
      } else {
        delete process.env[key];
      }
    }
  });

  it("uses the default rules when none provided", () => {
    const cfg = new FqdnConfig();
    expect(cfg.rules).toBe(DEFAULT_RULES);
    expect(cfg.codec).toBe(punycodeCodec);
  });

  it("accepts a rule description string", () => {
    const cfg = new FqdnConfig({ rules: "strict" });
    expect(cfg.rules).toBe(STRICT_RULES);
  });

  it("accepts a RuleSet", () => {
    const rules = defineRules({ trailingDot: true });
    const cfg = new FqdnConfig({ rules });
    expect(cfg.rules).toBe(rules);
  });

  it("uses FQDN_RULES env var", () => {
    process.env["FQDN_RULES"] = "strict";
    const cfg = new FqdnConfig();
    expect(cfg.rules).toBe(STRICT_RULES);
  });

  it("prefers the constructor arg over FQDN_RULES", () => {
    process.env["FQDN_RULES"] = "strict";
    const cfg = new FqdnConfig({ rules: "default" });
    expect(cfg.rules).toBe(DEFAULT_RULES);
  });

  it("falls back to FQDN_RULES when the arg is null", () => {
    process.env["FQDN_RULES"] = "trailing-dot";
    const cfg = new FqdnConfig({ rules: null });
    expect(cfg.rules.trailingDot).toBe(true);
    expect(cfg.rules.noEdgeHyphen).toBe(false);
  });

  it("rejects unknown rules", () => {
    expect(() => new FqdnConfig({ rules: "nope" })).toThrow("Unknown FQDN rule 'nope'");
  });

  it("FQDN_IDN=0 disables the codec", () => {
    process.env["FQDN_IDN"] = "0";
    const cfg = new FqdnConfig();
    expect(cfg.codec).toBeNull();
    expect(() => Fqdn.parse("bücher.de", cfg.parseOptions)).toThrow(InvalidCharacterError);
  });

  it("idn option overrides FQDN_IDN", () => {
    process.env["FQDN_IDN"] = "off";
    const cfg = new FqdnConfig({ idn: true });
    expect(cfg.codec).toBe(punycodeCodec);
  });

  it("uses a custom codec", () => {
    const codec: LabelCodec = {
      encode: () => "custom",
      decode: (label) => label,
    };
    const cfg = new FqdnConfig({ codec });
    expect(Fqdn.parse("é.com", cfg.parseOptions).toString()).toBe("custom.com");
  });

  it("passes rules through parseOptions", () => {
    const cfg = new FqdnConfig({ rules: "strict" });
    expect(Fqdn.parse("a.com", cfg.parseOptions).toString()).toBe("a.com.");
  });
});
