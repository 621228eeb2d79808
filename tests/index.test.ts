import { describe, it, expect } from "vitest";
import * as pkg from "../src/index.js";

describe("package exports", () => {
  it("exposes the name core and config", () => {
    const name = pkg.fqdn("www", "example.com");
    expect(name).toBeInstanceOf(pkg.Fqdn);
    expect(name.isSubdomainOf(pkg.Fqdn.parse("example.com"))).toBe(true);
    expect(new pkg.FqdnConfig({ rules: "strict" }).rules).toBe(pkg.STRICT_RULES);
    expect(pkg.Label.parse("Www").canonical).toBe("www");
    expect(pkg.toHex(pkg.Fqdn.root().toWire())).toBe("00");
  });

  it("exposes the error hierarchy", () => {
    const result = pkg.Fqdn.tryParse("a..b");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(pkg.FqdnError);
      expect(result.error).toBeInstanceOf(pkg.EmptyLabelError);
    }
  });
});
