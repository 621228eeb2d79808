import { describe, it, expect } from "vitest";
import { joinParts, renderName, splitName } from "../../src/name/text.js";
import { EmptyLabelError, MalformedSeparatorsError } from "../../src/name/errors.js";

describe("splitName", () => {
  it("returns no labels for the root", () => {
    expect(splitName("")).toEqual([]);
    expect(splitName(".")).toEqual([]);
  });

  it("drops a single trailing separator", () => {
    expect(splitName("a.b.")).toEqual(["a", "b"]);
    expect(splitName("a.b")).toEqual(["a", "b"]);
  });

  it("distinguishes empty labels from misplaced separators", () => {
    expect(() => splitName("a..b")).toThrow(EmptyLabelError);
    expect(() => splitName(".a")).toThrow(MalformedSeparatorsError);
    expect(() => splitName("a..")).toThrow(MalformedSeparatorsError);
    expect(() => splitName("..")).toThrow(MalformedSeparatorsError);
  });

  it("describes the malformed input", () => {
    expect(() => splitName(".a")).toThrow('leading separator in ".a"');
  });
});

describe("renderName", () => {
  it("joins labels", () => {
    expect(renderName(["a", "b"], false)).toBe("a.b");
    expect(renderName(["a", "b"], true)).toBe("a.b.");
  });

  it("renders the root as a dot", () => {
    expect(renderName([], false)).toBe(".");
    expect(renderName([], true)).toBe(".");
  });
});

describe("joinParts", () => {
  it("appends a separator to every part", () => {
    expect(joinParts(["octo-org", "github.io"])).toBe("octo-org.github.io.");
  });

  it("does not double a trailing dot", () => {
    expect(joinParts(["a.fr."])).toBe("a.fr.");
  });

  it("gives the root for no parts", () => {
    expect(joinParts([])).toBe(".");
    expect(joinParts([""])).toBe(".");
  });
});
