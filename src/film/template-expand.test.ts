import { describe, expect, it } from "vitest";
import {
  DEFAULT_DESTINATION_TEMPLATE,
  expandTemplate,
  validatePattern,
  type TokenContext,
} from "./template-expand.js";

describe("validatePattern", () => {
  it("accepts valid patterns with known tokens", () => {
    expect(validatePattern(DEFAULT_DESTINATION_TEMPLATE)).toEqual([]);
    expect(validatePattern("{TITLE_SORT}/{QUALITY}")).toEqual([]);
    expect(validatePattern("Films")).toEqual([]);
  });

  it("rejects unknown tokens", () => {
    const errors = validatePattern("{TITLE}/{CODEC}");
    expect(errors).toEqual(["Unknown token: {CODEC}"]);
  });

  it("rejects empty pattern", () => {
    expect(validatePattern("")).toEqual(["Pattern must not be empty"]);
  });
});

describe("expandTemplate", () => {
  const ctx: TokenContext = {
    TITLE: "Heat",
    YEAR: "1995",
    QUALITY: "Bluray-1080p",
    EDITION: "",
    PROPER: "",
  };

  it("expands tokens and tidies whitespace left by empty ones", () => {
    expect(expandTemplate("{TITLE} ({YEAR})/{TITLE} ({YEAR}) {EDITION} {QUALITY} {PROPER}", ctx)).toBe(
      "Heat (1995)/Heat (1995) Bluray-1080p",
    );
  });

  it("drops brackets around a missing value", () => {
    expect(expandTemplate("{TITLE} ({YEAR}) [{EDITION}]", { TITLE: "Heat", YEAR: "" })).toBe(
      "Heat",
    );
  });

  it("leaves unknown tokens as-is", () => {
    expect(expandTemplate("{TITLE} {CODEC}", ctx)).toBe("Heat {CODEC}");
  });

  it("turns a colon into a dash", () => {
    expect(
      expandTemplate("{TITLE} ({YEAR})", { TITLE: "Star Wars: Episode IV", YEAR: "1977" }, "linux"),
    ).toBe("Star Wars - Episode IV (1977)");
  });

  it("removes characters Windows rejects and replaces separators", () => {
    expect(expandTemplate("{TITLE}", { TITLE: 'What/If? "Cut"' }, "win32")).toBe("What-If Cut");
  });

  it("rejects path traversal", () => {
    expect(() => expandTemplate("{TITLE}/x", { TITLE: ".." })).toThrow(
      "Expanded path contains path traversal",
    );
  });

  it("rejects absolute patterns", () => {
    expect(() => expandTemplate("/{TITLE}", ctx)).toThrow("Expanded path must not be absolute");
  });

  it("rejects a segment left empty", () => {
    expect(() => expandTemplate("{TITLE}/{EDITION}", ctx)).toThrow(
      "Expanded path contains an empty segment",
    );
  });
});
