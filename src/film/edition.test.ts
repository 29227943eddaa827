import { describe, expect, it } from "vitest";
import type { EditionAliasTable } from "./types.js";
import { extractEdition } from "./parse.js";
import { resolveEdition, validateEditionMap } from "./edition.js";

describe("resolveEdition", () => {
  it("returns the canonical edition and the pattern that matched", () => {
    const match = resolveEdition("Blade.Runner.1982.Final.Cut.1080p.BluRay.mkv");
    expect(match?.edition).toBe("Final Cut");
    expect(match?.pattern.test("final cut")).toBe(true);
  });

  it("substitutes capture groups into the replacement", () => {
    expect(extractEdition("Some.Movie.1999.25th.Anniversary.Edition.mkv")).toBe(
      "25th Anniversary Edition",
    );
  });

  it("normalizes spelling variants", () => {
    expect(extractEdition("Alien.1979.Directors.Cut.mkv")).toBe("Director's Cut");
    expect(extractEdition("Alien (1979) Director's Cut.mkv")).toBe("Director's Cut");
  });

  it("prefers the more specific alias declared first", () => {
    expect(extractEdition("Kingdom.of.Heaven.2005.Extended.Directors.Cut.mkv")).toBe(
      "Extended Director's Cut",
    );
  });

  it("respects table order over match length", () => {
    const table: EditionAliasTable = [
      ["extended", "Extended"],
      ["extended\\W*cut", "Extended Cut"],
    ];
    expect(extractEdition("Movie.2000.Extended.Cut.mkv", table)).toBe("Extended");
  });

  it("searches the folder name too", () => {
    expect(extractEdition("/films/Aliens (1986) Special Edition/aliens.mkv")).toBe(
      "Special Edition",
    );
  });

  it("returns null when nothing matches", () => {
    expect(resolveEdition("Heat.1995.1080p.mkv")).toBeNull();
    expect(extractEdition("Heat.1995.1080p.mkv")).toBeNull();
  });

  it("only matches whole words", () => {
    expect(extractEdition("Uncuttable.2010.mkv")).toBeNull();
  });
});

describe("validateEditionMap", () => {
  it("accepts the default table", () => {
    expect(validateEditionMap([["final\\W*cut", "Final Cut"]])).toEqual([]);
  });

  it("reports empty and invalid patterns by index", () => {
    const errors = validateEditionMap([
      ["(unclosed", "x"],
      ["", "y"],
      ["ok", "z"],
    ]);
    expect(errors).toHaveLength(2);
    expect(errors[0]).toContain("edition_map[0]:");
    expect(errors[1]).toBe("edition_map[1]: pattern must not be empty");
  });
});
