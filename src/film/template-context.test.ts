import path from "node:path";
import { describe, expect, it } from "vitest";
import type { FilmAttributes } from "./types.js";
import { parseFilm } from "./parse.js";
import { buildTokenContext, resolveDestinationPath, toSortTitle } from "./template-context.js";
import { DEFAULT_DESTINATION_TEMPLATE } from "./template-expand.js";

const HEAT: FilmAttributes = {
  title: "Heat",
  year: 1995,
  resolution: "720p",
  media: "unknown",
  edition: null,
  part: null,
  is_hdr: false,
  is_proper: false,
};

describe("toSortTitle", () => {
  it("moves a leading The to the end", () => {
    expect(toSortTitle("The Matrix")).toBe("Matrix, The");
    expect(toSortTitle("Heat")).toBe("Heat");
  });
});

describe("buildTokenContext", () => {
  it("maps absent attributes to empty strings", () => {
    expect(buildTokenContext(HEAT)).toEqual({
      TITLE: "Heat",
      TITLE_SORT: "Heat",
      YEAR: "1995",
      EDITION: "",
      RESOLUTION: "720p",
      MEDIA: "",
      QUALITY: "720p",
      PART: "",
      HDR: "",
      PROPER: "",
    });
  });

  it("labels media, part and flags", () => {
    const ctx = buildTokenContext({
      ...HEAT,
      media: "webdl",
      resolution: "2160p",
      part: "II",
      is_hdr: true,
      is_proper: true,
    });
    expect(ctx.QUALITY).toBe("WEB-DL-2160p");
    expect(ctx.PART).toBe("Part II");
    expect(ctx.HDR).toBe("HDR");
    expect(ctx.PROPER).toBe("Proper");
  });
});

describe("resolveDestinationPath", () => {
  it("joins the expanded template and extension under the root", () => {
    const dst = resolveDestinationPath({
      root: "/library",
      template: DEFAULT_DESTINATION_TEMPLATE,
      film: { ...HEAT, media: "bluray", resolution: "1080p", is_proper: true },
      ext: "MKV",
    });
    expect(dst).toBe(
      path.join(path.resolve("/library"), "Heat (1995)", "Heat (1995) Bluray-1080p Proper.mkv"),
    );
  });
});

describe("extraction round-trip", () => {
  it.each([
    "/downloads/Rogue.One.A.Star.Wars.Story.2016.PROPER.1080p.BluRay.DTS.x264-DON/Rogue.One.A.Star.Wars.Story.2016.PROPER.1080p.BluRay.DTS.x264-DON.mkv",
    "/downloads/Kill.Bill.Part.2.2004.2160p.WEB-DL.HDR.mkv",
    "/downloads/Blade.Runner.1982.Final.Cut.1080p.BluRay.mkv",
    "/downloads/Matrix, The (1999)/The.Matrix.1999.720p.HDTV.mkv",
  ])("re-parsing the formatted path of %s gives the same attributes", (source) => {
    const film = parseFilm(source);
    const formatted = resolveDestinationPath({
      root: "/library",
      template: DEFAULT_DESTINATION_TEMPLATE,
      film,
      ext: path.extname(source),
    });
    expect(parseFilm(formatted)).toEqual(film);
  });
});
