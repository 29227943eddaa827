import path from "node:path";
import type { FilmAttributes, Media } from "./types.js";
import { LEADING_ARTICLE } from "./patterns.js";
import { expandTemplate, type TokenContext } from "./template-expand.js";

const MEDIA_LABELS: Record<Media, string> = {
  bluray: "Bluray",
  webdl: "WEB-DL",
  hdtv: "HDTV",
  dvd: "DVD",
  sdtv: "SDTV",
  unknown: "",
};

/** "The Matrix" -> "Matrix, The" */
export function toSortTitle(title: string): string {
  return LEADING_ARTICLE.test(title) ? `${title.replace(LEADING_ARTICLE, "")}, The` : title;
}

/**
 * Build a TokenContext for a film. Absent attributes map to "".
 */
export function buildTokenContext(film: FilmAttributes): TokenContext {
  const media = MEDIA_LABELS[film.media];
  const resolution = film.resolution ?? "";
  return {
    TITLE: film.title,
    TITLE_SORT: toSortTitle(film.title),
    YEAR: film.year === null ? "" : String(film.year),
    EDITION: film.edition ?? "",
    RESOLUTION: resolution,
    MEDIA: media,
    QUALITY: [media, resolution].filter(Boolean).join("-"),
    PART: film.part ? `Part ${film.part}` : "",
    HDR: film.is_hdr ? "HDR" : "",
    PROPER: film.is_proper ? "Proper" : "",
  };
}

export type DestinationParams = {
  root: string;
  template: string;
  film: FilmAttributes;
  ext: string; // with or without the leading "."
  platform?: NodeJS.Platform;
};

/**
 * Absolute destination for a film: `<root>/<expanded template><ext>`.
 */
export function resolveDestinationPath(params: DestinationParams): string {
  const rel = expandTemplate(params.template, buildTokenContext(params.film), params.platform);
  const ext = params.ext && !params.ext.startsWith(".") ? `.${params.ext}` : params.ext;
  return path.join(path.resolve(params.root), `${rel}${ext.toLowerCase()}`);
}
