import path from "node:path";
import type { FilmAttributes, Media, Resolution, TitleOptions } from "./types.js";
import { DEFAULT_EDITION_MAP, resolveEdition } from "./edition.js";
import {
  escapeRegExp,
  globalize,
  HDR,
  MEDIA,
  PART,
  PROPER,
  RESOLUTION,
  SORT_SUFFIX,
  STRIP_FROM_TITLE,
  YEAR,
} from "./patterns.js";
import { splitSourcePath } from "./source-path.js";

export const DEFAULT_TITLE_OPTIONS: TitleOptions = {
  stripPrefixes: [],
  keepPeriod: ["S.W.A.T", "After.Life"],
  editions: DEFAULT_EDITION_MAP,
};

/**
 * Right-most year in the folder and file name, or null. The right-most match
 * wins so that "2001 A Space Odyssey 1968" resolves to 1968.
 */
export function extractYear(sourcePath: string): number | null {
  const { joined } = splitSourcePath(sourcePath);
  const matches = [...joined.matchAll(globalize(YEAR))];
  const year = matches.at(-1)?.groups?.year;
  return year ? Number(year) : null;
}

export function extractResolution(sourcePath: string): Resolution | null {
  const { joined } = splitSourcePath(sourcePath);
  const found = RESOLUTION.exec(joined)?.groups?.resolution?.toLowerCase();
  if (!found) {
    return null;
  }
  if (found === "4k") {
    return "2160p";
  }
  const normalized = found.endsWith("p") ? found : `${found}p`;
  return normalized === "720p" || normalized === "1080p" ? normalized : "2160p";
}

export function extractMedia(sourcePath: string): Media {
  const { joined } = splitSourcePath(sourcePath);
  const groups = MEDIA.exec(joined)?.groups;
  if (!groups) {
    return "unknown";
  }
  if (groups.bluray) {
    return "bluray";
  }
  if (groups.webdl) {
    return "webdl";
  }
  if (groups.hdtv) {
    return "hdtv";
  }
  if (groups.dvd) {
    return "dvd";
  }
  return groups.sdtv ? "sdtv" : "unknown";
}

export function extractEdition(
  sourcePath: string,
  editions = DEFAULT_EDITION_MAP,
): string | null {
  return resolveEdition(sourcePath, editions)?.edition ?? null;
}

export function isHdr(sourcePath: string): boolean {
  return HDR.test(splitSourcePath(sourcePath).joined);
}

export function isProper(sourcePath: string): boolean {
  return PROPER.test(splitSourcePath(sourcePath).joined);
}

/** Part number ("2", "IV", ...) upper-cased, or null. */
export function extractPart(sourcePath: string): string | null {
  const part = PART.exec(splitSourcePath(sourcePath).joined)?.groups?.part;
  return part ? part.toUpperCase() : null;
}

// ---------------------------------------------------------------------------
// Title pipeline
// ---------------------------------------------------------------------------

export type TitleContext = {
  sourcePath: string;
  options: TitleOptions;
};

export type TitleStep = (title: string, ctx: TitleContext) => string;

/**
 * Pick the folder name when it carries a year or resolution (folders are
 * usually named more cleanly than the files inside them), otherwise the file
 * name without its extension. The input title is ignored.
 */
export const selectTitleSource: TitleStep = (_title, { sourcePath }) => {
  const { folder, file } = splitSourcePath(sourcePath);
  if (folder && (extractYear(folder) !== null || extractResolution(folder) !== null)) {
    return folder;
  }
  return path.parse(file).name;
};

export const stripPrefixes: TitleStep = (title, { options }) => {
  const lower = title.toLowerCase();
  const prefix = options.stripPrefixes.find((p) => p && lower.startsWith(p.toLowerCase()));
  return prefix ? title.slice(prefix.length) : title;
};

/** "Matrix, The (1999)" -> "The Matrix (1999)" */
export const restoreLeadingArticle: TitleStep = (title) => {
  if (!SORT_SUFFIX.test(title)) {
    return title;
  }
  return `The ${title.replace(globalize(SORT_SUFFIX), "")}`;
};

export const stripTitleChars: TitleStep = (title) =>
  title.replace(globalize(STRIP_FROM_TITLE), " ");

export const removeEdition: TitleStep = (title, { sourcePath, options }) => {
  const match = resolveEdition(sourcePath, options.editions);
  return match ? title.replace(globalize(match.pattern), "") : title;
};

export const removeMediaAndResolution: TitleStep = (title) =>
  title.replace(globalize(MEDIA), "").replace(globalize(RESOLUTION), "");

/** Keep only the text before the year; what follows is release metadata. */
export const truncateAtYear: TitleStep = (title, { sourcePath }) => {
  const year = extractYear(sourcePath);
  if (year === null) {
    return title;
  }
  const idx = title.indexOf(String(year));
  return idx === -1 ? title : title.slice(0, idx);
};

/**
 * Put periods back into configured strings such as "S.W.A.T", which the
 * character-stripping step turned into "S W A T".
 */
export const restoreKeptPeriods: TitleStep = (title, { options }) => {
  let out = title;
  for (const keep of options.keepPeriod) {
    const body = keep.split(".").map(escapeRegExp).join("[.\\s]");
    out = out.replace(new RegExp(`\\b${body}\\b`, "gi"), keep);
  }
  return out;
};

export const collapseWhitespace: TitleStep = (title) => title.replace(/\s+/g, " ").trim();

export const TITLE_STEPS: readonly TitleStep[] = [
  selectTitleSource,
  stripPrefixes,
  restoreLeadingArticle,
  stripTitleChars,
  removeEdition,
  removeMediaAndResolution,
  truncateAtYear,
  restoreKeptPeriods,
  collapseWhitespace,
];

/**
 * Get a clean, well-formed film title from the full path of a file.
 */
export function extractTitle(
  sourcePath: string,
  options: TitleOptions = DEFAULT_TITLE_OPTIONS,
): string {
  const ctx: TitleContext = { sourcePath, options };
  return TITLE_STEPS.reduce((title, step) => step(title, ctx), "");
}

export function parseFilm(
  sourcePath: string,
  options: TitleOptions = DEFAULT_TITLE_OPTIONS,
): FilmAttributes {
  return {
    title: extractTitle(sourcePath, options),
    year: extractYear(sourcePath),
    resolution: extractResolution(sourcePath),
    media: extractMedia(sourcePath),
    edition: extractEdition(sourcePath, options.editions),
    part: extractPart(sourcePath),
    is_hdr: isHdr(sourcePath),
    is_proper: isProper(sourcePath),
  };
}
