export type Resolution = "720p" | "1080p" | "2160p";

export type Media = "bluray" | "webdl" | "hdtv" | "dvd" | "sdtv" | "unknown";

/** Ordered (pattern, replacement) pairs. First match wins. */
export type EditionAliasTable = ReadonlyArray<readonly [pattern: string, replacement: string]>;

export type EditionMatch = {
  pattern: RegExp; // word-bounded, case-insensitive, non-global
  edition: string; // canonical text after capture-group substitution
};

export type TitleOptions = {
  stripPrefixes: readonly string[];
  keepPeriod: readonly string[];
  editions: EditionAliasTable;
};

export type FilmAttributes = {
  title: string;
  year: number | null; // 1921..2159
  resolution: Resolution | null;
  media: Media;
  edition: string | null;
  part: string | null; // "2", "II", ...
  is_hdr: boolean;
  is_proper: boolean;
};
