import type { EditionAliasTable, EditionMatch } from "./types.js";
import { splitSourcePath } from "./source-path.js";

/**
 * Known editions, most specific first. Patterns are matched between word
 * boundaries, case-insensitively; `$n` in the replacement refers to the
 * n-th capture group of the pattern.
 */
export const DEFAULT_EDITION_MAP: EditionAliasTable = [
  ["(\\d{2,3})(?:th)?\\W*anniversary(?:\\W*edition)?", "$1th Anniversary Edition"],
  ["extended\\W*director\\W*s?\\W*cut", "Extended Director's Cut"],
  ["director\\W*s?\\W*cut", "Director's Cut"],
  ["collector\\W*s?\\W*edition", "Collector's Edition"],
  ["criterion(?:\\W*collection)?", "Criterion Collection"],
  ["diamond\\W*edition", "Diamond Edition"],
  ["extended(?:\\W*(?:cut|edition))?", "Extended Edition"],
  ["final\\W*cut", "Final Cut"],
  ["imax(?:\\W*edition)?", "IMAX"],
  ["special\\W*edition", "Special Edition"],
  ["theatrical(?:\\W*(?:cut|edition|release))?", "Theatrical"],
  ["ultimate\\W*(?:cut|edition)", "Ultimate Edition"],
  ["unrated(?:\\W*(?:cut|edition))?", "Unrated"],
  ["uncut", "Uncut"],
  ["(?:4k\\W*)?remaster(?:ed)?", "Remastered"],
];

/** Build the word-bounded search for one edition alias. */
export function compileEditionPattern(pattern: string): RegExp {
  return new RegExp(`\\b(?:${pattern})\\b`, "i");
}

/**
 * Check every alias compiles. Returns an array of error messages (empty = valid).
 */
export function validateEditionMap(map: EditionAliasTable): string[] {
  const errors: string[] = [];
  for (let i = 0; i < map.length; i++) {
    const [pattern] = map[i];
    if (!pattern) {
      errors.push(`edition_map[${i}]: pattern must not be empty`);
      continue;
    }
    try {
      compileEditionPattern(pattern);
    } catch (err) {
      errors.push(`edition_map[${i}]: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
  return errors;
}

function substituteGroups(replacement: string, match: RegExpExecArray): string {
  return replacement.replace(/\$(\d)/g, (_token, n: string) => match[Number(n)] ?? "");
}

/**
 * Find the first edition alias that matches the folder and file name of
 * `sourcePath`. Returns the compiled pattern (so callers can excise the
 * matched text) and the canonical edition string, or null.
 */
export function resolveEdition(
  sourcePath: string,
  editions: EditionAliasTable = DEFAULT_EDITION_MAP,
): EditionMatch | null {
  const { joined } = splitSourcePath(sourcePath);
  for (const [pattern, replacement] of editions) {
    const rx = compileEditionPattern(pattern);
    const match = rx.exec(joined);
    if (match) {
      return { pattern: rx, edition: substituteGroups(replacement, match) };
    }
  }
  return null;
}
