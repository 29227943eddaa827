/**
 * Regular expressions used to match values in file and folder names.
 *
 * Every pattern here is non-global. Use {@link globalize} when a pattern
 * needs to be applied to every occurrence.
 */

/**
 * A 4-digit year between 1921 and 2159. 1920 collides with 1920x1080 and
 * 2160 with 2160p. The year may not be at the start of the input or directly
 * after a `/`, so there must be at least one other character in the same
 * path segment before it.
 */
export const YEAR = /[^/]+\b(?<year>192[1-9]|19[3-9]\d|20\d\d|21[0-5]\d)\b/;

/** 720p, 1080p, 2160p (trailing p optional) or 4K. */
export const RESOLUTION = /\b(?<resolution>(?:72|108|216)0p?|4K)\b/i;

/** Source media. Alternatives are listed in precedence order. */
export const MEDIA =
  /\b(?:(?<bluray>blu-?ray|bdremux|bdrip)|(?<webdl>web-?dl|webrip|amzn|nf|hulu|dsnp|atvp)|(?<hdtv>hdtv)|(?<dvd>dvd)|(?<sdtv>sdtv))\b/i;

/** "proper" only counts when a 4-digit run comes before it. */
export const PROPER = /\d{4}.*?\b(?<proper>proper)\b/i;

export const HDR = /\b(?<hdr>hdr)\b/i;

/** "Part n", where n is an integer or a non-empty Roman numeral. */
export const PART =
  /\bpart\W?(?<part>\d+|(?=[mdclxvi])M{0,4}(?:CM|CD|D?C{0,3})(?:XC|XL|L?X{0,3})(?:IX|IV|V?I{0,3}))\b/i;

/**
 * Characters replaced with a space in a title:
 *   - anywhere: . _ · [ ] { } ( )
 *   - at the end: any run of characters that are not letters or digits
 */
export const STRIP_FROM_TITLE = /[._·[\]{}()]|[^\p{L}\p{N}_]+$/u;

/** ", the" left over from a title stored in sort order. */
export const SORT_SUFFIX = /, the\b/i;

export const LEADING_ARTICLE = /^the\s+/i;

/** Characters the target filesystem will not accept in a path segment. */
export function illegalChars(platform: NodeJS.Platform = process.platform): RegExp {
  return platform === "win32" ? /[/?<>\\:*|"]/g : /:/g;
}

export function globalize(re: RegExp): RegExp {
  return re.global ? new RegExp(re.source, re.flags) : new RegExp(re.source, `${re.flags}g`);
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
