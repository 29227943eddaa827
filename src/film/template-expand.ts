import { illegalChars } from "./patterns.js";

export const ALLOWED_TOKENS = new Set([
  "TITLE",
  "TITLE_SORT",
  "YEAR",
  "EDITION",
  "RESOLUTION",
  "MEDIA",
  "QUALITY",
  "PART",
  "HDR",
  "PROPER",
]);

export const DEFAULT_DESTINATION_TEMPLATE =
  "{TITLE} ({YEAR})/{TITLE} ({YEAR}) {EDITION} {PART} {QUALITY} {HDR} {PROPER}";

export type TokenContext = Record<string, string>;

const TOKEN_RE = /\{([A-Z_]+)\}/g;

/**
 * Validate a pattern string. Returns an array of error messages (empty = valid).
 */
export function validatePattern(pattern: string): string[] {
  const errors: string[] = [];
  if (!pattern) {
    errors.push("Pattern must not be empty");
    return errors;
  }

  let match: RegExpExecArray | null;
  const re = new RegExp(TOKEN_RE.source, "g");
  while ((match = re.exec(pattern)) !== null) {
    const token = match[1];
    if (!ALLOWED_TOKENS.has(token)) {
      errors.push(`Unknown token: {${token}}`);
    }
  }

  return errors;
}

/**
 * Sanitize a token value: drop control characters, turn ":" into " -",
 * remove other characters the filesystem rejects and replace path separators.
 */
function sanitizeTokenValue(value: string, platform: NodeJS.Platform): string {
  // eslint-disable-next-line no-control-regex
  let clean = value.replace(/[\x00-\x1f\x7f]/g, "");
  clean = clean.replace(/\s*:\s*/g, " - ");
  clean = clean.replace(/[/\\]/g, "-");
  clean = clean.replace(illegalChars(platform), "");
  return clean.trim();
}

/** Drop brackets left empty by missing tokens and collapse whitespace. */
function tidySegment(segment: string): string {
  return segment
    .replace(/\(\s*\)|\[\s*\]|\{\s*\}/g, "")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Expand a template pattern using the provided token context.
 * Unknown tokens are left as-is. Missing tokens use an empty string.
 */
export function expandTemplate(
  pattern: string,
  ctx: TokenContext,
  platform: NodeJS.Platform = process.platform,
): string {
  const replaced = pattern.replace(TOKEN_RE, (match, token: string) => {
    if (!ALLOWED_TOKENS.has(token)) {
      return match;
    }
    return sanitizeTokenValue(ctx[token] ?? "", platform);
  });
  const expanded = replaced.split("/").map(tidySegment).join("/");

  assertSafePath(expanded);

  return expanded;
}

/**
 * Assert the expanded path is safe: no path traversal, no absolute paths,
 * no empty segments.
 */
function assertSafePath(expanded: string): void {
  if (expanded.startsWith("/")) {
    throw new Error("Expanded path must not be absolute");
  }
  const segments = expanded.split("/");
  for (const seg of segments) {
    if (seg === ".." || seg === ".") {
      throw new Error("Expanded path contains path traversal");
    }
    if (seg === "") {
      throw new Error("Expanded path contains an empty segment");
    }
  }
}
