import fs from "node:fs";
import os from "node:os";
import { Value } from "@sinclair/typebox/value";
import type { TitleOptions } from "../film/types.js";
import type { TransferOptions } from "../transfer/types.js";
import { validateEditionMap } from "../film/edition.js";
import { DEFAULT_TITLE_OPTIONS } from "../film/parse.js";
import { DEFAULT_DESTINATION_TEMPLATE, validatePattern } from "../film/template-expand.js";
import { createSubsystemLogger } from "../logging/logger.js";
import { DEFAULT_TRANSFER_OPTIONS } from "../transfer/move.js";
import { resolveConfigPath } from "./paths.js";
import { ReelsortConfigSchema, type ReelsortConfig } from "./schema.js";

const log = createSubsystemLogger("config");

export class ConfigValidationError extends Error {
  readonly configPath: string;
  readonly issues: string[];

  constructor(configPath: string, issues: string[]) {
    super(`Invalid config at ${configPath}:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.name = "ConfigValidationError";
    this.configPath = configPath;
    this.issues = issues;
  }
}

/**
 * Validate a parsed config value. Returns an array of error messages (empty = valid).
 */
export function validateConfig(raw: unknown): string[] {
  if (!Value.Check(ReelsortConfigSchema, raw)) {
    return [...Value.Errors(ReelsortConfigSchema, raw)].map(
      (e) => `${e.path || "/"}: ${e.message}`,
    );
  }
  const errors = validateEditionMap(raw.edition_map ?? []);
  if (raw.destination_template !== undefined) {
    for (const err of validatePattern(raw.destination_template)) {
      errors.push(`destination_template: ${err}`);
    }
  }
  return errors;
}

export type ConfigIO = {
  configPath: string;
  loadConfig(): ReelsortConfig;
};

export function createConfigIO(
  opts: {
    env?: NodeJS.ProcessEnv;
    homedir?: () => string;
  } = {},
): ConfigIO {
  const env = opts.env ?? process.env;
  const configPath = resolveConfigPath(env, opts.homedir ?? os.homedir);

  return {
    configPath,
    loadConfig() {
      if (!fs.existsSync(configPath)) {
        log.debug({ configPath }, "no config file, using defaults");
        return {};
      }
      let raw: unknown;
      try {
        raw = JSON.parse(fs.readFileSync(configPath, "utf-8"));
      } catch (err) {
        throw new ConfigValidationError(configPath, [
          `not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
        ]);
      }
      const issues = validateConfig(raw);
      if (issues.length > 0 || !Value.Check(ReelsortConfigSchema, raw)) {
        throw new ConfigValidationError(configPath, issues);
      }
      log.debug({ configPath }, "loaded config");
      return raw;
    },
  };
}

export function resolveTitleOptions(cfg: ReelsortConfig): TitleOptions {
  return {
    stripPrefixes: cfg.strip_prefixes ?? DEFAULT_TITLE_OPTIONS.stripPrefixes,
    keepPeriod: cfg.keep_period ?? DEFAULT_TITLE_OPTIONS.keepPeriod,
    editions: cfg.edition_map ?? DEFAULT_TITLE_OPTIONS.editions,
  };
}

export function resolveTransferOptions(cfg: ReelsortConfig): TransferOptions {
  return {
    forceOverwrite: cfg.duplicates?.force_overwrite ?? DEFAULT_TRANSFER_OPTIONS.forceOverwrite,
    safeCopy: cfg.safe_copy ?? DEFAULT_TRANSFER_OPTIONS.safeCopy,
    dryRun: cfg.test ?? DEFAULT_TRANSFER_OPTIONS.dryRun,
    verify: cfg.verify ?? DEFAULT_TRANSFER_OPTIONS.verify,
    hashAlgo: cfg.hash_algo ?? DEFAULT_TRANSFER_OPTIONS.hashAlgo,
  };
}

export function resolveDestinationTemplate(cfg: ReelsortConfig): string {
  return cfg.destination_template ?? DEFAULT_DESTINATION_TEMPLATE;
}
