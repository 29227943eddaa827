import os from "node:os";
import path from "node:path";

const STATE_DIRNAME = ".reelsort";
const CONFIG_FILENAME = "reelsort.json";

/**
 * Home directory, honoring REELSORT_HOME before the OS home.
 */
export function resolveHomeDir(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env.REELSORT_HOME?.trim();
  if (override) {
    return path.resolve(override);
  }
  const home = homedir();
  if (!home) {
    throw new Error("Unable to resolve a home directory; set REELSORT_HOME");
  }
  return path.resolve(home);
}

/** Expand a leading `~` and resolve to an absolute path. */
export function resolveUserPath(
  input: string,
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const trimmed = input.trim();
  if (!trimmed) {
    return trimmed;
  }
  if (trimmed === "~" || trimmed.startsWith("~/") || trimmed.startsWith("~\\")) {
    return path.resolve(resolveHomeDir(env, homedir), trimmed.slice(2));
  }
  return path.resolve(trimmed);
}

/**
 * State directory (config, logs).
 * Can be overridden via REELSORT_STATE_DIR.
 * Default: ~/.reelsort
 */
export function resolveStateDir(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env.REELSORT_STATE_DIR?.trim();
  if (override) {
    return resolveUserPath(override, env, homedir);
  }
  return path.join(resolveHomeDir(env, homedir), STATE_DIRNAME);
}

/**
 * Config file path.
 * Can be overridden via REELSORT_CONFIG_PATH.
 * Default: ~/.reelsort/reelsort.json
 */
export function resolveConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env.REELSORT_CONFIG_PATH?.trim();
  if (override) {
    return resolveUserPath(override, env, homedir);
  }
  return path.join(resolveStateDir(env, homedir), CONFIG_FILENAME);
}
