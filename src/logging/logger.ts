import pino, { type Logger } from "pino";

export type { Logger };

const LEVELS = new Set(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): string {
  const level = env.REELSORT_LOG_LEVEL?.trim().toLowerCase();
  return level && LEVELS.has(level) ? level : "info";
}

const root = pino({ name: "reelsort", level: resolveLogLevel() });

/** Child logger tagged with the subsystem that owns it. */
export function createSubsystemLogger(subsystem: string): Logger {
  return root.child({ subsystem });
}
