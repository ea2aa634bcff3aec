import "dotenv/config";

function resolveLogLevel(): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  return (process.env.NODE_ENV ?? "development") === "test" ? "silent" : "info";
}

function parseFlag(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw == null || raw.trim() === "") return fallback;
  const value = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(value)) return true;
  if (["0", "false", "no", "off"].includes(value)) return false;
  throw new Error(`${name} must be a boolean (true/false), got "${raw}"`);
}

export const env = Object.freeze({
  NODE_ENV: process.env.NODE_ENV ?? "development",
  LOG_LEVEL: resolveLogLevel(),

  // Grid description loaded by the CLI (relative to the working directory)
  GRID_FILE: process.env.GRID_FILE ?? "grids/demo14.json",

  // When true, unknown keys passed to update() raise instead of being logged and ignored
  ACTION_STRICT_UPDATE: parseFlag("ACTION_STRICT_UPDATE", false),
});
