import { pino, type Logger } from "pino";

export enum Subsystem {
  Server = "Server",
  Config = "Config",
  Store = "Store",
  Ingest = "Ingest",
  Mapping = "Mapping",
  Identity = "Identity",
  Schema = "Schema",
  Notes = "Notes",
  Transport = "Transport",
}

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

function initialLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : "info";
}

const root = pino({
  level: initialLevel(),
  formatters: {
    level: (label) => ({ level: label }),
  },
});

const children = new Map<Subsystem, Logger>();

export const getLogger = (subsystem: Subsystem): Logger => {
  const existing = children.get(subsystem);
  if (existing) return existing;
  const child = root.child({ name: subsystem });
  children.set(subsystem, child);
  return child;
};

export function getLogLevel(): LogLevel {
  return isLogLevel(root.level) ? root.level : "info";
}

/**
 * Applies `level` to the root and every subsystem logger. An explicit
 * `LOG_LEVEL` environment variable wins over configuration unless `force`.
 */
export function setLogLevel(level: LogLevel, opts: { force?: boolean } = {}): void {
  if (!opts.force && isLogLevel(process.env.LOG_LEVEL?.toLowerCase())) return;
  root.level = level;
  for (const child of children.values()) child.level = level;
}
