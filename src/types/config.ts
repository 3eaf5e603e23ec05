/**
 * @fileoverview Shapes of the two configuration files: `config.yaml`
 * (server settings) and `libraries.yaml` (shared context, defaults and the
 * library list). Library blocks stay `unknown` here; `Library` validates them.
 */

import { z } from "zod";
import { LOG_LEVELS } from "../utils/logger";

export const STORE_MODES = ["memory", "directory"] as const;
export type StoreMode = (typeof STORE_MODES)[number];

export const REFRESH_STRATEGIES = ["in-place", "swap"] as const;
export type RefreshStrategy = (typeof REFRESH_STRATEGIES)[number];

export const DEFAULTS_MODES = ["default", "override", "merge"] as const;
export type DefaultsMode = (typeof DEFAULTS_MODES)[number];

/** Minimum periodic refresh interval in seconds. */
export const MIN_REFRESH_INTERVAL = 30;

const lowerCased = (v: unknown) => (typeof v === "string" ? v.toLowerCase() : v);

export const ServerConfigSchema = z
  .object({
    log_level: z.preprocess(lowerCased, z.enum(LOG_LEVELS)).default("info"),
    refresh_interval: z.number().int().default(0),
    delay: z.number().min(0).default(60),
    store_mode: z.enum(STORE_MODES).default("directory"),
    store_directory: z.string().min(1).default("data"),
    export_directory: z.string().min(1).default("exports"),
    import_directory: z.string().min(1).default("import"),
    backup_directory: z.string().min(1).default("backup"),
    host: z.string().min(1).default("0.0.0.0"),
    port: z.number().int().min(1).max(65535).default(8000),
    refresh_strategy: z.enum(REFRESH_STRATEGIES).default("in-place"),
  })
  .passthrough();

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

export const ContextConfigSchema = z
  .object({
    vocab: z.string().min(1).optional(),
    api_url: z.string().min(1).optional(),
    base_url: z.string().min(1).optional(),
    /** Older spelling of `base_url`. */
    base: z.string().min(1).optional(),
    schema: z.string().url().optional(),
  })
  .passthrough();

export type ContextConfig = z.infer<typeof ContextConfigSchema>;

export const LibrariesFileSchema = z.object({
  context: ContextConfigSchema.nullish(),
  defaults: z.record(z.unknown()).nullish(),
  libraries: z.array(z.unknown()).nullish(),
});

/** Resolved shared context with every default applied. */
export interface ResolvedContext {
  vocab: string;
  apiUrl: string;
  baseUrl: string;
  schema?: string;
}

export interface AppConfig {
  server: ServerConfig;
  context: ResolvedContext;
  /** Library blocks with the defaults already applied. */
  libraries: unknown[];
  /** Files the configuration was read from. */
  sources: { config?: string; libraries?: string };
}
