/**
 * Loads `config.yaml` and `libraries.yaml`.
 *
 * Both files are optional: a missing file yields the defaults. Invalid server
 * values are reported and fall back to their defaults; library blocks are only
 * merged with the shared defaults here and validated later by `Library`.
 */

import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { DEFAULT_API_URL, DEFAULT_BASE_URL, DEFAULT_VOCAB } from "../constants/namespaces";
import {
  ContextConfigSchema,
  DEFAULTS_MODES,
  LibrariesFileSchema,
  MIN_REFRESH_INTERVAL,
  ServerConfigSchema,
  type AppConfig,
  type DefaultsMode,
  type ResolvedContext,
  type ServerConfig,
} from "../types/config";
import { ConfigError, getErrorMessage } from "./errors";
import { isPlainObject, type PlainObject } from "./guards";
import { getLogger, Subsystem } from "./logger";

const log = getLogger(Subsystem.Config);

export const DEFAULT_CONFIG_FILE = "config.yaml";
export const DEFAULT_LIBRARIES_FILE = "libraries.yaml";

/** Keys of a library block merged recursively under `mode: merge`. */
export const MERGE_KEYS: readonly string[] = ["map", "notes_parser", "api_query_params"];

/** Reads and parses a YAML file; undefined when the file does not exist. */
export async function readYamlFile(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    log.warn({ path, reason: getErrorMessage(err) }, "Configuration file not readable, using defaults");
    return undefined;
  }
  try {
    return parseYaml(text);
  } catch (err) {
    throw new ConfigError({ message: "Invalid YAML", source: path, cause: err });
  }
}

/** Validates the `server` block; offending keys are logged and reset to their defaults. */
export function parseServerConfig(raw: unknown): ServerConfig {
  const first = ServerConfigSchema.safeParse(raw ?? {});
  if (first.success) return first.data;

  const repaired: PlainObject = isPlainObject(raw) ? { ...raw } : {};
  for (const issue of first.error.issues) {
    const key = issue.path[0];
    log.warn({ key: key ?? "(server)", reason: issue.message }, "Invalid server setting, using default");
    if (typeof key === "string") delete repaired[key];
  }
  const second = ServerConfigSchema.safeParse(repaired);
  return second.success ? second.data : ServerConfigSchema.parse({});
}

export function describeRefreshInterval(interval: number): string {
  if (interval >= MIN_REFRESH_INTERVAL) return `Refresh every ${interval} seconds`;
  if (interval < 0) return "Refresh deactivated";
  if (interval === 0) return "Refresh only at startup";
  return `Refresh interval incorrect, periodic refresh disabled (minimum ${MIN_REFRESH_INTERVAL} seconds)`;
}

export function logRefreshInterval(interval: number): void {
  const message = describeRefreshInterval(interval);
  if (interval > 0 && interval < MIN_REFRESH_INTERVAL) log.warn({ interval }, message);
  else log.info({ interval }, message);
}

/**
 * Applies shared defaults to one library block.
 *
 * - `default`: keys missing from the library are filled in
 * - `override`: default values replace the library's
 * - `merge`: like `default`, but objects under `mergeKeys` are merged key by key
 */
export function applyDefaults(
  lib: PlainObject,
  defaults: PlainObject,
  mode: DefaultsMode = "default",
  mergeKeys: readonly string[] = MERGE_KEYS,
): PlainObject {
  const merged: PlainObject = { ...lib };
  for (const [key, value] of Object.entries(defaults)) {
    if (!(key in merged)) {
      merged[key] = value;
      continue;
    }
    const current = merged[key];
    if (mode === "override") {
      merged[key] = value;
    } else if (mode === "merge" && mergeKeys.includes(key) && isPlainObject(value) && isPlainObject(current)) {
      merged[key] = applyDefaults(current, value, "merge", Object.keys(value));
    }
  }
  return merged;
}

function isDefaultsMode(value: unknown): value is DefaultsMode {
  return typeof value === "string" && DEFAULTS_MODES.some((m) => m === value);
}

export function resolveContext(raw: unknown): ResolvedContext {
  const parsed = ContextConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    log.warn({ reason: parsed.error.message }, "Invalid context block, using defaults");
    return { vocab: DEFAULT_VOCAB, apiUrl: DEFAULT_API_URL, baseUrl: DEFAULT_BASE_URL };
  }
  const ctx = parsed.data;
  return {
    vocab: ctx.vocab ?? DEFAULT_VOCAB,
    apiUrl: ctx.api_url ?? DEFAULT_API_URL,
    baseUrl: ctx.base_url ?? ctx.base ?? DEFAULT_BASE_URL,
    schema: ctx.schema,
  };
}

/** Splits `libraries.yaml` into the resolved context and the library blocks with defaults applied. */
export function parseLibrariesFile(raw: unknown, source = DEFAULT_LIBRARIES_FILE): Pick<AppConfig, "context" | "libraries"> {
  const parsed = LibrariesFileSchema.safeParse(raw ?? {});
  if (!parsed.success) throw new ConfigError({ message: `Invalid libraries file: ${parsed.error.message}`, source });

  const block: PlainObject = parsed.data.defaults ?? {};
  const { mode: rawMode, ...defaults } = block;
  let mode: DefaultsMode = "default";
  if (isDefaultsMode(rawMode)) mode = rawMode;
  else if (rawMode !== undefined) log.warn({ mode: rawMode }, "Unknown defaults mode, using default");

  const libraries = (parsed.data.libraries ?? []).map((entry, i) => {
    if (!isPlainObject(entry)) {
      log.error({ index: i }, "Library entry is not a mapping, skipped");
      return undefined;
    }
    return applyDefaults(entry, defaults, mode);
  });

  return {
    context: resolveContext(parsed.data.context),
    libraries: libraries.filter((lib): lib is PlainObject => lib !== undefined),
  };
}

export interface ConfigPaths {
  config?: string;
  libraries?: string;
}

/** Paths from `CONFIG_FILE` / `LIBRARIES_CONFIG_FILE`, falling back to the working directory. */
export function configPathsFromEnv(env: NodeJS.ProcessEnv = process.env): Required<ConfigPaths> {
  return {
    config: env.CONFIG_FILE || DEFAULT_CONFIG_FILE,
    libraries: env.LIBRARIES_CONFIG_FILE || DEFAULT_LIBRARIES_FILE,
  };
}

export async function loadConfig(paths: ConfigPaths = configPathsFromEnv()): Promise<AppConfig> {
  const configRaw = paths.config ? await readYamlFile(paths.config) : undefined;
  const serverRaw = isPlainObject(configRaw) ? configRaw.server : undefined;
  const server = parseServerConfig(serverRaw);

  const librariesRaw = paths.libraries ? await readYamlFile(paths.libraries) : undefined;
  const { context, libraries } = parseLibrariesFile(librariesRaw, paths.libraries);

  log.info({ config: paths.config, libraries: libraries.length }, "Configuration loaded");
  logRefreshInterval(server.refresh_interval);
  return { server, context, libraries, sources: { ...paths } };
}
