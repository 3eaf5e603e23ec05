/**
 * Refresh cycle: clear the store, import the schema, then ingest every
 * library in configuration order.
 *
 *   idle → clearing → schema → library (fetch, map, annotate, notes) → idle
 *
 * With the `in-place` strategy the active store is cleared and refilled, so
 * readers can see a partial graph; with `swap` a fresh store is filled and
 * then replaces the active one.
 */

import { createStore } from "zustand/vanilla";
import { importSchema, loadSchema, type SchemaDocument } from "../schema/schemaImporter";
import { getActiveStore, setActiveStore } from "../stores/activeStore";
import { QuadStore } from "../stores/quadStore";
import { MIN_REFRESH_INTERVAL, type AppConfig, type ServerConfig } from "../types/config";
import { getErrorMessage } from "../utils/errors";
import { getLogger, Subsystem } from "../utils/logger";
import { buildGraphForLibrary } from "./buildGraph";
import type { Library } from "./library";
import { noteParserFor, parseAllNotes, type NoteParser } from "./notes";
import { importRdfFromDisk, loadRdfExport } from "./rdfImport";

const log = getLogger(Subsystem.Ingest);

export type RefreshPhase = "idle" | "clearing" | "schema" | "library";

export interface RefreshStatus {
  phase: RefreshPhase;
  /** Library being ingested during the `library` phase. */
  library?: string;
  passes: number;
  lastCompletedAt?: Date;
  lastQuadCount?: number;
}

export interface RefreshResult {
  quads: number;
  graphs: string[];
  libraries: number;
}

export interface OrchestratorDeps {
  getConfig: () => AppConfig;
  getLibraries: () => Library[];
  fetchSchema?: (url: string) => Promise<SchemaDocument>;
  parserFor?: (lib: Library) => NoteParser | undefined;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export function sleepUntilAborted(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/** The store `server` asks for: empty in memory, or the persisted directory store. */
export async function openConfiguredStore(server: ServerConfig): Promise<QuadStore> {
  if (server.store_mode === "memory") return new QuadStore();
  return QuadStore.open(server.store_directory);
}

export class RefreshOrchestrator {
  readonly status = createStore<RefreshStatus>()(() => ({ phase: "idle", passes: 0 }));

  private readonly deps: Required<OrchestratorDeps>;
  private inFlight?: Promise<RefreshResult | undefined>;

  constructor(deps: OrchestratorDeps) {
    this.deps = {
      fetchSchema: (url) => loadSchema(url),
      parserFor: (lib) => noteParserFor(lib),
      sleep: sleepUntilAborted,
      ...deps,
    };
  }

  get running(): boolean {
    return this.inFlight !== undefined;
  }

  /**
   * Runs one pass. With refresh deactivated (negative interval) the persisted
   * store is kept as is unless `force`. A call made during a pass joins it.
   */
  refreshOnce(force = false): Promise<RefreshResult | undefined> {
    const { server } = this.deps.getConfig();
    if (server.refresh_interval < 0 && !force) {
      const store = getActiveStore();
      log.info({ quads: store.size, graphs: store.graphs() }, "Refresh deactivated, serving persisted store");
      return Promise.resolve(undefined);
    }
    if (!this.inFlight) {
      this.inFlight = this.pass().finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  /**
   * Startup refresh followed, for intervals of at least 30 seconds, by one
   * pass per interval until `signal` aborts.
   */
  async run(signal?: AbortSignal): Promise<void> {
    const interval = this.deps.getConfig().server.refresh_interval;
    if (interval < 0) {
      await this.refreshOnce();
      return;
    }
    while (!signal?.aborted) {
      await this.refreshOnce();
      if (interval < MIN_REFRESH_INTERVAL) {
        log.info({ interval }, "No periodic refresh, exiting after initial load");
        return;
      }
      log.info({ interval }, "Next refresh scheduled");
      await this.deps.sleep(interval * 1000, signal);
    }
    log.info("Refresh loop stopped");
  }

  private setPhase(phase: RefreshPhase, library?: string): void {
    this.status.setState({ phase, library });
  }

  private async pass(): Promise<RefreshResult | undefined> {
    const { server, context } = this.deps.getConfig();
    const libraries = this.deps.getLibraries();
    log.info({ strategy: server.refresh_strategy, libraries: libraries.length }, "Refreshing data");

    try {
      this.setPhase("clearing");
      const store = await this.prepareTarget(server);

      if (context.schema) {
        this.setPhase("schema");
        try {
          importSchema(store, await this.deps.fetchSchema(context.schema), context.vocab);
          log.info({ schema: context.schema, vocab: context.vocab }, "Schema loaded");
        } catch (err) {
          log.error({ schema: context.schema, reason: getErrorMessage(err) }, "Schema could not be loaded");
        }
      }

      for (const lib of libraries) {
        this.setPhase("library", lib.name);
        await this.ingestLibrary(lib, store);
      }

      if (server.refresh_strategy === "swap") setActiveStore(store);
      if (store.directory) {
        try {
          await store.persist();
        } catch (err) {
          log.error({ dir: store.directory, reason: getErrorMessage(err) }, "Could not persist store");
        }
      }

      const result: RefreshResult = { quads: store.size, graphs: store.graphs(), libraries: libraries.length };
      this.status.setState((s) => ({ passes: s.passes + 1, lastCompletedAt: new Date(), lastQuadCount: result.quads }));
      log.info(result, "Data refreshed");
      return result;
    } catch (err) {
      log.error({ reason: getErrorMessage(err) }, "Error refreshing data");
      return undefined;
    } finally {
      this.setPhase("idle");
    }
  }

  private async prepareTarget(server: ServerConfig): Promise<QuadStore> {
    if (server.refresh_strategy === "swap") {
      return new QuadStore(server.store_mode === "directory" ? server.store_directory : undefined);
    }
    const store = getActiveStore();
    store.clear();
    await store.wipeDirectory();
    return store;
  }

  private async ingestLibrary(lib: Library, store: QuadStore): Promise<void> {
    const mode = lib.loadMode;
    try {
      switch (mode) {
        case "json":
          await buildGraphForLibrary(lib, store);
          break;
        case "rdf":
          await loadRdfExport(lib, store);
          break;
        case "manual_import":
          await importRdfFromDisk(lib, store);
          break;
        default:
          log.warn({ library: lib.name, mode }, "Unknown load_mode, skipping library");
          return;
      }
    } catch (err) {
      log.error({ library: lib.name, mode, reason: getErrorMessage(err) }, "Error loading library");
    }

    if (!lib.notesParser.auto) {
      log.debug({ library: lib.name }, "No notes parsing");
      return;
    }
    const parser = this.deps.parserFor(lib);
    if (!parser) {
      log.warn({ library: lib.name }, "notes_parser.auto is set but no endpoint is configured");
      return;
    }
    try {
      await parseAllNotes(lib, store, parser);
    } catch (err) {
      log.error({ library: lib.name, reason: getErrorMessage(err) }, "Error parsing notes");
    }
  }
}
