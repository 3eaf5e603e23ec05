import { appendFile, mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { join, resolve, sep } from "node:path";
import { Hono } from "hono";
import type { NamedNode } from "@rdfjs/types";
import { exportPrefixes } from "../constants/namespaces";
import type { Library } from "../ingest/library";
import { parseAllNotes, type NoteParser } from "../ingest/notes";
import type { RefreshOrchestrator } from "../ingest/orchestrator";
import { getActiveStore } from "../stores/activeStore";
import type { QuadStore } from "../stores/quadStore";
import type { AppConfig } from "../types/config";
import { getErrorMessage } from "../utils/errors";
import { getLogger, getLogLevel, isLogLevel, setLogLevel, Subsystem } from "../utils/logger";
import { EXPORT_FORMATS, isExportFormat } from "../utils/rdfSerialization";
import { iriToFilename, safeNamedNode } from "../utils/termUtils";
import { deleteCsvSubjects, graphToCsv, loadCsvRows, parseCsvRows, stripBrackets } from "./csv";

const log = getLogger(Subsystem.Server);

export interface AppDeps {
  getConfig: () => AppConfig;
  getLibraries: () => Library[];
  orchestrator: RefreshOrchestrator;
  parserFor: (lib: Library) => NoteParser | undefined;
  getStore?: () => QuadStore;
}

function storeSummary(store: QuadStore) {
  return { named_graphs: store.graphs(), len: store.size };
}

const isTrue = (value: string | undefined, fallback: boolean): boolean =>
  value === undefined ? fallback : ["1", "true", "yes"].includes(value.toLowerCase());

/** Normalizes a `graph` query value (`<iri>` or `iri`); undefined when absent. */
function requestedGraph(value: string | undefined): string | undefined {
  if (!value) return undefined;
  const iri = stripBrackets(value);
  return iri || undefined;
}

export function createApp(deps: AppDeps): Hono {
  const store = deps.getStore ?? getActiveStore;
  const app = new Hono();

  const unknownGraph = (graph: string | undefined): string | undefined => {
    if (!graph) return undefined;
    const graphs = store().graphs();
    return graphs.includes(graph) ? undefined : `Invalid graph IRI. Use one of these or none: ${graphs.join(", ")}`;
  };

  app.onError((err, c) => {
    log.error({ path: c.req.path, reason: getErrorMessage(err) }, "Request failed");
    return c.json({ error: getErrorMessage(err) }, 500);
  });

  app.get("/libs", (c) => c.json({ success: deps.getLibraries().map((lib) => lib.toJSON()) }));

  app.get("/graphs", (c) => c.json({ status: "success", store: storeSummary(store()) }));

  app.get("/export", async (c) => {
    const format = c.req.query("format") ?? "trig";
    const graph = requestedGraph(c.req.query("graph"));
    const graphError = unknownGraph(graph);
    if (graphError) return c.json({ error: graphError }, 400);
    if (!isExportFormat(format)) {
      return c.json({ error: `Unsupported export format. Use one of: ${Object.keys(EXPORT_FORMATS).join(", ")}` }, 400);
    }

    const { server, context } = deps.getConfig();
    await mkdir(server.export_directory, { recursive: true });
    const path = join(server.export_directory, `${graph ? iriToFilename(graph) : "store"}.${EXPORT_FORMATS[format].extension}`);
    const text = await store().serialize(format, { graph, prefixes: exportPrefixes(context.vocab) });
    await writeFile(path, text, "utf8");
    log.info({ path, format, graph }, "Export written");
    return c.json({ success: `Export to: ${path}` });
  });

  app.get("/backup", async (c) => {
    const { server } = deps.getConfig();
    const root = resolve(server.backup_directory);
    const target = join(root, "Store");
    const storeDir = resolve(server.store_directory);
    if (server.store_mode === "directory" && (target === storeDir || storeDir.startsWith(`${target}${sep}`))) {
      return c.json({ error: "Cannot back up into the current store's own directory" }, 400);
    }

    await mkdir(root, { recursive: true });
    const logFile = join(root, "backup.log");
    await rm(target, { recursive: true, force: true });
    const current = store();
    const file = await current.persist(target);
    await appendFile(logFile, `[${new Date().toISOString()}] Created new backup in ${target}\n`, "utf8");
    log.info({ path: target, quads: current.size }, "Backup created");
    return c.json({
      status: "success",
      "backup store": { path: target, file, named_graphs: current.graphs(), len: current.size },
    });
  });

  app.get("/reload", async (c) => {
    const requested = c.req.query("log_level")?.toLowerCase();
    if (requested !== undefined && !isLogLevel(requested)) {
      return c.json({ error: `Invalid log level: ${requested}` }, 400);
    }
    const previous = getLogLevel();
    if (requested) setLogLevel(requested, { force: true });
    try {
      await deps.orchestrator.refreshOnce(true);
    } finally {
      if (requested) setLogLevel(previous, { force: true });
    }
    return c.json({ status: "success", store: storeSummary(store()) });
  });

  app.get("/parse_notes", async (c) => {
    const graph = requestedGraph(c.req.query("graph"));
    const graphError = unknownGraph(graph);
    if (graphError) return c.json({ error: graphError }, 400);
    const push = isTrue(c.req.query("push"), true);
    const notePredicate = c.req.query("note_predicate") || undefined;

    let parsed = 0;
    for (const lib of deps.getLibraries()) {
      if (graph && graph !== lib.baseUrl) continue;
      const parser = deps.parserFor(lib);
      if (!parser) {
        log.warn({ library: lib.name }, "No notes parser endpoint configured, skipped");
        continue;
      }
      parsed += await parseAllNotes(lib, store(), parser, { notePredicate, push });
    }
    return c.json({ success: `${parsed} notes parsed` });
  });

  app.get("/csv", async (c) => {
    const graph = requestedGraph(c.req.query("graph"));
    const graphError = unknownGraph(graph);
    if (graphError) return c.json({ error: graphError }, 400);
    const graphNode: NamedNode | undefined = graph ? safeNamedNode(graph) : undefined;

    const { server } = deps.getConfig();
    await mkdir(server.export_directory, { recursive: true });
    const output = join(server.export_directory, "export.csv");
    await writeFile(output, graphToCsv(store(), graphNode), "utf8");

    const source = c.req.query("load_csv");
    let loaded = 0;
    if (source && resolve(source) !== resolve(output)) {
      let text: string;
      try {
        text = await readFile(source, "utf8");
      } catch (err) {
        return c.json({ error: `CSV file not readable: ${getErrorMessage(err)}` }, 400);
      }
      const rows = parseCsvRows(text);
      if (isTrue(c.req.query("delete"), false)) {
        const removed = deleteCsvSubjects(store(), rows, graphNode);
        log.info({ file: source, removed }, "Removed subjects listed in CSV");
      }
      loaded = loadCsvRows(store(), rows, graphNode);
      log.info({ file: source, quads: loaded }, "Loaded CSV");
    }
    return c.json({ status: "success", export: output, loaded, store: storeSummary(store()) });
  });

  return app;
}
