/**
 * One configured library: derived IRIs, soft validation and the fetchers
 * that pull its records from the API or from disk.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { PAGE_LIMIT, trimIri } from "../constants/namespaces";
import { DEFAULT_FUZZY_THRESHOLD } from "../mapping/identifierService";
import { DEFAULT_LANGUAGE_MAP } from "../mapping/languageTags";
import {
  LIBRARY_TYPES,
  LOAD_MODES,
  LibraryConfigSchema,
  RDF_EXPORT_FORMATS,
  type LibraryConfig,
  type LibraryEnvironment,
  type MapConfig,
  type MappingRules,
  type NotesParserConfig,
} from "../types/library";
import { ApiRecordSchema, type ApiRecord } from "../types/records";
import { doFetch, sleep, withQuery, type FetchOptions } from "../utils/fetcher";
import { isPlainObject, type PlainObject } from "../utils/guards";
import { getLogger, Subsystem } from "../utils/logger";

const log = getLogger(Subsystem.Ingest);

export type TransportOptions = Pick<FetchOptions, "timeoutMs" | "retries" | "baseDelayMs">;

export interface LibraryOptions {
  transport?: TransportOptions;
  /** Pause between API pages. */
  pageDelayMs?: number;
}

export function resolveRules(map: MapConfig | null | undefined): MappingRules {
  return {
    white: map?.white ?? [],
    black: map?.black ?? [],
    rdfMapping: map?.rdf_mapping ?? [],
    languageMap: map?.language_map ?? DEFAULT_LANGUAGE_MAP,
    languageTags: map?.language_tags ?? false,
    fuzzy: map?.fuzzy ?? DEFAULT_FUZZY_THRESHOLD,
    itemType: map?.item_type ?? [],
    collectionType: map?.collection_type ?? [],
    namedLibrary: map?.named_library ?? undefined,
    additional: map?.additional ?? [],
  };
}

const DROPPED = Symbol("dropped");
const MAX_REPAIRS = 5;

/**
 * Removes the value at `path`. Inside a list the whole element goes, so one bad
 * entry of `map.additional` leaves its siblings in place.
 */
function dropAt(root: PlainObject, fullPath: (string | number)[]): void {
  let elementAt = -1;
  fullPath.forEach((segment, i) => {
    if (typeof segment === "number") elementAt = i;
  });
  const path = elementAt >= 0 ? fullPath.slice(0, elementAt + 1) : fullPath;
  let node: unknown = root;
  for (const segment of path.slice(0, -1)) {
    if (Array.isArray(node) && typeof segment === "number") node = node[segment];
    else if (isPlainObject(node) && typeof segment === "string") node = node[segment];
    else return;
  }
  const last = path[path.length - 1];
  if (Array.isArray(node) && typeof last === "number") node[last] = DROPPED;
  else if (isPlainObject(node) && typeof last === "string") delete node[last];
}

function compact(value: unknown): unknown {
  if (Array.isArray(value)) return value.filter((entry) => entry !== DROPPED).map(compact);
  if (isPlainObject(value)) return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, compact(v)]));
  return value;
}

/** Parses a library block; each invalid value is reported and dropped so its default applies. */
function parseConfig(raw: unknown): { config: LibraryConfig; issues: string[] } {
  const issues: string[] = [];
  let candidate: PlainObject = isPlainObject(raw) ? raw : {};
  for (let round = 0; round <= MAX_REPAIRS; round++) {
    const parsed = LibraryConfigSchema.safeParse(candidate);
    if (parsed.success) return { config: parsed.data, issues };

    const repaired = structuredClone(candidate);
    for (const issue of parsed.error.issues) {
      issues.push(`${issue.path.join(".") || "(root)"}: ${issue.message}`);
      if (issue.path.length > 0) dropAt(repaired, issue.path);
    }
    const next = compact(repaired);
    candidate = isPlainObject(next) ? next : {};
    if (typeof candidate.name !== "string" || !candidate.name) candidate.name = "unnamed";
  }
  const name = typeof candidate.name === "string" ? candidate.name : "unnamed";
  return { config: { name }, issues };
}

/** Keeps the entries that are API records; the others are logged and left out. */
function keepValidRecords(entries: unknown[], source: string): ApiRecord[] {
  const records: ApiRecord[] = [];
  entries.forEach((entry, index) => {
    const parsed = ApiRecordSchema.safeParse(entry);
    if (parsed.success) records.push(parsed.data);
    else log.warn({ source, index, reason: parsed.error.issues[0]?.message }, "Malformed record, skipped");
  });
  const skipped = entries.length - records.length;
  if (skipped > 0) log.warn({ source, skipped, kept: records.length }, "Skipped malformed records");
  return records;
}

function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return typeof value === "string" && values.some((v) => v === value);
}

export class Library {
  readonly name: string;
  readonly loadMode: string;
  readonly libraryType?: string;
  readonly libraryId?: string;
  readonly apiKey?: string;
  readonly rdfExportFormat: string;
  readonly apiQueryParams: Record<string, string | number | boolean>;
  readonly baseApiUrl: string;
  readonly baseUrl: string;
  readonly knowledgeBaseGraph: string;
  readonly loadFrom: string;
  readonly saveTo?: string;
  readonly headers: Record<string, string>;
  readonly rules: MappingRules;
  readonly notesParser: NotesParserConfig;
  readonly vocab: string;
  readonly description?: string;

  /** Every defect found while validating; empty for a clean config. */
  readonly issues: string[];

  private readonly transport: TransportOptions;
  private readonly pageDelayMs: number;

  constructor(raw: unknown, env: LibraryEnvironment, opts: LibraryOptions = {}) {
    const { config, issues } = parseConfig(raw);
    this.issues = [...issues];
    this.transport = opts.transport ?? {};
    this.pageDelayMs = opts.pageDelayMs ?? 1000;

    this.name = config.name;
    this.vocab = env.vocab;
    this.loadMode = config.load_mode ?? "json";
    this.libraryType = config.library_type ?? undefined;
    this.libraryId = config.library_id === null || config.library_id === undefined ? undefined : String(config.library_id);
    this.apiKey = config.api_key ?? undefined;
    this.rdfExportFormat = config.rdf_export_format ?? "rdf_zotero";
    this.apiQueryParams = config.api_query_params ?? {};
    this.description = config.description;

    const typeAndId = `${this.libraryType ?? ""}/${this.libraryId ?? ""}`;
    this.baseApiUrl = trimIri(`${env.apiUrl}${typeAndId}`);
    this.baseUrl = trimIri(config.base_uri ?? `${env.baseUrl}${typeAndId}`);
    this.knowledgeBaseGraph = trimIri(config.knowledge_base_graph ?? this.baseUrl);

    const idText = this.libraryId ?? "";
    this.loadFrom = (config.load_from ?? join(env.importDirectory, this.name)).replaceAll("$", idText);
    this.saveTo = config.save_to ? config.save_to.replaceAll("$", idText) : undefined;
    this.headers = this.apiKey ? { "Zotero-API-Key": this.apiKey } : {};
    this.rules = resolveRules(config.map);
    this.notesParser = config.notes_parser ?? {};

    this.validate();
  }

  get valid(): boolean {
    return this.issues.length === 0;
  }

  private validate(): void {
    const warn = (issue: string) => {
      this.issues.push(issue);
      log.warn({ library: this.name }, issue);
    };
    const fail = (issue: string) => {
      this.issues.push(issue);
      log.error({ library: this.name }, issue);
    };

    for (const issue of this.issues) log.warn({ library: this.name }, `Invalid optional argument ${issue}`);

    const iris = { base_url: this.baseUrl, base_api_url: this.baseApiUrl, knowledge_base_graph: this.knowledgeBaseGraph };
    for (const [key, value] of Object.entries(iris)) {
      if (!value.startsWith("http")) warn(`${key} is expected to be an IRI but is ${value}`);
    }
    if (this.libraryType !== "knowledge base" && !/^\d+$/.test(this.libraryId ?? "")) {
      fail(`Invalid library ID ${this.libraryId ?? "(none)"}`);
    }
    if (!isOneOf(LOAD_MODES, this.loadMode)) warn(`Invalid load_mode ${this.loadMode}`);
    if (!isOneOf(LIBRARY_TYPES, this.libraryType)) fail(`Invalid library_type ${this.libraryType ?? "(none)"}`);
    if (this.loadMode === "rdf" && !isOneOf(RDF_EXPORT_FORMATS, this.rdfExportFormat)) {
      warn(`rdf_export_format ${this.rdfExportFormat} has not been tested`);
    }

    if (this.valid) log.info({ library: this.name }, "Valid library config");
    else log.error({ library: this.name, issues: this.issues.length }, "Problematic library config, check warnings");
  }

  /** Fetches every page of `endpoint` until the API returns an empty page. */
  async fetchPaginated(endpoint: string): Promise<ApiRecord[]> {
    const results: ApiRecord[] = [];
    for (let start = 0; ; start += PAGE_LIMIT) {
      const url = withQuery(`${this.baseApiUrl}/${endpoint}`, {
        format: "json",
        limit: PAGE_LIMIT,
        start,
        ...this.apiQueryParams,
      });
      const res = await doFetch(url, { ...this.transport, headers: this.headers });
      const page: unknown = await res.json();
      if (!Array.isArray(page)) throw new Error(`Unexpected page shape from ${url}: expected a list`);
      if (page.length === 0) {
        log.info({ library: this.name, endpoint, start }, "No more data");
        return results;
      }
      results.push(...keepValidRecords(page, url));
      log.info({ library: this.name, endpoint, start, count: page.length }, "Fetched page");
      await sleep(this.pageDelayMs);
    }
  }

  fetchItems(jsonPath?: string): Promise<ApiRecord[] | undefined> {
    return this.fetchRecords("items", jsonPath);
  }

  fetchCollections(jsonPath?: string): Promise<ApiRecord[] | undefined> {
    return this.fetchRecords("collections", jsonPath);
  }

  private async fetchRecords(endpoint: "items" | "collections", jsonPath?: string): Promise<ApiRecord[] | undefined> {
    if (this.loadMode === "manual_import") {
      if (!jsonPath) throw new Error(`JSON path not given for ${endpoint}`);
      return readRecordFile(jsonPath);
    }
    if (this.loadMode === "json") return this.fetchPaginated(endpoint);
    return undefined;
  }

  /** The API's own RDF serialization of every item. */
  async fetchRdfExport(): Promise<Buffer> {
    const url = withQuery(`${this.baseApiUrl}/items`, {
      format: this.rdfExportFormat,
      limit: PAGE_LIMIT,
      ...this.apiQueryParams,
    });
    const res = await doFetch(url, { ...this.transport, headers: this.headers });
    return Buffer.from(await res.arrayBuffer());
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      description: this.description,
      load_mode: this.loadMode,
      library_type: this.libraryType,
      library_id: this.libraryId,
      api_key: this.apiKey ? "***" : undefined,
      base_api_url: this.baseApiUrl,
      base_url: this.baseUrl,
      knowledge_base_graph: this.knowledgeBaseGraph,
      load_from: this.loadFrom,
      save_to: this.saveTo,
      map: this.rules,
      notes_parser: this.notesParser,
      valid: this.valid,
    };
  }
}

/** Reads a JSON dump of API records; throws when the file is missing or not a list. Malformed entries are skipped. */
export async function readRecordFile(path: string): Promise<ApiRecord[]> {
  const text = await readFile(path, "utf8");
  const parsed: unknown = JSON.parse(text);
  if (!Array.isArray(parsed)) throw new Error(`Expected a list of records in ${path}`);
  return keepValidRecords(parsed, path);
}
