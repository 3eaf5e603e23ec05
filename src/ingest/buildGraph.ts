import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { DataFactory } from "n3";
import type { NamedNode } from "@rdfjs/types";
import { RDF_TYPE } from "../constants/vocabularies";
import { collectionIri, itemIri } from "../lib/canonicalId";
import { addItemLabel, addTimestamp, applyAdditionalProperties, applyRdfTypes } from "../mapping/annotator";
import { IdentifierService } from "../mapping/identifierService";
import { mapRecord, type MappingOptions } from "../mapping/recordMapper";
import type { QuadStore } from "../stores/quadStore";
import { classifyRecords, type ApiRecord } from "../types/records";
import { getErrorMessage } from "../utils/errors";
import { readPath } from "../utils/guards";
import { getLogger, Subsystem } from "../utils/logger";
import { safeNamedNode, vocabTerm } from "../utils/termUtils";
import { readRecordFile, type Library } from "./library";

const { namedNode, quad } = DataFactory;

const log = getLogger(Subsystem.Ingest);

export interface BuildSummary {
  items: number;
  collections: number;
  /** Records skipped after a failure. */
  failed: number;
  /** Per-field mapping errors across all records. */
  fieldErrors: number;
}

/** `library.links.alternate.href` of an API record, when present. */
export function libraryHref(record: ApiRecord): string | undefined {
  const href = readPath(record, ["library", "links", "alternate", "href"]);
  return typeof href === "string" && href ? href : undefined;
}

async function saveDump(lib: Library, items: ApiRecord[], collections: ApiRecord[]): Promise<void> {
  if (!lib.saveTo) return;
  try {
    await mkdir(lib.saveTo, { recursive: true });
    const id = lib.libraryId ?? lib.name;
    if (items.length) await writeFile(join(lib.saveTo, `${id}_items.json`), JSON.stringify(items, null, 2), "utf8");
    if (collections.length) {
      await writeFile(join(lib.saveTo, `${id}_collections.json`), JSON.stringify(collections, null, 2), "utf8");
    }
    log.info({ library: lib.name, path: lib.saveTo }, "Stored JSON dump");
  } catch (err) {
    log.error({ library: lib.name, path: lib.saveTo, reason: getErrorMessage(err) }, "Could not save JSON dump");
  }
}

/**
 * Maps a library's items and collections into its graph. With `jsonPath`
 * only that file is read, as items or collections depending on its content.
 */
export async function buildGraphForLibrary(
  lib: Library,
  store: QuadStore,
  opts: { jsonPath?: string } = {},
): Promise<BuildSummary | undefined> {
  let itemsPath: string | undefined;
  let collectionsPath: string | undefined;

  if (opts.jsonPath) {
    try {
      const kind = classifyRecords(await readRecordFile(opts.jsonPath));
      if (!kind) throw new Error("Could not classify JSON as items or collections");
      if (kind === "items") itemsPath = opts.jsonPath;
      else collectionsPath = opts.jsonPath;
    } catch (err) {
      log.error({ library: lib.name, file: opts.jsonPath, reason: getErrorMessage(err) }, "Error reading or classifying JSON file");
      return undefined;
    }
  }

  let items: ApiRecord[] = [];
  let collections: ApiRecord[] = [];
  if (!collectionsPath) {
    try {
      items = (await lib.fetchItems(itemsPath)) ?? [];
    } catch (err) {
      log.warn({ library: lib.name, reason: getErrorMessage(err) }, "Could not fetch items");
    }
  }
  if (!itemsPath) {
    try {
      collections = (await lib.fetchCollections(collectionsPath)) ?? [];
    } catch (err) {
      log.warn({ library: lib.name, reason: getErrorMessage(err) }, "Could not fetch collections");
    }
  }

  await saveDump(lib, items, collections);

  const sample: ApiRecord | undefined = items[0] ?? collections[0];
  const href = (sample && libraryHref(sample)) ?? lib.baseUrl;
  if (!sample) log.warn({ library: lib.name }, "No items or collections found");
  log.info({ library: lib.name, href, items: items.length, collections: collections.length }, "Fetched records");

  const graph = safeNamedNode(lib.baseUrl);
  const { rules, vocab } = lib;
  const identifiers = new IdentifierService({
    store,
    vocab,
    knowledgeBaseGraph: lib.knowledgeBaseGraph,
    threshold: rules.fuzzy,
  });
  const mapping: MappingOptions = {
    vocab,
    baseUrl: lib.baseUrl,
    knowledgeBaseGraph: lib.knowledgeBaseGraph,
    rules,
    identifiers,
  };

  const libraryNode = safeNamedNode(href);
  const linkToLibrary = (node: NamedNode) => {
    if (rules.namedLibrary) store.add(quad(node, vocabTerm(vocab, rules.namedLibrary), libraryNode, graph));
  };

  if (rules.namedLibrary && sample?.library) {
    store.add(quad(libraryNode, namedNode(RDF_TYPE), vocabTerm(vocab, "library"), graph));
    mapRecord(store, libraryNode, sample.library, mapping);
    applyAdditionalProperties(store, libraryNode, sample.library, rules.additional, graph, vocab);
  }

  const summary: BuildSummary = { items: 0, collections: 0, failed: 0, fieldErrors: 0 };

  for (const col of collections) {
    const node = safeNamedNode(collectionIri(lib.baseUrl, col.data.key));
    try {
      linkToLibrary(node);
      applyRdfTypes(store, node, col.data, rules.collectionType, "collection", graph, vocab);
      applyAdditionalProperties(store, node, col.data, rules.additional, graph, vocab);
      summary.fieldErrors += mapRecord(store, node, col.data, mapping).errors.length;
      addTimestamp(store, node, graph);
      summary.collections++;
    } catch (err) {
      summary.failed++;
      log.error({ library: lib.name, node: node.value, reason: getErrorMessage(err) }, "Invalid collection, skipped");
    }
  }
  if (collections.length) log.info({ library: lib.name, count: summary.collections }, "Loaded collections");
  else if (!itemsPath) log.warn({ library: lib.name }, "No collections");

  for (const item of items) {
    const node = safeNamedNode(itemIri(lib.baseUrl, item.data.key));
    try {
      const data = item.data;
      const language = typeof data.language === "string" ? data.language : undefined;
      linkToLibrary(node);
      addItemLabel(store, node, data, graph);
      applyRdfTypes(store, node, data, rules.itemType, "item", graph, vocab);
      applyAdditionalProperties(store, node, data, rules.additional, graph, vocab);
      summary.fieldErrors += mapRecord(store, node, data, { ...mapping, language }).errors.length;
      addTimestamp(store, node, graph);
      summary.items++;
    } catch (err) {
      summary.failed++;
      log.error({ library: lib.name, node: node.value, reason: getErrorMessage(err) }, "Invalid item, skipped");
    }
  }
  if (items.length) log.info({ library: lib.name, count: summary.items }, "Loaded items");
  else if (!collectionsPath) log.warn({ library: lib.name }, "No items");

  return summary;
}
