import { DataFactory } from "n3";
import type { NamedNode } from "@rdfjs/types";
import { PROV, RDF_TYPE, RDFS_LABEL, XSD } from "../constants/vocabularies";
import type { QuadStore } from "../stores/quadStore";
import type { AdditionalPropertySpec } from "../types/library";
import { getErrorMessage } from "../utils/errors";
import { isEmptyValue, isPlainObject, type PlainObject } from "../utils/guards";
import { getLogger, Subsystem } from "../utils/logger";
import { safeLiteral, safeNamedNode, vocabTerm } from "../utils/termUtils";

const { namedNode, quad } = DataFactory;

const log = getLogger(Subsystem.Mapping);

/** `_x` is the constant `x`; any other spec names a record field. */
function resolveSpec(spec: string, record: PlainObject): { value: string; constant: boolean } | undefined {
  if (spec.startsWith("_")) return { value: spec.replace(/^_+/, ""), constant: true };
  const raw = record[spec];
  if (raw === 0 || raw === false || isEmptyValue(raw)) return undefined;
  return { value: typeof raw === "string" ? raw : JSON.stringify(raw), constant: false };
}

/**
 * Asserts rdf:type for `node`. Each entry of `typeFields` is a constant
 * (`_book`) or a record field whose value may pack several comma-separated
 * types. Without type fields the node gets `defaultType`.
 */
export function applyRdfTypes(
  store: QuadStore,
  node: NamedNode,
  record: PlainObject,
  typeFields: readonly string[],
  defaultType: string,
  graph: NamedNode,
  vocab: string,
): number {
  const rdfType = namedNode(RDF_TYPE);
  if (typeFields.length === 0) {
    store.add(quad(node, rdfType, vocabTerm(vocab, defaultType), graph));
    return 1;
  }

  let added = 0;
  for (const field of typeFields) {
    const resolved = resolveSpec(field, record);
    if (!resolved) continue;
    try {
      for (const token of resolved.value.split(",").map((t) => t.trim())) {
        if (!token) continue;
        store.add(quad(node, rdfType, vocabTerm(vocab, token), graph));
        added++;
      }
    } catch (err) {
      log.error({ node: node.value, value: resolved.value, reason: getErrorMessage(err) }, "Invalid rdf:type");
    }
  }
  return added;
}

/**
 * Asserts the configured extra statements. Looked-up values get the spec's
 * `prefix`; constants are used as written.
 */
export function applyAdditionalProperties(
  store: QuadStore,
  node: NamedNode,
  record: PlainObject,
  specs: readonly AdditionalPropertySpec[],
  graph: NamedNode,
  vocab: string,
): number {
  let added = 0;
  for (const spec of specs) {
    const resolved = resolveSpec(spec.value, record);
    if (!resolved) continue;
    const value = resolved.constant ? resolved.value : `${spec.prefix ?? ""}${resolved.value}`;
    try {
      const object = spec.named_node ? safeNamedNode(value) : safeLiteral(value);
      store.add(quad(node, vocabTerm(vocab, spec.property), object, graph));
      added++;
    } catch (err) {
      log.error({ node: node.value, value, reason: getErrorMessage(err) }, "Invalid additional property");
    }
  }
  return added;
}

export function addTimestamp(store: QuadStore, node: NamedNode, graph: NamedNode, now: Date = new Date()): void {
  store.add(quad(node, namedNode(PROV.generatedAtTime), safeLiteral(now.toISOString(), { datatype: XSD.dateTime }), graph));
}

/** `"{first creator lastName}: {title} ({date})"` with placeholders for missing parts. */
export function itemLabel(data: PlainObject): string {
  const creators = data.creators;
  const first = Array.isArray(creators) ? creators[0] : undefined;
  const creator = isPlainObject(first) && "lastName" in first ? String(first.lastName) : "NO CREATOR";
  const title = typeof data.title === "string" && data.title ? data.title : "NO TITLE";
  const date = typeof data.date === "string" && data.date ? data.date : "NO DATE";
  return `${creator}: ${title} (${date})`;
}

export function addItemLabel(store: QuadStore, node: NamedNode, data: PlainObject, graph: NamedNode): string {
  const label = itemLabel(data);
  store.add(quad(node, namedNode(RDFS_LABEL), safeLiteral(label), graph));
  return label;
}
