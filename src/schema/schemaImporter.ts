/**
 * Turns the library API's item-type schema into an OWL vocabulary in the
 * graph named after the vocabulary IRI.
 *
 * - root classes, one class per item type (⊑ item) and per creator type (⊑ creatorRole)
 * - one datatype property per field, its domain the union of the item types using it
 * - a `creators` object property per item type that declares creator types
 * - rdfs:label per locale
 */

import { DataFactory } from "n3";
import { z } from "zod";
import type { BlankNode, Literal, NamedNode } from "@rdfjs/types";
import { trimIri } from "../constants/namespaces";
import { OWL, RDF, RDFS } from "../constants/vocabularies";
import type { QuadStore } from "../stores/quadStore";
import { fetchJson, type FetchOptions } from "../utils/fetcher";
import { getLogger, Subsystem } from "../utils/logger";
import { safeLiteral, safeNamedNode } from "../utils/termUtils";

const { blankNode, namedNode, quad } = DataFactory;

const log = getLogger(Subsystem.Schema);

export const ROOT_CLASSES: readonly string[] = ["item", "library", "collection", "tag", "creatorRole"];

const LocaleSchema = z
  .object({
    itemTypes: z.record(z.string()).default({}),
    creatorTypes: z.record(z.string()).default({}),
    fields: z.record(z.string()).default({}),
  })
  .passthrough();

const ItemTypeSchema = z
  .object({
    itemType: z.string(),
    fields: z.array(z.object({ field: z.string(), baseField: z.string().optional() }).passthrough()).default([]),
    creatorTypes: z.array(z.object({ creatorType: z.string() }).passthrough()).default([]),
  })
  .passthrough();

export const SchemaDocumentSchema = z
  .object({
    itemTypes: z.array(ItemTypeSchema).default([]),
    locales: z.record(LocaleSchema).default({}),
  })
  .passthrough();

export type SchemaDocument = z.infer<typeof SchemaDocumentSchema>;

const PREFIXED: Readonly<Record<string, string>> = {
  "owl:": OWL.namespace,
  "rdfs:": RDFS.namespace,
  "rdf:": RDF.namespace,
};

function pushTo<K, V>(map: Map<K, V[]>, key: K, value: V): void {
  const list = map.get(key);
  if (list) list.push(value);
  else map.set(key, [value]);
}

export function importSchema(store: QuadStore, schema: SchemaDocument, vocabIri: string): number {
  const graph = safeNamedNode(trimIri(vocabIri));
  const before = store.size;

  const uri = (term: string): NamedNode => {
    for (const [prefix, ns] of Object.entries(PREFIXED)) {
      if (term.startsWith(prefix)) return safeNamedNode(ns + term.slice(prefix.length));
    }
    return safeNamedNode(vocabIri + term);
  };
  const add = (s: NamedNode | BlankNode, p: string, o: NamedNode | BlankNode | Literal) => store.add(quad(s, namedNode(p), o, graph));

  const rdfList = (elements: string[]): NamedNode | BlankNode => {
    if (elements.length === 0) return namedNode(RDF.nil);
    const head = blankNode();
    let current: BlankNode = head;
    elements.forEach((element, i) => {
      add(current, RDF.first, uri(element));
      if (i < elements.length - 1) {
        const next = blankNode();
        add(current, RDF.rest, next);
        current = next;
      } else {
        add(current, RDF.rest, namedNode(RDF.nil));
      }
    });
    return head;
  };

  const addUnion = (subject: NamedNode, predicate: string, types: string[]) => {
    if (types.length === 1) {
      add(subject, predicate, uri(types[0]));
      return;
    }
    const union = blankNode();
    add(subject, predicate, union);
    add(union, RDF.type, namedNode(OWL.Class));
    add(union, OWL.unionOf, rdfList(types));
  };

  const classLabels = new Map<string, Literal[]>();
  const propertyLabels = new Map<string, Literal[]>();
  for (const [lang, locale] of Object.entries(schema.locales)) {
    for (const [t, label] of Object.entries(locale.itemTypes)) pushTo(classLabels, t, safeLiteral(label, { language: lang }));
    for (const [t, label] of Object.entries(locale.creatorTypes)) pushTo(classLabels, t, safeLiteral(label, { language: lang }));
    for (const [f, label] of Object.entries(locale.fields)) pushTo(propertyLabels, f, safeLiteral(label, { language: lang }));
  }

  for (const root of ROOT_CLASSES) {
    add(uri(root), RDF.type, namedNode(OWL.Class));
    add(uri(root), RDFS.label, safeLiteral(root));
  }

  const fieldDomains = new Map<string, Set<string>>();
  const baseFields = new Map<string, string>();

  for (const itemType of schema.itemTypes) {
    const cls = uri(itemType.itemType);
    add(cls, RDF.type, namedNode(OWL.Class));
    add(cls, RDFS.subClassOf, uri("item"));
    for (const label of classLabels.get(itemType.itemType) ?? []) add(cls, RDFS.label, label);

    for (const field of itemType.fields) {
      const domains = fieldDomains.get(field.field) ?? new Set<string>();
      domains.add(itemType.itemType);
      fieldDomains.set(field.field, domains);
      if (field.baseField) baseFields.set(field.field, field.baseField);
    }
  }

  for (const [field, domains] of fieldDomains) {
    const prop = uri(field);
    add(prop, RDF.type, namedNode(OWL.DatatypeProperty));
    addUnion(prop, RDFS.domain, [...domains]);
    add(prop, RDFS.range, namedNode(RDFS.Literal));
    for (const label of propertyLabels.get(field) ?? []) add(prop, RDFS.label, label);
    const baseField = baseFields.get(field);
    if (baseField) add(prop, OWL.equivalentProperty, uri(baseField));
  }

  for (const itemType of schema.itemTypes) {
    const creatorTypes = itemType.creatorTypes.map((c) => c.creatorType);
    if (creatorTypes.length === 0) continue;
    for (const ct of creatorTypes) {
      const cls = uri(ct);
      add(cls, RDF.type, namedNode(OWL.Class));
      add(cls, RDFS.subClassOf, uri("creatorRole"));
      for (const label of classLabels.get(ct) ?? []) add(cls, RDFS.label, label);
    }
    const prop = uri("creators");
    add(prop, RDF.type, namedNode(OWL.ObjectProperty));
    add(prop, RDFS.label, safeLiteral("Creators"));
    addUnion(prop, RDFS.range, creatorTypes);
    addUnion(prop, RDFS.domain, [itemType.itemType]);
  }

  const added = store.size - before;
  log.info({ vocab: vocabIri, itemTypes: schema.itemTypes.length, quads: added }, "Schema imported");
  return added;
}

/** Fetches and validates a schema document. */
export async function loadSchema(url: string, transport: Omit<FetchOptions, "method" | "body"> = {}): Promise<SchemaDocument> {
  const parsed = SchemaDocumentSchema.safeParse(await fetchJson(url, transport));
  if (!parsed.success) throw new Error(`Invalid schema document at ${url}: ${parsed.error.message}`);
  return parsed.data;
}
