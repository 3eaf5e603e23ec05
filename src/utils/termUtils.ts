import { DataFactory } from "n3";
import type { Literal, NamedNode } from "@rdfjs/types";
import { INTERNAL_IRI_PREFIX } from "../constants/namespaces";
import { getLogger, Subsystem } from "./logger";

const { namedNode, literal } = DataFactory;

const log = getLogger(Subsystem.Mapping);

/**
 * Term construction helpers shared by the mapper, the annotator and the CSV
 * loader. Every IRI that originates in record data goes through
 * `safeNamedNode` so the serializers never see spaces or raw non-ASCII text.
 */

const UNRESERVED = /[A-Za-z0-9_.~-]/;
const IRI_SAFE = ":/#?&=%";
const SCHEME = /^[A-Za-z][A-Za-z0-9+.-]*:/;

const encoder = new TextEncoder();

/** Percent-encodes every character outside the unreserved set and `safe`. */
export function percentEncode(value: string, safe = ""): string {
  let out = "";
  for (const ch of value) {
    if (UNRESERVED.test(ch) || safe.includes(ch)) {
      out += ch;
      continue;
    }
    for (const byte of encoder.encode(ch)) {
      out += `%${byte.toString(16).toUpperCase().padStart(2, "0")}`;
    }
  }
  return out;
}

export function hasScheme(value: string): boolean {
  return SCHEME.test(value);
}

/**
 * Builds a named node from arbitrary text. Values without a scheme are moved
 * under the internal placeholder namespace, fully encoded.
 */
export function safeNamedNode(value: string): NamedNode {
  if (!hasScheme(value)) {
    const fallback = `${INTERNAL_IRI_PREFIX}${percentEncode(value)}`;
    log.warn({ value, iri: fallback }, "Value has no IRI scheme, using internal IRI");
    return namedNode(fallback);
  }
  return namedNode(percentEncode(value, IRI_SAFE));
}

export function safeLiteral(value: string | number | boolean, opts: { datatype?: string; language?: string } = {}): Literal {
  const text = String(value);
  if (opts.language) return literal(text, opts.language);
  if (opts.datatype) return literal(text, namedNode(opts.datatype));
  return literal(text);
}

/** Qualifies `term` with `vocab` unless it is already an http(s) IRI. */
export function vocabTerm(vocab: string, term: string): NamedNode {
  return term.startsWith("http") ? safeNamedNode(term) : safeNamedNode(`${vocab}${term}`);
}

/** Turns a graph IRI into a file-system friendly base name: `https://ex.org/a/b` → `ex.org_a_b`. */
export function iriToFilename(iri: string): string {
  let host = "";
  let path = iri;
  try {
    const url = new URL(iri);
    host = url.host;
    path = url.pathname;
  } catch (err) {
    log.debug({ iri, err }, "Graph name is not a URL, using it verbatim");
  }
  const parts = [host, ...path.replace(/^\/+|\/+$/g, "").split("/")];
  return parts.join("_").replace(/[^\w.-]/g, "_");
}
