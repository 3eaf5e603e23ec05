import { OWL, RDF, RDFS, SKOS, XSD } from "./vocabularies";

export const DEFAULT_VOCAB = "http://www.zotero.org/namespaces/export#";
export const DEFAULT_API_URL = "https://api.zotero.org/";
export const DEFAULT_BASE_URL = "https://www.zotero.org/";

/** Placeholder namespace for values that are not IRIs but must become named nodes. */
export const INTERNAL_IRI_PREFIX = "http://internal.invalid/";

export const PAGE_LIMIT = 100;

export function exportPrefixes(vocab: string): Record<string, string> {
  return {
    zot: vocab,
    rdfs: RDFS.namespace,
    owl: OWL.namespace,
    rdf: RDF.namespace,
    xsd: XSD.namespace,
    skos: SKOS.namespace,
  };
}

/** Removes leading and trailing `#` and `/` characters. */
export function trimIri(value: string): string {
  return value.replace(/^[#/]+|[#/]+$/g, "");
}
