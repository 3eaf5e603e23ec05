/**
 * canonicalId.ts
 *
 * Stable identifiers for the nodes the mapper mints.
 *
 * - Knowledge-base entities hash their label under a namespace derived from the
 *   knowledge-base graph IRI, so every refresh (and every library sharing that
 *   graph) lands on the same IRI for the same label.
 * - Items and collections reuse the source key; a random UUID stands in only
 *   when a record carries none.
 */

import { v4 as uuidv4, v5 as uuidv5 } from "uuid";

const namespaceCache = new Map<string, string>();

/** UUIDv5 of the graph IRI in the URL namespace, memoised per graph. */
export function entityNamespace(knowledgeBaseGraph: string): string {
  const cached = namespaceCache.get(knowledgeBaseGraph);
  if (cached) return cached;
  const ns = uuidv5(knowledgeBaseGraph, uuidv5.URL);
  namespaceCache.set(knowledgeBaseGraph, ns);
  return ns;
}

export function entityId(knowledgeBaseGraph: string, label: string): string {
  return uuidv5(label, entityNamespace(knowledgeBaseGraph));
}

/** `{kbGraph}/{type}/{uuid}` */
export function entityIri(knowledgeBaseGraph: string, type: string, label: string): string {
  return `${knowledgeBaseGraph}/${type}/${entityId(knowledgeBaseGraph, label)}`;
}

export function recordKey(key: unknown): string {
  if (typeof key === "string" && key.length > 0) return key;
  if (typeof key === "number") return String(key);
  return uuidv4();
}

export function itemIri(baseUrl: string, key: unknown): string {
  return `${baseUrl}/items/${recordKey(key)}`;
}

export function collectionIri(baseUrl: string, key: unknown): string {
  return `${baseUrl}/collections/${recordKey(key)}`;
}
