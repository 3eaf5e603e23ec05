/**
 * Entity identity for the knowledge-base graph.
 *
 * A label either resolves to an existing entity of the same type, found by
 * fuzzy comparison against every label that entity carries, or mints a new
 * entity whose IRI is a UUIDv5 of the label. Every label that reaches an
 * entity is kept as a skos:altLabel so later spellings can match it.
 */

import { DataFactory } from "n3";
import { ratio } from "fuzzball";
import type { NamedNode, Term } from "@rdfjs/types";
import { RDF_TYPE, RDFS_LABEL, SKOS_ALT_LABEL } from "../constants/vocabularies";
import { entityIri } from "../lib/canonicalId";
import type { QuadStore } from "../stores/quadStore";
import { invariant } from "../utils/guards";
import { getErrorMessage } from "../utils/errors";
import { getLogger, Subsystem } from "../utils/logger";
import { safeLiteral, safeNamedNode, vocabTerm } from "../utils/termUtils";

const { namedNode, quad } = DataFactory;

const log = getLogger(Subsystem.Identity);

export const DEFAULT_FUZZY_THRESHOLD = 90;
export const DEFAULT_LABEL_PREDICATES: readonly string[] = [SKOS_ALT_LABEL, RDFS_LABEL];

export interface FuzzyMatch {
  node: Term;
  score: number;
  matchedLabel: string;
}

export interface FuzzyMatchOptions {
  threshold?: number;
  graph?: NamedNode;
  predicates?: readonly string[];
}

/** Similarity of two labels in 0..100, case-insensitive, no other normalization. */
export function labelScore(a: string, b: string): number {
  return ratio(a.toLowerCase(), b.toLowerCase(), { full_process: false });
}

/**
 * Finds the entity of type `typeIri` whose labels best match `label`.
 * The first candidate with the strictly highest score wins; the result is
 * null unless that score reaches `threshold` (inclusive).
 */
export function fuzzyMatchLabel(
  store: QuadStore,
  label: string,
  typeIri: string,
  opts: FuzzyMatchOptions = {},
): FuzzyMatch | null {
  const threshold = opts.threshold ?? DEFAULT_FUZZY_THRESHOLD;
  const predicates = opts.predicates ?? DEFAULT_LABEL_PREDICATES;
  const graph = opts.graph ?? null;

  let best: FuzzyMatch | null = null;
  for (const typed of store.match(null, namedNode(RDF_TYPE), namedNode(typeIri), graph)) {
    for (const predicate of predicates) {
      for (const labelled of store.match(typed.subject, namedNode(predicate), null, graph)) {
        const existing = labelled.object.value;
        let score = 0;
        try {
          score = labelScore(existing, label);
        } catch (err) {
          log.error({ label, existing, reason: getErrorMessage(err) }, "Scoring failed, counting pair as 0");
        }
        log.debug({ label, existing, score }, "Compared labels");
        if (!best || score > best.score) {
          best = { node: typed.subject, score, matchedLabel: existing };
        }
      }
    }
  }

  if (best && best.score >= threshold) {
    log.debug({ label, node: best.node.value, matchedLabel: best.matchedLabel, score: best.score }, "Fuzzy match");
    return best;
  }
  log.debug({ label, typeIri, threshold, bestScore: best?.score }, "No fuzzy match above threshold");
  return null;
}

export function hasAltLabel(store: QuadStore, node: Term, label: string, graph: NamedNode): boolean {
  const lower = label.toLowerCase();
  return store.match(node, namedNode(SKOS_ALT_LABEL), null, graph).some((q) => q.object.value.toLowerCase() === lower);
}

export interface Resolution {
  node: NamedNode;
  matched: boolean;
  matchedLabel?: string;
  score: number;
  /** True when this call minted the entity. */
  created: boolean;
}

export interface IdentifierServiceOptions {
  store: QuadStore;
  vocab: string;
  knowledgeBaseGraph: string;
  threshold?: number;
}

export class IdentifierService {
  readonly store: QuadStore;
  readonly vocab: string;
  readonly knowledgeBaseGraph: string;
  readonly graph: NamedNode;
  readonly threshold: number;

  constructor(opts: IdentifierServiceOptions) {
    this.store = opts.store;
    this.vocab = opts.vocab;
    this.knowledgeBaseGraph = opts.knowledgeBaseGraph;
    this.graph = safeNamedNode(opts.knowledgeBaseGraph);
    this.threshold = opts.threshold ?? DEFAULT_FUZZY_THRESHOLD;
  }

  /** Returns the entity for `label`, creating it when nothing scores at or above the threshold. */
  resolveOrCreate(label: string, type: string): Resolution {
    const text = label.trim();
    invariant(text.length > 0, "Entity label must not be empty", { type });

    const typeNode = vocabTerm(this.vocab, type);
    const match = fuzzyMatchLabel(this.store, text, typeNode.value, {
      threshold: this.threshold,
      graph: this.graph,
    });

    let resolution: Resolution;
    if (match && match.node.termType === "NamedNode") {
      resolution = { node: match.node, matched: true, matchedLabel: match.matchedLabel, score: match.score, created: false };
      log.debug({ type, label: text, matchedLabel: match.matchedLabel, score: match.score }, "Entity matched");
    } else {
      const { node, created } = this.ensureEntity(text, type, typeNode);
      resolution = { node, matched: false, score: match?.score ?? 0, created };
      log.debug({ type, label: text, node: node.value }, "Entity created");
    }

    this.addAltLabel(resolution.node, text);
    return resolution;
  }

  /**
   * Asserts the entity minted from `label` under the `segment` path of the
   * knowledge base, typed `typeNode`. No fuzzy lookup happens here.
   */
  ensureEntity(label: string, segment: string, typeNode: NamedNode): { node: NamedNode; created: boolean } {
    const node = safeNamedNode(entityIri(this.knowledgeBaseGraph, segment, label));
    const created = !this.isTyped(node, typeNode);
    this.store.add(quad(node, namedNode(RDF_TYPE), typeNode, this.graph));
    this.store.add(quad(node, namedNode(RDFS_LABEL), safeLiteral(label), this.graph));
    return { node, created };
  }

  /** Tag identity is exact: the IRI hashes the tag text verbatim. */
  tagNode(tag: string): { node: NamedNode; created: boolean } {
    const node = safeNamedNode(entityIri(this.knowledgeBaseGraph, "tag", tag));
    return { node, created: !this.isTyped(node, vocabTerm(this.vocab, "tag")) };
  }

  /** Adds `label` as skos:altLabel unless the entity already has it, ignoring case. */
  addAltLabel(node: NamedNode, label: string): boolean {
    if (hasAltLabel(this.store, node, label, this.graph)) return false;
    this.store.add(quad(node, namedNode(SKOS_ALT_LABEL), safeLiteral(label), this.graph));
    return true;
  }

  private isTyped(node: NamedNode, typeNode: NamedNode): boolean {
    return this.store.count(node, namedNode(RDF_TYPE), typeNode, this.graph) > 0;
  }
}
