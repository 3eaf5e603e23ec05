/**
 * Semantic parsing of the HTML notes attached to items.
 *
 * Each note literal is handed to a NoteParser, which returns JSON-LD. The
 * JSON-LD lands in a scratch store on the library graph; with
 * `knowledge_base_mapping` enabled the entities it mentions are reconciled
 * against the knowledge base before the scratch store is merged.
 */

import { access, readFile } from "node:fs/promises";
import { DataFactory } from "n3";
import type { NamedNode, Quad_Subject } from "@rdfjs/types";
import { RDF_TYPE } from "../constants/vocabularies";
import { fuzzyMatchLabel, hasAltLabel, IdentifierService, DEFAULT_FUZZY_THRESHOLD } from "../mapping/identifierService";
import { QuadStore } from "../stores/quadStore";
import { KnowledgeBaseRuleSchema, type KnowledgeBaseRule } from "../types/library";
import { getErrorMessage } from "../utils/errors";
import { fetchJson } from "../utils/fetcher";
import { isPlainObject, type PlainObject } from "../utils/guards";
import { getLogger, Subsystem } from "../utils/logger";
import { parseRdf } from "../utils/rdfParser";
import { safeNamedNode, vocabTerm } from "../utils/termUtils";
import type { Library, TransportOptions } from "./library";

const { namedNode, quad } = DataFactory;

const log = getLogger(Subsystem.Notes);

export interface NoteInput {
  html: string;
  noteUri: string;
  mapping: PlainObject;
  metadata: PlainObject;
}

/** Turns one HTML note into a JSON-LD document. */
export interface NoteParser {
  parse(input: NoteInput): Promise<unknown>;
}

/** Posts `{html, note_uri, mapping, metadata}` to an HTTP endpoint that answers with JSON-LD. */
export class HttpNoteParser implements NoteParser {
  constructor(
    private readonly endpoint: string,
    private readonly transport: TransportOptions = {},
  ) {}

  parse(input: NoteInput): Promise<unknown> {
    log.debug({ endpoint: this.endpoint, note: input.noteUri }, "Sending note to parser");
    return fetchJson(this.endpoint, {
      ...this.transport,
      method: "POST",
      headers: { "Content-Type": "application/json", Accept: "application/ld+json, application/json" },
      body: JSON.stringify({
        html: input.html,
        note_uri: input.noteUri,
        mapping: input.mapping,
        metadata: input.metadata,
      }),
    });
  }
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

async function readJsonSource(raw: unknown, what: string): Promise<PlainObject> {
  if (isPlainObject(raw)) return raw;
  if (typeof raw !== "string") throw new Error(`No ${what} configured`);

  let parsed: unknown;
  if (await fileExists(raw)) {
    parsed = JSON.parse(await readFile(raw, "utf8"));
    log.info({ file: raw }, `Parser ${what} loaded from file`);
  } else {
    parsed = JSON.parse(raw);
    log.info(`Parser ${what} loaded from JSON string`);
  }
  if (!isPlainObject(parsed)) throw new Error(`Parser ${what} is not a JSON object`);
  return parsed;
}

/**
 * Reads a mapping or metadata object given inline, as a JSON file path or as
 * a JSON string. Anything unusable yields `fallback`.
 */
export async function resolveJsonSource(raw: unknown, fallback: PlainObject, what: string): Promise<PlainObject> {
  try {
    return await readJsonSource(raw, what);
  } catch (err) {
    log.warn({ reason: getErrorMessage(err) }, `No ${what} found, using fallback`);
    return fallback;
  }
}

/** Splits the `KnowledgeBase` rules off a parser mapping; invalid rules are logged and dropped. */
export function extractKnowledgeBaseRules(mapping: PlainObject): { mapping: PlainObject; rules: KnowledgeBaseRule[] } {
  const { KnowledgeBase: raw, ...rest } = mapping;
  const rules: KnowledgeBaseRule[] = [];
  for (const entry of Array.isArray(raw) ? raw : []) {
    const parsed = KnowledgeBaseRuleSchema.safeParse(entry);
    if (parsed.success) rules.push(parsed.data);
    else log.error({ rule: entry, reason: parsed.error.message }, "Missing key in knowledge base rule");
  }
  return { mapping: rest, rules };
}

export interface ReconcileOptions {
  rules: readonly KnowledgeBaseRule[];
  /** Library graph that receives the links. */
  graph: NamedNode;
  defaultKnowledgeBaseGraph: string;
  vocab: string;
  threshold: number;
}

/**
 * Links note entities to knowledge-base entities. For every subject of
 * `domainTypes` in `scratch`, each `domainProperty` value is fuzzy-matched
 * against the `targetProperty` labels of `rangeType` entities in `store`.
 * A match is linked with `mapProperty`; without a match, a rule naming its
 * own knowledge-base graph gets a new `semantic_html` entity.
 */
export function reconcileEntities(scratch: QuadStore, store: QuadStore, opts: ReconcileOptions): number {
  let linked = 0;
  for (const rule of opts.rules) {
    const kbGraph = rule.knowledgeBaseGraph ?? opts.defaultKnowledgeBaseGraph;
    const entityGraph = safeNamedNode(kbGraph);
    const rangeType = safeNamedNode(rule.rangeType);
    const mapProperty = safeNamedNode(rule.mapProperty);
    const identifiers = new IdentifierService({ store: scratch, vocab: opts.vocab, knowledgeBaseGraph: kbGraph });

    for (const typed of scratch.match(null, namedNode(RDF_TYPE), safeNamedNode(rule.domainTypes))) {
      const domainNode: Quad_Subject = typed.subject;
      for (const labelled of scratch.match(domainNode, safeNamedNode(rule.domainProperty))) {
        const label = labelled.object.value;
        try {
          const match = fuzzyMatchLabel(store, label, rangeType.value, {
            threshold: opts.threshold,
            graph: entityGraph,
            predicates: [rule.targetProperty],
          });

          let target: NamedNode | undefined;
          if (match && match.node.termType === "NamedNode") {
            target = match.node;
            log.debug({ label, matchedLabel: match.matchedLabel, score: match.score, node: target.value }, "Note entity matched");
          } else if (rule.knowledgeBaseGraph && label.trim()) {
            target = identifiers.ensureEntity(label, "semantic_html", rangeType).node;
            log.debug({ label, node: target.value }, "Note entity added to knowledge base");
          }
          if (!target) continue;

          scratch.add(quad(domainNode, mapProperty, target, opts.graph));
          linked++;
          if (!hasAltLabel(store, target, label, entityGraph)) identifiers.addAltLabel(target, label);
        } catch (err) {
          log.error({ label, rule: rule.domainTypes, reason: getErrorMessage(err) }, "Error matching knowledge base");
        }
      }
    }
  }
  return linked;
}

export interface ParseNotesOptions {
  /** Predicate carrying the note HTML; defaults to `{vocab}note`. */
  notePredicate?: string;
  /** Merge the parsed quads into `store`; false only parses. */
  push?: boolean;
}

/** Parses every note literal in the library graph and returns how many were handled. */
export async function parseAllNotes(
  lib: Library,
  store: QuadStore,
  parser: NoteParser,
  opts: ParseNotesOptions = {},
): Promise<number> {
  const graph = safeNamedNode(lib.baseUrl);
  const push = opts.push ?? true;
  const config = lib.notesParser;

  const rawMapping = await resolveJsonSource(
    config.mapping,
    { "@context": { "@base": lib.baseUrl, "@vocab": lib.vocab } },
    "mapping",
  );
  const metadata = await resolveJsonSource(config.metadata, { wasGeneratedBy: "biblio-graph-server" }, "metadata");

  const { mapping, rules } = config.knowledge_base_mapping
    ? extractKnowledgeBaseRules(rawMapping)
    : { mapping: rawMapping, rules: [] };
  if (rules.length) log.debug({ library: lib.name, rules: rules.length }, "Mapping note entities to knowledge base");

  const predicate = opts.notePredicate ? safeNamedNode(opts.notePredicate) : vocabTerm(lib.vocab, "note");
  const notes = store.match(null, predicate, null, graph).filter((q) => q.object.termType === "Literal");
  log.info({ library: lib.name, predicate: predicate.value, notes: notes.length }, "Parsing notes");

  let count = 0;
  for (const note of notes) {
    count++;
    const noteUri = note.subject.value;
    try {
      const result = await parser.parse({ html: note.object.value, noteUri, mapping, metadata });
      const quads = await parseRdf(JSON.stringify(result), {
        contentType: "application/ld+json",
        baseIRI: lib.baseUrl,
        graph,
      });
      if (!push) {
        log.info({ note: noteUri, quads: quads.length }, "Note parsed, not merged");
        continue;
      }
      const scratch = new QuadStore();
      scratch.addAll(quads);
      if (rules.length) {
        reconcileEntities(scratch, store, {
          rules,
          graph,
          defaultKnowledgeBaseGraph: lib.knowledgeBaseGraph,
          vocab: lib.vocab,
          threshold: config.fuzzy ?? DEFAULT_FUZZY_THRESHOLD,
        });
      }
      store.extend(scratch);
      log.debug({ note: noteUri, quads: scratch.size }, "Extended store");
    } catch (err) {
      log.error({ library: lib.name, note: noteUri, reason: getErrorMessage(err) }, "Could not parse note");
    }
  }

  log.info({ library: lib.name, count }, "Note parsing completed");
  return count;
}

/** The parser configured for `lib`, or undefined when it names no endpoint. */
export function noteParserFor(lib: Library, transport: TransportOptions = {}): NoteParser | undefined {
  const endpoint = lib.notesParser.endpoint;
  if (!endpoint) return undefined;
  return new HttpNoteParser(endpoint, { ...transport, timeoutMs: lib.notesParser.timeout_ms ?? transport.timeoutMs });
}
