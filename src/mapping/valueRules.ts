/**
 * Value transform rules.
 *
 * `mapValue` turns one raw field value into a RuleOutcome. Rules live in two
 * ordered tables, one for object values and one for scalars; the first rule
 * whose `applies` accepts the field wins. Rules that mint entities write
 * their quads directly and report `handled`; the others return a term for
 * the mapper to assert.
 */

import { DataFactory } from "n3";
import type { BlankNode, Literal, NamedNode } from "@rdfjs/types";
import { RDF_TYPE, RDFS_LABEL, XSD } from "../constants/vocabularies";
import type { QuadStore } from "../stores/quadStore";
import type { MappingRules } from "../types/library";
import { MappingError, getErrorMessage } from "../utils/errors";
import { isEmptyValue, isPlainObject, type PlainObject } from "../utils/guards";
import { getLogger, Subsystem } from "../utils/logger";
import { safeLiteral, safeNamedNode, vocabTerm } from "../utils/termUtils";
import { classifyDate } from "./dateParsing";
import type { IdentifierService } from "./identifierService";
import { languageCode, taggedTitle } from "./languageTags";

const { blankNode, namedNode, quad } = DataFactory;

const log = getLogger(Subsystem.Mapping);

export type RuleOutcome =
  | { kind: "skip"; reason: string }
  | { kind: "term"; term: NamedNode | Literal }
  | { kind: "nested"; value: PlainObject }
  | { kind: "handled"; added: number }
  | { kind: "error"; error: MappingError };

export interface RuleContext {
  store: QuadStore;
  subject: NamedNode | BlankNode;
  vocab: string;
  /** Base of item and collection IRIs, also the assertion graph. */
  baseUrl: string;
  graph: NamedNode;
  rules: MappingRules;
  identifiers: IdentifierService;
  /** Language of the record being mapped; unset inside nested objects. */
  language?: string;
}

export type Scalar = string | number | boolean;

interface Rule<V> {
  name: string;
  applies: (field: string, value: V, ctx: RuleContext) => boolean;
  apply: (field: string, value: V, ctx: RuleContext) => RuleOutcome;
}

export const DEFAULT_ENTITY_FIELDS: readonly string[] = ["place", "publisher", "series"];
const LINK_FIELDS: readonly string[] = ["url", "dc:relation", "doi", "owl:sameAs"];
const INTEGER_FIELDS: readonly string[] = ["numPages", "numberOfVolumes", "volume", "series number"];
const DATETIME_FIELDS: readonly string[] = ["dateModified", "accessDate", "dateAdded"];
const TITLE_FIELDS: readonly string[] = ["title", "bookTitle"];

const skip = (reason: string): RuleOutcome => ({ kind: "skip", reason });
const term = (t: NamedNode | Literal): RuleOutcome => ({ kind: "term", term: t });

/** Text form of a value nested inside an object rule. */
function literalText(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value);
}

function isFalsy(value: unknown): boolean {
  return value === 0 || value === false || isEmptyValue(value);
}

/** Runs `write` and reports how many new quads it produced. */
function handled(store: QuadStore, write: () => void): RuleOutcome {
  const before = store.size;
  write();
  return { kind: "handled", added: store.size - before };
}

// =============================================================================
// OBJECT RULES
// =============================================================================

const tagRule: Rule<PlainObject> = {
  name: "tag",
  applies: (field, value) => field === "tags" && "tag" in value,
  apply: (field, value, ctx) => {
    if (isFalsy(value.tag)) throw new Error("Tag without text");
    const text = literalText(value.tag);
    const { node, created } = ctx.identifiers.tagNode(text);
    const kbGraph = ctx.identifiers.graph;
    return handled(ctx.store, () => {
      ctx.store.add(quad(ctx.subject, vocabTerm(ctx.vocab, field), node, ctx.graph));
      if (!created) {
        log.debug({ tag: text }, "Tag already exists");
        return;
      }
      ctx.store.add(quad(node, namedNode(RDF_TYPE), vocabTerm(ctx.vocab, "tag"), kbGraph));
      ctx.store.add(quad(node, namedNode(RDFS_LABEL), safeLiteral(text), kbGraph));
      for (const [key, inner] of Object.entries(value)) {
        if (isFalsy(inner)) continue;
        ctx.store.add(quad(node, vocabTerm(ctx.vocab, key), safeLiteral(literalText(inner)), kbGraph));
      }
      log.debug({ tag: text }, "Tag added");
    });
  },
};

/** `name`, or `lastName, firstName`; undefined when neither gives any text. */
export function creatorLabel(creator: PlainObject): string | undefined {
  const label =
    "name" in creator
      ? literalText(creator.name ?? "")
      : `${literalText(creator.lastName ?? "")}, ${literalText(creator.firstName ?? "")}`;
  return label.replace(/,/g, "").trim() ? label.trim() : undefined;
}

const creatorRule: Rule<PlainObject> = {
  name: "creator",
  applies: (field) => field === "creators",
  apply: (field, value, ctx) => {
    const label = creatorLabel(value);
    if (!label) throw new Error("Creator without a usable name");

    return handled(ctx.store, () => {
      const role = blankNode();
      ctx.store.add(quad(ctx.subject, vocabTerm(ctx.vocab, field), role, ctx.graph));
      ctx.store.add(quad(role, namedNode(RDF_TYPE), vocabTerm(ctx.vocab, "creatorRole"), ctx.graph));

      const person = ctx.identifiers.resolveOrCreate(label, "person");
      if (person.created) {
        for (const [key, inner] of Object.entries(value)) {
          if (key === "creatorType" || isFalsy(inner)) continue;
          ctx.store.add(quad(person.node, vocabTerm(ctx.vocab, key), safeLiteral(literalText(inner)), ctx.identifiers.graph));
        }
      }

      const creatorType = value.creatorType;
      if (!isFalsy(creatorType)) {
        const roleName = literalText(creatorType);
        const roleClass = vocabTerm(ctx.vocab, roleName);
        ctx.store.add(quad(role, namedNode(RDFS_LABEL), safeLiteral(roleName), ctx.graph));
        ctx.store.add(quad(role, vocabTerm(ctx.vocab, "creatorType"), roleClass, ctx.graph));
        ctx.store.add(quad(role, namedNode(RDF_TYPE), roleClass, ctx.graph));
      }

      ctx.store.add(quad(role, vocabTerm(ctx.vocab, "hasCreator"), person.node, ctx.graph));
    });
  },
};

const nestedRule: Rule<PlainObject> = {
  name: "nested",
  applies: () => true,
  apply: (_field, value) => ({ kind: "nested", value }),
};

export const OBJECT_RULES: readonly Rule<PlainObject>[] = [tagRule, creatorRule, nestedRule];

// =============================================================================
// SCALAR RULES
// =============================================================================

const RECORD_LINKS: Readonly<Record<string, "items" | "collections">> = {
  collections: "collections",
  parentItem: "items",
  parentCollection: "collections",
};

const recordLinkRule: Rule<Scalar> = {
  name: "record-link",
  applies: (field) => field in RECORD_LINKS,
  apply: (field, value, ctx) => term(safeNamedNode(`${ctx.baseUrl}/${RECORD_LINKS[field]}/${value}`)),
};

const languageRule: Rule<Scalar> = {
  name: "language",
  applies: (field, value, ctx) =>
    typeof value === "string" && Boolean(ctx.language) && (TITLE_FIELDS.includes(field) || field === "language"),
  apply: (field, value, ctx) => {
    const text = String(value);
    if (!ctx.rules.languageTags) {
      log.debug({ field, language: ctx.language }, "Language-dependent value not stored");
      return skip("language-tagging disabled");
    }
    if (field === "language") return term(languageCode(text, ctx.rules.languageMap));
    return term(taggedTitle(text, ctx.language, ctx.rules.languageMap));
  },
};

const urlRule: Rule<Scalar> = {
  name: "url",
  applies: (field, value) => typeof value === "string" && LINK_FIELDS.includes(field) && value.startsWith("http"),
  apply: (_field, value) => term(safeNamedNode(String(value).trim())),
};

const doiRule: Rule<Scalar> = {
  name: "doi",
  applies: (field, value) => field === "doi" && typeof value === "string" && !value.startsWith("http") && value.length > 5,
  apply: (_field, value) => term(safeNamedNode(`https://doi.org/${value}`.trim())),
};

const integerRule: Rule<Scalar> = {
  name: "integer",
  applies: (field, value) => INTEGER_FIELDS.includes(field) && /^\d+$/.test(String(value)),
  apply: (_field, value) => term(safeLiteral(String(value), { datatype: XSD.int })),
};

const dateRule: Rule<Scalar> = {
  name: "date",
  applies: (field) => field === "date",
  apply: (_field, value) => {
    const date = classifyDate(String(value));
    if (date.kind === "gYear") return term(safeLiteral(date.value, { datatype: XSD.gYear }));
    if (date.kind === "dateTime") return term(safeLiteral(date.value, { datatype: XSD.dateTime }));
    return term(safeLiteral(date.value));
  },
};

const dateTimeRule: Rule<Scalar> = {
  name: "datetime",
  applies: (field) => DATETIME_FIELDS.includes(field),
  apply: (_field, value) => term(safeLiteral(String(value), { datatype: XSD.dateTime })),
};

/** Semicolon-separated segments of an entity field; commas stay inside names. */
export function entitySegments(value: string): string[] {
  return value
    .split(";")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

const entityRule: Rule<Scalar> = {
  name: "entity",
  applies: (field, value, ctx) =>
    typeof value === "string" &&
    (ctx.rules.rdfMapping.length > 0 ? ctx.rules.rdfMapping.includes(field) : DEFAULT_ENTITY_FIELDS.includes(field)),
  apply: (field, value, ctx) =>
    handled(ctx.store, () => {
      for (const segment of entitySegments(String(value))) {
        const entity = ctx.identifiers.resolveOrCreate(segment, field);
        ctx.store.add(quad(ctx.subject, vocabTerm(ctx.vocab, field), entity.node, ctx.graph));
      }
    }),
};

const literalRule: Rule<Scalar> = {
  name: "literal",
  applies: () => true,
  apply: (_field, value) => term(safeLiteral(value)),
};

export const SCALAR_RULES: readonly Rule<Scalar>[] = [
  recordLinkRule,
  languageRule,
  urlRule,
  doiRule,
  integerRule,
  dateRule,
  dateTimeRule,
  entityRule,
  literalRule,
];

// =============================================================================
// ENTRY POINT
// =============================================================================

function isScalar(value: unknown): value is Scalar {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function runRules<V>(table: readonly Rule<V>[], field: string, value: V, ctx: RuleContext): RuleOutcome {
  const rule = table.find((r) => r.applies(field, value, ctx));
  if (!rule) return skip("no rule");
  return rule.apply(field, value, ctx);
}

export function mapValue(field: string, value: unknown, ctx: RuleContext): RuleOutcome {
  try {
    if (isEmptyValue(value)) return skip("empty");

    const { rdfMapping } = ctx.rules;
    if (rdfMapping.length > 0 && !rdfMapping.includes(field)) {
      if (isPlainObject(value)) return skip("not in rdf_mapping");
      if (isScalar(value)) return term(safeLiteral(value));
    }

    if (isPlainObject(value)) return runRules(OBJECT_RULES, field, value, ctx);
    if (isScalar(value)) return runRules(SCALAR_RULES, field, value, ctx);
    throw new Error(`Unsupported value shape: ${Array.isArray(value) ? "nested array" : typeof value}`);
  } catch (err) {
    const error = new MappingError({ message: getErrorMessage(err), field, value, cause: err });
    return { kind: "error", error };
  }
}
