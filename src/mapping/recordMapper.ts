/**
 * Record mapper.
 *
 * Walks one record field by field, filters fields through the allow and
 * block lists, hands every value to the value rules and asserts what they
 * return. Objects the rules pass back as `nested` hang under a fresh blank
 * node and are walked recursively. A failing field is logged and counted;
 * it never stops the record.
 */

import { DataFactory } from "n3";
import type { BlankNode, NamedNode } from "@rdfjs/types";
import type { QuadStore } from "../stores/quadStore";
import type { MappingRules } from "../types/library";
import { MappingError, getErrorMessage } from "../utils/errors";
import type { PlainObject } from "../utils/guards";
import { getLogger, Subsystem } from "../utils/logger";
import { safeNamedNode, vocabTerm } from "../utils/termUtils";
import { IdentifierService } from "./identifierService";
import { mapValue, type RuleContext } from "./valueRules";

const { blankNode, quad } = DataFactory;

const log = getLogger(Subsystem.Mapping);

export interface MappingOptions {
  vocab: string;
  baseUrl: string;
  /** Defaults to `baseUrl`. */
  knowledgeBaseGraph?: string;
  rules: MappingRules;
  language?: string;
  /** Shared across records of one pass; built from the options when absent. */
  identifiers?: IdentifierService;
}

export interface MappingReport {
  /** Triples asserted from `term` outcomes. */
  emitted: number;
  /** Values whose rule wrote its own quads. */
  handled: number;
  skipped: number;
  nested: number;
  errors: MappingError[];
}

export const emptyReport = (): MappingReport => ({ emitted: 0, handled: 0, skipped: 0, nested: 0, errors: [] });

/** Whether `field` passes the allow and block lists. The allowlist, when set, wins. */
export function isFieldAllowed(field: string, rules: MappingRules): boolean {
  if (rules.white.length > 0) return rules.white.includes(field) || rules.rdfMapping.includes(field);
  return !rules.black.includes(field);
}

function mapOne(field: string, predicate: NamedNode, value: unknown, ctx: RuleContext, report: MappingReport): void {
  const outcome = mapValue(field, value, ctx);
  switch (outcome.kind) {
    case "skip":
      report.skipped++;
      return;
    case "handled":
      report.handled++;
      return;
    case "error":
      log.error({ field, value, reason: outcome.error.message }, "Invalid data for field");
      report.errors.push(outcome.error);
      return;
    case "term":
      ctx.store.add(quad(ctx.subject, predicate, outcome.term, ctx.graph));
      report.emitted++;
      return;
    case "nested": {
      const node = blankNode();
      ctx.store.add(quad(ctx.subject, predicate, node, ctx.graph));
      report.nested++;
      walk(outcome.value, { ...ctx, subject: node, language: undefined }, report);
      return;
    }
  }
}

function walk(record: PlainObject, ctx: RuleContext, report: MappingReport): void {
  for (const [field, value] of Object.entries(record)) {
    if (!isFieldAllowed(field, ctx.rules)) {
      log.debug({ field }, "Field filtered out");
      report.skipped++;
      continue;
    }
    try {
      const predicate = vocabTerm(ctx.vocab, field);
      if (Array.isArray(value)) {
        for (const element of value) mapOne(field, predicate, element, ctx, report);
      } else {
        mapOne(field, predicate, value, ctx, report);
      }
    } catch (err) {
      const error = new MappingError({ message: getErrorMessage(err), field, value, cause: err });
      log.error({ field, value, reason: error.message }, "Invalid data for field");
      report.errors.push(error);
    }
  }
}

/** Maps `record` onto `subject` in the graph named by `baseUrl`. */
export function mapRecord(
  store: QuadStore,
  subject: NamedNode | BlankNode,
  record: PlainObject,
  opts: MappingOptions,
): MappingReport {
  const knowledgeBaseGraph = opts.knowledgeBaseGraph ?? opts.baseUrl;
  const identifiers =
    opts.identifiers ??
    new IdentifierService({ store, vocab: opts.vocab, knowledgeBaseGraph, threshold: opts.rules.fuzzy });

  const ctx: RuleContext = {
    store,
    subject,
    vocab: opts.vocab,
    baseUrl: opts.baseUrl,
    graph: safeNamedNode(opts.baseUrl),
    rules: opts.rules,
    identifiers,
    language: opts.language || undefined,
  };

  const report = emptyReport();
  walk(record, ctx, report);
  return report;
}
