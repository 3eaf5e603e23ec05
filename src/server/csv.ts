/**
 * Tabular view of a graph: one row per subject, one column per predicate,
 * several values joined with ` | `. IRIs in value cells are written as
 * `<iri>` so that a reloaded sheet can tell them from literals.
 */

import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { DataFactory } from "n3";
import { z } from "zod";
import type { NamedNode, Quad_Object, Term } from "@rdfjs/types";
import type { QuadStore } from "../stores/quadStore";
import { safeLiteral, safeNamedNode } from "../utils/termUtils";

const { defaultGraph, quad } = DataFactory;

export const CSV_VALUE_DELIMITER = " | ";
export const SUBJECT_COLUMN = "IRI";

const CsvRowsSchema = z.array(z.record(z.string()));

function cellValue(term: Term): string {
  switch (term.termType) {
    case "NamedNode":
      return `<${term.value}>`;
    case "BlankNode":
      return `_:${term.value}`;
    default:
      return term.value;
  }
}

export function stripBrackets(value: string): string {
  return value.trim().replace(/^<+|>+$/g, "").trim();
}

/** Serializes every quad matching `graph` (all graphs when undefined) as CSV. */
export function graphToCsv(store: QuadStore, graph?: NamedNode): string {
  const records = new Map<string, Map<string, string[]>>();
  const predicates = new Set<string>();

  for (const q of store.match(null, null, null, graph)) {
    const row = records.get(q.subject.value) ?? new Map<string, string[]>();
    records.set(q.subject.value, row);
    const values = row.get(q.predicate.value) ?? [];
    row.set(q.predicate.value, values);
    values.push(cellValue(q.object));
    predicates.add(q.predicate.value);
  }

  const columns = [SUBJECT_COLUMN, ...[...predicates].sort()];
  const rows = [...records.keys()].sort().map((subject) => {
    const row = records.get(subject);
    return [subject, ...columns.slice(1).map((p) => (row?.get(p) ?? []).join(CSV_VALUE_DELIMITER))];
  });
  return stringify([columns, ...rows]);
}

export function parseCsvRows(text: string): Record<string, string>[] {
  const raw: unknown = parse(text, { columns: true, skip_empty_lines: true });
  return CsvRowsSchema.parse(raw);
}

/** Removes every quad of the subjects listed in the sheet's IRI column; returns how many went. */
export function deleteCsvSubjects(store: QuadStore, rows: Record<string, string>[], graph?: NamedNode): number {
  const subjects = new Set<string>();
  for (const row of rows) {
    const iri = stripBrackets(row[SUBJECT_COLUMN] ?? "");
    if (iri) subjects.add(iri);
  }
  let removed = 0;
  for (const iri of subjects) removed += store.removeMatching(safeNamedNode(iri), null, null, graph);
  return removed;
}

function objectFor(value: string): Quad_Object {
  if (value.startsWith("<") && value.endsWith(">")) {
    const iri = stripBrackets(value);
    if (iri.startsWith("http")) return safeNamedNode(iri);
  }
  return safeLiteral(value);
}

/** Adds the statements of a sheet written by `graphToCsv`; returns the number of new quads. */
export function loadCsvRows(store: QuadStore, rows: Record<string, string>[], graph?: NamedNode): number {
  const before = store.size;
  const target = graph ?? defaultGraph();
  for (const row of rows) {
    const subjectIri = stripBrackets(row[SUBJECT_COLUMN] ?? "");
    if (!subjectIri) continue;
    const subject = safeNamedNode(subjectIri);

    for (const [column, cell] of Object.entries(row)) {
      if (column === SUBJECT_COLUMN || !cell.trim()) continue;
      const predicateIri = stripBrackets(column);
      if (!predicateIri) continue;
      const predicate = safeNamedNode(predicateIri);
      for (const part of cell.split(CSV_VALUE_DELIMITER)) {
        const value = part.trim();
        if (value) store.add(quad(subject, predicate, objectFor(value), target));
      }
    }
  }
  return store.size - before;
}
