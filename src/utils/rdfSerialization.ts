import { DataFactory, Writer } from "n3";
import type { Quad } from "@rdfjs/types";

const { quad, defaultGraph } = DataFactory;

/**
 * Export formats served by the HTTP surface, with the n3 Writer format name
 * and file extension of each.
 */
export const EXPORT_FORMATS = {
  trig: { writer: "application/trig", extension: "trig", namedGraphs: true },
  nquads: { writer: "N-Quads", extension: "nq", namedGraphs: true },
  ttl: { writer: "Turtle", extension: "ttl", namedGraphs: false },
  nt: { writer: "N-Triples", extension: "nt", namedGraphs: false },
} as const;

export type ExportFormat = keyof typeof EXPORT_FORMATS;

export function isExportFormat(value: unknown): value is ExportFormat {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(EXPORT_FORMATS, value);
}

/**
 * Serializes quads. Triple-only formats move every quad into the default
 * graph; callers narrow to one graph beforehand when they need that.
 */
export function serializeQuads(
  quads: Iterable<Quad>,
  format: ExportFormat,
  prefixes: Record<string, string> = {},
): Promise<string> {
  const spec = EXPORT_FORMATS[format];
  // n-quads and n-triples writers ignore prefixes
  const writer = new Writer({ format: spec.writer, prefixes: spec.writer.startsWith("N-") ? undefined : prefixes });
  for (const q of quads) {
    writer.addQuad(spec.namedGraphs ? q : quad(q.subject, q.predicate, q.object, defaultGraph()));
  }
  return new Promise<string>((resolve, reject) => {
    writer.end((error: Error | null, result: string) => {
      if (error) reject(error);
      else resolve(result);
    });
  });
}
