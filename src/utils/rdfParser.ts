/**
 * Stream-parses serialized RDF into quads with rdf-parse.
 *
 * Parser selection is deterministic: an explicit contentType wins, otherwise
 * the file name's extension picks the media type, otherwise rdf-parse is given
 * the path and detects the format itself.
 */

import { Readable } from "node:stream";
import { extname } from "node:path";
import { DataFactory } from "n3";
import { rdfParser } from "rdf-parse";
import type { NamedNode, Quad } from "@rdfjs/types";
import { RdfLoadError } from "./errors";

const { quad } = DataFactory;

export const MEDIA_TYPES: Readonly<Record<string, string>> = {
  ".rdf": "application/rdf+xml",
  ".xml": "application/rdf+xml",
  ".trig": "application/trig",
  ".ttl": "text/turtle",
  ".nt": "application/n-triples",
  ".nq": "application/n-quads",
  ".jsonld": "application/ld+json",
};

export function mediaTypeForPath(path: string): string | undefined {
  return MEDIA_TYPES[extname(path).toLowerCase()];
}

export interface ParseOptions {
  contentType?: string;
  path?: string;
  baseIRI?: string;
  /** Graph assigned to quads the source puts in the default graph. */
  graph?: NamedNode;
}

export function parseRdf(input: string | Buffer, opts: ParseOptions): Promise<Quad[]> {
  const contentType = opts.contentType ?? (opts.path ? mediaTypeForPath(opts.path) : undefined);
  const source = opts.path ?? contentType ?? "inline";
  const readable = Readable.from([typeof input === "string" ? Buffer.from(input, "utf8") : input]);

  return new Promise<Quad[]>((resolve, reject) => {
    const quads: Quad[] = [];
    const stream = rdfParser.parse(readable, {
      contentType,
      path: contentType ? undefined : opts.path,
      baseIRI: opts.baseIRI,
    });
    stream.on("data", (q: Quad) => {
      const graph = opts.graph && q.graph.termType === "DefaultGraph" ? opts.graph : q.graph;
      quads.push(quad(q.subject, q.predicate, q.object, graph));
    });
    stream.on("error", (err: unknown) => {
      reject(new RdfLoadError({ message: "Could not parse RDF", source, cause: err }));
    });
    stream.on("end", () => resolve(quads));
  });
}
