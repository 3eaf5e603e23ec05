/**
 * QuadStore - the graph storage used by every other module.
 *
 * A thin layer over n3's in-memory Store adding bulk loading through
 * rdf-parse, serialization through n3's Writer, and optional persistence of
 * the whole store as one N-Quads file in a directory.
 */

import { mkdir, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { DataFactory, Store } from "n3";
import type { NamedNode, Quad, Term } from "@rdfjs/types";
import { parseRdf, type ParseOptions } from "../utils/rdfParser";
import { serializeQuads, type ExportFormat } from "../utils/rdfSerialization";
import { RdfLoadError } from "../utils/errors";
import { getLogger, Subsystem } from "../utils/logger";

const { namedNode } = DataFactory;

const log = getLogger(Subsystem.Store);

export const STORE_FILE = "store.nq";

type Pattern = Term | null | undefined;

export class QuadStore {
  private store = new Store();

  /** Directory the store persists to; undefined for a memory-only store. */
  readonly directory?: string;

  constructor(directory?: string) {
    this.directory = directory;
  }

  /** Opens a directory-backed store, loading `store.nq` when present. */
  static async open(directory: string): Promise<QuadStore> {
    await mkdir(directory, { recursive: true });
    const qs = new QuadStore(directory);
    const file = join(directory, STORE_FILE);
    let text: string | undefined;
    try {
      text = await readFile(file, "utf8");
    } catch (err) {
      log.debug({ file, err }, "No persisted store found, starting empty");
    }
    if (text !== undefined) {
      const added = await qs.loadContent(text, { contentType: "application/n-quads" });
      log.info({ file, quads: added }, "Opened persisted store");
    }
    return qs;
  }

  /** A fresh, empty store with the same persistence target. */
  fork(): QuadStore {
    return new QuadStore(this.directory);
  }

  get size(): number {
    return this.store.size;
  }

  add(q: Quad): void {
    this.store.addQuad(q);
  }

  addAll(quads: Iterable<Quad>): void {
    for (const q of quads) this.store.addQuad(q);
  }

  remove(q: Quad): void {
    this.store.removeQuad(q);
  }

  has(q: Quad): boolean {
    return this.store.countQuads(q.subject, q.predicate, q.object, q.graph) > 0;
  }

  match(subject?: Pattern, predicate?: Pattern, object?: Pattern, graph?: Pattern): Quad[] {
    return this.store.getQuads(subject ?? null, predicate ?? null, object ?? null, graph ?? null);
  }

  count(subject?: Pattern, predicate?: Pattern, object?: Pattern, graph?: Pattern): number {
    return this.store.countQuads(subject ?? null, predicate ?? null, object ?? null, graph ?? null);
  }

  /** Removes every quad matching the pattern and returns how many went. */
  removeMatching(subject?: Pattern, predicate?: Pattern, object?: Pattern, graph?: Pattern): number {
    const matched = this.match(subject, predicate, object, graph);
    this.store.removeQuads(matched);
    return matched.length;
  }

  /** IRIs of the named graphs holding at least one quad. */
  graphs(): string[] {
    const names = new Set<string>();
    for (const g of this.store.getGraphs(null, null, null)) {
      if (g.termType === "NamedNode") names.add(g.value);
    }
    return [...names].sort();
  }

  hasGraph(iri: string): boolean {
    return this.count(null, null, null, namedNode(iri)) > 0;
  }

  clear(): void {
    this.store = new Store();
  }

  extend(other: QuadStore): void {
    this.addAll(other.match());
  }

  /** Parses serialized RDF and adds it; returns the number of new quads. */
  async loadContent(content: string | Buffer, opts: ParseOptions): Promise<number> {
    const before = this.size;
    this.addAll(await parseRdf(content, opts));
    return this.size - before;
  }

  /** Loads a file, picking the parser from its extension. */
  async bulkLoad(path: string, opts: { baseIRI?: string; graph?: NamedNode } = {}): Promise<number> {
    let content: Buffer;
    try {
      content = await readFile(path);
    } catch (err) {
      throw new RdfLoadError({ message: "Could not read RDF file", source: path, cause: err });
    }
    return this.loadContent(content, { path, baseIRI: opts.baseIRI, graph: opts.graph });
  }

  serialize(format: ExportFormat, opts: { graph?: string; prefixes?: Record<string, string> } = {}): Promise<string> {
    const quads = opts.graph ? this.match(null, null, null, namedNode(opts.graph)) : this.match();
    return serializeQuads(quads, format, opts.prefixes);
  }

  /** Writes the store to `{dir}/store.nq` (default: its own directory). */
  async persist(dir = this.directory): Promise<string | undefined> {
    if (!dir) return undefined;
    await mkdir(dir, { recursive: true });
    const file = join(dir, STORE_FILE);
    await writeFile(file, await this.serialize("nquads"), "utf8");
    log.debug({ file, quads: this.size }, "Store persisted");
    return file;
  }

  /** Deletes everything inside the store directory. */
  async wipeDirectory(): Promise<void> {
    if (!this.directory) return;
    await mkdir(this.directory, { recursive: true });
    for (const entry of await readdir(this.directory)) {
      await rm(join(this.directory, entry), { recursive: true, force: true });
    }
  }
}
