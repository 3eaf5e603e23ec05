import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { DataFactory } from "n3";
import type { Library } from "../../ingest/library";
import type { NoteParser } from "../../ingest/notes";
import { RefreshOrchestrator } from "../../ingest/orchestrator";
import { createApp } from "../../server/app";
import { QuadStore, STORE_FILE } from "../../stores/quadStore";
import type { AppConfig } from "../../types/config";
import { getLogLevel } from "../../utils/logger";
import { VOCAB, valuesOf } from "../fixtures/mappingFixtures";
import { makeLibrary, testConfig } from "../fixtures/libraryFixtures";

const { literal, namedNode, quad } = DataFactory;

const G1 = "https://example.org/g1";
const G2 = "https://example.org/g2";
const A = "https://example.org/a";
const B = "https://example.org/b";
const TITLE = `${VOCAB}title`;
const REL = `${VOCAB}rel`;

let dir: string;
let store: QuadStore;
let config: AppConfig;

function setup(opts: { libraries?: Library[]; parserFor?: (lib: Library) => NoteParser | undefined } = {}) {
  const libraries = opts.libraries ?? [];
  const orchestrator = new RefreshOrchestrator({ getConfig: () => config, getLibraries: () => libraries });
  const app = createApp({
    getConfig: () => config,
    getLibraries: () => libraries,
    orchestrator,
    parserFor: opts.parserFor ?? (() => undefined),
    getStore: () => store,
  });
  return { app, orchestrator };
}

async function call(app: ReturnType<typeof createApp>, path: string): Promise<{ status: number; body: unknown }> {
  const res = await app.request(path);
  const body: unknown = await res.json();
  return { status: res.status, body };
}

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "server-test-"));
  config = testConfig({
    export_directory: join(dir, "exports"),
    backup_directory: join(dir, "backup"),
    store_directory: join(dir, "data"),
  });
  store = new QuadStore();
  store.add(quad(namedNode(A), namedNode(TITLE), literal("A"), namedNode(G1)));
  store.add(quad(namedNode(A), namedNode(REL), namedNode(B), namedNode(G1)));
  store.add(quad(namedNode(B), namedNode(TITLE), literal("B"), namedNode(G2)));
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

describe("GET /graphs", () => {
  it("summarizes the store", async () => {
    const { app } = setup();
    await expect(call(app, "/graphs")).resolves.toEqual({
      status: 200,
      body: { status: "success", store: { named_graphs: [G1, G2], len: 3 } },
    });
  });
});

describe("GET /libs", () => {
  it("lists libraries with masked keys", async () => {
    const { app } = setup({ libraries: [makeLibrary({ api_key: "test-secret" })] });
    const { body } = await call(app, "/libs");
    expect(body).toMatchObject({ success: [{ name: "Test", api_key: "***", base_url: "https://example.org/groups/42" }] });
  });
});

describe("GET /export", () => {
  it("rejects unknown graphs and formats", async () => {
    const { app } = setup();
    expect((await call(app, `/export?graph=${encodeURIComponent("https://example.org/nope")}`)).status).toBe(400);
    expect((await call(app, "/export?format=xml")).status).toBe(400);
  });

  it("writes one graph as N-Triples", async () => {
    const { app } = setup();
    const { status, body } = await call(app, `/export?format=nt&graph=${encodeURIComponent(`<${G1}>`)}`);

    const path = join(dir, "exports", "example.org_g1.nt");
    expect(status).toBe(200);
    expect(body).toEqual({ success: `Export to: ${path}` });
    const lines = (await readFile(path, "utf8")).trim().split("\n").sort();
    expect(lines).toEqual([`<${A}> <${REL}> <${B}> .`, `<${A}> <${TITLE}> "A" .`]);
  });

  it("writes the whole store as TriG by default", async () => {
    const { app } = setup();
    const { body } = await call(app, "/export");
    expect(body).toEqual({ success: `Export to: ${join(dir, "exports", "store.trig")}` });
  });
});

describe("GET /csv", () => {
  it("exports a graph as one row per subject", async () => {
    const { app } = setup();
    const { body } = await call(app, `/csv?graph=${encodeURIComponent(G1)}`);
    const output = join(dir, "exports", "export.csv");

    expect(body).toEqual({ status: "success", export: output, loaded: 0, store: { named_graphs: [G1, G2], len: 3 } });
    expect(await readFile(output, "utf8")).toBe(`IRI,${REL},${TITLE}\n${A},<${B}>,A\n`);
  });

  it("loads a sheet into the graph", async () => {
    const sheet = join(dir, "in.csv");
    await writeFile(sheet, `IRI,${TITLE},${REL}\n<https://example.org/c>,C | D,<${A}>\n`, "utf8");
    const { app } = setup();

    const { body } = await call(app, `/csv?graph=${encodeURIComponent(G1)}&load_csv=${encodeURIComponent(sheet)}`);

    expect(body).toMatchObject({ loaded: 3 });
    expect(valuesOf(store, "https://example.org/c", TITLE).sort()).toEqual(["C", "D"]);
    expect(store.count(namedNode("https://example.org/c"), namedNode(REL), namedNode(A), namedNode(G1))).toBe(1);
  });

  it("replaces listed subjects when delete is set", async () => {
    const sheet = join(dir, "in.csv");
    await writeFile(sheet, `IRI,${TITLE}\n${A},A2\n`, "utf8");
    const { app } = setup();

    const { body } = await call(app, `/csv?graph=${encodeURIComponent(G1)}&load_csv=${encodeURIComponent(sheet)}&delete=true`);

    expect(body).toMatchObject({ loaded: 1, store: { len: 2 } });
    expect(valuesOf(store, A, TITLE)).toEqual(["A2"]);
    expect(valuesOf(store, A, REL)).toEqual([]);
  });

  it("reports an unreadable sheet", async () => {
    const { app } = setup();
    const { status } = await call(app, `/csv?load_csv=${encodeURIComponent(join(dir, "missing.csv"))}`);
    expect(status).toBe(400);
  });
});

describe("GET /reload", () => {
  it("rejects an unknown log level without refreshing", async () => {
    const { app, orchestrator } = setup();
    const refresh = vi.spyOn(orchestrator, "refreshOnce").mockResolvedValue(undefined);

    const { status } = await call(app, "/reload?log_level=loud");

    expect(status).toBe(400);
    expect(refresh).not.toHaveBeenCalled();
  });

  it("forces a refresh and restores the log level", async () => {
    const { app, orchestrator } = setup();
    const refresh = vi.spyOn(orchestrator, "refreshOnce").mockResolvedValue(undefined);
    const before = getLogLevel();

    const { status, body } = await call(app, "/reload?log_level=DEBUG");

    expect(status).toBe(200);
    expect(refresh).toHaveBeenCalledWith(true);
    expect(body).toEqual({ status: "success", store: { named_graphs: [G1, G2], len: 3 } });
    expect(getLogLevel()).toBe(before);
  });
});

describe("GET /backup", () => {
  it("persists the store under the backup directory and logs it", async () => {
    const { app } = setup();
    const target = join(resolve(dir, "backup"), "Store");

    const { body } = await call(app, "/backup");

    expect(body).toEqual({
      status: "success",
      "backup store": { path: target, file: join(target, STORE_FILE), named_graphs: [G1, G2], len: 3 },
    });
    expect((await QuadStore.open(target)).size).toBe(3);
    expect(await readFile(join(dir, "backup", "backup.log"), "utf8")).toContain(`Created new backup in ${target}`);
  });

  it("refuses to back up into the store directory", async () => {
    config = testConfig({ store_mode: "directory", store_directory: join(dir, "backup", "Store"), backup_directory: join(dir, "backup") });
    const { app } = setup();
    expect((await call(app, "/backup")).status).toBe(400);
  });
});

describe("GET /parse_notes", () => {
  it("parses the notes of every library with a parser", async () => {
    const lib = makeLibrary({});
    store.add(quad(namedNode(`${lib.baseUrl}/items/N1`), namedNode(`${VOCAB}note`), literal("<p/>"), namedNode(lib.baseUrl)));
    const parser: NoteParser = { parse: async () => ({ "@id": `${lib.baseUrl}/notes/N1`, "http://example.org/notes#text": "x" }) };
    const { app } = setup({ libraries: [lib, makeLibrary({ name: "NoParser", library_id: 7 })], parserFor: (l) => (l === lib ? parser : undefined) });

    const { body } = await call(app, "/parse_notes");

    expect(body).toEqual({ success: "1 notes parsed" });
    expect(valuesOf(store, `${lib.baseUrl}/notes/N1`, "http://example.org/notes#text")).toEqual(["x"]);
  });

  it("rejects an unknown graph", async () => {
    const { app } = setup();
    expect((await call(app, `/parse_notes?graph=${encodeURIComponent("https://example.org/nope")}`)).status).toBe(400);
  });
});
