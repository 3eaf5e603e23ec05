import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { DataFactory } from "n3";
import { QuadStore, STORE_FILE } from "../../stores/quadStore";
import { activeStore, getActiveStore, setActiveStore } from "../../stores/activeStore";
import { RdfLoadError } from "../../utils/errors";

const { literal, namedNode, quad } = DataFactory;

const S = namedNode("https://example.org/s");
const P = namedNode("https://example.org/p");
const G1 = namedNode("https://example.org/g1");
const G2 = namedNode("https://example.org/g2");

function sample(): QuadStore {
  const store = new QuadStore();
  store.add(quad(S, P, literal("one"), G2));
  store.add(quad(S, P, literal("two"), G1));
  store.add(quad(S, P, literal("three")));
  return store;
}

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "store-test-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("QuadStore", () => {
  it("lists named graphs sorted, leaving out the default graph", () => {
    const store = sample();
    expect(store.graphs()).toEqual([G1.value, G2.value]);
    expect(store.hasGraph(G1.value)).toBe(true);
    expect(store.hasGraph("https://example.org/none")).toBe(false);
  });

  it("removes matching quads", () => {
    const store = sample();
    expect(store.removeMatching(S, null, null, G1)).toBe(1);
    expect(store.size).toBe(2);
    expect(store.graphs()).toEqual([G2.value]);
  });

  it("ignores duplicates and merges other stores", () => {
    const store = sample();
    store.add(quad(S, P, literal("one"), G2));
    expect(store.size).toBe(3);

    const other = new QuadStore();
    other.add(quad(S, P, literal("four"), G1));
    store.extend(other);
    expect(store.count(S, P, null, G1)).toBe(2);
  });

  it("round-trips through the store directory", async () => {
    const store = new QuadStore(dir);
    store.addAll(sample().match());

    await expect(store.persist()).resolves.toBe(join(dir, STORE_FILE));
    const reopened = await QuadStore.open(dir);

    expect(reopened.size).toBe(3);
    expect(reopened.directory).toBe(dir);
    expect(reopened.count(S, P, literal("two"), G1)).toBe(1);
  });

  it("opens an empty store when nothing was persisted", async () => {
    const store = await QuadStore.open(join(dir, "fresh"));
    expect(store.size).toBe(0);
  });

  it("does not persist a memory store", async () => {
    await expect(sample().persist()).resolves.toBeUndefined();
  });

  it("wipes its directory", async () => {
    const store = new QuadStore(dir);
    await writeFile(join(dir, "leftover.txt"), "x", "utf8");
    await store.persist();

    await store.wipeDirectory();

    expect(await readdir(dir)).toEqual([]);
  });

  it("bulk-loads into a target graph", async () => {
    const file = join(dir, "data.ttl");
    await writeFile(file, "@prefix ex: <https://example.org/> .\nex:s ex:p \"loaded\" .\n", "utf8");
    const store = new QuadStore();

    await expect(store.bulkLoad(file, { graph: G1 })).resolves.toBe(1);
    expect(store.count(S, P, literal("loaded"), G1)).toBe(1);
  });

  it("wraps unreadable files in RdfLoadError", async () => {
    await expect(new QuadStore().bulkLoad(join(dir, "missing.ttl"))).rejects.toBeInstanceOf(RdfLoadError);
  });

  it("serializes one graph or all", async () => {
    const store = sample();
    await expect(store.serialize("nt", { graph: G1.value })).resolves.toBe(`<${S.value}> <${P.value}> "two" .\n`);
    await expect(store.serialize("nquads", { graph: G2.value })).resolves.toBe(`<${S.value}> <${P.value}> "one" <${G2.value}> .\n`);
  });

  it("collapses graphs for triple-only formats", async () => {
    const text = await sample().serialize("nt");
    expect(text.trim().split("\n")).toHaveLength(3);
    expect(text).not.toContain(G1.value);
  });
});

describe("active store", () => {
  it("swaps and reports the displaced store", () => {
    const first = new QuadStore();
    setActiveStore(first);
    const generation = activeStore.getState().generation;
    const next = new QuadStore();

    expect(setActiveStore(next)).toBe(first);
    expect(getActiveStore()).toBe(next);
    expect(activeStore.getState().generation).toBe(generation + 1);
  });
});
