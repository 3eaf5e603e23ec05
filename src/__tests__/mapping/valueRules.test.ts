import { describe, it, expect } from "vitest";
import { DataFactory } from "n3";
import { entityIri } from "../../lib/canonicalId";
import { creatorLabel, entitySegments, mapValue, type RuleOutcome } from "../../mapping/valueRules";
import { BASE, KB, RDFS_LABEL, RDF_TYPE, VOCAB, makeContext, v, valuesOf } from "../fixtures/mappingFixtures";

const { namedNode } = DataFactory;

const XSD = "http://www.w3.org/2001/XMLSchema#";

function termOf(outcome: RuleOutcome) {
  if (outcome.kind !== "term") throw new Error(`expected a term outcome, got ${outcome.kind}`);
  return outcome.term;
}

describe("mapValue empty guard", () => {
  it.each([null, undefined, "", {}, []])("skips %j", (value) => {
    expect(mapValue("title", value, makeContext()).kind).toBe("skip");
  });

  it("keeps 0 and false", () => {
    expect(termOf(mapValue("extra", 0, makeContext())).value).toBe("0");
    expect(termOf(mapValue("extra", false, makeContext())).value).toBe("false");
  });
});

describe("scalar rules", () => {
  it("links record references under the base", () => {
    const ctx = makeContext();
    expect(termOf(mapValue("collections", "COL1", ctx)).value).toBe(`${BASE}/collections/COL1`);
    expect(termOf(mapValue("parentItem", "ITEM1", ctx)).value).toBe(`${BASE}/items/ITEM1`);
    expect(termOf(mapValue("parentCollection", "COL2", ctx)).value).toBe(`${BASE}/collections/COL2`);
  });

  it("turns http links into named nodes", () => {
    const t = termOf(mapValue("url", "https://example.org/a b", makeContext()));
    expect(t.termType).toBe("NamedNode");
    expect(t.value).toBe("https://example.org/a%20b");
  });

  it("resolves bare DOIs", () => {
    expect(termOf(mapValue("doi", "10.1000/xyz", makeContext())).value).toBe("https://doi.org/10.1000/xyz");
  });

  it("keeps short DOIs as literals", () => {
    const t = termOf(mapValue("doi", "10.1", makeContext()));
    expect(t.termType).toBe("Literal");
    expect(t.value).toBe("10.1");
  });

  it("types digit-only counts as xsd:int", () => {
    const t = termOf(mapValue("numPages", "123", makeContext()));
    expect(t.termType === "Literal" && t.datatype.value).toBe(`${XSD}int`);
    const loose = termOf(mapValue("numPages", "12a", makeContext()));
    expect(loose.termType === "Literal" && loose.datatype.value).toBe(`${XSD}string`);
  });

  it("classifies dates", () => {
    const year = termOf(mapValue("date", "2020", makeContext()));
    expect(year.value).toBe("2020");
    expect(year.termType === "Literal" && year.datatype.value).toBe(`${XSD}gYear`);

    const full = termOf(mapValue("date", "March 3, 2020", makeContext()));
    expect(full.value).toBe("2020-03-03");
    expect(full.termType === "Literal" && full.datatype.value).toBe(`${XSD}dateTime`);
  });

  it("keeps timestamps verbatim as xsd:dateTime", () => {
    const t = termOf(mapValue("dateModified", "2021-05-01T10:00:00Z", makeContext()));
    expect(t.value).toBe("2021-05-01T10:00:00Z");
    expect(t.termType === "Literal" && t.datatype.value).toBe(`${XSD}dateTime`);
  });

  it("splits entity fields on semicolons only", () => {
    const ctx = makeContext();
    const outcome = mapValue("publisher", "Springer, Berlin; Wiley", ctx);

    expect(outcome).toEqual({ kind: "handled", added: 8 });
    expect(valuesOf(ctx.store, ctx.subject.value, `${VOCAB}publisher`)).toEqual([
      entityIri(KB, "publisher", "Springer, Berlin"),
      entityIri(KB, "publisher", "Wiley"),
    ]);
  });

  it("skips language-dependent values unless tagging is enabled", () => {
    expect(mapValue("title", "Notes", makeContext({ language: "English" }))).toEqual({
      kind: "skip",
      reason: "language-tagging disabled",
    });

    const tagged = termOf(mapValue("title", "Notes", makeContext({ language: "English", map: { language_tags: true } })));
    expect(tagged.termType === "Literal" && tagged.language).toBe("en");

    const code = termOf(mapValue("language", "Deutsch", makeContext({ language: "Deutsch", map: { language_tags: true } })));
    expect(code.value).toBe("de");
  });

  it("emits a plain title when the record has no language", () => {
    expect(termOf(mapValue("title", "Notes", makeContext())).value).toBe("Notes");
  });
});

describe("rdf_mapping restriction", () => {
  it("turns unlisted scalars into plain literals and skips unlisted objects", () => {
    const ctx = makeContext({ map: { rdf_mapping: ["publisher"] } });
    const t = termOf(mapValue("url", "https://example.org/x", ctx));
    expect(t.termType).toBe("Literal");
    expect(mapValue("creators", { name: "Ada" }, ctx)).toEqual({ kind: "skip", reason: "not in rdf_mapping" });
  });

  it("makes every listed scalar field an entity field", () => {
    const ctx = makeContext({ map: { rdf_mapping: ["archive"] } });
    expect(mapValue("archive", "State Archive", ctx).kind).toBe("handled");
    expect(valuesOf(ctx.store, ctx.subject.value, `${VOCAB}archive`)).toEqual([entityIri(KB, "archive", "State Archive")]);
  });
});

describe("tags", () => {
  it("creates a tag entity once and links every mention", () => {
    const ctx = makeContext();
    const first = mapValue("tags", { tag: "History", type: 1 }, ctx);
    const second = mapValue("tags", { tag: "History", type: 1 }, ctx);
    const node = entityIri(KB, "tag", "History");

    expect(first).toEqual({ kind: "handled", added: 5 });
    expect(second).toEqual({ kind: "handled", added: 0 });
    expect(valuesOf(ctx.store, node, RDF_TYPE)).toEqual([`${VOCAB}tag`]);
    expect(valuesOf(ctx.store, node, RDFS_LABEL)).toEqual(["History"]);
    expect(valuesOf(ctx.store, node, `${VOCAB}type`)).toEqual(["1"]);
  });

  it("keeps tags that differ only in case apart", () => {
    const ctx = makeContext();
    mapValue("tags", { tag: "History" }, ctx);
    mapValue("tags", { tag: "history" }, ctx);
    expect(ctx.store.count(null, namedNode(RDF_TYPE), v("tag"))).toBe(2);
  });

  it("reports a tag without text as an error", () => {
    const outcome = mapValue("tags", { tag: "" }, makeContext());
    expect(outcome.kind).toBe("error");
  });
});

describe("creators", () => {
  it("builds the label from name or last and first name", () => {
    expect(creatorLabel({ name: "Smith, John" })).toBe("Smith, John");
    expect(creatorLabel({ firstName: "John", lastName: "Smith" })).toBe("Smith, John");
    expect(creatorLabel({ firstName: "", lastName: "" })).toBeUndefined();
  });

  it("keeps a comma inside a name as one person", () => {
    const ctx = makeContext();
    mapValue("creators", { name: "Smith, John", creatorType: "author" }, ctx);

    const people = ctx.store.match(null, namedNode(RDF_TYPE), v("person"));
    expect(people).toHaveLength(1);
    expect(people[0].subject.value).toBe(entityIri(KB, "person", "Smith, John"));
  });

  it("hangs the person off a typed role node", () => {
    const ctx = makeContext();
    mapValue("creators", { firstName: "Ada", lastName: "Lovelace", creatorType: "author" }, ctx);

    const [link] = ctx.store.match(ctx.subject, v("creators"));
    const role = link.object;
    expect(role.termType).toBe("BlankNode");
    expect(ctx.store.match(role, namedNode(RDF_TYPE)).map((q) => q.object.value)).toEqual([
      `${VOCAB}creatorRole`,
      `${VOCAB}author`,
    ]);
    expect(ctx.store.match(role, v("creatorType")).map((q) => q.object.value)).toEqual([`${VOCAB}author`]);
    expect(ctx.store.match(role, namedNode(RDFS_LABEL)).map((q) => q.object.value)).toEqual(["author"]);

    const person = entityIri(KB, "person", "Lovelace, Ada");
    expect(ctx.store.match(role, v("hasCreator")).map((q) => q.object.value)).toEqual([person]);
    expect(valuesOf(ctx.store, person, `${VOCAB}firstName`)).toEqual(["Ada"]);
    expect(valuesOf(ctx.store, person, `${VOCAB}lastName`)).toEqual(["Lovelace"]);
  });

  it("adds person literals only when the person is created", () => {
    const ctx = makeContext();
    mapValue("creators", { name: "Ada Lovelace", creatorType: "author" }, ctx);
    mapValue("creators", { name: "Ada Lovelace", creatorType: "editor", note: "second" }, ctx);

    const person = entityIri(KB, "person", "Ada Lovelace");
    expect(valuesOf(ctx.store, person, `${VOCAB}name`)).toEqual(["Ada Lovelace"]);
    expect(valuesOf(ctx.store, person, `${VOCAB}note`)).toEqual([]);
  });

  it("reports a creator without a name as an error", () => {
    const outcome = mapValue("creators", { creatorType: "author" }, makeContext());
    expect(outcome.kind).toBe("error");
  });
});

describe("other shapes", () => {
  it("hands unknown objects back as nested", () => {
    expect(mapValue("relations", { "dc:relation": "x" }, makeContext())).toEqual({
      kind: "nested",
      value: { "dc:relation": "x" },
    });
  });

  it("reports nested arrays as errors", () => {
    const outcome = mapValue("extra", [["a"]], makeContext());
    expect(outcome.kind).toBe("error");
  });
});

describe("entitySegments", () => {
  it("drops empty segments", () => {
    expect(entitySegments(" A ;; B ; ")).toEqual(["A", "B"]);
  });
});
