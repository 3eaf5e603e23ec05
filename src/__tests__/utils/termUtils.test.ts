import { describe, it, expect } from "vitest";
import { INTERNAL_IRI_PREFIX } from "../../constants/namespaces";
import { iriToFilename, percentEncode, safeLiteral, safeNamedNode, vocabTerm } from "../../utils/termUtils";

describe("safeNamedNode", () => {
  it("encodes unsafe characters of IRIs", () => {
    expect(safeNamedNode("https://example.org/a b?x=ü#f").value).toBe("https://example.org/a%20b?x=%C3%BC#f");
  });

  it("moves scheme-less values under the internal namespace", () => {
    expect(safeNamedNode("Müller & Sons").value).toBe(`${INTERNAL_IRI_PREFIX}M%C3%BCller%20%26%20Sons`);
  });
});

describe("percentEncode", () => {
  it("keeps unreserved characters and the safe set", () => {
    expect(percentEncode("a-b_c.d~e/f")).toBe("a-b_c.d~e%2Ff");
    expect(percentEncode("a/b", "/")).toBe("a/b");
  });
});

describe("vocabTerm", () => {
  it("qualifies local names and keeps http IRIs", () => {
    expect(vocabTerm("http://example.org/vocab#", "title").value).toBe("http://example.org/vocab#title");
    expect(vocabTerm("http://example.org/vocab#", "http://schema.org/name").value).toBe("http://schema.org/name");
  });
});

describe("safeLiteral", () => {
  it("prefers a language tag over a datatype", () => {
    const tagged = safeLiteral("Titel", { language: "de", datatype: "http://www.w3.org/2001/XMLSchema#string" });
    expect(tagged.language).toBe("de");
    expect(safeLiteral(12, { datatype: "http://www.w3.org/2001/XMLSchema#int" }).datatype.value).toBe("http://www.w3.org/2001/XMLSchema#int");
    expect(safeLiteral(true).value).toBe("true");
  });
});

describe("iriToFilename", () => {
  it("joins host and path segments", () => {
    expect(iriToFilename("https://example.org/groups/42")).toBe("example.org_groups_42");
    expect(iriToFilename("urn:x:y")).toBe("_x_y");
  });
});
