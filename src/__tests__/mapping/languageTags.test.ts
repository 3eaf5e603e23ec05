import { describe, it, expect } from "vitest";
import { fallbackLanguage, languageCode, normalizeLanguage, taggedTitle } from "../../mapping/languageTags";

describe("normalizeLanguage", () => {
  it("matches names case-insensitively", () => {
    expect(normalizeLanguage(" Deutsch ")).toBe("de");
    expect(normalizeLanguage("ENG")).toBe("en");
    expect(normalizeLanguage("Klingon")).toBeUndefined();
    expect(normalizeLanguage("")).toBeUndefined();
  });

  it("uses a custom map", () => {
    expect(normalizeLanguage("plattdüütsch", { nds: ["plattdüütsch"], default: "de" })).toBe("nds");
  });
});

describe("taggedTitle", () => {
  it("falls back to the map's default code", () => {
    expect(taggedTitle("Notes", "Klingon").language).toBe("und");
    expect(taggedTitle("Notes", "Klingon", { default: "en" }).language).toBe("en");
    expect(taggedTitle("Notes", "français").language).toBe("fr");
  });
});

describe("languageCode", () => {
  it("keeps unknown names verbatim", () => {
    expect(languageCode("Italiano").value).toBe("it");
    expect(languageCode("Klingon").value).toBe("Klingon");
  });
});

describe("fallbackLanguage", () => {
  it("defaults to und", () => {
    expect(fallbackLanguage({})).toBe("und");
  });
});
