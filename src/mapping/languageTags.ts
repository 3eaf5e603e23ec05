import type { Literal } from "@rdfjs/types";
import defaultLanguageMap from "../constants/languageMap.json";
import type { LanguageMap } from "../types/library";
import { safeLiteral } from "../utils/termUtils";

export const DEFAULT_LANGUAGE_MAP: LanguageMap = defaultLanguageMap;

const FALLBACK_CODE = "und";

/** Maps a free-text language name ("Deutsch", "eng", …) to its code. */
export function normalizeLanguage(language: string | undefined, map: LanguageMap = DEFAULT_LANGUAGE_MAP): string | undefined {
  const normalized = language?.trim().toLowerCase();
  if (!normalized) return undefined;
  for (const [code, variants] of Object.entries(map)) {
    if (code === "default" || !Array.isArray(variants)) continue;
    if (variants.includes(normalized)) return code;
  }
  return undefined;
}

export function fallbackLanguage(map: LanguageMap = DEFAULT_LANGUAGE_MAP): string {
  const fallback = map.default;
  return typeof fallback === "string" ? fallback : FALLBACK_CODE;
}

/** `title` tagged with the code for `language`, or the map's fallback code. */
export function taggedTitle(title: string, language: string | undefined, map?: LanguageMap): Literal {
  return safeLiteral(title, { language: normalizeLanguage(language, map) ?? fallbackLanguage(map) });
}

/** The code for `language` as a plain literal; unknown names are kept verbatim. */
export function languageCode(language: string, map?: LanguageMap): Literal {
  return safeLiteral(normalizeLanguage(language, map) ?? language);
}
