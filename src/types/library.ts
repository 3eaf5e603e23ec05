/**
 * @fileoverview Configuration shapes for one library and its mapping rules.
 * Raw shapes are zod schemas (they validate YAML input); the resolved
 * interfaces below are what the ingestion code works with.
 */

import { z } from "zod";

export const LOAD_MODES = ["json", "rdf", "manual_import"] as const;
export type LoadMode = (typeof LOAD_MODES)[number];

export const LIBRARY_TYPES = ["groups", "user", "knowledge base"] as const;
export type LibraryType = (typeof LIBRARY_TYPES)[number];

export const RDF_EXPORT_FORMATS = ["rdf_zotero", "rdf_bibliontology"] as const;

// =============================================================================
// MAPPING RULES
// =============================================================================

export const AdditionalPropertySpecSchema = z.object({
  property: z.string().min(1),
  value: z.string().min(1),
  named_node: z.boolean().optional(),
  prefix: z.string().optional(),
});

export type AdditionalPropertySpec = z.infer<typeof AdditionalPropertySpecSchema>;

const fieldList = z.array(z.string()).nullish();

export const LanguageMapSchema = z.record(z.union([z.array(z.string()), z.string()]));
export type LanguageMap = z.infer<typeof LanguageMapSchema>;

export const MapConfigSchema = z
  .object({
    white: fieldList,
    black: fieldList,
    rdf_mapping: fieldList,
    language_map: LanguageMapSchema.nullish(),
    language_tags: z.boolean().nullish(),
    fuzzy: z.number().min(0).max(100).nullish(),
    item_type: fieldList,
    collection_type: fieldList,
    named_library: z.string().nullish(),
    additional: z.array(AdditionalPropertySpecSchema).nullish(),
  })
  .passthrough();

export type MapConfig = z.infer<typeof MapConfigSchema>;

/** Mapping rules with every default applied. */
export interface MappingRules {
  white: string[];
  black: string[];
  rdfMapping: string[];
  languageMap: LanguageMap;
  /** Emit language-tagged titles instead of skipping them. */
  languageTags: boolean;
  fuzzy: number;
  itemType: string[];
  collectionType: string[];
  namedLibrary?: string;
  additional: AdditionalPropertySpec[];
}

// =============================================================================
// NOTES PARSER
// =============================================================================

const jsonSource = z.union([z.record(z.unknown()), z.string()]);

export const NotesParserConfigSchema = z
  .object({
    auto: z.boolean().optional(),
    endpoint: z.string().url().optional(),
    knowledge_base_mapping: z.boolean().optional(),
    fuzzy: z.number().min(0).max(100).optional(),
    mapping: jsonSource.optional(),
    metadata: jsonSource.optional(),
    timeout_ms: z.number().int().positive().optional(),
  })
  .passthrough();

export type NotesParserConfig = z.infer<typeof NotesParserConfigSchema>;

/** One reconciliation rule for entities found in parsed notes. */
export const KnowledgeBaseRuleSchema = z.object({
  domainTypes: z.string(),
  rangeType: z.string(),
  domainProperty: z.string(),
  targetProperty: z.string(),
  mapProperty: z.string(),
  knowledgeBaseGraph: z.string().optional(),
});

export type KnowledgeBaseRule = z.infer<typeof KnowledgeBaseRuleSchema>;

// =============================================================================
// LIBRARY
// =============================================================================

export const LibraryConfigSchema = z
  .object({
    name: z.string().min(1),
    load_mode: z.string().optional(),
    library_type: z.string().nullish(),
    library_id: z.union([z.string(), z.number()]).nullish(),
    api_key: z.string().nullish(),
    rdf_export_format: z.string().optional(),
    api_query_params: z.record(z.union([z.string(), z.number(), z.boolean()])).nullish(),
    base_uri: z.string().optional(),
    knowledge_base_graph: z.string().optional(),
    load_from: z.string().optional(),
    save_to: z.string().nullish(),
    description: z.string().optional(),
    map: MapConfigSchema.nullish(),
    notes_parser: NotesParserConfigSchema.nullish(),
  })
  .passthrough();

export type LibraryConfig = z.infer<typeof LibraryConfigSchema>;

/** Values shared by every library, taken from the `context` block and server settings. */
export interface LibraryEnvironment {
  vocab: string;
  apiUrl: string;
  baseUrl: string;
  importDirectory: string;
}
