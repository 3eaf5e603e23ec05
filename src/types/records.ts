import { z } from "zod";

/**
 * One entry of the library API's JSON: items carry `data.itemType`,
 * collections `data.name`. Anything else in the entry is kept untouched.
 */
export const ApiRecordSchema = z
  .object({
    key: z.string().optional(),
    library: z.record(z.unknown()).optional(),
    data: z.record(z.unknown()),
  })
  .passthrough();

export type ApiRecord = z.infer<typeof ApiRecordSchema>;

export type RecordKind = "items" | "collections";

/** Decides whether a JSON dump holds items or collections; undefined when neither fits every entry. */
export function classifyRecords(records: ApiRecord[]): RecordKind | undefined {
  if (records.every((r) => "itemType" in r.data)) return "items";
  if (records.every((r) => "name" in r.data)) return "collections";
  return undefined;
}
