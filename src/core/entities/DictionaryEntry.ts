import { z } from 'zod';

export const genderSchema = z.enum(['m', 'f', 'n']);

export const synonymEntrySchema = z
  .object({
    prati: z.string(),
    gender: genderSchema,
  })
  .passthrough();

// Fields are optional here: an entry without `head` is carried through unchanged.
// `verify` is left to passthrough; withVerifyFlag overwrites whatever the model sent.
export const dictionaryEntrySchema = z
  .object({
    head: z.string().optional(),
    gender: genderSchema.optional(),
    qual: z.string().optional(),
    syns: z.array(synonymEntrySchema).optional(),
  })
  .passthrough();

export const parsedResultSchema = z.object({
  entries: z.array(dictionaryEntrySchema),
});

export type Gender = z.infer<typeof genderSchema>;
export type SynonymEntry = z.infer<typeof synonymEntrySchema>;
export type DictionaryEntry = z.infer<typeof dictionaryEntrySchema>;
export type ParsedResult = z.infer<typeof parsedResultSchema>;

export function emptyResult(): ParsedResult {
  return { entries: [] };
}

/**
 * Rebuilds an entry as `head, verify: false, ...rest` for proofreading.
 * Entries without a headword are returned as they are.
 */
export function withVerifyFlag(entry: DictionaryEntry): DictionaryEntry {
  if (entry.head === undefined) return entry;

  const flagged: DictionaryEntry = { head: entry.head, verify: false };
  for (const [field, value] of Object.entries(entry)) {
    if (field === 'head' || field === 'verify') continue;
    flagged[field] = value;
  }
  return flagged;
}
