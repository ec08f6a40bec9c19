/**
 * Schemas for cache records read back from storage
 */

import { z } from 'zod';
import type { CacheKind, CachePayloads } from '../types.js';

const FormatStateSchema = z.object({
  present: z.boolean(),
  statusText: z.string(),
  libraryLabel: z.string(),
});

export const SourceItemSchema = z.object({
  link: z.string().nullable(),
  title: z.string(),
  author: z.string(),
});

export const LibraryCandidateSchema = z.object({
  id: z.string(),
  title: z.string(),
  author: z.string(),
  formatStatuses: z.object({
    eBook: FormatStateSchema,
    AudioBook: FormatStateSchema,
  }),
});

const StatusLetterSchema = z.enum(['Have', 'Wanted', 'Skipped', 'Ignored', 'Missing']);

export const MatchResultSchema = z.object({
  sourceItem: SourceItemSchema,
  libraryMatches: z.array(LibraryCandidateSchema),
  perFormatStatus: z.object({
    eBook: StatusLetterSchema.optional(),
    AudioBook: StatusLetterSchema.optional(),
  }),
});

/** On-disk record: `{ fetchedAt, payload }` */
export const StoredRecordSchema = z.object({
  fetchedAt: z.string().datetime({ offset: true }),
  payload: z.unknown(),
});

export type StoredRecord = z.infer<typeof StoredRecordSchema>;

const payloadSchemas: { [K in CacheKind]: z.ZodType<CachePayloads[K]> } = {
  'source-list': z.array(SourceItemSchema),
  'reconciliation': z.array(MatchResultSchema),
};

export function parsePayload<K extends CacheKind>(kind: K, payload: unknown): CachePayloads[K] {
  return payloadSchemas[kind].parse(payload);
}
