import { z } from 'zod';

const absoluteHttpUrl = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), 'url must be absolute http(s)');

export const jobRecordSchema = z.object({
  title: z.string().min(1),
  url: absoluteHttpUrl,
  description: z.string().optional(),
  location: z.string().optional(),
  postedDate: z.string().optional(),
  scrapedAt: z.string().datetime(),
  targetId: z.string().nullable(),
});

export type JobRecord = z.infer<typeof jobRecordSchema>;

export const batchInsertResultSchema = z.object({
  added: z.number().int().nonnegative(),
  duplicates: z.number().int().nonnegative(),
  errors: z.number().int().nonnegative(),
});

export type BatchInsertResult = z.infer<typeof batchInsertResultSchema>;

/** True when a record carries the two fields persistence and identity depend on. */
export function isWellFormedJob(record: { title?: string | null; url?: string | null }): boolean {
  return !!record.title?.trim() && absoluteHttpUrl.safeParse(record.url).success;
}

export const MAX_JOB_SEARCH_LIMIT = 100;

/** Filters for reading stored jobs back; text filters are case-insensitive substrings. */
export const jobSearchQuerySchema = z.object({
  q: z.string().trim().optional(),
  /** Exact target name */
  company: z.string().trim().optional(),
  location: z.string().trim().optional(),
  limit: z.coerce
    .number()
    .int()
    .positive()
    .default(50)
    .transform((limit) => Math.min(limit, MAX_JOB_SEARCH_LIMIT)),
});

export type JobSearchQuery = z.infer<typeof jobSearchQuerySchema>;
