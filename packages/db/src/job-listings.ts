import { and, desc, eq, ilike, or, type SQL } from 'drizzle-orm';
import {
  isWellFormedJob,
  type BatchInsertResult,
  type JobRecord,
  type JobSearchQuery,
} from '@boardscout/schemas';
import type { Db } from './client';
import type { ListedJob } from './gateway';
import { jobListings, targets } from './schema';

export type JobListingInsert = typeof jobListings.$inferInsert;
type JobListingRow = typeof jobListings.$inferSelect;

export function toJobRecord(row: JobListingRow): JobRecord {
  return {
    title: row.title,
    url: row.url,
    description: row.description ?? undefined,
    location: row.location ?? undefined,
    postedDate: row.postedDate ?? undefined,
    scrapedAt: row.scrapedAt.toISOString(),
    targetId: row.targetId,
  };
}

export interface PreparedBatch {
  rows: JobListingInsert[];
  duplicates: number;
  errors: number;
}

/**
 * Drop malformed candidates (counted as errors) and repeats within the batch
 * (counted as duplicates) before anything reaches storage.
 */
export function prepareJobRows(
  targetId: string,
  records: readonly JobRecord[],
  knownUrls?: ReadonlySet<string>,
): PreparedBatch {
  const rows: JobListingInsert[] = [];
  const seen = new Set<string>();
  let duplicates = 0;
  let errors = 0;

  for (const record of records) {
    if (!isWellFormedJob(record)) {
      errors++;
      continue;
    }
    if (seen.has(record.url) || knownUrls?.has(record.url)) {
      duplicates++;
      continue;
    }
    seen.add(record.url);
    rows.push({
      targetId,
      title: record.title,
      url: record.url,
      description: record.description ?? null,
      location: record.location ?? null,
      postedDate: record.postedDate ?? null,
      scrapedAt: new Date(record.scrapedAt),
    });
  }

  return { rows, duplicates, errors };
}

/** Insert that leaves existing URLs untouched; returns the ids it created. */
export function buildInsertJobsQuery(db: Db, rows: JobListingInsert[]) {
  return db
    .insert(jobListings)
    .values(rows)
    .onConflictDoNothing({ target: jobListings.url })
    .returning({ id: jobListings.id });
}

export async function insertJobsBatch(
  db: Db,
  targetId: string,
  records: readonly JobRecord[],
): Promise<BatchInsertResult> {
  const { rows, duplicates, errors } = prepareJobRows(targetId, records);
  if (rows.length === 0) return { added: 0, duplicates, errors };

  const inserted = await buildInsertJobsQuery(db, rows);
  return {
    added: inserted.length,
    duplicates: duplicates + (rows.length - inserted.length),
    errors,
  };
}

export async function getExistingUrls(db: Db, targetId: string): Promise<Set<string>> {
  const rows = await db
    .select({ url: jobListings.url })
    .from(jobListings)
    .where(eq(jobListings.targetId, targetId));
  return new Set(rows.map((r) => r.url));
}

/** Stored jobs joined with their target's name, newest first. */
export function buildSearchJobsQuery(db: Db, query: JobSearchQuery) {
  const conditions: SQL[] = [];
  if (query.company) conditions.push(eq(targets.name, query.company));
  if (query.q) {
    const pattern = `%${query.q}%`;
    const text = or(ilike(jobListings.title, pattern), ilike(jobListings.description, pattern));
    if (text) conditions.push(text);
  }
  if (query.location) conditions.push(ilike(jobListings.location, `%${query.location}%`));

  return db
    .select({ listing: jobListings, targetName: targets.name })
    .from(jobListings)
    .innerJoin(targets, eq(jobListings.targetId, targets.id))
    .where(and(...conditions))
    .orderBy(desc(jobListings.scrapedAt))
    .limit(query.limit);
}

export async function searchJobs(db: Db, query: JobSearchQuery): Promise<ListedJob[]> {
  const rows = await buildSearchJobsQuery(db, query);
  return rows.map((r) => ({ ...toJobRecord(r.listing), targetName: r.targetName }));
}

export async function listJobsForTarget(db: Db, targetId: string, limit: number): Promise<JobRecord[]> {
  const rows = await db
    .select()
    .from(jobListings)
    .where(eq(jobListings.targetId, targetId))
    .orderBy(desc(jobListings.scrapedAt))
    .limit(limit);
  return rows.map(toJobRecord);
}
