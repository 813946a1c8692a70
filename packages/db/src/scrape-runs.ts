import { and, avg, count, desc, eq, gt, lt, max, sql } from 'drizzle-orm';
import type { RunLogInput } from '@boardscout/schemas';
import type { Db } from './client';
import type { TargetRunStats } from './gateway';
import { scrapeRuns, targets } from './schema';

/** Record one execution against a target and stamp the target's last run time. */
export async function logRun(db: Db, input: RunLogInput): Promise<void> {
  const now = new Date();
  await db.insert(scrapeRuns).values({
    targetId: input.targetId,
    jobsFound: input.jobsFound,
    success: input.success,
    errorMessage: input.errorMessage ?? null,
    attempts: input.attempts ?? null,
    ranAt: now,
  });
  await db.update(targets).set({ lastRunAt: now }).where(eq(targets.id, input.targetId));
}

export async function listRunsForTarget(db: Db, targetId: string, limit = 50) {
  return db
    .select()
    .from(scrapeRuns)
    .where(eq(scrapeRuns.targetId, targetId))
    .orderBy(desc(scrapeRuns.ranAt))
    .limit(limit);
}

export async function getRunStats(db: Db, targetId: string, since: Date): Promise<TargetRunStats> {
  const [row] = await db
    .select({
      totalRuns: count(),
      successfulRuns: sql<number>`count(*) filter (where ${eq(scrapeRuns.success, true)})`.mapWith(Number),
      avgJobsFound: avg(scrapeRuns.jobsFound),
      lastRunAt: max(scrapeRuns.ranAt),
    })
    .from(scrapeRuns)
    .where(and(eq(scrapeRuns.targetId, targetId), gt(scrapeRuns.ranAt, since)));

  return {
    totalRuns: row?.totalRuns ?? 0,
    successfulRuns: row?.successfulRuns ?? 0,
    avgJobsFound: row?.avgJobsFound != null ? Number(row.avgJobsFound) : null,
    lastRunAt: row?.lastRunAt ?? null,
  };
}

export async function pruneRuns(db: Db, before: Date): Promise<number> {
  const deleted = await db
    .delete(scrapeRuns)
    .where(lt(scrapeRuns.ranAt, before))
    .returning({ id: scrapeRuns.id });
  return deleted.length;
}
