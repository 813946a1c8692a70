import { count, desc, eq, gt, max, sql } from 'drizzle-orm';
import type { Db } from './client';
import type { DashboardStats, TargetSummary } from './gateway';
import { jobListings, targets } from './schema';

const DAY_MS = 24 * 60 * 60 * 1000;
export const TOP_TARGETS_LIMIT = 10;

export function daysBefore(now: Date, days: number): Date {
  return new Date(now.getTime() - days * DAY_MS);
}

/** Every target with its stored job count, by name. */
export async function listTargetSummaries(db: Db): Promise<TargetSummary[]> {
  const rows = await db
    .select({
      target: targets,
      jobCount: count(jobListings.id),
      lastJobScrapedAt: max(jobListings.scrapedAt),
    })
    .from(targets)
    .leftJoin(jobListings, eq(jobListings.targetId, targets.id))
    .groupBy(targets.id)
    .orderBy(targets.name);

  return rows.map(({ target, jobCount, lastJobScrapedAt }) => ({
    id: target.id,
    name: target.name,
    boardUrl: target.boardUrl,
    status: target.status,
    lastRunAt: target.lastRunAt,
    jobCount,
    lastJobScrapedAt,
  }));
}

export async function getDashboardStats(db: Db, now: Date): Promise<DashboardStats> {
  const countSince = (since: Date) =>
    sql<number>`count(*) filter (where ${gt(jobListings.scrapedAt, since)})`.mapWith(Number);

  const [jobs] = await db
    .select({
      totalJobs: count(),
      jobsThisWeek: countSince(daysBefore(now, 7)),
      jobsToday: countSince(daysBefore(now, 1)),
    })
    .from(jobListings);

  const [active] = await db
    .select({ value: count() })
    .from(targets)
    .where(eq(targets.status, 'ACTIVE'));

  const jobCount = count(jobListings.id);
  const topTargets = await db
    .select({ name: targets.name, jobCount })
    .from(targets)
    .leftJoin(jobListings, eq(jobListings.targetId, targets.id))
    .where(eq(targets.status, 'ACTIVE'))
    .groupBy(targets.id, targets.name)
    .orderBy(desc(jobCount), targets.name)
    .limit(TOP_TARGETS_LIMIT);

  return {
    totalJobs: jobs?.totalJobs ?? 0,
    totalTargets: active?.value ?? 0,
    jobsThisWeek: jobs?.jobsThisWeek ?? 0,
    jobsToday: jobs?.jobsToday ?? 0,
    topTargets,
  };
}
