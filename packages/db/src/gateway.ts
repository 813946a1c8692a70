/**
 * Persistence Gateway — the only state shared between workflows.
 * Drizzle/Postgres in production; InMemoryPersistenceGateway when no
 * DATABASE_URL is configured and in tests.
 */

import type {
  BatchInsertResult,
  JobRecord,
  JobSearchQuery,
  RunLogInput,
  Target,
  TargetStatus,
  UpsertTargetInput,
} from '@boardscout/schemas';
import type { Db } from './client';
import {
  upsertTarget,
  getTargetByName,
  listActiveTargets,
  setTargetStatus,
} from './targets';
import { insertJobsBatch, getExistingUrls, listJobsForTarget, searchJobs } from './job-listings';
import { logRun, listRunsForTarget, getRunStats, pruneRuns } from './scrape-runs';
import { daysBefore, getDashboardStats, listTargetSummaries } from './reports';

export const DEFAULT_TARGET_JOBS_LIMIT = 100;
export const DEFAULT_RUN_STATS_DAYS = 7;
export const DEFAULT_RUN_RETENTION_DAYS = 30;

export interface RunLogEntry {
  targetId: string;
  jobsFound: number;
  success: boolean;
  errorMessage: string | null;
  attempts: number | null;
  ranAt: Date;
}

export interface ListedJob extends JobRecord {
  targetName: string;
}

export interface TargetSummary {
  id: string;
  name: string;
  boardUrl: string | null;
  status: TargetStatus;
  lastRunAt: Date | null;
  jobCount: number;
  lastJobScrapedAt: Date | null;
}

export interface DashboardStats {
  totalJobs: number;
  /** Targets currently ACTIVE */
  totalTargets: number;
  jobsThisWeek: number;
  jobsToday: number;
  /** ACTIVE targets by stored job count, at most TOP_TARGETS_LIMIT */
  topTargets: Array<{ name: string; jobCount: number }>;
}

export interface TargetRunStats {
  totalRuns: number;
  successfulRuns: number;
  avgJobsFound: number | null;
  lastRunAt: Date | null;
}

export interface PersistenceGateway {
  upsertTarget(input: UpsertTargetInput): Promise<Target>;
  getTargetByName(name: string): Promise<Target | null>;
  listActiveTargets(): Promise<Target[]>;
  setTargetStatus(targetId: string, status: TargetStatus): Promise<void>;
  /** Idempotent on url: a url already stored is counted as a duplicate, never an error. */
  insertJobsBatch(targetId: string, records: readonly JobRecord[]): Promise<BatchInsertResult>;
  logRun(input: RunLogInput): Promise<void>;
  listRuns(targetId: string, limit?: number): Promise<RunLogEntry[]>;
  getExistingUrls(targetId: string): Promise<Set<string>>;

  /** Newest first, across every target. */
  searchJobs(query: JobSearchQuery): Promise<ListedJob[]>;
  listJobsForTarget(targetId: string, limit?: number): Promise<JobRecord[]>;
  listTargetSummaries(): Promise<TargetSummary[]>;
  getDashboardStats(now?: Date): Promise<DashboardStats>;
  /** Runs logged in the `days` before `now`. */
  getRunStats(targetId: string, days?: number, now?: Date): Promise<TargetRunStats>;
  /** Delete run logs older than `olderThanDays`; returns how many went. */
  pruneRuns(olderThanDays?: number, now?: Date): Promise<number>;
}

export class DrizzlePersistenceGateway implements PersistenceGateway {
  constructor(private readonly db: Db) {}

  upsertTarget(input: UpsertTargetInput): Promise<Target> {
    return upsertTarget(this.db, input);
  }

  getTargetByName(name: string): Promise<Target | null> {
    return getTargetByName(this.db, name);
  }

  listActiveTargets(): Promise<Target[]> {
    return listActiveTargets(this.db);
  }

  setTargetStatus(targetId: string, status: TargetStatus): Promise<void> {
    return setTargetStatus(this.db, targetId, status);
  }

  insertJobsBatch(targetId: string, records: readonly JobRecord[]): Promise<BatchInsertResult> {
    return insertJobsBatch(this.db, targetId, records);
  }

  logRun(input: RunLogInput): Promise<void> {
    return logRun(this.db, input);
  }

  async listRuns(targetId: string, limit?: number): Promise<RunLogEntry[]> {
    const rows = await listRunsForTarget(this.db, targetId, limit);
    return rows.map((r) => ({
      targetId: r.targetId,
      jobsFound: r.jobsFound,
      success: r.success,
      errorMessage: r.errorMessage,
      attempts: r.attempts,
      ranAt: r.ranAt,
    }));
  }

  getExistingUrls(targetId: string): Promise<Set<string>> {
    return getExistingUrls(this.db, targetId);
  }

  searchJobs(query: JobSearchQuery): Promise<ListedJob[]> {
    return searchJobs(this.db, query);
  }

  listJobsForTarget(targetId: string, limit = DEFAULT_TARGET_JOBS_LIMIT): Promise<JobRecord[]> {
    return listJobsForTarget(this.db, targetId, limit);
  }

  listTargetSummaries(): Promise<TargetSummary[]> {
    return listTargetSummaries(this.db);
  }

  getDashboardStats(now = new Date()): Promise<DashboardStats> {
    return getDashboardStats(this.db, now);
  }

  getRunStats(targetId: string, days = DEFAULT_RUN_STATS_DAYS, now = new Date()): Promise<TargetRunStats> {
    return getRunStats(this.db, targetId, daysBefore(now, days));
  }

  pruneRuns(olderThanDays = DEFAULT_RUN_RETENTION_DAYS, now = new Date()): Promise<number> {
    return pruneRuns(this.db, daysBefore(now, olderThanDays));
  }
}
