import { randomUUID } from 'node:crypto';
import type {
  BatchInsertResult,
  JobRecord,
  JobSearchQuery,
  RunLogInput,
  Target,
  TargetStatus,
  UpsertTargetInput,
} from '@boardscout/schemas';
import {
  DEFAULT_RUN_RETENTION_DAYS,
  DEFAULT_RUN_STATS_DAYS,
  DEFAULT_TARGET_JOBS_LIMIT,
  type DashboardStats,
  type ListedJob,
  type PersistenceGateway,
  type RunLogEntry,
  type TargetRunStats,
  type TargetSummary,
} from './gateway';
import { prepareJobRows } from './job-listings';
import { TOP_TARGETS_LIMIT, daysBefore } from './reports';

interface StoredJob {
  targetId: string;
  record: JobRecord;
}

export class InMemoryPersistenceGateway implements PersistenceGateway {
  private readonly targets = new Map<string, Target>();
  private readonly jobs = new Map<string, StoredJob>();
  private runs: RunLogEntry[] = [];

  async upsertTarget(input: UpsertTargetInput): Promise<Target> {
    const now = new Date();
    const existing = await this.getTargetByName(input.name);
    const target: Target = {
      id: existing?.id ?? randomUUID(),
      name: input.name,
      boardUrl: input.boardUrl,
      configuration: input.configuration,
      status: 'ACTIVE',
      lastRunAt: existing?.lastRunAt ?? null,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    };
    this.targets.set(target.id, target);
    return { ...target };
  }

  async getTargetByName(name: string): Promise<Target | null> {
    for (const target of this.targets.values()) {
      if (target.name === name) return { ...target };
    }
    return null;
  }

  async listActiveTargets(): Promise<Target[]> {
    return [...this.targets.values()]
      .filter((t) => t.boardUrl !== null && t.configuration !== null)
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((t) => ({ ...t }));
  }

  async setTargetStatus(targetId: string, status: TargetStatus): Promise<void> {
    const target = this.targets.get(targetId);
    if (target) this.targets.set(targetId, { ...target, status, updatedAt: new Date() });
  }

  async insertJobsBatch(
    targetId: string,
    records: readonly JobRecord[],
  ): Promise<BatchInsertResult> {
    const known = new Set(this.jobs.keys());
    const { rows, duplicates, errors } = prepareJobRows(targetId, records, known);
    for (const row of rows) {
      this.jobs.set(row.url, {
        targetId,
        record: {
          title: row.title,
          url: row.url,
          description: row.description ?? undefined,
          location: row.location ?? undefined,
          postedDate: row.postedDate ?? undefined,
          scrapedAt: row.scrapedAt.toISOString(),
          targetId,
        },
      });
    }
    return { added: rows.length, duplicates, errors };
  }

  async logRun(input: RunLogInput): Promise<void> {
    const ranAt = new Date();
    this.runs.push({
      targetId: input.targetId,
      jobsFound: input.jobsFound,
      success: input.success,
      errorMessage: input.errorMessage ?? null,
      attempts: input.attempts ?? null,
      ranAt,
    });
    const target = this.targets.get(input.targetId);
    if (target) this.targets.set(target.id, { ...target, lastRunAt: ranAt });
  }

  async listRuns(targetId: string, limit = 50): Promise<RunLogEntry[]> {
    return this.runs
      .filter((r) => r.targetId === targetId)
      .reverse()
      .slice(0, limit);
  }

  async getExistingUrls(targetId: string): Promise<Set<string>> {
    const urls = new Set<string>();
    for (const [url, job] of this.jobs) {
      if (job.targetId === targetId) urls.add(url);
    }
    return urls;
  }

  async searchJobs(query: JobSearchQuery): Promise<ListedJob[]> {
    const contains = (value: string | undefined, needle: string) =>
      (value ?? '').toLowerCase().includes(needle.toLowerCase());

    const listed: ListedJob[] = [];
    for (const job of this.jobs.values()) {
      const target = this.targets.get(job.targetId);
      if (!target) continue;
      const { record } = job;
      if (query.company && target.name !== query.company) continue;
      if (query.q && !contains(record.title, query.q) && !contains(record.description, query.q)) continue;
      if (query.location && !contains(record.location, query.location)) continue;
      listed.push({ ...record, targetName: target.name });
    }
    return newestFirst(listed).slice(0, query.limit);
  }

  async listJobsForTarget(targetId: string, limit = DEFAULT_TARGET_JOBS_LIMIT): Promise<JobRecord[]> {
    return newestFirst(this.listJobs(targetId)).slice(0, limit);
  }

  async listTargetSummaries(): Promise<TargetSummary[]> {
    return [...this.targets.values()]
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((target) => {
        const jobs = this.listJobs(target.id);
        const latest = newestFirst(jobs)[0];
        return {
          id: target.id,
          name: target.name,
          boardUrl: target.boardUrl,
          status: target.status,
          lastRunAt: target.lastRunAt,
          jobCount: jobs.length,
          lastJobScrapedAt: latest ? new Date(latest.scrapedAt) : null,
        };
      });
  }

  async getDashboardStats(now = new Date()): Promise<DashboardStats> {
    const jobs = this.listJobs();
    const since = (days: number) => {
      const cutoff = daysBefore(now, days).getTime();
      return jobs.filter((j) => Date.parse(j.scrapedAt) > cutoff).length;
    };
    const active = (await this.listTargetSummaries()).filter((t) => t.status === 'ACTIVE');

    return {
      totalJobs: jobs.length,
      totalTargets: active.length,
      jobsThisWeek: since(7),
      jobsToday: since(1),
      topTargets: active
        .sort((a, b) => b.jobCount - a.jobCount || a.name.localeCompare(b.name))
        .slice(0, TOP_TARGETS_LIMIT)
        .map((t) => ({ name: t.name, jobCount: t.jobCount })),
    };
  }

  async getRunStats(
    targetId: string,
    days = DEFAULT_RUN_STATS_DAYS,
    now = new Date(),
  ): Promise<TargetRunStats> {
    const cutoff = daysBefore(now, days).getTime();
    const runs = this.runs.filter((r) => r.targetId === targetId && r.ranAt.getTime() > cutoff);
    return {
      totalRuns: runs.length,
      successfulRuns: runs.filter((r) => r.success).length,
      avgJobsFound: runs.length ? runs.reduce((sum, r) => sum + r.jobsFound, 0) / runs.length : null,
      lastRunAt: runs.reduce<Date | null>((latest, r) => (!latest || r.ranAt > latest ? r.ranAt : latest), null),
    };
  }

  async pruneRuns(olderThanDays = DEFAULT_RUN_RETENTION_DAYS, now = new Date()): Promise<number> {
    const cutoff = daysBefore(now, olderThanDays).getTime();
    const kept = this.runs.filter((r) => r.ranAt.getTime() >= cutoff);
    const pruned = this.runs.length - kept.length;
    this.runs = kept;
    return pruned;
  }

  /** Stored records, for inspection in tests and the dev server. */
  listJobs(targetId?: string): JobRecord[] {
    return [...this.jobs.values()]
      .filter((j) => !targetId || j.targetId === targetId)
      .map((j) => ({ ...j.record }));
  }
}

function newestFirst<T extends { scrapedAt: string }>(jobs: T[]): T[] {
  return [...jobs].sort((a, b) => Date.parse(b.scrapedAt) - Date.parse(a.scrapedAt));
}
