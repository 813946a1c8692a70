import { eq, isNotNull, and } from 'drizzle-orm';
import {
  scrapingConfigurationSchema,
  type Target,
  type TargetStatus,
  type UpsertTargetInput,
} from '@boardscout/schemas';
import type { Db } from './client';
import { targets } from './schema';

type TargetRow = typeof targets.$inferSelect;

export function toTarget(row: TargetRow): Target {
  const configuration = scrapingConfigurationSchema.safeParse(row.configuration);
  return {
    id: row.id,
    name: row.name,
    boardUrl: row.boardUrl,
    configuration: configuration.success ? configuration.data : null,
    status: row.status,
    lastRunAt: row.lastRunAt,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

/** Create or replace a target's board URL and configuration; marks it ACTIVE. */
export async function upsertTarget(db: Db, input: UpsertTargetInput): Promise<Target> {
  const now = new Date();
  const [row] = await db
    .insert(targets)
    .values({
      name: input.name,
      boardUrl: input.boardUrl,
      configuration: input.configuration,
      status: 'ACTIVE',
      updatedAt: now,
    })
    .onConflictDoUpdate({
      target: targets.name,
      set: {
        boardUrl: input.boardUrl,
        configuration: input.configuration,
        status: 'ACTIVE',
        updatedAt: now,
      },
    })
    .returning();
  if (!row) throw new Error(`Upsert of target "${input.name}" returned no row`);
  return toTarget(row);
}

export async function getTargetByName(db: Db, name: string): Promise<Target | null> {
  const [row] = await db.select().from(targets).where(eq(targets.name, name)).limit(1);
  return row ? toTarget(row) : null;
}

/** Targets that carry a board URL and a configuration, in any status. */
export async function listActiveTargets(db: Db): Promise<Target[]> {
  const rows = await db
    .select()
    .from(targets)
    .where(and(isNotNull(targets.boardUrl), isNotNull(targets.configuration)))
    .orderBy(targets.name);
  return rows.map(toTarget);
}

export async function setTargetStatus(db: Db, id: string, status: TargetStatus): Promise<void> {
  await db.update(targets).set({ status, updatedAt: new Date() }).where(eq(targets.id, id));
}
