import {
  pgTable,
  uuid,
  text,
  varchar,
  boolean,
  timestamp,
  jsonb,
  pgEnum,
  integer,
  uniqueIndex,
  index,
} from 'drizzle-orm/pg-core';
import type { ScrapingConfiguration } from '@boardscout/schemas';

// Enums (storage)
export const targetStatusEnum = pgEnum('target_status', ['PENDING', 'ACTIVE', 'BROKEN']);

export const targets = pgTable(
  'targets',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    name: varchar('name', { length: 255 }).notNull(),
    boardUrl: text('board_url'),
    configuration: jsonb('configuration').$type<ScrapingConfiguration>(),
    status: targetStatusEnum('status').notNull().default('PENDING'),
    lastRunAt: timestamp('last_run_at'),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (table) => ({
    targetsNameIdx: uniqueIndex('targets_name_idx').on(table.name),
  }),
);

export const jobListings = pgTable(
  'job_listings',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    targetId: uuid('target_id')
      .notNull()
      .references(() => targets.id, { onDelete: 'cascade' }),
    title: text('title').notNull(),
    url: text('url').notNull(),
    description: text('description'),
    location: varchar('location', { length: 255 }),
    postedDate: varchar('posted_date', { length: 64 }),
    scrapedAt: timestamp('scraped_at').notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
  },
  (table) => ({
    jobListingsUrlIdx: uniqueIndex('job_listings_url_idx').on(table.url),
    jobListingsTargetIdx: index('job_listings_target_idx').on(table.targetId),
  }),
);

export const scrapeRuns = pgTable(
  'scrape_runs',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    targetId: uuid('target_id')
      .notNull()
      .references(() => targets.id, { onDelete: 'cascade' }),
    jobsFound: integer('jobs_found').default(0).notNull(),
    success: boolean('success').notNull(),
    errorMessage: text('error_message'),
    attempts: integer('attempts'),
    ranAt: timestamp('ran_at').defaultNow().notNull(),
  },
  (table) => ({
    scrapeRunsTargetIdx: index('scrape_runs_target_idx').on(table.targetId, table.ranAt),
  }),
);
