import { z } from 'zod';

const flag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((v) => (v === undefined ? fallback : v === 'true' || v === '1'));

const optionalString = z
  .string()
  .optional()
  .transform((v) => v?.trim() || undefined);

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: optionalString,
  SERPAPI_KEY: optionalString,
  OLLAMA_BASE_URL: optionalString,
  SCRAPER_ARTIFACT_DIR: z.string().default('./scrapers'),
  WORKFLOW_TIMEOUT_MS: z.coerce.number().int().positive().default(600_000),
  MAX_CONCURRENT_WORKFLOWS: z.coerce.number().int().positive().default(5),
  NAVIGATION_HOP_BUDGET: z.coerce.number().int().positive().default(5),
  PAGE_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  DUPLICATE_RATIO_THRESHOLD: z.coerce.number().gt(0).max(1).default(0.5),
  WORKFLOW_RETENTION_MS: z.coerce.number().int().nonnegative().default(3_600_000),
  SCRAPE_INTERVAL_MINUTES: z.coerce.number().int().positive().default(60),
  RUN_RETENTION_DAYS: z.coerce.number().int().positive().default(30),
  CAPTURE_SCREENSHOTS: flag(false),
  HEADLESS: flag(true),
});

export interface AppConfig {
  port: number;
  databaseUrl?: string;
  serpApiKey?: string;
  ollamaBaseUrl?: string;
  artifactDir: string;
  workflowTimeoutMs: number;
  maxConcurrentWorkflows: number;
  hopBudget: number;
  pageTimeoutMs: number;
  duplicateRatioThreshold: number;
  workflowRetentionMs: number;
  scrapeIntervalMs: number;
  runRetentionDays: number;
  captureScreenshots: boolean;
  headless: boolean;
}

/**
 * Read the environment once at bootstrap. Invalid values fail fast with the
 * offending variable names.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid environment: ${problems}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    databaseUrl: e.DATABASE_URL,
    serpApiKey: e.SERPAPI_KEY,
    ollamaBaseUrl: e.OLLAMA_BASE_URL,
    artifactDir: e.SCRAPER_ARTIFACT_DIR,
    workflowTimeoutMs: e.WORKFLOW_TIMEOUT_MS,
    maxConcurrentWorkflows: e.MAX_CONCURRENT_WORKFLOWS,
    hopBudget: e.NAVIGATION_HOP_BUDGET,
    pageTimeoutMs: e.PAGE_TIMEOUT_MS,
    duplicateRatioThreshold: e.DUPLICATE_RATIO_THRESHOLD,
    workflowRetentionMs: e.WORKFLOW_RETENTION_MS,
    scrapeIntervalMs: e.SCRAPE_INTERVAL_MINUTES * 60_000,
    runRetentionDays: e.RUN_RETENTION_DAYS,
    captureScreenshots: e.CAPTURE_SCREENSHOTS,
    headless: e.HEADLESS,
  };
}
