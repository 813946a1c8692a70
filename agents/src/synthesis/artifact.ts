/**
 * Scraper artifacts: a validated configuration written to disk as JSON so the
 * generic runtime can execute it without the oracle.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { InvalidConfigurationError, slugify, toErrorMessage } from '@boardscout/core';
import { formatIssues, scrapingConfigurationSchema, type ScrapingConfiguration } from '@boardscout/schemas';

export const ARTIFACT_FORMAT = 'boardscout.scraper/v1';

export const scraperArtifactSchema = z.object({
  format: z.literal(ARTIFACT_FORMAT),
  targetName: z.string().min(1),
  boardUrl: z.string().url(),
  configuration: scrapingConfigurationSchema,
  generatedAt: z.string().datetime(),
});

export type ScraperArtifact = z.infer<typeof scraperArtifactSchema>;

export function artifactPathFor(artifactDir: string, targetName: string): string {
  return path.join(artifactDir, `${slugify(targetName)}.scraper.json`);
}

export async function writeScraperArtifact(
  artifactDir: string,
  artifact: { targetName: string; boardUrl: string; configuration: ScrapingConfiguration },
  generatedAt: Date = new Date(),
): Promise<string> {
  const filePath = artifactPathFor(artifactDir, artifact.targetName);
  const body: ScraperArtifact = {
    format: ARTIFACT_FORMAT,
    targetName: artifact.targetName,
    boardUrl: artifact.boardUrl,
    configuration: artifact.configuration,
    generatedAt: generatedAt.toISOString(),
  };
  await mkdir(artifactDir, { recursive: true });
  await writeFile(filePath, `${JSON.stringify(body, null, 2)}\n`, 'utf8');
  return filePath;
}

export async function loadScraperArtifact(filePath: string): Promise<ScraperArtifact> {
  const raw = await readFile(filePath, 'utf8');
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new InvalidConfigurationError(`${filePath} is not JSON: ${toErrorMessage(err)}`);
  }
  const parsed = scraperArtifactSchema.safeParse(json);
  if (!parsed.success) {
    throw new InvalidConfigurationError(`${filePath}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}
