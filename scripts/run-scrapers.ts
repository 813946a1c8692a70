/**
 * One scheduled pass over every stored scraper.
 *
 * Options:
 *   --artifact <file>   register a scraper artifact as a target before the pass (repeatable)
 *   --target <name>     only run this target (repeatable)
 *
 * Run: npm run scrape -- --artifact scrapers/acme-corp.scraper.json
 */
import './load-env';

import {
  getDb,
  closeDb,
  DrizzlePersistenceGateway,
  InMemoryPersistenceGateway,
  type PersistenceGateway,
} from '@boardscout/db';
import { launchBrowserSession, loadScraperArtifact } from '@boardscout/agents';
import { loadConfig } from '@/lib/config';
import { runScheduledScrapes } from '@/lib/scheduler';

function readOption(args: string[], name: string): string[] {
  const values: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if (args[i] === name && value) {
      values.push(value);
      i++;
    }
  }
  return values;
}

async function main() {
  const args = process.argv.slice(2);
  const config = loadConfig();
  const persistence: PersistenceGateway = config.databaseUrl
    ? new DrizzlePersistenceGateway(getDb())
    : new InMemoryPersistenceGateway();

  const artifactTargets: string[] = [];
  for (const file of readOption(args, '--artifact')) {
    const artifact = await loadScraperArtifact(file);
    await persistence.upsertTarget({
      name: artifact.targetName,
      boardUrl: artifact.boardUrl,
      configuration: artifact.configuration,
    });
    artifactTargets.push(artifact.targetName);
    console.log(`Registered ${artifact.targetName} from ${file}`);
  }

  const only = readOption(args, '--target');
  const summary = await runScheduledScrapes(
    {
      persistence,
      launchBrowser: () =>
        launchBrowserSession({ headless: config.headless, timeout: config.pageTimeoutMs }),
    },
    {
      duplicateRatioThreshold: config.duplicateRatioThreshold,
      runRetentionDays: config.runRetentionDays,
      only: only.length ? only : config.databaseUrl ? undefined : artifactTargets,
    },
  );

  for (const result of summary.results) {
    const status = result.success ? 'ok  ' : 'FAIL';
    const stop = result.termination ? ` [${result.termination.reason}]` : '';
    console.log(
      `${status} ${result.targetName}: ${result.added} new / ${result.jobsFound} found${stop}`,
    );
    if (result.error) console.log(`     ${result.error}`);
  }
  console.log(`Done. ${summary.succeeded}/${summary.targets} targets, ${summary.jobsAdded} jobs added.`);

  await closeDb();
  if (summary.failed > 0) process.exitCode = 1;
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
