import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { OracleUnavailableError } from '@boardscout/core';
import { InMemoryPersistenceGateway } from '@boardscout/db';
import { loadScraperArtifact, type CandidateSearch } from '@boardscout/agents';
import type { ReasoningGateway } from '@boardscout/llm';
import type { ProgressEvent } from '@boardscout/schemas';
import { JobOrchestrator, type OrchestratorDeps } from '@/lib/orchestrator';
import { FakeBrowserDriver, listingPage } from '../support/fake-browser';
import { ScriptedOracle } from '../support/fake-oracle';

const HOME = 'https://acme.example/';
const CAREERS = 'https://acme.example/careers';

const acmeSite = () =>
  new FakeBrowserDriver({
    pages: {
      [HOME]: '<html><body><a href="/careers">Careers</a></body></html>',
      [CAREERS]: listingPage(
        [1, 2, 3, 4, 5].map((n) => ({ title: `Role ${n}`, href: `/jobs/${n}`, location: 'Remote' })),
      ),
    },
  });

const searchReturning = (urls: string[]): CandidateSearch => ({
  findCandidates: async () => urls,
});

const stagesOf = (events: ProgressEvent[]) =>
  events.map((e) => e.stage).filter((stage, i, all) => stage !== all[i - 1]);

describe('JobOrchestrator', () => {
  let artifactDir: string;
  let persistence: InMemoryPersistenceGateway;

  beforeEach(async () => {
    artifactDir = await mkdtemp(path.join(os.tmpdir(), 'boardscout-orchestrator-'));
    persistence = new InMemoryPersistenceGateway();
  });

  afterEach(async () => {
    await rm(artifactDir, { recursive: true, force: true });
  });

  const deps = (overrides: Partial<OrchestratorDeps> = {}): OrchestratorDeps => ({
    persistence,
    search: searchReturning([HOME]),
    launchBrowser: async () => acmeSite(),
    createGateway: () =>
      new ScriptedOracle({
        navigate: { [HOME]: { valid: true, value: { action: 'LEAVE', url: CAREERS } } },
      }),
    ...overrides,
  });

  it('takes a target from name to stored jobs', async () => {
    const driver = acmeSite();
    const orchestrator = new JobOrchestrator(deps({ launchBrowser: async () => driver }), {
      artifactDir,
    });

    const id = orchestrator.createWorkflow('Acme Corp');
    const snapshot = await orchestrator.waitForCompletion(id);

    expect(snapshot).toMatchObject({
      id,
      targetName: 'Acme Corp',
      stage: 'COMPLETE',
      status: 'success',
      boardUrl: CAREERS,
      attempts: 1,
      jobsFound: 5,
      artifactPath: path.join(artifactDir, 'acme-corp.scraper.json'),
    });
    expect(stagesOf(snapshot?.events ?? [])).toEqual([
      'QUEUED',
      'SEARCHING',
      'ANALYZING',
      'VALIDATING',
      'GENERATING',
      'STORING',
      'COMPLETE',
    ]);
    expect(snapshot?.events.map((e) => e.seq)).toEqual(snapshot?.events.map((_, i) => i + 1));
    expect(snapshot?.events.at(-1)?.data).toMatchObject({ jobsFound: 5, added: 5, duplicates: 0 });
    expect(driver.closed).toBe(true);

    const target = await persistence.getTargetByName('Acme Corp');
    expect(target?.boardUrl).toBe(CAREERS);
    expect(persistence.listJobs(target?.id)).toHaveLength(5);
    expect(persistence.listJobs(target?.id).every((j) => j.targetId === target?.id)).toBe(true);
    expect((await loadScraperArtifact(path.join(artifactDir, 'acme-corp.scraper.json'))).boardUrl).toBe(
      CAREERS,
    );
  });

  it('reports each navigation hop as an ANALYZING event', async () => {
    const orchestrator = new JobOrchestrator(deps(), { artifactDir });
    const snapshot = await orchestrator.waitForCompletion(orchestrator.createWorkflow('Acme Corp'));

    const hops = (snapshot?.events ?? []).filter((e) => e.stage === 'ANALYZING' && e.data);
    expect(hops.map((e) => e.data)).toEqual([
      { hop: 1, candidate: 0, url: HOME, verdict: 'LEAVE' },
      { hop: 2, candidate: 0, url: CAREERS, verdict: 'STAY' },
    ]);
  });

  it('tries a stored board url before search results', async () => {
    const first = new JobOrchestrator(deps(), { artifactDir });
    await first.waitForCompletion(first.createWorkflow('Acme Corp'));

    const oracle = new ScriptedOracle();
    const second = new JobOrchestrator(deps({ createGateway: () => oracle }), { artifactDir });
    const snapshot = await second.waitForCompletion(second.createWorkflow('Acme Corp'));

    expect(snapshot?.status).toBe('success');
    expect(oracle.navigateRequests[0]?.url).toBe(CAREERS);
    expect(snapshot?.events.at(-1)?.data).toMatchObject({ added: 0, duplicates: 5 });
  });

  it('ends in COMPLETE with the failure kind when no board is found', async () => {
    const orchestrator = new JobOrchestrator(deps({ search: searchReturning([]) }), { artifactDir });

    const snapshot = await orchestrator.waitForCompletion(orchestrator.createWorkflow('Nowhere Inc'));

    expect(snapshot).toMatchObject({
      stage: 'COMPLETE',
      status: 'error',
      failureKind: 'NavigationExhausted',
      error: 'No candidate URLs to navigate from',
    });
    expect(snapshot?.events.at(-1)).toMatchObject({
      stage: 'COMPLETE',
      status: 'error',
      kind: 'NavigationExhausted',
    });
  });

  it('times out long discoveries', async () => {
    const orchestrator = new JobOrchestrator(
      deps({ search: { findCandidates: () => new Promise<string[]>(() => {}) } }),
      { artifactDir, timeoutMs: 20 },
    );

    const snapshot = await orchestrator.waitForCompletion(orchestrator.createWorkflow('Slow Co'));

    expect(snapshot?.status).toBe('error');
    expect(snapshot?.failureKind).toBe('WorkflowTimeout');
    expect(snapshot?.events.filter((e) => e.stage === 'COMPLETE')).toHaveLength(1);
  });

  it('hides unexpected error messages', async () => {
    const orchestrator = new JobOrchestrator(
      deps({
        search: {
          findCandidates: async () => {
            throw new Error('connect ECONNREFUSED 10.0.0.7:5432');
          },
        },
      }),
      { artifactDir },
    );

    const snapshot = await orchestrator.waitForCompletion(orchestrator.createWorkflow('Acme Corp'));

    expect(snapshot).toMatchObject({
      failureKind: 'RuntimeFailure',
      error: 'Unexpected failure during SEARCHING',
    });
  });

  it('never echoes the oracle key', async () => {
    const failing: ReasoningGateway = {
      rank: async () => {
        throw new OracleUnavailableError('Ollama chat failed: 401 - bad key test-secret');
      },
      navigate: async () => ({ valid: true, value: { action: 'STAY' } }),
      synthesize: async () => ({ valid: false, error: 'unused' }),
    };
    const orchestrator = new JobOrchestrator(deps({ createGateway: () => failing }), { artifactDir });

    const snapshot = await orchestrator.waitForCompletion(
      orchestrator.createWorkflow('Acme Corp', { apiKey: 'test-secret' }),
    );

    expect(snapshot).toMatchObject({
      failureKind: 'OracleUnavailable',
      error: 'Ollama chat failed: 401 - bad key [redacted]',
    });
    expect(JSON.stringify(snapshot)).not.toContain('test-secret');
  });

  it('queues workflows beyond the concurrency limit', async () => {
    let release: (urls: string[]) => void = () => {};
    const gate = new Promise<string[]>((resolve) => {
      release = resolve;
    });
    const orchestrator = new JobOrchestrator(
      deps({ search: { findCandidates: () => gate } }),
      { artifactDir, maxConcurrent: 1 },
    );

    const first = orchestrator.createWorkflow('Acme Corp');
    const second = orchestrator.createWorkflow('Globex');
    await new Promise((resolve) => setTimeout(resolve, 10));

    expect(orchestrator.activeCount).toBe(1);
    expect(orchestrator.getWorkflow(first)?.stage).toBe('SEARCHING');
    expect(orchestrator.getWorkflow(second)?.stage).toBe('QUEUED');

    release([]);
    await orchestrator.waitForCompletion(first);
    await orchestrator.waitForCompletion(second);

    expect(orchestrator.activeCount).toBe(0);
    expect(orchestrator.getWorkflow(second)?.stage).toBe('COMPLETE');
  });

  it('replays the whole history to a late subscriber', async () => {
    const orchestrator = new JobOrchestrator(deps(), { artifactDir });
    const id = orchestrator.createWorkflow('Acme Corp');
    const snapshot = await orchestrator.waitForCompletion(id);

    const stream = orchestrator.subscribe(id);
    expect(stream).not.toBeNull();
    if (!stream) return;

    const seen: ProgressEvent[] = [];
    for await (const event of stream) seen.push(event);

    expect(seen).toEqual(snapshot?.events);
    expect(seen.at(-1)?.stage).toBe('COMPLETE');
  });

  it('forgets finished workflows after the retention window', async () => {
    const orchestrator = new JobOrchestrator(deps({ search: searchReturning([]) }), {
      artifactDir,
      retentionMs: 1000,
    });
    const id = orchestrator.createWorkflow('Acme Corp');
    await orchestrator.waitForCompletion(id);

    orchestrator.sweep(Date.now() + 500);
    expect(orchestrator.getWorkflow(id)).not.toBeNull();

    orchestrator.sweep(Date.now() + 5000);
    expect(orchestrator.getWorkflow(id)).toBeNull();
    expect(orchestrator.subscribe(id)).toBeNull();
  });

  it('returns null for unknown workflows', () => {
    const orchestrator = new JobOrchestrator(deps(), { artifactDir });
    expect(orchestrator.getWorkflow('missing')).toBeNull();
    expect(orchestrator.waitForCompletion('missing')).toBeNull();
  });
});
