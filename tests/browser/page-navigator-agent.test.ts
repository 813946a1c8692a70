import { describe, it, expect } from 'vitest';
import { locateJobBoard, type HopEvent } from '@boardscout/agents';
import { NavigationExhaustedError, OracleUnavailableError } from '@boardscout/core';
import type { ReasoningGateway } from '@boardscout/llm';
import { FakeBrowserDriver, listingPage } from '../support/fake-browser';
import { ScriptedOracle } from '../support/fake-oracle';

const HOME = 'https://acme.example/';
const CAREERS = 'https://acme.example/careers';
const JOBS = 'https://acme.example/careers/jobs';

const site = () =>
  new FakeBrowserDriver({
    pages: {
      [HOME]: '<html><head><title>Acme</title></head><body><a href="/careers">Careers</a></body></html>',
      [CAREERS]: '<html><body><a href="/careers/jobs">View open jobs</a></body></html>',
      [JOBS]: listingPage([{ title: 'Engineer', href: '/jobs/1' }]),
    },
  });

const leave = (url: string) => ({ valid: true as const, value: { action: 'LEAVE' as const, url } });

describe('page-navigator-agent', () => {
  it('follows LEAVE verdicts until the oracle says STAY', async () => {
    const driver = site();
    const oracle = new ScriptedOracle({ navigate: { [HOME]: leave(CAREERS), [CAREERS]: leave(JOBS) } });
    const events: HopEvent[] = [];

    const location = await locateJobBoard(
      [HOME],
      { driver, oracle, onHop: (event) => void events.push(event) },
      { captureScreenshots: true },
    );

    expect(location.boardUrl).toBe(JOBS);
    expect(location.candidateUrl).toBe(HOME);
    expect(location.hops).toBe(3);
    expect(location.page.title).toBe('Careers');
    expect(events.map((e) => [e.hop, e.verdict])).toEqual([
      [1, 'LEAVE'],
      [2, 'LEAVE'],
      [3, 'STAY'],
    ]);
    expect(events[2]?.image).toBe(Buffer.from(`png:${JOBS}`).toString('base64'));
  });

  it('offers only job links to the oracle', async () => {
    const driver = site();
    const oracle = new ScriptedOracle();

    await locateJobBoard([HOME], { driver, oracle });

    expect(oracle.navigateRequests[0]?.links).toEqual([{ text: 'Careers', url: CAREERS }]);
  });

  it('backtracks to the next candidate when a page cannot be opened', async () => {
    const driver = site();
    const events: HopEvent[] = [];

    const location = await locateJobBoard(
      ['https://unreachable.example/', JOBS],
      { driver, oracle: new ScriptedOracle(), onHop: (event) => void events.push(event) },
    );

    expect(location.boardUrl).toBe(JOBS);
    expect(location.hops).toBe(2);
    expect(events.map((e) => [e.candidate, e.verdict])).toEqual([
      [0, 'BACKTRACK'],
      [1, 'STAY'],
    ]);
    expect(events[0]?.image).toBeUndefined();
  });

  it('gives up when the hop budget is spent on every candidate', async () => {
    const oracle = new ScriptedOracle({ navigate: { [HOME]: leave(CAREERS), [CAREERS]: leave(JOBS) } });
    const events: HopEvent[] = [];

    const attempt = locateJobBoard(
      [HOME],
      { driver: site(), oracle, onHop: (event) => void events.push(event) },
      { hopBudget: 2 },
    );

    await expect(attempt).rejects.toThrow(
      new NavigationExhaustedError('No job board found after 2 hops across 1 candidate URLs'),
    );
    expect(events.map((e) => e.verdict)).toEqual(['LEAVE', 'BACKTRACK']);
  });

  it('backtracks on a malformed verdict', async () => {
    const oracle = new ScriptedOracle({
      navigate: { [HOME]: { valid: false, error: 'LEAVE without a usable link' } },
    });
    const events: HopEvent[] = [];

    await expect(
      locateJobBoard([HOME], { driver: site(), oracle, onHop: (event) => void events.push(event) }),
    ).rejects.toBeInstanceOf(NavigationExhaustedError);
    expect(events[0]?.message).toBe('No viable link: LEAVE without a usable link');
  });

  it('fails fast without candidates', async () => {
    await expect(
      locateJobBoard([], { driver: site(), oracle: new ScriptedOracle() }),
    ).rejects.toThrow('No candidate URLs to navigate from');
  });

  it('lets oracle outages escape', async () => {
    const oracle: ReasoningGateway = {
      rank: async (candidates) => candidates,
      navigate: async () => {
        throw new OracleUnavailableError('Ollama unreachable');
      },
      synthesize: async () => ({ valid: false, error: 'unused' }),
    };

    await expect(locateJobBoard([HOME], { driver: site(), oracle })).rejects.toBeInstanceOf(
      OracleUnavailableError,
    );
  });
});
