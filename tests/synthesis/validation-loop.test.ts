import { describe, it, expect } from 'vitest';
import {
  ConfigSynthesizerAgent,
  EMPTY_SAMPLE_FEEDBACK,
  runValidationLoop,
  type ValidationTransition,
} from '@boardscout/agents';
import { OracleUnavailableError } from '@boardscout/core';
import type { ReasoningGateway } from '@boardscout/llm';
import { FakeBrowserDriver, listingPage } from '../support/fake-browser';
import { ScriptedOracle, configurationAnswer } from '../support/fake-oracle';

const BOARD = 'https://acme.example/careers';
const request = { boardUrl: BOARD, html: '<ul class="jobs"><li class="job-row">...</li></ul>' };

const board = () =>
  new FakeBrowserDriver({
    pages: {
      [BOARD]: listingPage([
        { title: 'Engineer', href: '/jobs/1' },
        { title: 'Designer', href: '/jobs/2' },
      ]),
    },
  });

describe('validation-loop', () => {
  it('succeeds on the first attempt when the sample yields jobs', async () => {
    const oracle = new ScriptedOracle();
    const outcome = await runValidationLoop(request, {
      synthesizer: new ConfigSynthesizerAgent(oracle),
      driver: board(),
    });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.attempts).toBe(1);
    expect(outcome.records.map((r) => r.title)).toEqual(['Engineer', 'Designer']);
    expect(outcome.termination.reason).toBe('NO_NEXT_CONTROL');
    expect(Object.isFrozen(outcome.configuration.fields)).toBe(true);
  });

  it('feeds an empty sample back into the next synthesis', async () => {
    const oracle = new ScriptedOracle({
      synthesize: [configurationAnswer({ listItemSelector: '.posting' }), configurationAnswer()],
    });
    const transitions: ValidationTransition[] = [];

    const outcome = await runValidationLoop(request, {
      synthesizer: new ConfigSynthesizerAgent(oracle),
      driver: board(),
      onTransition: (t) => void transitions.push(t),
    });

    expect(outcome).toMatchObject({ ok: true, attempts: 2 });
    expect(oracle.synthesizeRequests[0]?.feedback).toBeUndefined();
    expect(oracle.synthesizeRequests[1]?.feedback).toMatchObject({
      attempt: 1,
      error: EMPTY_SAMPLE_FEEDBACK,
      previous: { listItemSelector: '.posting' },
    });
    expect(transitions.map((t) => `${t.from}>${t.to}`)).toEqual([
      'SYNTHESIZE>EXECUTE_SAMPLE',
      'EXECUTE_SAMPLE>EVALUATE',
      'EVALUATE>RETRY',
      'RETRY>SYNTHESIZE',
      'SYNTHESIZE>EXECUTE_SAMPLE',
      'EXECUTE_SAMPLE>EVALUATE',
      'EVALUATE>SUCCESS',
    ]);
    expect(transitions[3]?.attempt).toBe(2);
  });

  it('never synthesizes a fourth time', async () => {
    const oracle = new ScriptedOracle({
      synthesize: [configurationAnswer({ listItemSelector: '.posting' })],
    });

    const outcome = await runValidationLoop(request, {
      synthesizer: new ConfigSynthesizerAgent(oracle),
      driver: board(),
    });

    expect(outcome).toEqual({
      ok: false,
      error: EMPTY_SAMPLE_FEEDBACK,
      kind: 'ExtractionFailure',
      attempts: 3,
    });
    expect(oracle.synthesizeRequests).toHaveLength(3);
  });

  it('counts malformed answers as attempts', async () => {
    const oracle = new ScriptedOracle({
      synthesize: [{ valid: false, error: 'Invalid JSON: Unexpected token' }, configurationAnswer()],
    });

    const outcome = await runValidationLoop(request, {
      synthesizer: new ConfigSynthesizerAgent(oracle),
      driver: board(),
    });

    expect(outcome).toMatchObject({ ok: true, attempts: 2 });
    expect(oracle.synthesizeRequests[1]?.feedback).toEqual({
      attempt: 1,
      error: 'Malformed synthesis answer: Invalid JSON: Unexpected token',
      previous: undefined,
    });
  });

  it('reports repeated refusals as SynthesisRejected', async () => {
    const oracle = new ScriptedOracle({
      synthesize: [{ valid: true, value: { status: 'refused', reason: 'login wall' } }],
    });

    const outcome = await runValidationLoop(request, {
      synthesizer: new ConfigSynthesizerAgent(oracle),
      driver: board(),
    });

    expect(outcome).toEqual({
      ok: false,
      error: 'Oracle refused to synthesize: login wall',
      kind: 'SynthesisRejected',
      attempts: 3,
    });
  });

  it('contains sample timeouts as extraction failures', async () => {
    const driver = new FakeBrowserDriver({ pages: { [BOARD]: '' }, timeouts: [BOARD] });

    const outcome = await runValidationLoop(
      request,
      { synthesizer: new ConfigSynthesizerAgent(new ScriptedOracle()), driver },
      { maxAttempts: 2 },
    );

    expect(outcome).toEqual({
      ok: false,
      error: `Page timed out after 30000ms: ${BOARD}`,
      kind: 'ExtractionFailure',
      attempts: 2,
    });
  });

  it('lets oracle outages escape the loop', async () => {
    const oracle: ReasoningGateway = {
      rank: async (candidates) => candidates,
      navigate: async () => ({ valid: true, value: { action: 'STAY' } }),
      synthesize: async () => {
        throw new OracleUnavailableError('Ollama unreachable');
      },
    };

    await expect(
      runValidationLoop(request, { synthesizer: new ConfigSynthesizerAgent(oracle), driver: board() }),
    ).rejects.toBeInstanceOf(OracleUnavailableError);
  });
});
