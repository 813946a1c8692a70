/**
 * Job Orchestrator — runs discovery-to-storage workflows concurrently.
 *
 * QUEUED -> SEARCHING -> ANALYZING -> VALIDATING -> GENERATING -> STORING -> COMPLETE
 *
 * Each workflow gets its own browser, oracle gateway and logger; persistence
 * is the only shared state. At most `maxConcurrent` workflows run at once,
 * the rest wait in QUEUED. Every workflow ends in COMPLETE with status
 * success or error; failures are reported by kind and a sanitized message.
 */
import { randomUUID } from 'node:crypto';
import {
  WorkflowTimeoutError,
  createAgentLogger,
  failureKindOf,
  isScraperError,
  toErrorMessage,
  type AgentLogger,
} from '@boardscout/core';
import type { NavigateRequest, ReasoningGateway, SynthesizeRequest } from '@boardscout/llm';
import type { BrowserDriver } from '@boardscout/agents';
import type {
  OracleCredentials,
  ProgressEvent,
  WorkflowSnapshot,
  WorkflowStage,
} from '@boardscout/schemas';
import { ProgressStream } from '../progress-stream';
import { analyzeCandidates, publishScraper, searchCandidates, validateBoard } from './run';
import type {
  OrchestratorDeps,
  OrchestratorOptions,
  ResolvedOrchestratorOptions,
  ValidatedBoard,
  WorkflowContext,
  WorkflowRecord,
} from './types';

export * from './types';
export { searchCandidates, analyzeCandidates, validateBoard, publishScraper } from './run';

export const DEFAULT_ORCHESTRATOR_OPTIONS: ResolvedOrchestratorOptions = {
  maxConcurrent: 5,
  timeoutMs: 10 * 60_000,
  retentionMs: 60 * 60_000,
  hopBudget: 5,
  captureScreenshots: false,
  artifactDir: './scrapers',
  validation: {},
};

interface WorkflowEntry {
  record: WorkflowRecord;
  done: Promise<WorkflowSnapshot>;
}

/** Per-workflow browser and cancellation state. */
class WorkflowSession {
  cancelled = false;
  private driver?: BrowserDriver;
  private launching?: Promise<BrowserDriver>;

  constructor(
    private readonly launch: () => Promise<BrowserDriver>,
    private readonly timeoutMs: number,
  ) {}

  browser(): Promise<BrowserDriver> {
    this.launching ??= this.launch().then((driver) => {
      this.driver = driver;
      return guardDriver(driver, () => this.assertActive());
    });
    return this.launching;
  }

  assertActive(): void {
    if (this.cancelled) throw new WorkflowTimeoutError(this.timeoutMs);
  }

  async close(logger: AgentLogger): Promise<void> {
    const pending = this.launching;
    this.launching = undefined;
    if (!pending) return;
    try {
      await pending;
      await this.driver?.close();
    } catch (err) {
      logger.warn('Browser did not close cleanly', toErrorMessage(err));
    }
  }
}

export class JobOrchestrator {
  private readonly workflows = new Map<string, WorkflowEntry>();
  private readonly waiting: Array<() => void> = [];
  private readonly options: ResolvedOrchestratorOptions;
  private running = 0;

  constructor(
    private readonly deps: OrchestratorDeps,
    options: OrchestratorOptions = {},
    readonly progress: ProgressStream = new ProgressStream(),
  ) {
    this.options = {
      ...DEFAULT_ORCHESTRATOR_OPTIONS,
      ...options,
      validation: options.validation ?? DEFAULT_ORCHESTRATOR_OPTIONS.validation,
    };
  }

  /** Queue a workflow and return its id immediately. */
  createWorkflow(targetName: string, credentials: OracleCredentials = {}): string {
    this.sweep();
    const id = randomUUID();
    const now = new Date().toISOString();
    const record: WorkflowRecord = {
      id,
      targetName,
      stage: 'QUEUED',
      status: 'running',
      attempts: 0,
      createdAt: now,
      updatedAt: now,
    };
    this.progress.open(id);
    this.progress.append(id, { stage: 'QUEUED', status: 'running', message: `Queued ${targetName}` });

    const done = this.execute(record, credentials);
    this.workflows.set(id, { record, done });
    return id;
  }

  getWorkflow(id: string): WorkflowSnapshot | null {
    this.sweep();
    const entry = this.workflows.get(id);
    return entry ? this.snapshot(entry.record) : null;
  }

  listWorkflows(): WorkflowSnapshot[] {
    this.sweep();
    return [...this.workflows.values()].map((e) => this.snapshot(e.record));
  }

  /** Replay then follow; null for an unknown or expired workflow. */
  subscribe(id: string, signal?: AbortSignal): AsyncIterable<ProgressEvent> | null {
    return this.workflows.has(id) ? this.progress.subscribe(id, signal) : null;
  }

  waitForCompletion(id: string): Promise<WorkflowSnapshot> | null {
    return this.workflows.get(id)?.done ?? null;
  }

  get activeCount(): number {
    return this.running;
  }

  /** Drop finished workflows older than the retention window. */
  sweep(now = Date.now()): void {
    for (const [id, entry] of this.workflows) {
      const finishedAt = entry.record.finishedAt;
      if (finishedAt && now - Date.parse(finishedAt) > this.options.retentionMs) {
        this.workflows.delete(id);
        this.progress.delete(id);
      }
    }
  }

  private async execute(
    record: WorkflowRecord,
    credentials: OracleCredentials,
  ): Promise<WorkflowSnapshot> {
    await this.acquire();

    const logger = createAgentLogger('Orchestrator', {
      sink: this.deps.logSink,
      workflowId: record.id,
    });
    const session = new WorkflowSession(this.deps.launchBrowser, this.options.timeoutMs);
    const ctx = this.createContext(record, credentials, logger, session);

    try {
      const board = await this.withTimeout(this.discover(ctx), session);
      const published = await publishScraper(ctx, board);
      this.finish(record, 'success', `Scraper ready: ${published.jobsFound} jobs found`, {
        jobsFound: published.jobsFound,
        attempts: record.attempts,
        artifactPath: published.artifactPath,
        added: published.added,
        duplicates: published.duplicates,
      });
      logger.success(`Workflow for ${record.targetName} complete`);
    } catch (err) {
      const kind = failureKindOf(err);
      const message = sanitize(err, record.stage, credentials);
      if (!isScraperError(err)) logger.error(`Unexpected failure during ${record.stage}`, err);
      else logger.warn(`Workflow failed: ${kind}`, message);
      record.failureKind = kind;
      record.error = message;
      this.finish(record, 'error', message, { attempts: record.attempts });
    } finally {
      await session.close(logger);
      this.release();
    }
    return this.snapshot(record);
  }

  private async discover(ctx: WorkflowContext): Promise<ValidatedBoard> {
    const candidates = await searchCandidates(ctx);
    const location = await analyzeCandidates(ctx, candidates);
    return validateBoard(ctx, location);
  }

  /**
   * Race the discovery stages against the ceiling. On expiry the session is
   * cancelled so the abandoned stages fail at their next browser or oracle
   * call; the browser itself is closed by `execute`.
   */
  private async withTimeout<T>(work: Promise<T>, session: WorkflowSession): Promise<T> {
    const { timeoutMs } = this.options;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        session.cancelled = true;
        reject(new WorkflowTimeoutError(timeoutMs));
      }, timeoutMs);
    });
    try {
      return await Promise.race([work, deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private createContext(
    record: WorkflowRecord,
    credentials: OracleCredentials,
    logger: AgentLogger,
    session: WorkflowSession,
  ): WorkflowContext {
    const oracle = guardGateway(
      this.deps.createGateway(credentials, logger.child('ReasoningGateway')),
      () => session.assertActive(),
    );

    return {
      workflowId: record.id,
      targetName: record.targetName,
      deps: this.deps,
      options: this.options,
      logger,
      oracle,
      browser: () => session.browser(),
      report: (stage, message, extra) => {
        if (session.cancelled) return null;
        this.moveTo(record, stage);
        return this.progress.append(record.id, {
          stage,
          status: 'running',
          message,
          ...(extra?.image ? { image: extra.image } : {}),
          ...(extra?.data ? { data: extra.data } : {}),
        });
      },
      update: (patch) => {
        if (session.cancelled) return;
        Object.assign(record, patch, { updatedAt: new Date().toISOString() });
      },
    };
  }

  private moveTo(record: WorkflowRecord, stage: WorkflowStage): void {
    if (record.stage === stage) return;
    record.stage = stage;
    record.updatedAt = new Date().toISOString();
  }

  private finish(
    record: WorkflowRecord,
    status: 'success' | 'error',
    message: string,
    data: Record<string, unknown>,
  ): void {
    const now = new Date().toISOString();
    record.stage = 'COMPLETE';
    record.status = status;
    record.updatedAt = now;
    record.finishedAt = now;
    this.progress.append(record.id, {
      stage: 'COMPLETE',
      status,
      message,
      ...(record.failureKind ? { kind: record.failureKind } : {}),
      data,
    });
  }

  private snapshot(record: WorkflowRecord): WorkflowSnapshot {
    return { ...record, events: this.progress.history(record.id) };
  }

  private acquire(): Promise<void> {
    if (this.running < this.options.maxConcurrent) {
      this.running++;
      return Promise.resolve();
    }
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) next();
    else this.running--;
  }
}

/**
 * Message safe to show a client: taxonomy errors keep theirs, anything else
 * is replaced. Oracle keys never appear either way.
 */
function sanitize(err: unknown, stage: WorkflowStage, credentials: OracleCredentials): string {
  const message = isScraperError(err) ? err.message : `Unexpected failure during ${stage}`;
  return credentials.apiKey ? message.split(credentials.apiKey).join('[redacted]') : message;
}

function guardDriver(driver: BrowserDriver, check: () => void): BrowserDriver {
  return {
    open: async (url) => {
      check();
      await driver.open(url);
    },
    currentUrl: () => driver.currentUrl(),
    currentHtml: async () => {
      check();
      return driver.currentHtml();
    },
    click: async (selector) => {
      check();
      await driver.click(selector);
    },
    fill: async (selector, text) => {
      check();
      await driver.fill(selector, text);
    },
    submit: async (selector) => {
      check();
      await driver.submit(selector);
    },
    removeOverlays: async (selectors) => {
      check();
      return driver.removeOverlays(selectors);
    },
    screenshot: async () => {
      check();
      return driver.screenshot();
    },
    close: () => driver.close(),
  };
}

function guardGateway(gateway: ReasoningGateway, check: () => void): ReasoningGateway {
  return {
    rank: async (candidates: string[], query: string) => {
      check();
      return gateway.rank(candidates, query);
    },
    navigate: async (request: NavigateRequest) => {
      check();
      return gateway.navigate(request);
    },
    synthesize: async (request: SynthesizeRequest) => {
      check();
      return gateway.synthesize(request);
    },
  };
}
