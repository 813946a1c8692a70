/**
 * Orchestrator types: dependencies shared by all workflows and the state each
 * workflow accumulates across stages.
 */
import type { AgentLogger, LogSink } from '@boardscout/core';
import type { PersistenceGateway } from '@boardscout/db';
import type { ReasoningGateway } from '@boardscout/llm';
import type { BrowserDriver, CandidateSearch, ValidationLoopOptions } from '@boardscout/agents';
import type {
  FailureKind,
  JobRecord,
  OracleCredentials,
  ProgressEvent,
  ScrapingConfiguration,
  WorkflowStage,
  WorkflowStatus,
} from '@boardscout/schemas';

export interface OrchestratorDeps {
  /** The only state workflows share */
  persistence: PersistenceGateway;
  search: CandidateSearch;
  launchBrowser: () => Promise<BrowserDriver>;
  /** Built per workflow; credentials go no further than the gateway */
  createGateway: (credentials: OracleCredentials, logger: AgentLogger) => ReasoningGateway;
  logSink?: LogSink;
}

export interface OrchestratorOptions {
  maxConcurrent?: number;
  /** Ceiling on SEARCHING + ANALYZING + VALIDATING */
  timeoutMs?: number;
  /** How long finished workflows stay queryable */
  retentionMs?: number;
  hopBudget?: number;
  captureScreenshots?: boolean;
  artifactDir?: string;
  validation?: ValidationLoopOptions;
}

export type ResolvedOrchestratorOptions = Required<Omit<OrchestratorOptions, 'validation'>> & {
  validation: ValidationLoopOptions;
};

export interface WorkflowRecord {
  id: string;
  targetName: string;
  stage: WorkflowStage;
  status: WorkflowStatus;
  boardUrl?: string;
  artifactPath?: string;
  attempts: number;
  jobsFound?: number;
  failureKind?: FailureKind;
  error?: string;
  createdAt: string;
  updatedAt: string;
  finishedAt?: string;
}

export interface StageReport {
  image?: string;
  data?: Record<string, unknown>;
}

/** What one workflow's stages see. */
export interface WorkflowContext {
  workflowId: string;
  targetName: string;
  deps: OrchestratorDeps;
  options: ResolvedOrchestratorOptions;
  logger: AgentLogger;
  oracle: ReasoningGateway;
  /** Launched on first use, closed by the orchestrator */
  browser: () => Promise<BrowserDriver>;
  report: (stage: WorkflowStage, message: string, extra?: StageReport) => ProgressEvent | null;
  update: (patch: Partial<WorkflowRecord>) => void;
}

export interface ValidatedBoard {
  boardUrl: string;
  configuration: Readonly<ScrapingConfiguration>;
  records: JobRecord[];
  attempts: number;
}

export interface PublishedScraper {
  targetId: string;
  artifactPath: string;
  jobsFound: number;
  added: number;
  duplicates: number;
}
