/**
 * Shared types and interfaces for all agents.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import type { AgentLogger } from '@boardscout/core';
import type { FailureKind } from '@boardscout/schemas';

export interface AgentContext {
  workflowId?: string;
  timestamp: Date;
  /** Parent logger; the agent logs through a child named after itself */
  logger?: AgentLogger;
  metadata?: Record<string, unknown>;
}

export interface AgentResult<T> {
  success: boolean;
  data?: T;
  error?: string;
  errorKind?: FailureKind;
  duration: number;
  context: AgentContext;
}

export interface AgentConfig {
  name: string;
  description: string;
  version: string;
}

export interface Agent<TInput, TOutput> {
  config: AgentConfig;
  inputSchema: ZodType<TInput, ZodTypeDef, unknown>;
  outputSchema: ZodType<TOutput, ZodTypeDef, unknown>;
  execute(input: TInput, context?: Partial<AgentContext>): Promise<AgentResult<TOutput>>;
}

export interface AgentLog {
  timestamp: Date;
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  data?: unknown;
}
