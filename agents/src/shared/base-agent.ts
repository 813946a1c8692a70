/**
 * Base agent class providing common functionality for all agents.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import {
  AgentInputError,
  createAgentLogger,
  failureKindOf,
  isEscalatingError,
  type AgentLogger,
} from '@boardscout/core';
import type { Agent, AgentConfig, AgentContext, AgentResult, AgentLog } from './types.js';

export abstract class BaseAgent<TInput, TOutput> implements Agent<TInput, TOutput> {
  abstract config: AgentConfig;
  abstract inputSchema: ZodType<TInput, ZodTypeDef, unknown>;
  abstract outputSchema: ZodType<TOutput, ZodTypeDef, unknown>;

  protected logs: AgentLog[] = [];
  private logger?: AgentLogger;

  protected log(level: AgentLog['level'], message: string, data?: unknown): void {
    this.logs.push({
      timestamp: new Date(),
      level,
      message,
      data,
    });

    const logger = (this.logger ??= createAgentLogger(this.config.name));
    logger[level](message, data);
  }

  protected debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  protected info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  protected warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  protected error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  /**
   * Run the agent. Failures come back as `{ success: false }`, except oracle
   * unavailability and workflow timeouts, which are rethrown. Input the schema
   * rejects throws AgentInputError before anything runs.
   */
  async execute(input: TInput, context?: Partial<AgentContext>): Promise<AgentResult<TOutput>> {
    const startTime = Date.now();
    this.logs = [];
    this.logger = context?.logger?.child(this.config.name);

    const fullContext: AgentContext = {
      timestamp: new Date(),
      ...context,
    };

    this.debug(`Starting execution`);

    const parsedInput = this.inputSchema.safeParse(input);
    if (!parsedInput.success) {
      throw new AgentInputError(
        this.config.name,
        parsedInput.error.issues.map((i) =>
          i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message,
        ),
      );
    }

    try {
      // Run the agent's main logic
      const output = await this.run(parsedInput.data, fullContext);

      // Validate output
      const validatedOutput = this.outputSchema.parse(output);

      const duration = Date.now() - startTime;
      this.info(`Completed successfully`, { duration });

      return {
        success: true,
        data: validatedOutput,
        duration,
        context: fullContext,
      };
    } catch (err) {
      if (isEscalatingError(err)) throw err;

      const duration = Date.now() - startTime;
      const errorMessage = err instanceof Error ? err.message : String(err);

      this.warn(`Execution failed: ${errorMessage}`);

      return {
        success: false,
        error: errorMessage,
        errorKind: failureKindOf(err),
        duration,
        context: fullContext,
      };
    }
  }

  /**
   * Abstract method to be implemented by each agent.
   * Contains the core agent logic.
   */
  protected abstract run(input: TInput, context: AgentContext): Promise<TOutput>;

  /**
   * Get execution logs.
   */
  getLogs(): AgentLog[] {
    return [...this.logs];
  }
}
