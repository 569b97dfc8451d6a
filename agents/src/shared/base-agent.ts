/**
 * Base agent class providing common functionality for all agents.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { getEngineConfig } from '@tailorkit/core';
import type { Agent, AgentConfig, AgentContext, AgentResult, AgentLog, LogLevel } from './types.js';

export abstract class BaseAgent<TInput, TOutput> implements Agent<TInput, TOutput> {
  abstract config: AgentConfig;
  abstract inputSchema: ZodType<TInput, ZodTypeDef, unknown>;
  abstract outputSchema: ZodType<TOutput, ZodTypeDef, unknown>;

  protected logs: AgentLog[] = [];

  /** Resolved from the engine config at the start of each execution. */
  private logLevel: LogLevel | null = null;

  protected log(level: AgentLog['level'], message: string, data?: unknown): void {
    this.logs.push({
      timestamp: new Date(),
      level,
      message,
      data,
    });

    // Until the config has loaded, fall back to the raw env value
    const threshold = this.logLevel ?? process.env.LOG_LEVEL;
    if (threshold === 'debug' || level === 'error') {
      console.log(`[${this.config.name}] [${level.toUpperCase()}] ${message}`, data ?? '');
    }
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

  async execute(input: unknown, context?: Partial<AgentContext>): Promise<AgentResult<TOutput>> {
    const startTime = Date.now();
    this.logs = [];
    this.logLevel = null;

    const fullContext: AgentContext = {
      timestamp: new Date(),
      ...context,
    };

    this.info(`Starting execution`);

    try {
      this.logLevel = getEngineConfig().logLevel;

      // Validate input
      const validatedInput = this.inputSchema.parse(input);

      const output = await this.run(validatedInput, fullContext);

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
      const duration = Date.now() - startTime;
      const errorMessage = err instanceof Error ? err.message : String(err);

      this.error(`Execution failed: ${errorMessage}`, err);

      return {
        success: false,
        error: errorMessage,
        duration,
        context: fullContext,
      };
    }
  }

  /**
   * Contains the core agent logic. Receives input already validated by inputSchema.
   */
  protected abstract run(input: TInput, context: AgentContext): Promise<TOutput>;

  /**
   * Get execution logs.
   */
  getLogs(): AgentLog[] {
    return [...this.logs];
  }
}
