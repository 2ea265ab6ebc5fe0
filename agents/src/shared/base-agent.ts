/**
 * Base agent class: input/output validation around `run`, with failures
 * returned as results instead of thrown.
 */

import { agentLog, type AgentLogThreshold } from '@hltvsync/core';
import type { ZodType, ZodTypeDef } from 'zod';
import type { Agent, AgentConfig, AgentContext, AgentResult } from './types.js';

function describe(data: unknown): string | undefined {
  if (data === undefined) return undefined;
  if (data instanceof Error) return data.message;
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
}

export abstract class BaseAgent<TInput, TOutput> implements Agent<TInput, TOutput> {
  abstract readonly config: AgentConfig;
  abstract readonly inputSchema: ZodType<TInput, ZodTypeDef, unknown>;
  abstract readonly outputSchema: ZodType<TOutput, ZodTypeDef, unknown>;

  protected log(level: AgentLogThreshold, message: string, data?: unknown): void {
    agentLog(this.config.name, message, { level, detail: describe(data) });
  }

  protected debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  protected error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  async execute(
    input: TInput,
    context: Omit<AgentContext, 'startedAt'> = {},
  ): Promise<AgentResult<TOutput>> {
    const ctx: AgentContext = { ...context, startedAt: new Date() };
    const elapsed = () => Date.now() - ctx.startedAt.getTime();
    const where = ctx.unitKey ? { unitKey: ctx.unitKey } : undefined;

    try {
      const data = this.outputSchema.parse(await this.run(this.inputSchema.parse(input), ctx));
      const durationMs = elapsed();
      this.debug(`Completed in ${durationMs}ms`, where);
      return { success: true, data, durationMs, context: ctx };
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      this.error(`Execution failed: ${error}`, where);
      return {
        success: false,
        error,
        errorKind: err instanceof Error ? err.name : 'Error',
        durationMs: elapsed(),
        context: ctx,
      };
    }
  }

  /** The agent's own work; throw to fail. */
  protected abstract run(input: TInput, context: AgentContext): Promise<TOutput>;
}
