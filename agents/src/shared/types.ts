/**
 * Agent contract shared by the pipeline stages.
 */

import type { ZodType, ZodTypeDef } from 'zod';

/** Where an agent call sits in a sync run; carried into its log lines. */
export interface AgentContext {
  runId?: string;
  unitKey?: string;
  startedAt: Date;
}

export type AgentResult<T> =
  | { success: true; data: T; durationMs: number; context: AgentContext }
  | {
      success: false;
      error: string;
      /** Error class name, e.g. `ExtractionError` or `ZodError`. */
      errorKind: string;
      durationMs: number;
      context: AgentContext;
    };

export interface AgentConfig {
  name: string;
  description: string;
}

export interface Agent<TInput, TOutput> {
  readonly config: AgentConfig;
  readonly inputSchema: ZodType<TInput, ZodTypeDef, unknown>;
  readonly outputSchema: ZodType<TOutput, ZodTypeDef, unknown>;
  execute(input: TInput, context?: Omit<AgentContext, 'startedAt'>): Promise<AgentResult<TOutput>>;
}
