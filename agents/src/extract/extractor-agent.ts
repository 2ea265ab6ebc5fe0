/**
 * Extractor Agent: runs the page extractor for a loaded page and validates
 * the records it produced.
 *
 * LLM Usage: None
 */

import { z } from 'zod';
import { extractionResultSchema, pageKindEnum, type ExtractionResult } from '@hltvsync/schemas';
import { BaseAgent } from '../shared/base-agent.js';
import type { AgentConfig } from '../shared/types.js';
import { extractPage } from './extract.js';

const extractorInputSchema = z.object({
  pageKind: pageKindEnum,
  url: z.string(),
  finalUrl: z.string(),
  html: z.string(),
  capturedAt: z.string(),
  expectedId: z.number().int().positive().nullable(),
});
export type ExtractorInput = z.infer<typeof extractorInputSchema>;

export class ExtractorAgent extends BaseAgent<ExtractorInput, ExtractionResult> {
  readonly config: AgentConfig = {
    name: 'Extractor',
    description: 'Maps loaded HLTV pages to typed records',
  };

  readonly inputSchema = extractorInputSchema;
  readonly outputSchema = extractionResultSchema;

  protected async run(input: ExtractorInput): Promise<ExtractionResult> {
    const result = extractPage(input.pageKind, input);
    this.debug(`Extracted ${result.records.length} records from ${input.pageKind}`, {
      links: result.links.length,
    });
    return result;
  }
}
