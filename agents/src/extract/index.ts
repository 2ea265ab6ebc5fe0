export {
  PAGE_EXTRACTORS,
  extract,
  extractPage,
  type ExtractInput,
  type ExtractOutcome,
} from './extract.js';
export type { ExtractContext, PageExtractor } from './context.js';
export { ExtractorAgent, type ExtractorInput } from './extractor-agent.js';
export {
  decodeEmbeddedJson,
  deriveEventStatus,
  parseNumber,
  parseOrdinal,
  unixMsToDate,
} from './html.js';
export { eventTypeFromText } from './event-pages.js';
