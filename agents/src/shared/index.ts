export * from './types.js';
export { BaseAgent } from './base-agent.js';
export { ExtractionError } from './errors.js';
