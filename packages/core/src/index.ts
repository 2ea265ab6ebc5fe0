/**
 * @hltvsync/core: configuration, page-kind table and shared utilities
 */

export { loadSyncConfig, type SyncConfig } from './config';
export {
  DEFAULT_PAGE_KINDS,
  buildPageUrl,
  type PageKindConfig,
  type PageKindTable,
} from './page-kinds';
export { parseEntityRef, parseEntityId, type EntityRef } from './hltv-urls';
export { systemClock, type Clock } from './clock';
export {
  backoffDelayMs,
  jitter,
  randomWaitMs,
  type BackoffPolicy,
  type RandomSource,
} from './backoff';
export {
  agentLog,
  getAgentLogs,
  clearAgentLogs,
  setAgentLogLevel,
  getAgentLogLevel,
  type AgentLogEntry,
  type AgentLogThreshold,
  type LogLevel,
} from './agent-logs';
