export * from './types.js';
export {
  classifyBlockedPage,
  DEFAULT_BLOCK_POLICY,
  DEFAULT_BLOCK_SIGNALS,
  type BlockClassification,
  type BlockPolicy,
  type BlockSignal,
  type ClassifierInput,
  type SignalMatcher,
  type SignalStrength,
} from './blocked-page-classifier.js';
export { STEALTH_ARGS, randomStealthProfile, hideAutomationFlags } from './stealth.js';
export { PlaywrightBrowserDriver, type NavigatorConfig } from './navigator-agent.js';
export {
  SessionManager,
  type FetchOutcome,
  type RetryPolicy,
  type Session,
  type SessionManagerOptions,
} from './session-manager.js';
