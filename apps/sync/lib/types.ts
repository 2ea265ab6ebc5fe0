/**
 * Engine wiring and run reporting types shared by the orchestrator modules.
 */
import type { ExtractorAgent, FetchOutcome, Reconciler } from '@hltvsync/agents';
import type { SyncStore } from '@hltvsync/db';
import type {
  FailureReason,
  PageKind,
  RunState,
  ScopeDirective,
  SyncLimits,
  UnitStatus,
} from '@hltvsync/schemas';
import type { SnapshotSink } from './snapshot-disk';
import type { PlannerEnv, UnitGroup } from './sync-planner';

/** Page loading with retries; `SessionManager` is the production implementation. */
export interface PageFetcher {
  fetch(pageKind: PageKind, url: string): Promise<FetchOutcome>;
  close(): Promise<void>;
}

export interface SyncEngine {
  store: SyncStore;
  fetcher: PageFetcher;
  extractor: ExtractorAgent;
  reconciler: Reconciler;
  snapshots: SnapshotSink | null;
  planner: PlannerEnv;
  concurrency: Record<UnitGroup, number>;
}

export interface SyncRequest {
  scope: ScopeDirective;
  limits?: SyncLimits;
  /** Start a new run even when an unfinished run exists for the same scope. */
  refresh?: boolean;
  signal?: AbortSignal;
}

export interface UnitReport {
  key: string;
  pageKind: PageKind;
  externalId: number | null;
  status: UnitStatus;
}

export interface FailureReport {
  unitKey: string;
  pageKind: PageKind;
  url: string;
  reason: FailureReason;
  attempts: number;
  signals: string[];
  message: string;
}

export interface RunSummary {
  runId: string | null;
  state: Extract<RunState, 'DONE' | 'FAILED'>;
  history: RunState[];
  resumed: boolean;
  units: UnitReport[];
  failures: FailureReport[];
  errorMessage: string | null;
}
