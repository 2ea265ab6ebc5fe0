/**
 * Session Manager: owns the pool of browser sessions.
 *
 * - A session is one isolated browser context with its own fingerprint.
 * - Sessions are reused only for the same page kind, so one page class's
 *   suspicion does not carry over to another.
 * - A session that saw a challenge or a navigation error is discarded on release.
 * - Navigations on one session are spaced by at least `minNavDelayMs`.
 *
 * The pool starts empty (browser launched on first acquire) and is torn down by `close()`.
 */

import {
  agentLog,
  backoffDelayMs,
  jitter,
  systemClock,
  type BackoffPolicy,
  type Clock,
  type PageKindTable,
  type RandomSource,
} from '@hltvsync/core';
import type { FailureReason, PageKind } from '@hltvsync/schemas';
import {
  classifyBlockedPage,
  DEFAULT_BLOCK_POLICY,
  type BlockPolicy,
} from './blocked-page-classifier.js';
import { randomStealthProfile } from './stealth.js';
import type {
  BrowserDriver,
  BrowserPage,
  LoadResult,
  PageContent,
  StealthProfile,
} from './types.js';

export interface RetryPolicy extends BackoffPolicy {
  maxAttempts: number;
}

export interface SessionManagerOptions {
  driver: BrowserDriver;
  pageKinds: PageKindTable;
  maxSessions: number;
  minNavDelayMs: number;
  /** Extra random spacing added on top of `minNavDelayMs`. */
  navJitterMs?: number;
  navTimeoutMs: number;
  readyTimeoutMs: number;
  retry: RetryPolicy;
  blockPolicy?: BlockPolicy;
  clock?: Clock;
  random?: RandomSource;
}

export interface Session {
  readonly id: string;
  readonly pageKind: PageKind;
  readonly profile: StealthProfile;
}

interface PooledSession extends Session {
  page: BrowserPage;
  busy: boolean;
  discard: boolean;
  lastNavigationAt: number | null;
}

export type FetchOutcome =
  | { type: 'ok'; content: PageContent; attempts: number }
  | {
      type: 'failed';
      reason: Extract<FailureReason, 'BLOCKED' | 'TRANSIENT'>;
      attempts: number;
      signals: string[];
      message: string;
    };

const AGENT = 'SessionManager';

export class SessionManager {
  private readonly sessions = new Map<string, PooledSession>();
  private readonly waiters: (() => void)[] = [];
  private readonly clock: Clock;
  private readonly random: RandomSource;
  private readonly blockPolicy: BlockPolicy;
  private nextSessionId = 1;
  private closed = false;

  constructor(private readonly options: SessionManagerOptions) {
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
    this.blockPolicy = options.blockPolicy ?? DEFAULT_BLOCK_POLICY;
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Waits for capacity when `maxSessions` sessions are all busy. */
  async acquire(pageKind: PageKind): Promise<Session> {
    for (;;) {
      if (this.closed) throw new Error('Session manager is closed');

      for (const s of this.sessions.values()) {
        if (!s.busy && !s.discard && s.pageKind === pageKind) {
          s.busy = true;
          return s;
        }
      }

      if (this.sessions.size >= this.options.maxSessions) {
        // Make room by retiring an idle session of another page kind.
        const idle = [...this.sessions.values()].find((s) => !s.busy);
        if (idle) await this.destroy(idle);
      }

      if (this.sessions.size < this.options.maxSessions) {
        return this.open(pageKind);
      }

      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
  }

  release(session: Session): Promise<void> {
    const s = this.sessions.get(session.id);
    if (!s) return Promise.resolve();
    s.busy = false;
    const done = s.discard ? this.destroy(s) : Promise.resolve();
    return done.finally(() => this.waiters.shift()?.());
  }

  async load(session: Session, url: string): Promise<LoadResult> {
    const s = this.sessions.get(session.id);
    if (!s) throw new Error(`Unknown session ${session.id}`);
    const kind = this.options.pageKinds[s.pageKind];

    if (s.lastNavigationAt !== null) {
      const floor = jitter(this.options.minNavDelayMs, this.options.navJitterMs ?? 0, this.random);
      const wait = s.lastNavigationAt + floor - this.clock.now();
      if (wait > 0) await this.clock.sleep(wait);
    }
    s.lastNavigationAt = this.clock.now();

    let status: number | null;
    let finalUrl: string;
    try {
      const res = await s.page.goto(url, this.options.navTimeoutMs);
      status = res.status;
      finalUrl = res.finalUrl;
    } catch (err) {
      s.discard = true;
      const error = err instanceof Error ? err.message : String(err);
      return { type: 'transient', url, error };
    }

    let ready = true;
    try {
      await s.page.waitForSelector(kind.readySelector, this.options.readyTimeoutMs);
    } catch {
      ready = false;
      agentLog(AGENT, `Readiness selector not found for ${s.pageKind}; using page as loaded`, {
        level: 'warn',
        detail: url,
      });
    }

    let html: string;
    try {
      html = await s.page.content();
    } catch (err) {
      s.discard = true;
      const error = err instanceof Error ? err.message : String(err);
      return { type: 'transient', url, error };
    }

    const verdict = classifyBlockedPage({ html, finalUrl, status }, this.blockPolicy);
    if (verdict.blocked) {
      s.discard = true;
      return { type: 'blocked', url, status, signals: verdict.strong };
    }

    return {
      type: 'ok',
      weakSignals: verdict.weak,
      content: {
        pageKind: s.pageKind,
        url,
        finalUrl,
        status,
        html,
        ready,
        capturedAt: new Date(this.clock.now()).toISOString(),
      },
    };
  }

  /**
   * acquire → load → release, retried with exponential backoff plus jitter on
   * Blocked / TransientFailure up to `retry.maxAttempts`.
   */
  async fetch(pageKind: PageKind, url: string): Promise<FetchOutcome> {
    const { maxAttempts } = this.options.retry;
    let last: Exclude<LoadResult, { type: 'ok' }> | null = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const session = await this.acquire(pageKind);
      let result: LoadResult;
      try {
        result = await this.load(session, url);
      } finally {
        await this.release(session);
      }

      if (result.type === 'ok') {
        if (attempt > 1) {
          agentLog(AGENT, `Loaded ${pageKind} on attempt ${attempt}`, { level: 'info', detail: url });
        }
        return { type: 'ok', content: result.content, attempts: attempt };
      }

      last = result;
      const what =
        result.type === 'blocked'
          ? `blocked (${result.signals.join(', ')})`
          : `transient failure (${result.error})`;

      if (attempt < maxAttempts) {
        const delay = backoffDelayMs(attempt, this.options.retry, this.random);
        agentLog(AGENT, `Attempt ${attempt}/${maxAttempts} ${what}; retrying in ${delay}ms`, {
          level: 'warn',
          detail: url,
        });
        await this.clock.sleep(delay);
      } else {
        agentLog(AGENT, `Attempt ${attempt}/${maxAttempts} ${what}; giving up`, {
          level: 'error',
          detail: url,
        });
      }
    }

    if (last === null) {
      return { type: 'failed', reason: 'TRANSIENT', attempts: 0, signals: [], message: 'No attempts allowed' };
    }
    return last.type === 'blocked'
      ? {
          type: 'failed',
          reason: 'BLOCKED',
          attempts: maxAttempts,
          signals: last.signals,
          message: `Blocked by anti-bot challenge after ${maxAttempts} attempts`,
        }
      : {
          type: 'failed',
          reason: 'TRANSIENT',
          attempts: maxAttempts,
          signals: [],
          message: last.error,
        };
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const s of [...this.sessions.values()]) await this.destroy(s);
    await this.options.driver.close();
    for (const wake of this.waiters.splice(0)) wake();
  }

  private async open(pageKind: PageKind): Promise<PooledSession> {
    const id = `session-${this.nextSessionId++}`;
    const profile = randomStealthProfile(this.random);
    // Reserve the slot before the async open so concurrent acquires respect maxSessions.
    const placeholder: PooledSession = {
      id,
      pageKind,
      profile,
      page: PENDING_PAGE,
      busy: true,
      discard: false,
      lastNavigationAt: null,
    };
    this.sessions.set(id, placeholder);
    try {
      placeholder.page = await this.options.driver.newPage(profile);
    } catch (err) {
      this.sessions.delete(id);
      this.waiters.shift()?.();
      throw err;
    }
    agentLog(AGENT, `Opened ${id} for ${pageKind}`, { level: 'info', detail: profile.userAgent });
    return placeholder;
  }

  private async destroy(s: PooledSession): Promise<void> {
    this.sessions.delete(s.id);
    try {
      await s.page.close();
    } catch (err) {
      agentLog(AGENT, `Closing ${s.id} failed`, {
        level: 'warn',
        detail: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

const PENDING_PAGE: BrowserPage = {
  goto: () => Promise.reject(new Error('Session is still opening')),
  waitForSelector: () => Promise.reject(new Error('Session is still opening')),
  content: () => Promise.reject(new Error('Session is still opening')),
  close: () => Promise.resolve(),
};
