/**
 * Types for the browser layer
 */

import type { PageKind } from '@hltvsync/schemas';

/** A loaded, classified-clean page handed to the extractors. */
export interface PageContent {
  pageKind: PageKind;
  /** Requested url. */
  url: string;
  /** Url after redirects. */
  finalUrl: string;
  status: number | null;
  html: string;
  /** False when the readiness selector never appeared; the html may be partial. */
  ready: boolean;
  capturedAt: string;
}

export type LoadResult =
  | { type: 'ok'; content: PageContent; weakSignals: string[] }
  | { type: 'blocked'; url: string; status: number | null; signals: string[] }
  | { type: 'transient'; url: string; error: string };

/** Fingerprint-relevant properties applied to a fresh browser context. */
export interface StealthProfile {
  userAgent: string;
  viewport: { width: number; height: number };
  locale: string;
  timezoneId: string;
  acceptLanguage: string;
}

export interface NavigationResponse {
  status: number | null;
  finalUrl: string;
}

/** One isolated browsing context (cookies, storage, fingerprint). */
export interface BrowserPage {
  goto(url: string, timeoutMs: number): Promise<NavigationResponse>;
  /** Rejects when the selector does not appear within the timeout. */
  waitForSelector(selector: string, timeoutMs: number): Promise<void>;
  content(): Promise<string>;
  close(): Promise<void>;
}

export interface BrowserDriver {
  newPage(profile: StealthProfile): Promise<BrowserPage>;
  close(): Promise<void>;
}
