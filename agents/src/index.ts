/**
 * @hltvsync/agents - Crawl-and-sync building blocks
 *
 * - browser/    : Session Manager, blocked-page classifier, Playwright driver
 * - extract/    : Page-to-record extractors, one per page kind
 * - reconcile/  : Upsert-by-external-id with non-regression merge
 * - shared/     : Agent base class, errors
 */

export * from './shared/index.js';
export * from './browser/index.js';
export * from './extract/index.js';
export * from './reconcile/index.js';
