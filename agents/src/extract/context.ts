import { parseEntityRef, parseEntityId } from '@hltvsync/core';
import type {
  DiscoveredRef,
  EntityKind,
  ExtractionResult,
  PageKind,
  SyncRecord,
} from '@hltvsync/schemas';
import { ExtractionError } from '../shared/errors.js';
import { attrOf, textOf, type HTMLElement } from './html.js';

export interface ExtractContext {
  pageKind: PageKind;
  url: string;
  finalUrl: string;
  capturedAt: string;
  /** External id the page was requested for; null for listing pages. */
  expectedId: number | null;
}

export type PageExtractor = (doc: HTMLElement, ctx: ExtractContext) => ExtractionResult;

export function fail(ctx: ExtractContext, reason: string): never {
  throw new ExtractionError(ctx.pageKind, ctx.url, reason);
}

/**
 * The page's own external id, read from the canonical link or og:url. A page
 * that does not state which entity it is, or states a different one than was
 * requested, cannot be trusted.
 */
export function requireIdentity(doc: HTMLElement, ctx: ExtractContext, kind: EntityKind): number {
  const candidates = [
    attrOf(doc.querySelector('link[rel="canonical"]'), 'href'),
    attrOf(doc.querySelector('meta[property="og:url"]'), 'content'),
  ];
  for (const href of candidates) {
    const id = parseEntityId(href, kind);
    if (id === null) continue;
    if (ctx.expectedId !== null && id !== ctx.expectedId) {
      fail(ctx, `page identifies as ${kind.toLowerCase()} ${id}, expected ${ctx.expectedId}`);
    }
    return id;
  }
  return fail(ctx, `no ${kind.toLowerCase()} identity on page`);
}

/** Ordered, de-duplicated references from the links under `root` matching `selector`. */
export function collectRefs(
  root: HTMLElement,
  selector: string,
  kind: EntityKind,
  nameOf: (a: HTMLElement) => string | null = textOf,
): DiscoveredRef[] {
  const seen = new Set<number>();
  const refs: DiscoveredRef[] = [];
  for (const a of root.querySelectorAll(selector)) {
    const ref = parseEntityRef(attrOf(a, 'href'));
    if (!ref || ref.kind !== kind || seen.has(ref.id)) continue;
    seen.add(ref.id);
    refs.push({ kind, id: ref.id, name: nameOf(a) });
  }
  return refs;
}

export function result(
  ctx: ExtractContext,
  primaryId: number | null,
  records: SyncRecord[],
  links: DiscoveredRef[] = [],
  extras: Record<string, unknown> = {},
): ExtractionResult {
  return {
    pageKind: ctx.pageKind,
    url: ctx.url,
    capturedAt: ctx.capturedAt,
    primaryId,
    records,
    links,
    extras,
  };
}

/** Absent fragment → undefined ("not observed"); keeps null for "present but empty". */
export function observedValue<T>(value: T | null, present: boolean): T | null | undefined {
  if (value !== null) return value;
  return present ? null : undefined;
}
