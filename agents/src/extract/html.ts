/**
 * Small, forgiving helpers over node-html-parser. Every reader returns null
 * instead of throwing when the fragment is absent.
 */

import { parse, type HTMLElement } from 'node-html-parser';
import type { EventStatus } from '@hltvsync/schemas';

export type { HTMLElement };

export function loadDocument(html: string): HTMLElement {
  return parse(html, { comment: false, blockTextElements: { script: false, style: false } });
}

/** Decoded, whitespace-collapsed text; null when empty. */
export function textOf(el: HTMLElement | null | undefined): string | null {
  if (!el) return null;
  const t = el.text.replace(/\s+/g, ' ').trim();
  return t.length > 0 ? t : null;
}

export function textAt(root: HTMLElement, selector: string): string | null {
  return textOf(root.querySelector(selector));
}

export function attrOf(el: HTMLElement | null | undefined, name: string): string | null {
  if (!el) return null;
  const v = el.getAttribute(name);
  if (v === undefined) return null;
  const t = v.trim();
  return t.length > 0 ? t : null;
}

/** "1,234", "41.2%", "+0.15", "86.7" → number; null for anything else. */
export function parseNumber(text: string | null | undefined): number | null {
  if (!text) return null;
  const m = /[-+]?\d[\d,]*(?:\.\d+)?/.exec(text);
  if (!m) return null;
  const n = Number.parseFloat(m[0].replace(/,/g, ''));
  return Number.isFinite(n) ? n : null;
}

export function parseInteger(text: string | null | undefined): number | null {
  const n = parseNumber(text);
  return n === null ? null : Math.trunc(n);
}

/** "1st" → 1, "3-4th" → 3, "#5" → 5. */
export function parseOrdinal(text: string | null | undefined): number | null {
  if (!text) return null;
  const m = /(\d+)/.exec(text);
  if (!m) return null;
  const n = Number.parseInt(m[1], 10);
  return n > 0 ? n : null;
}

/** Millisecond unix timestamp (as rendered in data-unix) → UTC YYYY-MM-DD. */
export function unixMsToDate(raw: string | null | undefined): string | null {
  if (!raw) return null;
  const ms = Number(raw);
  if (!Number.isFinite(ms) || ms <= 0) return null;
  return new Date(ms).toISOString().slice(0, 10);
}

export function deriveEventStatus(
  startDate: string | null,
  endDate: string | null,
  capturedAt: string,
): EventStatus | null {
  if (!startDate) return null;
  const today = capturedAt.slice(0, 10);
  const end = endDate ?? startDate;
  if (today < startDate) return 'UPCOMING';
  if (today > end) return 'FINISHED';
  return 'ONGOING';
}

/**
 * Embedded structured payloads (e.g. bracket JSON in a data attribute) may arrive
 * with HTML entities still escaped. Returns the parsed value, or null when the
 * payload is not JSON either way.
 */
export function decodeEmbeddedJson(raw: string | null | undefined): unknown {
  if (!raw) return null;
  const attempts = [raw, parse(raw).text];
  for (const candidate of attempts) {
    try {
      return JSON.parse(candidate);
    } catch {
      continue;
    }
  }
  return null;
}
