/**
 * Pull external ids out of site links. Accepts both the profile paths
 * (`/team/ID/slug`, `/player/ID/slug`) and the stats paths (`/stats/teams/ID/slug`,
 * `/stats/players/ID/slug`), absolute or relative.
 */

import type { EntityKind } from '@hltvsync/schemas';

export interface EntityRef {
  kind: EntityKind;
  id: number;
}

const PATTERNS: { kind: EntityKind; re: RegExp }[] = [
  { kind: 'EVENT', re: /\/events\/(\d+)(?:[/?#]|$)/ },
  { kind: 'EVENT', re: /[?&]event=(\d+)(?:&|#|$)/ },
  { kind: 'TEAM', re: /\/teams?\/(\d+)(?:[/?#]|$)/ },
  { kind: 'PLAYER', re: /\/players?\/(\d+)(?:[/?#]|$)/ },
];

function pathOf(href: string): string {
  const s = href.trim();
  if (/^https?:\/\//i.test(s)) {
    try {
      const u = new URL(s);
      return `${u.pathname}${u.search}`;
    } catch {
      return s;
    }
  }
  return s;
}

/** First entity reference found in the link, or null. */
export function parseEntityRef(href: string | null | undefined): EntityRef | null {
  if (!href) return null;
  const p = pathOf(href);
  for (const { kind, re } of PATTERNS) {
    const m = re.exec(p);
    if (m) {
      const id = Number.parseInt(m[1], 10);
      if (id > 0) return { kind, id };
    }
  }
  return null;
}

export function parseEntityId(href: string | null | undefined, kind: EntityKind): number | null {
  if (!href) return null;
  const p = pathOf(href);
  for (const pattern of PATTERNS) {
    if (pattern.kind !== kind) continue;
    const m = pattern.re.exec(p);
    if (m) {
      const id = Number.parseInt(m[1], 10);
      if (id > 0) return id;
    }
  }
  return null;
}
