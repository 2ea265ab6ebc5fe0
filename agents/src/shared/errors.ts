import type { PageKind } from '@hltvsync/schemas';

/** The page cannot yield a trustworthy record; retrying the same content reproduces it. */
export class ExtractionError extends Error {
  readonly pageKind: PageKind;
  readonly url: string;

  constructor(pageKind: PageKind, url: string, reason: string) {
    super(`${pageKind} ${url}: ${reason}`);
    this.name = 'ExtractionError';
    this.pageKind = pageKind;
    this.url = url;
  }
}
