/**
 * Blocked-page classifier: decides whether a loaded page is an anti-bot
 * challenge instead of real content.
 *
 * The policy is data: a list of signals, each strong or weak, and a threshold
 * counted over distinct strong signals only. Weak signals are reported for
 * diagnostics and never block on their own.
 */

export type SignalStrength = 'strong' | 'weak';

export type SignalMatcher =
  | { source: 'html'; anyOf: string[] }
  | { source: 'url'; anyOf: string[] }
  | { source: 'status'; anyOf: number[] }
  | { source: 'length'; below: number };

export interface BlockSignal {
  id: string;
  strength: SignalStrength;
  match: SignalMatcher;
}

export interface BlockPolicy {
  signals: BlockSignal[];
  /** Minimum number of distinct strong signals for a page to count as blocked. */
  threshold: number;
}

export interface ClassifierInput {
  html: string;
  finalUrl: string;
  status: number | null;
}

export interface BlockClassification {
  blocked: boolean;
  strong: string[];
  weak: string[];
}

export const DEFAULT_BLOCK_SIGNALS: BlockSignal[] = [
  {
    id: 'challenge_title',
    strength: 'strong',
    match: { source: 'html', anyOf: ['<title>just a moment...</title>'] },
  },
  {
    id: 'browser_check_notice',
    strength: 'strong',
    match: { source: 'html', anyOf: ['checking your browser before accessing'] },
  },
  {
    id: 'browser_verification_markup',
    strength: 'strong',
    match: { source: 'html', anyOf: ['cf-browser-verification'] },
  },
  {
    id: 'wait_check_notice',
    strength: 'strong',
    match: { source: 'html', anyOf: ['wait while we check your browser'] },
  },
  {
    id: 'enable_cookies_notice',
    strength: 'strong',
    match: { source: 'html', anyOf: ['please enable javascript and cookies'] },
  },
  {
    id: 'attention_required',
    strength: 'strong',
    match: { source: 'html', anyOf: ['attention required!'] },
  },
  {
    id: 'challenge_redirect',
    strength: 'strong',
    match: { source: 'url', anyOf: ['/cdn-cgi/challenge-platform/', '__cf_chl'] },
  },
  {
    id: 'challenge_script',
    strength: 'strong',
    match: { source: 'html', anyOf: ['challenges.cloudflare.com', '_cf_chl_opt'] },
  },
  { id: 'challenge_status', strength: 'weak', match: { source: 'status', anyOf: [403, 503] } },
  { id: 'short_document', strength: 'weak', match: { source: 'length', below: 2000 } },
  { id: 'mentions_cloudflare', strength: 'weak', match: { source: 'html', anyOf: ['cloudflare'] } },
];

export const DEFAULT_BLOCK_POLICY: BlockPolicy = {
  signals: DEFAULT_BLOCK_SIGNALS,
  threshold: 2,
};

function matches(m: SignalMatcher, input: ClassifierInput, lowerHtml: string): boolean {
  switch (m.source) {
    case 'html':
      return m.anyOf.some((needle) => lowerHtml.includes(needle.toLowerCase()));
    case 'url': {
      const url = input.finalUrl.toLowerCase();
      return m.anyOf.some((needle) => url.includes(needle.toLowerCase()));
    }
    case 'status':
      return input.status !== null && m.anyOf.includes(input.status);
    case 'length':
      return input.html.length < m.below;
  }
}

export function classifyBlockedPage(
  input: ClassifierInput,
  policy: BlockPolicy = DEFAULT_BLOCK_POLICY,
): BlockClassification {
  const lowerHtml = input.html.toLowerCase();
  const strong = new Set<string>();
  const weak = new Set<string>();
  for (const signal of policy.signals) {
    if (!matches(signal.match, input, lowerHtml)) continue;
    (signal.strength === 'strong' ? strong : weak).add(signal.id);
  }
  return {
    blocked: strong.size >= policy.threshold,
    strong: [...strong],
    weak: [...weak],
  };
}
