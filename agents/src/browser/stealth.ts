/**
 * Anti-detection configuration applied to every fresh browser context.
 */

import { randomWaitMs, type RandomSource } from '@hltvsync/core';
import type { StealthProfile } from './types.js';

export const STEALTH_ARGS = [
  '--disable-blink-features=AutomationControlled',
  '--disable-dev-shm-usage',
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-infobars',
  '--window-position=0,0',
];

const USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36',
];

const VIEWPORTS = [
  { width: 1920, height: 1080 },
  { width: 1536, height: 864 },
  { width: 1440, height: 900 },
  { width: 1366, height: 768 },
];

const LOCALES = [
  { locale: 'en-US', timezoneId: 'America/New_York', acceptLanguage: 'en-US,en;q=0.9' },
  { locale: 'en-GB', timezoneId: 'Europe/London', acceptLanguage: 'en-GB,en;q=0.9' },
  { locale: 'en-US', timezoneId: 'Europe/Berlin', acceptLanguage: 'en-US,en;q=0.8,de;q=0.6' },
];

function pick<T>(items: readonly T[], random: RandomSource): T {
  return items[randomWaitMs(0, items.length - 1, random)];
}

/** A randomized, internally consistent fingerprint for one session. */
export function randomStealthProfile(random: RandomSource = Math.random): StealthProfile {
  const loc = pick(LOCALES, random);
  return {
    userAgent: pick(USER_AGENTS, random),
    viewport: { ...pick(VIEWPORTS, random) },
    locale: loc.locale,
    timezoneId: loc.timezoneId,
    acceptLanguage: loc.acceptLanguage,
  };
}

/** Runs in the page before any site script; hides the automation flags headless Chromium exposes. */
export function hideAutomationFlags(): void {
  Object.defineProperty(navigator, 'webdriver', { get: () => undefined });
  Object.defineProperty(navigator, 'languages', { get: () => ['en-US', 'en'] });
  Object.defineProperty(navigator, 'plugins', { get: () => [1, 2, 3, 4, 5] });
}
