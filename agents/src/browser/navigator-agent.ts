/**
 * Browser Navigator: Playwright driver behind the Session Manager.
 *
 * Responsibilities:
 * - Launch Chromium once, with stealth args
 * - Open one isolated context per session, with its own fingerprint
 * - Navigate and wait for content
 */

import { chromium, type Browser, type BrowserContext, type Page } from 'playwright-core';
import { agentLog } from '@hltvsync/core';
import { STEALTH_ARGS, hideAutomationFlags } from './stealth.js';
import type { BrowserDriver, BrowserPage, NavigationResponse, StealthProfile } from './types.js';

export interface NavigatorConfig {
  headless?: boolean;
  /** Chromium binary; playwright-core ships no browser of its own. */
  executablePath?: string;
  /** Installed browser channel, e.g. "chrome", used when no executable path is set. */
  channel?: string;
}

class PlaywrightPage implements BrowserPage {
  constructor(
    private readonly context: BrowserContext,
    private readonly page: Page,
  ) {}

  async goto(url: string, timeoutMs: number): Promise<NavigationResponse> {
    const response = await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
    return { status: response ? response.status() : null, finalUrl: this.page.url() };
  }

  async waitForSelector(selector: string, timeoutMs: number): Promise<void> {
    await this.page.waitForSelector(selector, { timeout: timeoutMs, state: 'attached' });
  }

  content(): Promise<string> {
    return this.page.content();
  }

  async close(): Promise<void> {
    await this.context.close();
  }
}

export class PlaywrightBrowserDriver implements BrowserDriver {
  private browser: Browser | null = null;
  private launching: Promise<Browser> | null = null;

  constructor(private readonly config: NavigatorConfig = {}) {}

  private async ensureBrowser(): Promise<Browser> {
    if (this.browser) return this.browser;
    if (!this.launching) {
      this.launching = chromium.launch({
        headless: this.config.headless ?? true,
        args: STEALTH_ARGS,
        executablePath: this.config.executablePath,
        channel: this.config.executablePath ? undefined : this.config.channel,
      });
    }
    try {
      this.browser = await this.launching;
      agentLog('Navigator', 'Browser launched', {
        level: 'info',
        detail: this.config.headless === false ? 'headed' : 'headless',
      });
      return this.browser;
    } finally {
      this.launching = null;
    }
  }

  async newPage(profile: StealthProfile): Promise<BrowserPage> {
    const browser = await this.ensureBrowser();
    const context = await browser.newContext({
      userAgent: profile.userAgent,
      viewport: profile.viewport,
      locale: profile.locale,
      timezoneId: profile.timezoneId,
      extraHTTPHeaders: { 'Accept-Language': profile.acceptLanguage },
    });
    await context.addInitScript(hideAutomationFlags);
    const page = await context.newPage();
    return new PlaywrightPage(context, page);
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    if (browser) await browser.close();
  }
}
