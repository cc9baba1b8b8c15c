import { chromium } from 'playwright-core';
import type { ExtractionOutcome, PlatformCredentials } from '../core/types.js';
import {
  collectPageSignals,
  findTwoFactorSignal,
  type SignalSource,
} from '../detection/twoFactorClassifier.js';
import { Artifact } from '../security/artifact.js';
import { getLogger } from '../utils/logging.js';
import type { ExtractionBoundary } from './types.js';

export interface BrowserCookie {
  name: string;
  value: string;
  domain: string;
  expires?: number;
  secure?: boolean;
  httpOnly?: boolean;
}

// The slices of playwright's Page, BrowserContext and Browser used here.
export interface ExtractionPage extends SignalSource {
  goto(url: string, opts: { waitUntil: 'networkidle'; timeout: number }): Promise<{ ok(): boolean } | null>;
  fill(selector: string, value: string): Promise<void>;
  click(selector: string): Promise<void>;
  waitForLoadState(state: 'networkidle', opts: { timeout: number }): Promise<void>;
}

export interface ExtractionContext {
  newPage(): Promise<ExtractionPage>;
  cookies(): Promise<BrowserCookie[]>;
}

export interface ExtractionBrowser {
  newContext(opts: { viewport: { width: number; height: number }; timezoneId: string }): Promise<ExtractionContext>;
  close(): Promise<void>;
}

export type BrowserLauncher = () => Promise<ExtractionBrowser>;

export interface LoginSelectors {
  username: string;
  password: string;
  submit: string;
}

export const DEFAULT_LOGIN_SELECTORS: LoginSelectors = {
  username: 'input[type="email"], input[name="username"], input[name="login"], input[autocomplete="username"]',
  password: 'input[type="password"]',
  submit: 'button[type="submit"], input[type="submit"]',
};

const VIEWPORTS = [
  { width: 1280, height: 720 },
  { width: 1366, height: 768 },
  { width: 1440, height: 900 },
];
const TIMEZONES = ['UTC', 'America/New_York', 'Europe/London'];

function pick<T>(items: readonly T[]): T {
  return items[Math.floor(Math.random() * items.length)];
}

export interface PlaywrightExtractorOptions {
  headless?: boolean;
  navigationTimeoutMs?: number;
  executablePath?: string;
  loginSelectors?: LoginSelectors;
  launcher?: BrowserLauncher;
}

/**
 * Browser boundary. Opens a fresh browser per call so that no cookie jar
 * outlives the extraction, checks the page for a second-factor prompt and
 * reads the context's cookies into Artifacts.
 */
export class PlaywrightExtractor implements ExtractionBoundary {
  private readonly launch: BrowserLauncher;
  private readonly timeout: number;

  constructor(private readonly opts: PlaywrightExtractorOptions = {}) {
    this.timeout = opts.navigationTimeoutMs ?? 30000;
    this.launch =
      opts.launcher ??
      (() =>
        chromium.launch({
          headless: opts.headless ?? true,
          executablePath: opts.executablePath,
        }));
  }

  async extract(locator: string, credentials?: PlatformCredentials): Promise<ExtractionOutcome> {
    const log = getLogger().child({ locator });
    const browser = await this.launch();
    try {
      const context = await browser.newContext({ viewport: pick(VIEWPORTS), timezoneId: pick(TIMEZONES) });
      const page = await context.newPage();
      await page.goto(locator, { waitUntil: 'networkidle', timeout: this.timeout });
      if (credentials) await this.login(page, credentials);

      const signal = findTwoFactorSignal(await collectPageSignals(page));
      if (signal) {
        // Cookies are not read at all once a second factor is requested.
        log.info({ kind: signal.kind, marker: signal.marker }, 'second factor requested');
        return { artifacts: [], twoFactorDetected: true, succeeded: false };
      }

      const artifacts = (await context.cookies()).map((c) => Artifact.fromCookie(c));
      log.debug({ count: artifacts.length }, 'cookies read');
      if (artifacts.length === 0) {
        return { artifacts, twoFactorDetected: false, succeeded: false, errorDetail: 'no cookies set' };
      }
      return { artifacts, twoFactorDetected: false, succeeded: true };
    } finally {
      await browser.close();
    }
  }

  private async login(page: ExtractionPage, credentials: PlatformCredentials): Promise<void> {
    const selectors = this.opts.loginSelectors ?? DEFAULT_LOGIN_SELECTORS;
    await page.fill(selectors.username, credentials.username);
    // fill() only takes strings
    await page.fill(selectors.password, credentials.password.view().toString('utf8'));
    await page.click(selectors.submit);
    await page.waitForLoadState('networkidle', { timeout: this.timeout });
  }
}
