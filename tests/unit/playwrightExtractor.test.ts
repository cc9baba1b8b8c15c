import { describe, it, expect } from 'vitest';
import {
  DEFAULT_LOGIN_SELECTORS,
  PlaywrightExtractor,
  type BrowserCookie,
  type ExtractionBrowser,
  type ExtractionContext,
  type ExtractionPage,
} from '../../src/collaborators/playwrightExtractor.js';
import { SensitiveBuffer } from '../../src/security/sensitive.js';

interface FakeOptions {
  bodyText?: string;
  cookies?: BrowserCookie[];
  gotoError?: Error;
}

class FakePage implements ExtractionPage {
  readonly visited: string[] = [];
  readonly filled: Array<[string, string]> = [];
  readonly clicked: string[] = [];

  constructor(private readonly opts: FakeOptions) {}

  async goto(url: string) {
    this.visited.push(url);
    if (this.opts.gotoError) throw this.opts.gotoError;
    return { ok: () => true };
  }
  async fill(selector: string, value: string) {
    this.filled.push([selector, value]);
  }
  async click(selector: string) {
    this.clicked.push(selector);
  }
  async waitForLoadState() {}
  async innerText() {
    return this.opts.bodyText ?? 'Welcome';
  }
  async title() {
    return 'Home';
  }
  async $$() {
    return [];
  }
}

class FakeBrowser implements ExtractionBrowser {
  closed = 0;
  cookiesRead = 0;
  readonly page: FakePage;

  constructor(private readonly opts: FakeOptions) {
    this.page = new FakePage(opts);
  }

  async newContext(): Promise<ExtractionContext> {
    return {
      newPage: async () => this.page,
      cookies: async () => {
        this.cookiesRead++;
        return this.opts.cookies ?? [];
      },
    };
  }

  async close() {
    this.closed++;
  }
}

function extractorFor(opts: FakeOptions) {
  const browser = new FakeBrowser(opts);
  const extractor = new PlaywrightExtractor({ launcher: async () => browser, navigationTimeoutMs: 1000 });
  return { browser, extractor };
}

describe('PlaywrightExtractor', () => {
  it('reads context cookies into artifacts', async () => {
    const { browser, extractor } = extractorFor({
      cookies: [
        { name: 'sid', value: 'abc', domain: '.example.com', expires: 1700000000, secure: true, httpOnly: true },
        { name: 'pref', value: 'dark', domain: '.example.com', expires: -1 },
      ],
    });

    const outcome = await extractor.extract('https://app.example.com/');

    expect(outcome.succeeded).toBe(true);
    expect(outcome.twoFactorDetected).toBe(false);
    expect(outcome.artifacts.map((a) => [a.name, a.value.toString('utf8'), a.expiresAt?.toISOString()])).toEqual([
      ['sid', 'abc', '2023-11-14T22:13:20.000Z'],
      ['pref', 'dark', undefined],
    ]);
    expect(browser.page.visited).toEqual(['https://app.example.com/']);
    expect(browser.closed).toBe(1);
  });

  it('returns no artifacts when the page asks for a second factor', async () => {
    const { browser, extractor } = extractorFor({
      bodyText: 'Enter the 6-digit code from your authenticator app',
      cookies: [{ name: 'sid', value: 'abc', domain: '.example.com' }],
    });

    const outcome = await extractor.extract('https://app.example.com/');

    expect(outcome).toEqual({ artifacts: [], twoFactorDetected: true, succeeded: false });
    expect(browser.cookiesRead).toBe(0);
    expect(browser.closed).toBe(1);
  });

  it('reports an unsuccessful extraction when no cookies were set', async () => {
    const { extractor } = extractorFor({ cookies: [] });
    await expect(extractor.extract('https://app.example.com/')).resolves.toEqual({
      artifacts: [],
      twoFactorDetected: false,
      succeeded: false,
      errorDetail: 'no cookies set',
    });
  });

  it('logs in with platform credentials before reading cookies', async () => {
    const { browser, extractor } = extractorFor({ cookies: [{ name: 'sid', value: 'abc', domain: 'd' }] });

    await extractor.extract('https://app.example.com/login', {
      username: 'tester',
      password: SensitiveBuffer.fromString('test-secret'),
    });

    expect(browser.page.filled).toEqual([
      [DEFAULT_LOGIN_SELECTORS.username, 'tester'],
      [DEFAULT_LOGIN_SELECTORS.password, 'test-secret'],
    ]);
    expect(browser.page.clicked).toEqual([DEFAULT_LOGIN_SELECTORS.submit]);
  });

  it('closes the browser when navigation fails', async () => {
    const { browser, extractor } = extractorFor({ gotoError: new Error('net::ERR_NAME_NOT_RESOLVED') });

    await expect(extractor.extract('https://nowhere.example.com/')).rejects.toThrow('net::ERR_NAME_NOT_RESOLVED');
    expect(browser.closed).toBe(1);
  });
});
