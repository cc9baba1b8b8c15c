/**
 * Two-factor detection over page signals.
 *
 * A positive result means extraction for the target must stop without
 * producing usable artifacts; it is an outcome, not an error.
 */

export const TWO_FACTOR_PHRASES: readonly string[] = [
  'two-factor',
  'two factor',
  '2-step verification',
  'two-step verification',
  '2fa',
  'multi-factor',
  'verification code',
  'security code',
  'authentication code',
  'one-time code',
  'one-time password',
  'authenticator',
  'backup code',
  'recovery code',
  'sms code',
  'text message code',
  'enter the code',
  'confirm your identity',
];

export const TWO_FACTOR_SELECTORS: readonly string[] = [
  'input[autocomplete="one-time-code"]',
  'input[name="otp"]',
  'input[name="totp"]',
  'input[name="mfa"]',
  'input[name="app_otp"]',
  'input[name="verification"]',
  'input[name="verification_code"]',
  'input[name="two_factor_code"]',
  'input[id*="otp"]',
  'input[id*="mfa"]',
  'input[id*="two-factor"]',
  'input[id*="verification"]',
  'input[placeholder*="verification"]',
];

/** Per-selector match count, or the error raised while evaluating it. */
export type SelectorMatch = { count: number } | { error: unknown };

export interface PageSignals {
  /** Lower-cased page text content. */
  content: string;
  /** Lower-cased page title. */
  title: string;
  selectorMatches: ReadonlyMap<string, SelectorMatch>;
}

export type TwoFactorSignal =
  | { kind: 'content'; marker: string }
  | { kind: 'selector'; marker: string }
  | { kind: 'title'; marker: string };

/**
 * Returns the first positive signal, checking content phrases, then selectors,
 * then title phrases. `null` when nothing matched.
 */
export function findTwoFactorSignal(
  signals: PageSignals,
  phrases: readonly string[] = TWO_FACTOR_PHRASES,
): TwoFactorSignal | null {
  for (const p of phrases) {
    if (signals.content.includes(p)) return { kind: 'content', marker: p };
  }
  for (const [selector, match] of signals.selectorMatches) {
    if ('count' in match && match.count > 0) return { kind: 'selector', marker: selector };
  }
  for (const p of phrases) {
    if (signals.title.includes(p)) return { kind: 'title', marker: p };
  }
  return null;
}

export function detectTwoFactor(signals: PageSignals): boolean {
  return findTwoFactorSignal(signals) !== null;
}

/** The subset of a Playwright Page the signal collector needs. */
export interface SignalSource {
  innerText(selector: string): Promise<string>;
  title(): Promise<string>;
  $$(selector: string): Promise<unknown[]>;
}

/**
 * Reads page signals. Each selector is queried in isolation; a failing query
 * is recorded as an error entry and counts as no match.
 */
export async function collectPageSignals(
  page: SignalSource,
  selectors: readonly string[] = TWO_FACTOR_SELECTORS,
): Promise<PageSignals> {
  const [content, title] = await Promise.all([
    page.innerText('body').catch(() => ''),
    page.title().catch(() => ''),
  ]);
  const selectorMatches = new Map<string, SelectorMatch>();
  for (const selector of selectors) {
    try {
      const found = await page.$$(selector);
      selectorMatches.set(selector, { count: found.length });
    } catch (error) {
      selectorMatches.set(selector, { error });
    }
  }
  return {
    content: content.toLowerCase(),
    title: title.toLowerCase(),
    selectorMatches,
  };
}
