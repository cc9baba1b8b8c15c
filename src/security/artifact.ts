import { wipeBuffer, type SensitiveHolder } from './sensitive.js';

export interface ArtifactInit {
  name: string;
  /** Raw value bytes. Copied into storage owned by the artifact. */
  value: Uint8Array;
  domain: string;
  expiresAt?: Date;
  secure?: boolean;
  httpOnly?: boolean;
}

/**
 * One extracted cookie-like value.
 *
 * The value lives in a mutable Buffer from construction onward so that it can
 * be zero-filled at release; it is never held as a string. After release,
 * `value` still has the original length but every byte is 0.
 */
export class Artifact implements SensitiveHolder {
  readonly name: string;
  readonly domain: string;
  readonly expiresAt?: Date;
  readonly secure: boolean;
  readonly httpOnly: boolean;
  private readonly bytes: Buffer;
  private wiped = false;

  constructor(init: ArtifactInit) {
    this.name = init.name;
    this.domain = init.domain;
    this.expiresAt = init.expiresAt;
    this.secure = init.secure ?? false;
    this.httpOnly = init.httpOnly ?? false;
    this.bytes = Buffer.alloc(init.value.byteLength);
    this.bytes.set(init.value);
  }

  /**
   * Builds an artifact from a string value (as browser drivers return them).
   * The intermediate encoding buffer is zeroed before returning.
   */
  static fromCookie(cookie: {
    name: string;
    value: string;
    domain: string;
    expires?: number;
    secure?: boolean;
    httpOnly?: boolean;
  }): Artifact {
    const tmp = Buffer.from(cookie.value, 'utf8');
    try {
      return new Artifact({
        name: cookie.name,
        value: tmp,
        domain: cookie.domain,
        // Playwright reports -1 for session cookies
        expiresAt:
          cookie.expires !== undefined && cookie.expires > 0
            ? new Date(cookie.expires * 1000)
            : undefined,
        secure: cookie.secure,
        httpOnly: cookie.httpOnly,
      });
    } finally {
      tmp.fill(0);
    }
  }

  get value(): Buffer {
    return this.bytes;
  }

  get byteLength(): number {
    return this.bytes.byteLength;
  }

  get released(): boolean {
    return this.wiped;
  }

  wipe(): void {
    wipeBuffer(this.bytes);
    this.wiped = true;
  }

  // Keeps the value out of JSON.stringify, util.inspect and pino serialization.
  toJSON() {
    return {
      name: this.name,
      domain: this.domain,
      expiresAt: this.expiresAt?.toISOString() ?? null,
      secure: this.secure,
      httpOnly: this.httpOnly,
      value: '[REDACTED]',
    };
  }

  [Symbol.for('nodejs.util.inspect.custom')]() {
    return `Artifact(${this.name}@${this.domain}, ${this.byteLength} bytes${this.wiped ? ', released' : ''})`;
  }
}
