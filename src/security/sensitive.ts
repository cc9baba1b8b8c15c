import crypto from 'crypto';

/**
 * Anything whose backing bytes can be overwritten in place. The lifecycle guard
 * only ever talks to this interface, never to the bytes themselves.
 */
export interface SensitiveHolder {
  readonly byteLength: number;
  readonly released: boolean;
  wipe(): void;
}

/**
 * Overwrites a buffer with random bytes, then zeroes it. Length is preserved.
 */
export function wipeBuffer(buf: Uint8Array): void {
  if (buf.byteLength === 0) return;
  crypto.randomFillSync(buf);
  buf.fill(0);
}

/**
 * Owned, mutable byte storage for a sensitive value (payloads, passwords).
 * The constructor copies its input so the caller's buffer can be wiped independently.
 */
export class SensitiveBuffer implements SensitiveHolder {
  private readonly bytes: Buffer;
  private wiped = false;

  constructor(source: Uint8Array) {
    this.bytes = Buffer.alloc(source.byteLength);
    this.bytes.set(source);
  }

  /** Encodes a UTF-8 string straight into owned bytes. */
  static fromString(value: string): SensitiveBuffer {
    const tmp = Buffer.from(value, 'utf8');
    try {
      return new SensitiveBuffer(tmp);
    } finally {
      tmp.fill(0);
    }
  }

  get byteLength(): number {
    return this.bytes.byteLength;
  }

  get released(): boolean {
    return this.wiped;
  }

  /**
   * Direct view of the bytes. Valid until wipe(); callers must not copy it
   * into long-lived storage.
   */
  view(): Buffer {
    return this.bytes;
  }

  wipe(): void {
    wipeBuffer(this.bytes);
    this.wiped = true;
  }
}
