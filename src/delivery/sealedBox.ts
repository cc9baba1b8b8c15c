import { createRequire } from 'module';
import type { RecipientKey } from '../core/types.js';

export type Sodium = typeof import('libsodium-wrappers');

// The package's ESM entry points at a build it does not ship; load the CommonJS one.
const sodium: Sodium = createRequire(import.meta.url)('libsodium-wrappers');

export const PUBLIC_KEY_BYTES = 32;

/** Resolves once the libsodium WASM module is initialised. */
export async function sodiumReady(): Promise<Sodium> {
  await sodium.ready;
  return sodium;
}

export async function decodePublicKey(base64Key: string): Promise<Uint8Array> {
  const s = await sodiumReady();
  const bytes = s.from_base64(base64Key, s.base64_variants.ORIGINAL);
  if (bytes.length !== PUBLIC_KEY_BYTES) {
    throw new Error(`expected ${PUBLIC_KEY_BYTES}-byte key, got ${bytes.length}`);
  }
  return bytes;
}

export async function toBase64(bytes: Uint8Array): Promise<string> {
  const s = await sodiumReady();
  return s.to_base64(bytes, s.base64_variants.ORIGINAL);
}

/**
 * Anonymous sealed box (X25519 + XSalsa20-Poly1305 with an ephemeral sender key).
 * Output differs on every call for the same input; only the holder of the
 * matching private key can open it.
 */
export async function sealPayload(key: RecipientKey, plaintext: Uint8Array): Promise<Uint8Array> {
  const s = await sodiumReady();
  return s.crypto_box_seal(plaintext, key.publicKeyBytes);
}
