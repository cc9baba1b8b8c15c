import { z } from 'zod';
import { DeliveryError, KeyFetchError, describe } from '../core/errors.js';
import type { RecipientKey } from '../core/types.js';
import { getLogger } from '../utils/logging.js';
import { deliveriesTotal, recipientKeyFetchesTotal } from '../metrics/index.js';
import { decodePublicKey, sealPayload, toBase64 } from './sealedBox.js';
import type { SecretStoreClient } from './secretStore.js';

const PublicKeyDocSchema = z.object({
  key_id: z.string().min(1),
  key: z.string().min(1),
});

/** What the orchestrator needs from a delivery mechanism. */
export interface DeliveryProtocol {
  deliver(recipientId: string, secretName: string, plaintext: Uint8Array): Promise<void>;
}

/**
 * Public-key fetch, sealed-box encryption and upload.
 *
 * Recipient keys are cached for the lifetime of the instance and never
 * expire: a different key means a different recipient, not a rotation.
 * The cache is the only state shared between concurrent runs; a miss may be
 * fetched twice, but an entry is written only once it is complete.
 */
export class SealedDeliveryProtocol implements DeliveryProtocol {
  private readonly keyCache = new Map<string, RecipientKey>();

  constructor(private readonly store: SecretStoreClient) {}

  async fetchRecipientKey(recipientId: string): Promise<RecipientKey> {
    const cached = this.keyCache.get(recipientId);
    if (cached) {
      recipientKeyFetchesTotal.inc({ result: 'hit' });
      return cached;
    }
    let doc: unknown;
    try {
      doc = await this.store.getPublicKey(recipientId);
    } catch (err) {
      recipientKeyFetchesTotal.inc({ result: 'error' });
      throw new KeyFetchError(recipientId, describe(err), err);
    }
    const parsed = PublicKeyDocSchema.safeParse(doc);
    if (!parsed.success) {
      recipientKeyFetchesTotal.inc({ result: 'error' });
      throw new KeyFetchError(recipientId, 'malformed public key document', parsed.error);
    }
    let publicKeyBytes: Uint8Array;
    try {
      publicKeyBytes = await decodePublicKey(parsed.data.key);
    } catch (err) {
      recipientKeyFetchesTotal.inc({ result: 'error' });
      throw new KeyFetchError(recipientId, `undecodable public key: ${describe(err)}`, err);
    }
    const key: RecipientKey = Object.freeze({
      keyIdentifier: parsed.data.key_id,
      publicKeyBytes,
    });
    this.keyCache.set(recipientId, key);
    recipientKeyFetchesTotal.inc({ result: 'fetched' });
    getLogger().debug({ recipientId, keyId: key.keyIdentifier }, 'recipient key cached');
    return key;
  }

  sealPayload(key: RecipientKey, plaintext: Uint8Array): Promise<Uint8Array> {
    return sealPayload(key, plaintext);
  }

  /**
   * Seals `plaintext` for `recipientId` and uploads it under `secretName`.
   * Key lookup failures surface as KeyFetchError, upload failures as
   * DeliveryError. A failed upload leaves the cached key in place.
   */
  async deliver(recipientId: string, secretName: string, plaintext: Uint8Array): Promise<void> {
    const key = await this.fetchRecipientKey(recipientId);
    const ciphertext = await this.sealPayload(key, plaintext);
    const encrypted = await toBase64(ciphertext);
    try {
      await this.store.putSecret(recipientId, secretName, {
        key_id: key.keyIdentifier,
        encrypted_value: encrypted,
      });
    } catch (err) {
      deliveriesTotal.inc({ result: 'failure' });
      throw new DeliveryError(recipientId, secretName, describe(err), err);
    }
    deliveriesTotal.inc({ result: 'success' });
    getLogger().info({ recipientId, secretName, keyId: key.keyIdentifier }, 'sealed secret delivered');
  }
}

/** Stand-in used by `relay run --dry-run`: logs what would be delivered, uploads nothing. */
export class DryRunDelivery implements DeliveryProtocol {
  readonly deliveries: Array<{ recipientId: string; secretName: string; bytes: number }> = [];

  async deliver(recipientId: string, secretName: string, plaintext: Uint8Array): Promise<void> {
    this.deliveries.push({ recipientId, secretName, bytes: plaintext.byteLength });
    getLogger().info({ recipientId, secretName, bytes: plaintext.byteLength }, 'dry-run: delivery skipped');
  }
}
