/**
 * HTTP client for the remote secret store.
 *
 * Speaks the GitHub Actions secrets API shape: a per-repository public key
 * endpoint and a PUT that takes `{ encrypted_value, key_id }`.
 */

import { requestJson } from '../utils/http.js';

export interface SealedSecretBody {
  key_id: string;
  encrypted_value: string; // base64 sealed box
}

export interface SecretStoreClient {
  /** Raw JSON of the recipient's public key document; validated by the caller. */
  getPublicKey(recipientId: string): Promise<unknown>;
  putSecret(recipientId: string, secretName: string, body: SealedSecretBody): Promise<void>;
}

export interface GitHubSecretStoreOptions {
  apiUrl: string;
  token: string;
  timeoutMs?: number;
}

export function githubHeaders(token: string | undefined): Record<string, string> {
  const headers: Record<string, string> = {
    accept: 'application/vnd.github+json',
    'x-github-api-version': '2022-11-28',
  };
  if (token) headers.authorization = `Bearer ${token}`;
  return headers;
}

export class GitHubSecretStore implements SecretStoreClient {
  private readonly apiUrl: string;

  constructor(private readonly opts: GitHubSecretStoreOptions) {
    this.apiUrl = opts.apiUrl.replace(/\/+$/, '');
  }

  getPublicKey(recipientId: string): Promise<unknown> {
    return requestJson(`${this.apiUrl}/repos/${recipientId}/actions/secrets/public-key`, {
      headers: githubHeaders(this.opts.token),
      timeoutMs: this.opts.timeoutMs,
    });
  }

  async putSecret(recipientId: string, secretName: string, body: SealedSecretBody): Promise<void> {
    await requestJson(
      `${this.apiUrl}/repos/${recipientId}/actions/secrets/${encodeURIComponent(secretName)}`,
      {
        method: 'PUT',
        headers: githubHeaders(this.opts.token),
        body,
        timeoutMs: this.opts.timeoutMs,
      },
    );
  }
}
