import type { AppConfig } from '../config/index.js';
import { getCredentialsForPlatform, getEnvValue, loadConfig } from '../config/index.js';
import { ChatCompletionAdvisor } from '../collaborators/chatAdvisor.js';
import { GitHubDiscovery } from '../collaborators/githubDiscovery.js';
import { PlaywrightExtractor } from '../collaborators/playwrightExtractor.js';
import { WarpIdentity } from '../collaborators/warpIdentity.js';
import { getDb, type DatabaseClient } from '../db/client.js';
import { DryRunDelivery, SealedDeliveryProtocol, type DeliveryProtocol } from '../delivery/sealedDelivery.js';
import { GitHubSecretStore } from '../delivery/secretStore.js';
import { ConfigError } from '../core/errors.js';
import { AuditRepository } from '../repositories/auditRepository.js';
import { SqliteMetadataStore } from '../repositories/metadataStore.js';
import { RunStateRepository } from '../repositories/runStateRepository.js';
import { EphemeralLifecycleOrchestrator } from './orchestrator.js';

export interface BuildOptions {
  dryRun?: boolean;
  db?: DatabaseClient;
}

/** Wires the production collaborators from configuration. */
export function buildOrchestrator(
  cfg: AppConfig = loadConfig(),
  opts: BuildOptions = {},
): EphemeralLifecycleOrchestrator {
  const token = getEnvValue(cfg.github.tokenEnv);
  if (!cfg.github.org) throw new ConfigError('github.org (GITHUB_ORG) is required');
  if (!token && !opts.dryRun) {
    throw new ConfigError(`${cfg.github.tokenEnv} is required to deliver secrets`);
  }
  const db = opts.db ?? getDb(cfg);

  let delivery: DeliveryProtocol;
  if (opts.dryRun || !token) {
    delivery = new DryRunDelivery();
  } else {
    delivery = new SealedDeliveryProtocol(new GitHubSecretStore({ apiUrl: cfg.github.apiUrl, token }));
  }

  return new EphemeralLifecycleOrchestrator(
    {
      discovery: new GitHubDiscovery({ apiUrl: cfg.github.apiUrl, org: cfg.github.org, token }),
      advisor: new ChatCompletionAdvisor({
        apiUrl: cfg.advisor.apiUrl,
        apiKey: getEnvValue(cfg.advisor.apiKeyEnv),
        model: cfg.advisor.model,
        timeoutMs: cfg.advisor.timeoutMs,
      }),
      extractor: new PlaywrightExtractor({
        headless: cfg.browser.headless,
        navigationTimeoutMs: cfg.browser.navigationTimeoutMs,
        executablePath: cfg.browser.executablePath,
      }),
      delivery,
      audit: new AuditRepository(db),
      stateStore: new RunStateRepository(db),
      metadata: new SqliteMetadataStore(db),
      identity: cfg.identity.enabled
        ? new WarpIdentity({
            command: cfg.identity.command,
            connectTimeoutMs: cfg.identity.connectTimeoutMs,
            settleMs: cfg.identity.settleMs,
          })
        : undefined,
      credentials: (platform) => getCredentialsForPlatform(platform, cfg),
    },
    { maxConsecutiveRotationFailures: cfg.identity.maxConsecutiveFailures },
  );
}
