import type {
  AuditSink,
  DecisionAdvisor,
  ExtractionBoundary,
  ExtractionMetadata,
  MetadataStore,
  NetworkIdentity,
  RunStateStore,
  TargetDiscovery,
} from '../../src/collaborators/types.js';
import type {
  AuditRecord,
  Decision,
  ExtractionOutcome,
  PlatformCredentials,
  RunState,
  Target,
} from '../../src/core/types.js';
import type { DeliveryProtocol } from '../../src/delivery/sealedDelivery.js';
import { Artifact } from '../../src/security/artifact.js';

export function target(identifier: string, relevanceScore = 0.5): Target {
  return Object.freeze({
    identifier,
    locator: `https://github.com/${identifier}`,
    relevanceScore,
  });
}

export function artifact(name: string, value: string, expires?: number): Artifact {
  return Artifact.fromCookie({ name, value, domain: '.example.com', expires });
}

export class FakeDiscovery implements TargetDiscovery {
  calls = 0;
  constructor(private readonly result: Target[] | Error) {}

  async discover(): Promise<Target[]> {
    this.calls++;
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

export class FakeAdvisor implements DecisionAdvisor {
  readonly prompts: string[] = [];
  constructor(private readonly answer: Decision | Error | ((prompt: string) => Decision) = { action: 'extract', reason: 'test' }) {}

  async decide(prompt: string): Promise<Decision> {
    this.prompts.push(prompt);
    if (this.answer instanceof Error) throw this.answer;
    if (typeof this.answer === 'function') return this.answer(prompt);
    return this.answer;
  }
}

type Script = (locator: string) => ExtractionOutcome | Error;

export class FakeExtractor implements ExtractionBoundary {
  readonly calls: Array<{ locator: string; credentials?: PlatformCredentials }> = [];
  /** Every artifact handed out, so tests can check they were zeroed. */
  readonly issued: Artifact[] = [];

  constructor(private readonly script: Script) {}

  async extract(locator: string, credentials?: PlatformCredentials): Promise<ExtractionOutcome> {
    this.calls.push({ locator, credentials });
    const result = this.script(locator);
    if (result instanceof Error) throw result;
    this.issued.push(...result.artifacts);
    return result;
  }
}

export function succeeded(...artifacts: Artifact[]): ExtractionOutcome {
  return { artifacts, twoFactorDetected: false, succeeded: true };
}

export class RecordingDelivery implements DeliveryProtocol {
  readonly delivered: Array<{ recipientId: string; secretName: string; text: string; view: Uint8Array }> = [];

  constructor(private readonly failFor: ReadonlySet<string> = new Set()) {}

  async deliver(recipientId: string, secretName: string, plaintext: Uint8Array): Promise<void> {
    if (this.failFor.has(recipientId)) throw new Error('upload rejected');
    this.delivered.push({
      recipientId,
      secretName,
      text: Buffer.from(plaintext).toString('utf8'),
      view: plaintext,
    });
  }
}

export class MemoryAudit implements AuditSink {
  readonly records: AuditRecord[] = [];

  async record(record: AuditRecord): Promise<void> {
    this.records.push(record);
  }

  byEvent(eventType: string): AuditRecord[] {
    return this.records.filter((r) => r.eventType === eventType);
  }
}

export class MemoryStateStore implements RunStateStore {
  readonly writes: RunState[] = [];
  constructor(public state: RunState = 'Idle') {}

  async get(): Promise<RunState> {
    return this.state;
  }

  async set(state: RunState): Promise<void> {
    this.writes.push(state);
    this.state = state;
  }
}

export class MemoryMetadata implements MetadataStore {
  readonly targets: Array<{ identifier: string; requiresCookies: boolean }> = [];
  readonly extractions: ExtractionMetadata[] = [];

  async upsertTarget(t: Target, requiresCookies = false): Promise<void> {
    this.targets.push({ identifier: t.identifier, requiresCookies });
  }

  async recordExtraction(meta: ExtractionMetadata): Promise<void> {
    this.extractions.push(meta);
  }
}

/** Fails the first `failures` rotations, or follows a fail/succeed pattern (true = fail). */
export class FlakyIdentity implements NetworkIdentity {
  calls = 0;
  constructor(private readonly failures: number | readonly boolean[]) {}

  async rotate(): Promise<void> {
    this.calls++;
    const fail =
      typeof this.failures === 'number'
        ? this.calls <= this.failures
        : (this.failures[this.calls - 1] ?? false);
    if (fail) throw new Error('warp unavailable');
  }
}
