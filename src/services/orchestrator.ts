import { randomUUID } from 'crypto';
import { EventBus } from '../events/eventBus.js';
import {
  AppError,
  CollaboratorUnavailableError,
  RunCancelledError,
  TargetExtractionFailedError,
  describe,
} from '../core/errors.js';
import {
  RUN_STATES,
  type AuditRecord,
  type ExtractionOutcome,
  type PlatformCredentials,
  type RunState,
  type RunSummary,
  type Target,
  type TargetOutcome,
} from '../core/types.js';
import type {
  AuditSink,
  CredentialsLookup,
  DecisionAdvisor,
  ExtractionBoundary,
  MetadataStore,
  NetworkIdentity,
  RunStateStore,
  TargetDiscovery,
} from '../collaborators/types.js';
import { isProceed } from '../collaborators/types.js';
import type { DeliveryProtocol } from '../delivery/sealedDelivery.js';
import { SecureLifecycleGuard, type GuardHandle } from '../security/lifecycleGuard.js';
import { serializeArtifacts } from '../security/payload.js';
import { getLogger } from '../utils/logging.js';
import { redactText } from '../utils/redaction.js';
import { deriveSecretName } from '../utils/secretName.js';
import { platformFromLocator } from '../utils/platform.js';
import { assertTransition } from './runStateMachine.js';
import { buildExtractionPrompt } from './prompts.js';
import {
  currentRunState,
  identityRotationFailuresTotal,
  runDurationSeconds,
  stateTransitionsTotal,
  targetsProcessedTotal,
} from '../metrics/index.js';

export interface RunEvents {
  [k: string]: unknown;
  stateTransition: { runId: string; from: RunState; to: RunState; at: Date };
  targetCompleted: { runId: string; outcome: TargetOutcome };
  runFinished: { runId: string; summary?: RunSummary; error?: AppError };
}

export interface OrchestratorDeps {
  discovery: TargetDiscovery;
  advisor: DecisionAdvisor;
  extractor: ExtractionBoundary;
  delivery: DeliveryProtocol;
  audit: AuditSink;
  stateStore: RunStateStore;
  identity?: NetworkIdentity;
  metadata?: MetadataStore;
  credentials?: CredentialsLookup;
  /** Each run gets a fresh guard; override to observe it in tests. */
  guardFactory?: () => SecureLifecycleGuard;
}

export interface OrchestratorOptions {
  /** Consecutive rotation failures after which rotation is suspended for the run. */
  maxConsecutiveRotationFailures?: number;
}

export interface RunOptions {
  signal?: AbortSignal;
}

/**
 * Everything one run mutates. Passed explicitly to every step; nothing about a
 * run lives on the orchestrator instance itself.
 */
export interface RunContext {
  readonly runId: string;
  readonly startedAt: Date;
  readonly guard: SecureLifecycleGuard;
  readonly signal?: AbortSignal;
  state: RunState;
  readonly history: RunState[];
  readonly outcomes: TargetOutcome[];
  targetsDiscovered: number;
  rotation: { consecutiveFailures: number; suspended: boolean };
}

export type StepResult<T> =
  | { kind: 'ok'; value: T }
  | { kind: 'target-failure'; error: AppError; outcome: TargetOutcome }
  | { kind: 'fatal'; error: AppError };

const ok = <T>(value: T): StepResult<T> => ({ kind: 'ok', value });

/**
 * Sequences discovery → extraction → 2FA gating → sealed delivery → cleanup.
 *
 * Sensitive material is tracked by the run's guard from the moment it exists.
 * Per-target values are released before that target's metadata is written, and
 * a final releaseAll runs in a finally block regardless of how the run ends.
 */
export class EphemeralLifecycleOrchestrator {
  readonly events = new EventBus<RunEvents>();
  private readonly maxRotationFailures: number;

  constructor(
    private readonly deps: OrchestratorDeps,
    opts: OrchestratorOptions = {},
  ) {
    this.maxRotationFailures = opts.maxConsecutiveRotationFailures ?? 3;
  }

  createContext(signal?: AbortSignal): RunContext {
    return {
      runId: randomUUID(),
      startedAt: new Date(),
      guard: this.deps.guardFactory ? this.deps.guardFactory() : new SecureLifecycleGuard(),
      signal,
      state: 'Idle',
      history: ['Idle'],
      outcomes: [],
      targetsDiscovered: 0,
      rotation: { consecutiveFailures: 0, suspended: false },
    };
  }

  async run(opts: RunOptions = {}): Promise<RunSummary> {
    const ctx = this.createContext(opts.signal);
    const start = process.hrtime.bigint();
    const log = getLogger().child({ runId: ctx.runId });
    let result: 'completed' | 'fatal' | 'cancelled' = 'fatal';
    let failure: AppError | undefined;
    let summary: RunSummary | undefined;
    try {
      await this.resetStaleState(ctx);
      await this.transition(ctx, 'Discovering');
      await this.deps.audit.record({ eventType: 'run_started', status: 'started' });

      const discovered = await this.discover(ctx);
      if (discovered.kind !== 'ok') throw discovered.error;

      for (const target of discovered.value) {
        this.throwIfCancelled(ctx);
        const step = await this.processTarget(ctx, target);
        if (step.kind === 'fatal') throw step.error;
        if (step.kind === 'target-failure') {
          log.error({ err: step.error, target: target.identifier }, 'target failed');
        }
      }
      this.throwIfCancelled(ctx);

      await this.transition(ctx, 'Completed');
      summary = this.summarize(ctx);
      await this.deps.audit.record({
        eventType: 'run_complete',
        status: 'completed',
        message: `targets=${summary.targetsDiscovered} delivered=${summary.outcomes.filter((o) => o.status === 'delivered').length}`,
      });
      result = 'completed';
      return summary;
    } catch (err) {
      failure = err instanceof AppError ? err : new AppError('RUN_FAILED', describe(err), err);
      result = err instanceof RunCancelledError ? 'cancelled' : 'fatal';
      log.error({ err, state: ctx.state }, 'run aborted');
      await this.recordBestEffort({
        eventType: 'run_failed',
        status: 'failed',
        message: redactText(failure.message),
      });
      throw err;
    } finally {
      const released = ctx.guard.releaseAll();
      if (released > 0) log.info({ released }, 'final release pass');
      try {
        await this.transition(ctx, 'Idle', { force: result !== 'completed' });
      } catch (resetErr) {
        log.error({ err: resetErr }, 'failed to persist Idle after run');
        // On the failure paths the original error is already propagating.
        if (result === 'completed') throw resetErr;
      }
      runDurationSeconds.observe({ result }, Number(process.hrtime.bigint() - start) / 1e9);
      await this.events.emit('runFinished', { runId: ctx.runId, summary, error: failure });
    }
  }

  private async resetStaleState(ctx: RunContext): Promise<void> {
    const persisted = await this.deps.stateStore.get();
    if (persisted !== 'Idle') {
      // A crashed run does not resume; it starts over from Idle.
      getLogger().warn({ runId: ctx.runId, persisted }, 'stale run state found, resetting to Idle');
      await this.deps.stateStore.set('Idle');
    }
  }

  private throwIfCancelled(ctx: RunContext): void {
    if (ctx.signal?.aborted) throw new RunCancelledError(ctx.signal.reason);
  }

  private async discover(ctx: RunContext): Promise<StepResult<Target[]>> {
    let targets: Target[];
    try {
      targets = await this.deps.discovery.discover();
    } catch (err) {
      return { kind: 'fatal', error: new CollaboratorUnavailableError('discovery', err) };
    }
    const sorted = [...targets].sort((a, b) => b.relevanceScore - a.relevanceScore);
    ctx.targetsDiscovered = sorted.length;
    if (this.deps.metadata) {
      for (const t of sorted) await this.deps.metadata.upsertTarget(t);
    }
    getLogger().info({ runId: ctx.runId, count: sorted.length }, 'targets discovered');
    return ok(sorted);
  }

  /**
   * One target, start to finish. Anything tracked here is released in the
   * finally block even when a step throws.
   */
  async processTarget(ctx: RunContext, target: Target): Promise<StepResult<TargetOutcome>> {
    const platform = platformFromLocator(target.locator);
    const handles: GuardHandle[] = [];
    const release = () => {
      ctx.guard.releaseMany(handles);
      handles.length = 0;
    };
    try {
      await this.transition(ctx, 'Extracting');
      await this.rotateIdentity(ctx);

      const decision = await this.advise(target);
      if (decision.kind !== 'ok') return decision;
      if (!decision.value) {
        return ok(
          await this.finishTarget(ctx, {
            target: target.identifier,
            platform,
            status: 'skipped-decision',
            artifactCount: 0,
          }),
        );
      }

      if (this.deps.metadata) await this.deps.metadata.upsertTarget(target, true);
      const credentials = this.deps.credentials?.(platform) ?? undefined;
      if (credentials) handles.push(ctx.guard.track(credentials.password, 'credential'));

      const extracted = await this.extract(ctx, target, credentials, handles);
      if (extracted.kind === 'target-failure') {
        release();
        await this.recordExtraction(target, platform, 0, false, false, extracted.error.message);
        await this.finishTarget(ctx, extracted.outcome);
        return extracted;
      }
      if (extracted.kind === 'fatal') return extracted;
      const outcome = extracted.value;
      const artifactCount = outcome.artifacts.length;
      const expiresAt = earliestExpiry(outcome);

      if (outcome.twoFactorDetected) {
        release();
        await this.recordExtraction(target, platform, artifactCount, true, false, undefined, expiresAt);
        return ok(
          await this.finishTarget(ctx, {
            target: target.identifier,
            platform,
            status: 'skipped-2fa',
            artifactCount,
          }),
        );
      }

      if (!outcome.succeeded) {
        release();
        const detail = redactText(outcome.errorDetail ?? 'extraction unsuccessful');
        await this.recordExtraction(target, platform, artifactCount, false, false, detail, expiresAt);
        const error = new TargetExtractionFailedError(target.identifier, detail);
        const failed: TargetOutcome = {
          target: target.identifier,
          platform,
          status: 'failed',
          artifactCount,
          error: detail,
        };
        await this.finishTarget(ctx, failed);
        return { kind: 'target-failure', error, outcome: failed };
      }

      await this.transition(ctx, 'Injecting');
      const secretName = deriveSecretName(target.identifier);
      const payload = serializeArtifacts(outcome.artifacts);
      handles.push(ctx.guard.track(payload, 'payload'));
      let deliveryError: AppError | undefined;
      try {
        await this.deps.delivery.deliver(target.identifier, secretName, payload.view());
      } catch (err) {
        deliveryError =
          err instanceof AppError ? err : new AppError('DELIVERY_FAILED', describe(err), err);
      }

      await this.transition(ctx, 'Cleanup');
      release();
      await this.recordExtraction(
        target,
        platform,
        artifactCount,
        false,
        true,
        deliveryError ? redactText(deliveryError.message) : undefined,
        expiresAt,
      );
      const result: TargetOutcome = {
        target: target.identifier,
        platform,
        status: deliveryError ? 'delivery-failed' : 'delivered',
        artifactCount,
        secretName,
        error: deliveryError ? redactText(deliveryError.message) : undefined,
      };
      await this.finishTarget(ctx, result);
      if (deliveryError) return { kind: 'target-failure', error: deliveryError, outcome: result };
      return ok(result);
    } finally {
      release();
    }
  }

  private async advise(target: Target): Promise<StepResult<boolean>> {
    try {
      const decision = await this.deps.advisor.decide(buildExtractionPrompt(target));
      getLogger().info(
        { target: target.identifier, action: decision.action, reason: decision.reason },
        'advisor decision',
      );
      return ok(isProceed(decision));
    } catch (err) {
      return { kind: 'fatal', error: new CollaboratorUnavailableError('decision advisor', err) };
    }
  }

  private async extract(
    ctx: RunContext,
    target: Target,
    credentials: PlatformCredentials | undefined,
    handles: GuardHandle[],
  ): Promise<StepResult<ExtractionOutcome>> {
    try {
      const outcome = await this.deps.extractor.extract(target.locator, credentials);
      handles.push(...ctx.guard.trackAll(outcome.artifacts, 'artifact'));
      return ok(outcome);
    } catch (err) {
      const detail = redactText(describe(err));
      return {
        kind: 'target-failure',
        error: new TargetExtractionFailedError(target.identifier, detail, err),
        outcome: {
          target: target.identifier,
          platform: platformFromLocator(target.locator),
          status: 'failed',
          artifactCount: 0,
          error: detail,
        },
      };
    }
  }

  // Best effort: a failed rotation is logged and counted, never fatal.
  private async rotateIdentity(ctx: RunContext): Promise<void> {
    const identity = this.deps.identity;
    if (!identity || ctx.rotation.suspended) return;
    try {
      await identity.rotate();
      ctx.rotation.consecutiveFailures = 0;
    } catch (err) {
      ctx.rotation.consecutiveFailures += 1;
      identityRotationFailuresTotal.inc();
      getLogger().warn(
        { err, runId: ctx.runId, consecutiveFailures: ctx.rotation.consecutiveFailures },
        'network identity rotation failed',
      );
      await this.recordBestEffort({
        eventType: 'identity_rotation',
        status: 'rotation-failed',
        message: redactText(describe(err)).slice(0, 200),
      });
      if (ctx.rotation.consecutiveFailures >= this.maxRotationFailures) {
        ctx.rotation.suspended = true;
        getLogger().error(
          { runId: ctx.runId, failures: ctx.rotation.consecutiveFailures },
          'network identity rotation suspended for the rest of the run',
        );
      }
    }
  }

  private async recordExtraction(
    target: Target,
    platform: string,
    artifactCount: number,
    twoFactorDetected: boolean,
    succeeded: boolean,
    errorMessage?: string,
    expiresAt?: Date,
  ): Promise<void> {
    if (!this.deps.metadata) return;
    await this.deps.metadata.recordExtraction({
      targetName: target.identifier,
      platform,
      artifactCount,
      twoFactorDetected,
      succeeded,
      errorMessage,
      expiresAt,
    });
  }

  private async finishTarget(ctx: RunContext, outcome: TargetOutcome): Promise<TargetOutcome> {
    ctx.outcomes.push(outcome);
    targetsProcessedTotal.inc({ outcome: outcome.status });
    await this.deps.audit.record({
      eventType: 'target_processed',
      targetName: outcome.target,
      platform: outcome.platform,
      status: outcome.status,
      message: outcome.error ?? `artifacts=${outcome.artifactCount}`,
    });
    getLogger().info(
      {
        runId: ctx.runId,
        target: outcome.target,
        status: outcome.status,
        artifactCount: outcome.artifactCount,
      },
      'target processed',
    );
    await this.events.emit('targetCompleted', { runId: ctx.runId, outcome });
    return outcome;
  }

  private async transition(ctx: RunContext, to: RunState, opts: { force?: boolean } = {}) {
    const from = ctx.state;
    if (!opts.force) assertTransition(from, to);
    await this.deps.stateStore.set(to);
    ctx.state = to;
    ctx.history.push(to);
    stateTransitionsTotal.inc({ state: to });
    currentRunState.set(RUN_STATES.indexOf(to));
    getLogger().info({ runId: ctx.runId, from, to }, 'state-transition');
    await this.events.emit('stateTransition', { runId: ctx.runId, from, to, at: new Date() });
  }

  private async recordBestEffort(record: AuditRecord): Promise<void> {
    try {
      await this.deps.audit.record(record);
    } catch (err) {
      getLogger().error({ err, eventType: record.eventType }, 'audit record failed');
    }
  }

  private summarize(ctx: RunContext): RunSummary {
    return {
      runId: ctx.runId,
      startedAt: ctx.startedAt,
      finishedAt: new Date(),
      targetsDiscovered: ctx.targetsDiscovered,
      outcomes: [...ctx.outcomes],
    };
  }
}

function earliestExpiry(outcome: ExtractionOutcome): Date | undefined {
  let min: Date | undefined;
  for (const a of outcome.artifacts) {
    if (a.expiresAt && (!min || a.expiresAt < min)) min = a.expiresAt;
  }
  return min;
}
