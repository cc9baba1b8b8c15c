/**
 * Contracts the orchestrator consumes. Each has one production
 * implementation in this directory; tests supply their own doubles.
 */

import type {
  AuditRecord,
  Decision,
  ExtractionOutcome,
  PlatformCredentials,
  RunState,
  Target,
} from '../core/types.js';

export interface TargetDiscovery {
  /** No ordering guarantee; the orchestrator sorts by relevance. */
  discover(): Promise<Target[]>;
}

export interface DecisionAdvisor {
  decide(prompt: string): Promise<Decision>;
}

export interface ExtractionBoundary {
  /** Every artifact in the outcome is owned by the caller from this point on. */
  extract(locator: string, credentials?: PlatformCredentials): Promise<ExtractionOutcome>;
}

export interface NetworkIdentity {
  rotate(): Promise<void>;
}

export interface AuditSink {
  /** `message` must never carry a sensitive value. */
  record(record: AuditRecord): Promise<void>;
}

export interface ExtractionMetadata {
  targetName: string;
  platform: string;
  artifactCount: number;
  twoFactorDetected: boolean;
  succeeded: boolean;
  errorMessage?: string;
  expiresAt?: Date;
}

/** Durable metadata about targets and extractions. Counts and flags only. */
export interface MetadataStore {
  upsertTarget(target: Target, requiresCookies?: boolean): Promise<void>;
  recordExtraction(meta: ExtractionMetadata): Promise<void>;
}

export interface RunStateStore {
  get(): Promise<RunState>;
  set(state: RunState): Promise<void>;
}

export type CredentialsLookup = (platform: string) => PlatformCredentials | null;

export const PROCEED_ACTIONS: readonly string[] = ['extract', 'yes', 'true'];

export function isProceed(decision: Decision): boolean {
  return PROCEED_ACTIONS.includes(decision.action.toLowerCase());
}
