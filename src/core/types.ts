// Domain model shared by the orchestrator, the collaborators and the metadata store.
// Sensitive values never appear here as strings; see security/sensitive.ts.

import type { Artifact } from '../security/artifact.js';
import type { SensitiveBuffer } from '../security/sensitive.js';

export const RUN_STATES = [
  'Idle',
  'Discovering',
  'Extracting',
  'Injecting',
  'Cleanup',
  'Completed',
] as const;

export type RunState = (typeof RUN_STATES)[number];

export interface Target {
  readonly identifier: string; // e.g. "acme/payments-api"
  readonly locator: string; // URL the browser boundary navigates to
  readonly relevanceScore: number; // 0..1
  readonly description?: string;
}

export interface ExtractionOutcome {
  artifacts: Artifact[];
  twoFactorDetected: boolean;
  succeeded: boolean;
  errorDetail?: string;
}

export interface PlatformCredentials {
  username: string;
  password: SensitiveBuffer;
}

export interface RecipientKey {
  keyIdentifier: string;
  publicKeyBytes: Uint8Array;
}

export interface Decision {
  action: string;
  reason: string;
}

export const AUDIT_STATUSES = [
  'started',
  'completed',
  'failed',
  'delivered',
  'delivery-failed',
  'skipped-2fa',
  'skipped-decision',
  'rotation-failed',
] as const;

export type AuditStatus = (typeof AUDIT_STATUSES)[number];

export interface AuditRecord {
  eventType: string;
  targetName?: string;
  platform?: string;
  status: AuditStatus;
  message?: string;
}

export interface StoredAuditRecord extends AuditRecord {
  id: number;
  createdAt: Date;
}

export type TargetOutcomeStatus =
  | 'delivered'
  | 'delivery-failed'
  | 'skipped-2fa'
  | 'skipped-decision'
  | 'failed';

export interface TargetOutcome {
  target: string;
  platform: string;
  status: TargetOutcomeStatus;
  artifactCount: number;
  secretName?: string;
  error?: string;
}

export interface RunSummary {
  runId: string;
  startedAt: Date;
  finishedAt: Date;
  targetsDiscovered: number;
  outcomes: TargetOutcome[];
}

// Metadata rows; never contain artifact values.
export interface TargetRecord {
  id: number;
  name: string;
  url: string;
  relevanceScore: number;
  requiresCookies: boolean;
  lastScannedAt: Date | null;
}

export interface ExtractionRecord {
  id: number;
  targetName: string;
  platform: string;
  artifactCount: number;
  twoFactorDetected: boolean;
  succeeded: boolean;
  errorMessage: string | null;
  extractedAt: Date;
  expiresAt: Date | null;
}
