import { Counter, Histogram, Gauge, Registry, collectDefaultMetrics } from 'prom-client';

export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const stateTransitionsTotal = new Counter({
  name: 'state_transitions_total',
  help: 'Run state transitions by destination state',
  labelNames: ['state'] as const,
  registers: [registry],
});

// outcome: delivered|delivery-failed|skipped-2fa|skipped-decision|failed
export const targetsProcessedTotal = new Counter({
  name: 'targets_processed_total',
  help: 'Targets processed by final outcome',
  labelNames: ['outcome'] as const,
  registers: [registry],
});

export const deliveriesTotal = new Counter({
  name: 'deliveries_total',
  help: 'Sealed secret uploads by result',
  labelNames: ['result'] as const, // result=success|failure
  registers: [registry],
});

export const recipientKeyFetchesTotal = new Counter({
  name: 'recipient_key_fetches_total',
  help: 'Recipient public key lookups (cache hits included)',
  labelNames: ['result'] as const, // result=hit|fetched|error
  registers: [registry],
});

export const artifactsReleasedTotal = new Counter({
  name: 'artifacts_released_total',
  help: 'Sensitive values zero-filled by the lifecycle guard',
  labelNames: ['label'] as const,
  registers: [registry],
});

export const identityRotationFailuresTotal = new Counter({
  name: 'identity_rotation_failures_total',
  help: 'Network identity rotations that failed (never fatal)',
  registers: [registry],
});

export const runDurationSeconds = new Histogram({
  name: 'run_duration_seconds',
  help: 'Wall time of a full orchestrator run (seconds)',
  labelNames: ['result'] as const, // result=completed|fatal|cancelled
  buckets: [1, 5, 15, 30, 60, 120, 300, 600],
  registers: [registry],
});

// Numeric index into RUN_STATES of the last persisted state
export const currentRunState = new Gauge({
  name: 'current_run_state',
  help: 'Index of the current run state (0=Idle ... 5=Completed)',
  registers: [registry],
});
