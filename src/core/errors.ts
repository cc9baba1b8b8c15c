export class AppError extends Error {
  constructor(
    readonly code: string,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

/** Discovery or decision advice could not be obtained. Fatal to the run. */
export class CollaboratorUnavailableError extends AppError {
  constructor(
    readonly collaborator: string,
    cause?: unknown,
  ) {
    super('COLLABORATOR_UNAVAILABLE', `${collaborator} unavailable: ${describe(cause)}`, cause);
  }
}

export class TargetExtractionFailedError extends AppError {
  constructor(
    readonly target: string,
    detail: string,
    cause?: unknown,
  ) {
    super('TARGET_EXTRACTION_FAILED', `Extraction failed for ${target}: ${detail}`, cause);
  }
}

export class KeyFetchError extends AppError {
  constructor(
    readonly recipientId: string,
    detail: string,
    cause?: unknown,
  ) {
    super('KEY_FETCH_FAILED', `Public key fetch failed for ${recipientId}: ${detail}`, cause);
  }
}

export class DeliveryError extends AppError {
  constructor(
    readonly recipientId: string,
    readonly secretName: string,
    detail: string,
    cause?: unknown,
  ) {
    super(
      'DELIVERY_FAILED',
      `Delivery of ${secretName} to ${recipientId} failed: ${detail}`,
      cause,
    );
  }
}

export class InvalidTransitionError extends AppError {
  constructor(
    readonly from: string,
    readonly to: string,
  ) {
    super('INVALID_TRANSITION', `Invalid run state transition: ${from} -> ${to}`);
  }
}

export class RunCancelledError extends AppError {
  constructor(reason?: unknown) {
    super('RUN_CANCELLED', `Run cancelled${reason ? `: ${describe(reason)}` : ''}`, reason);
  }
}

export class ConfigError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('CONFIG_ERROR', message, cause);
  }
}

export function describe(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return 'unknown error';
}
