/**
 * Error taxonomy
 *
 * Validation errors are local and fatal to the operation that raised them.
 * Classifier failures are always recovered by the heuristic fallback.
 * Lock contention is control flow. Stage failures become escalations.
 */

export class AppError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.code = code;
  }
}

/** A ConversationState field violated its invariant */
export class InvalidStateError extends AppError {
  readonly field: string;

  constructor(field: string, detail: string) {
    super('invalid_state', `Invalid conversation state field "${field}": ${detail}`);
    this.name = 'InvalidStateError';
    this.field = field;
  }
}

export type ClassifierName = 'intent' | 'language' | 'governance';

export type ClassifierFailureReason =
  | 'transport'
  | 'parse'
  | 'schema'
  | 'budget_exceeded'
  | 'not_configured';

export class ClassifierFailureError extends AppError {
  readonly classifier: ClassifierName;
  readonly reason: ClassifierFailureReason;

  constructor(classifier: ClassifierName, reason: ClassifierFailureReason, detail?: string, cause?: unknown) {
    super('classifier_failure', `${classifier} classifier failed (${reason})${detail ? `: ${detail}` : ''}`, { cause });
    this.name = 'ClassifierFailureError';
    this.classifier = classifier;
    this.reason = reason;
  }
}

export class LockHeldError extends AppError {
  readonly fingerprint: string;
  readonly heldBy?: string;

  constructor(fingerprint: string, heldBy?: string) {
    super('lock_held', `Message ${fingerprint} is already being processed${heldBy ? ` by ${heldBy}` : ''}`);
    this.name = 'LockHeldError';
    this.fingerprint = fingerprint;
    this.heldBy = heldBy;
  }
}

export class StageExecutionError extends AppError {
  readonly stage: string;

  constructor(stage: string, cause: unknown) {
    super('stage_failed', `Stage ${stage} failed: ${errorMessage(cause)}`, { cause });
    this.name = 'StageExecutionError';
    this.stage = stage;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
