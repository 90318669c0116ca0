export type FailureKind = 'transient' | 'permanent';

export abstract class PipelineError extends Error {
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Rejected before any paid call is made.
 */
export class InvalidTopicError extends PipelineError {
  readonly retryable = false;
}

abstract class CollaboratorError extends PipelineError {
  readonly kind: FailureKind;

  constructor(kind: FailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
  }

  get retryable(): boolean {
    return this.kind === 'transient';
  }
}

export class GenerationError extends CollaboratorError {}

export class MediaError extends CollaboratorError {}

export class PublishError extends CollaboratorError {}

export class CallTimeoutError extends PipelineError {
  readonly retryable = true;

  constructor(readonly timeoutMs: number) {
    super(`Call timed out after ${timeoutMs}ms`);
  }
}

/**
 * Raised when a cache write would not move an entry strictly forward.
 * Usually means two runs are working on the same fingerprint.
 */
export class StaleStageError extends PipelineError {
  readonly retryable = false;

  constructor(
    readonly fingerprint: string,
    readonly currentStage: string,
    readonly requestedStage: string
  ) {
    super(`Stale stage for ${fingerprint.slice(0, 12)}: cannot move from '${currentStage}' to '${requestedStage}'`);
  }
}

/** Storage is unavailable. Fatal to the whole run. */
export class CacheIOError extends PipelineError {
  readonly retryable = false;
}

export class TopicSourceError extends PipelineError {
  readonly retryable = false;
}

export class ConfigError extends PipelineError {
  readonly retryable = false;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
