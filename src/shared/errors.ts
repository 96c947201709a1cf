// -----------------------------------------------------------------------------
// Pipeline error taxonomy
// -----------------------------------------------------------------------------

export type PipelineErrorCategory = 'validation' | 'upstream' | 'cardinality' | 'timeout';

export type PipelineStage =
  | 'created'
  | 'generating'
  | 'rendering_images'
  | 'synthesizing_audio'
  | 'indexing'
  | 'notifying'
  | 'complete'
  | 'failed';

/**
 * Base class for terminal pipeline failures. Anything thrown out of a
 * pipeline stage that is not one of these is treated as `upstream`.
 */
export class StoryPipelineError extends Error {
  public readonly category: PipelineErrorCategory;
  public readonly retryable: boolean;

  constructor(message: string, category: PipelineErrorCategory, retryable = false) {
    super(message);
    this.name = 'StoryPipelineError';
    this.category = category;
    this.retryable = retryable;
  }
}

/**
 * Generated content never passed shape validation, even after self-healing.
 */
export class ContentValidationError extends StoryPipelineError {
  public readonly attempts: number;
  public readonly lastValidationError: string;

  constructor(attempts: number, lastValidationError: string) {
    super(
      `Story content failed validation after ${attempts} attempt(s): ${lastValidationError}`,
      'validation',
    );
    this.name = 'ContentValidationError';
    this.attempts = attempts;
    this.lastValidationError = lastValidationError;
  }
}

export class MaxRetriesExceededError extends StoryPipelineError {
  public readonly sceneIndex: number;
  public readonly attempts: number;
  public readonly lastError: unknown;

  constructor(sceneIndex: number, attempts: number, lastError: unknown) {
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    super(
      `Image generation for scene ${sceneIndex + 1} failed after ${attempts} attempt(s): ${reason}`,
      'upstream',
    );
    this.name = 'MaxRetriesExceededError';
    this.sceneIndex = sceneIndex;
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export class CardinalityMismatchError extends StoryPipelineError {
  public readonly expected: number;
  public readonly actual: number;

  constructor(what: string, expected: number, actual: number) {
    super(`Expected ${expected} ${what} but got ${actual}`, 'cardinality');
    this.name = 'CardinalityMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

export class StageTimeoutError extends StoryPipelineError {
  public readonly stage: string;
  public readonly timeoutMs: number;

  constructor(stage: string, timeoutMs: number) {
    super(`Stage ${stage} timed out after ${timeoutMs}ms`, 'timeout');
    this.name = 'StageTimeoutError';
    this.stage = stage;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Terminal failure as recorded by the orchestrator.
 */
export interface PipelineFailure {
  stage: PipelineStage;
  category: PipelineErrorCategory;
  message: string;
}

export function toPipelineFailure(stage: PipelineStage, error: unknown): PipelineFailure {
  if (error instanceof StoryPipelineError) {
    return { stage, category: error.category, message: error.message };
  }
  return {
    stage,
    category: 'upstream',
    message: error instanceof Error ? error.message : String(error),
  };
}

// -----------------------------------------------------------------------------
// Library (synchronous, user-facing) errors
// -----------------------------------------------------------------------------

export type LibraryErrorKind = 'not_found' | 'access_denied' | 'conflict' | 'invalid';

export interface LibraryError {
  kind: LibraryErrorKind;
  message: string;
}

export const notFound = (message: string): LibraryError => ({ kind: 'not_found', message });
export const accessDenied = (message: string): LibraryError => ({ kind: 'access_denied', message });
export const conflict = (message: string): LibraryError => ({ kind: 'conflict', message });
export const invalid = (message: string): LibraryError => ({ kind: 'invalid', message });

export function httpStatusFor(error: LibraryError): number {
  switch (error.kind) {
    case 'not_found':
      return 404;
    case 'access_denied':
      return 403;
    case 'conflict':
      return 409;
    case 'invalid':
      return 400;
  }
}
