import type { ValidationResult } from '../validation/validation.types';

export type PipelineErrorCode =
  | 'CONNECTOR_UNAVAILABLE'
  | 'VALIDATION_FAILURE'
  | 'INPUT_ERROR'
  | 'EXECUTION_ERROR'
  | 'TASK_TIMEOUT'
  | 'CANCELLED'
  | 'CONFLICT'
  | 'CONFIGURATION_ERROR'
  | 'NOT_FOUND';

/**
 * Base class of every error the pipeline core raises on purpose.
 * `transient` tells the retry policy whether another attempt can help.
 */
export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;
  abstract readonly transient: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConnectorUnavailableError extends PipelineError {
  readonly code = 'CONNECTOR_UNAVAILABLE';
  readonly transient = true;

  constructor(
    readonly sourceId: string,
    message = `Source connector unavailable: ${sourceId}`,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ValidationFailureError extends PipelineError {
  readonly code = 'VALIDATION_FAILURE';
  readonly transient = false;

  constructor(readonly result: ValidationResult) {
    super(
      `Data batch ${result.batchId} failed validation with ${result.violations.length} violation(s)`,
    );
  }
}

export class InputError extends PipelineError {
  readonly code = 'INPUT_ERROR';
  readonly transient = false;
}

export class ExecutionError extends PipelineError {
  readonly code = 'EXECUTION_ERROR';
  readonly transient: boolean;

  constructor(
    message: string,
    options: { retryable?: boolean; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.transient = options.retryable ?? true;
  }
}

export class TaskTimeoutError extends PipelineError {
  readonly code = 'TASK_TIMEOUT';
  readonly transient = true;

  constructor(
    readonly taskId: string,
    readonly timeoutMs: number,
  ) {
    super(`Task ${taskId} exceeded its ${timeoutMs}ms timeout`);
  }
}

export class CancelledError extends PipelineError {
  readonly code = 'CANCELLED';
  readonly transient = false;
}

export class ConflictError extends PipelineError {
  readonly code = 'CONFLICT';
  readonly transient = false;

  constructor(
    readonly pipelineId: string,
    readonly logicalKey: string,
    readonly activeRunId: string,
  ) {
    super(
      `Pipeline ${pipelineId} already has active run ${activeRunId} for key ${logicalKey}`,
    );
  }
}

export class ConfigurationError extends PipelineError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly transient = false;
}

export class NotFoundError extends PipelineError {
  readonly code = 'NOT_FOUND';
  readonly transient = false;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
