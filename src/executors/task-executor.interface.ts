import type { TaskConfig, TaskKind } from '../pipelines/pipeline.types';
import type { DataBatch } from '../validation/validation.types';

export interface TaskContext {
  runId: string;
  pipelineId: string;
  logicalKey: string;
  taskId: string;
  attempt: number;
  params: Readonly<Record<string, unknown>>;
  /** Aborted on task timeout, run timeout or cancellation. */
  signal: AbortSignal;
}

export interface TaskResult<TOutput = unknown> {
  output: TOutput;
  metrics: Record<string, number>;
  /** Set by the ingestion task: handle of the batch it stored. */
  batchRef?: string;
}

/**
 * Uniform contract for every task kind. Implementations fail with
 * `InputError`, `ExecutionError` or `TaskTimeoutError`; they must tolerate
 * re-invocation with the same input and attempt.
 */
export interface TaskExecutor {
  readonly kind: TaskKind;
  execute(
    batch: DataBatch | undefined,
    config: TaskConfig,
    context: TaskContext,
  ): Promise<TaskResult>;
}
