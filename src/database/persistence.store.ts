import type { RunQuery, WorkflowRun } from '../engine/run.types';
import type { FeedbackQuery, FeedbackRecord } from '../feedback/feedback.types';
import type {
  Alert,
  AlertQuery,
  ModelMetricSnapshot,
} from '../monitoring/monitoring.types';
import type {
  DataBatch,
  ValidationResult,
} from '../validation/validation.types';

export interface TaskOutputKey {
  runId: string;
  taskId: string;
  attempt: number;
}

export interface TaskOutputRecord extends TaskOutputKey {
  ref: string;
  output: unknown;
  writtenAt: Date;
}

export function taskOutputRef(key: TaskOutputKey): string {
  return `${key.runId}/${key.taskId}/${key.attempt}`;
}

export function batchHandle(runId: string, batchId: string): string {
  return `batch/${runId}/${batchId}`;
}

/**
 * Read/write contract of the persistence collaborator. Structured records
 * (runs, validation results, metrics, alerts, feedback) and opaque payloads
 * (batches, task outputs) referenced by handle.
 */
export abstract class PersistenceStore {
  // Runs & tasks
  abstract saveRun(run: WorkflowRun): Promise<void>;
  abstract getRun(runId: string): Promise<WorkflowRun | null>;
  abstract listRuns(
    query: RunQuery,
  ): Promise<{ runs: WorkflowRun[]; total: number }>;
  abstract findRunsByKey(
    pipelineId: string,
    logicalKey: string,
  ): Promise<WorkflowRun[]>;
  /** Removes terminal runs finished before `cutoff` with everything they own. */
  abstract deleteRunsFinishedBefore(cutoff: Date): Promise<number>;

  // Payloads
  /**
   * Stores a batch owned by the run that ingested it. Every batch of a run,
   * referenced or not, is removed with the run.
   */
  abstract putBatch(runId: string, batch: DataBatch): Promise<string>;
  abstract getBatch(handle: string): Promise<DataBatch | null>;
  /** Writes are keyed by (run, task, attempt); rewriting a key replaces it. */
  abstract putTaskOutput(key: TaskOutputKey, output: unknown): Promise<string>;
  abstract getTaskOutput(ref: string): Promise<TaskOutputRecord | null>;
  abstract listTaskOutputs(
    runId: string,
    taskId: string,
  ): Promise<TaskOutputRecord[]>;

  // Validation audit
  abstract saveValidationResult(
    runId: string,
    result: ValidationResult,
  ): Promise<void>;
  abstract getValidationResult(runId: string): Promise<ValidationResult | null>;

  // Monitoring
  abstract appendMetricSnapshot(snapshot: ModelMetricSnapshot): Promise<void>;
  /** Latest `limit` snapshots of a metric, oldest first. */
  abstract getMetricSnapshots(
    metricId: string,
    limit: number,
  ): Promise<ModelMetricSnapshot[]>;
  abstract saveAlert(alert: Alert): Promise<void>;
  abstract listAlerts(query?: AlertQuery): Promise<Alert[]>;

  // Feedback
  abstract appendFeedback(record: FeedbackRecord): Promise<void>;
  abstract listFeedback(query?: FeedbackQuery): Promise<FeedbackRecord[]>;
}
