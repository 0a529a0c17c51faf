import { Injectable } from '@nestjs/common';
import { isTerminalRunState, RunQuery, WorkflowRun } from '../engine/run.types';
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
import {
  PersistenceStore,
  TaskOutputKey,
  TaskOutputRecord,
  batchHandle,
  taskOutputRef,
} from './persistence.store';

/**
 * Process-local store. Runs are copied on the way in and out so callers
 * never share mutable state with it.
 */
@Injectable()
export class InMemoryStore extends PersistenceStore {
  private readonly runs = new Map<string, WorkflowRun>();
  private readonly batches = new Map<string, DataBatch>();
  private readonly outputs = new Map<string, TaskOutputRecord>();
  private readonly validations = new Map<string, ValidationResult>();
  private readonly snapshots = new Map<string, ModelMetricSnapshot[]>();
  private readonly alerts: Alert[] = [];
  private readonly feedback: FeedbackRecord[] = [];

  async saveRun(run: WorkflowRun): Promise<void> {
    this.runs.set(run.id, cloneRun(run));
  }

  async getRun(runId: string): Promise<WorkflowRun | null> {
    const run = this.runs.get(runId);
    return run ? cloneRun(run) : null;
  }

  async listRuns(
    query: RunQuery,
  ): Promise<{ runs: WorkflowRun[]; total: number }> {
    const matching = Array.from(this.runs.values())
      .filter(
        (run) =>
          (!query.pipelineId || run.pipelineId === query.pipelineId) &&
          (!query.logicalKey || run.logicalKey === query.logicalKey) &&
          (!query.state || run.state === query.state),
      )
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());

    const page = query.page || 1;
    const limit = query.limit || 20;
    const offset = (page - 1) * limit;

    return {
      runs: matching.slice(offset, offset + limit).map(cloneRun),
      total: matching.length,
    };
  }

  async findRunsByKey(
    pipelineId: string,
    logicalKey: string,
  ): Promise<WorkflowRun[]> {
    return Array.from(this.runs.values())
      .filter(
        (run) => run.pipelineId === pipelineId && run.logicalKey === logicalKey,
      )
      .map(cloneRun);
  }

  async deleteRunsFinishedBefore(cutoff: Date): Promise<number> {
    let deleted = 0;
    for (const run of Array.from(this.runs.values())) {
      if (
        !isTerminalRunState(run.state) ||
        !run.finishedAt ||
        run.finishedAt.getTime() >= cutoff.getTime()
      ) {
        continue;
      }
      this.runs.delete(run.id);
      this.validations.delete(run.id);
      const ownedBatches = batchHandle(run.id, '');
      for (const handle of Array.from(this.batches.keys())) {
        if (handle.startsWith(ownedBatches)) {
          this.batches.delete(handle);
        }
      }
      for (const [ref, record] of Array.from(this.outputs.entries())) {
        if (record.runId === run.id) {
          this.outputs.delete(ref);
        }
      }
      deleted++;
    }
    return deleted;
  }

  async putBatch(runId: string, batch: DataBatch): Promise<string> {
    const handle = batchHandle(runId, batch.id);
    this.batches.set(handle, batch);
    return handle;
  }

  async getBatch(handle: string): Promise<DataBatch | null> {
    return this.batches.get(handle) ?? null;
  }

  async putTaskOutput(key: TaskOutputKey, output: unknown): Promise<string> {
    const ref = taskOutputRef(key);
    this.outputs.set(ref, { ...key, ref, output, writtenAt: new Date() });
    return ref;
  }

  async getTaskOutput(ref: string): Promise<TaskOutputRecord | null> {
    return this.outputs.get(ref) ?? null;
  }

  async listTaskOutputs(
    runId: string,
    taskId: string,
  ): Promise<TaskOutputRecord[]> {
    return Array.from(this.outputs.values())
      .filter((record) => record.runId === runId && record.taskId === taskId)
      .sort((a, b) => a.attempt - b.attempt);
  }

  async saveValidationResult(
    runId: string,
    result: ValidationResult,
  ): Promise<void> {
    this.validations.set(runId, result);
  }

  async getValidationResult(runId: string): Promise<ValidationResult | null> {
    return this.validations.get(runId) ?? null;
  }

  async appendMetricSnapshot(snapshot: ModelMetricSnapshot): Promise<void> {
    const series = this.snapshots.get(snapshot.metricId) ?? [];
    series.push(snapshot);
    this.snapshots.set(snapshot.metricId, series);
  }

  async getMetricSnapshots(
    metricId: string,
    limit: number,
  ): Promise<ModelMetricSnapshot[]> {
    const series = this.snapshots.get(metricId) ?? [];
    return series.slice(Math.max(0, series.length - limit));
  }

  async saveAlert(alert: Alert): Promise<void> {
    this.alerts.push(alert);
  }

  async listAlerts(query: AlertQuery = {}): Promise<Alert[]> {
    return this.alerts.filter(
      (alert) =>
        (!query.modelId || alert.modelId === query.modelId) &&
        (!query.severity || alert.severity === query.severity) &&
        (!query.since || alert.createdAt.getTime() >= query.since.getTime()),
    );
  }

  async appendFeedback(record: FeedbackRecord): Promise<void> {
    this.feedback.push(record);
  }

  async listFeedback(query: FeedbackQuery = {}): Promise<FeedbackRecord[]> {
    return this.feedback.filter(
      (record) =>
        (!query.modelId || record.modelId === query.modelId) &&
        (!query.since ||
          record.submittedAt.getTime() >= query.since.getTime()),
    );
  }
}

function cloneRun(run: WorkflowRun): WorkflowRun {
  return {
    ...run,
    params: { ...run.params },
    validation: run.validation ? { ...run.validation } : undefined,
    tasks: run.tasks.map((task) => ({
      ...task,
      dependsOn: [...task.dependsOn],
      lastError: task.lastError ? { ...task.lastError } : undefined,
      metrics: task.metrics ? { ...task.metrics } : undefined,
    })),
  };
}
