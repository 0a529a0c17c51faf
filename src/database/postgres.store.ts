import { Injectable, Logger } from '@nestjs/common';
import { PoolClient } from 'pg';
import type {
  RunQuery,
  TaskInstance,
  WorkflowRun,
} from '../engine/run.types';
import type { FeedbackQuery, FeedbackRecord } from '../feedback/feedback.types';
import type {
  Alert,
  AlertQuery,
  ModelMetricSnapshot,
} from '../monitoring/monitoring.types';
import { TASK_KINDS, TaskKind } from '../pipelines/pipeline.types';
import type {
  DataBatch,
  ValidationResult,
} from '../validation/validation.types';
import { DatabaseService } from './database.service';
import {
  AlertRow,
  CountRow,
  DataBatchRow,
  FeedbackRow,
  MetricSnapshotRow,
  TaskInstanceRow,
  TaskOutputRow,
  ValidationResultRow,
  WorkflowRunRow,
} from './database.types';
import {
  PersistenceStore,
  TaskOutputKey,
  TaskOutputRecord,
  batchHandle,
  taskOutputRef,
} from './persistence.store';

@Injectable()
export class PostgresStore extends PersistenceStore {
  private readonly logger = new Logger(PostgresStore.name);

  constructor(private readonly db: DatabaseService) {
    super();
  }

  // ============================================================================
  // WORKFLOW RUNS
  // ============================================================================

  async saveRun(run: WorkflowRun): Promise<void> {
    await this.db.transaction(async (client) => {
      await client.query(
        `
        INSERT INTO workflow_runs (
          id, pipeline_id, logical_key, epoch, state, params, batch_ref,
          validation, last_error, created_at, started_at, finished_at
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
        ON CONFLICT (id) DO UPDATE SET
          state = EXCLUDED.state,
          batch_ref = EXCLUDED.batch_ref,
          validation = EXCLUDED.validation,
          last_error = EXCLUDED.last_error,
          started_at = EXCLUDED.started_at,
          finished_at = EXCLUDED.finished_at,
          updated_at = CURRENT_TIMESTAMP
        `,
        [
          run.id,
          run.pipelineId,
          run.logicalKey,
          run.epoch,
          run.state,
          JSON.stringify(run.params),
          run.batchRef ?? null,
          run.validation ? JSON.stringify(run.validation) : null,
          run.lastError ?? null,
          run.createdAt,
          run.startedAt ?? null,
          run.finishedAt ?? null,
        ],
      );

      for (const task of run.tasks) {
        await this.upsertTask(client, run.id, task);
      }
    });
  }

  private async upsertTask(
    client: PoolClient,
    runId: string,
    task: TaskInstance,
  ): Promise<void> {
    await client.query(
      `
      INSERT INTO task_instances (
        run_id, task_id, kind, state, optional, depends_on, attempt_count,
        last_error, input_ref, output_ref, metrics, started_at, finished_at
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)
      ON CONFLICT (run_id, task_id) DO UPDATE SET
        state = EXCLUDED.state,
        attempt_count = EXCLUDED.attempt_count,
        last_error = EXCLUDED.last_error,
        input_ref = EXCLUDED.input_ref,
        output_ref = EXCLUDED.output_ref,
        metrics = EXCLUDED.metrics,
        started_at = EXCLUDED.started_at,
        finished_at = EXCLUDED.finished_at
      `,
      [
        runId,
        task.taskId,
        task.kind,
        task.state,
        task.optional,
        task.dependsOn,
        task.attemptCount,
        task.lastError ? JSON.stringify(task.lastError) : null,
        task.inputRef ?? null,
        task.outputRef ?? null,
        task.metrics ? JSON.stringify(task.metrics) : null,
        task.startedAt ?? null,
        task.finishedAt ?? null,
      ],
    );
  }

  async getRun(runId: string): Promise<WorkflowRun | null> {
    const rows = await this.db.query<WorkflowRunRow>(
      'SELECT * FROM workflow_runs WHERE id = $1',
      [runId],
    );
    if (rows.length === 0) {
      return null;
    }
    const [run] = await this.hydrateRuns(rows);
    return run;
  }

  async listRuns(
    query: RunQuery,
  ): Promise<{ runs: WorkflowRun[]; total: number }> {
    let whereClause = 'WHERE 1=1';
    const queryParams: unknown[] = [];
    let paramIndex = 1;

    if (query.pipelineId) {
      whereClause += ` AND pipeline_id = $${paramIndex}`;
      queryParams.push(query.pipelineId);
      paramIndex++;
    }

    if (query.logicalKey) {
      whereClause += ` AND logical_key = $${paramIndex}`;
      queryParams.push(query.logicalKey);
      paramIndex++;
    }

    if (query.state) {
      whereClause += ` AND state = $${paramIndex}`;
      queryParams.push(query.state);
      paramIndex++;
    }

    const countResult = await this.db.query<CountRow>(
      `SELECT COUNT(*) AS total FROM workflow_runs ${whereClause}`,
      queryParams,
    );
    const total = parseInt(countResult[0]?.total ?? '0', 10);

    const page = query.page || 1;
    const limit = query.limit || 20;
    const offset = (page - 1) * limit;

    const rows = await this.db.query<WorkflowRunRow>(
      `
      SELECT * FROM workflow_runs
      ${whereClause}
      ORDER BY created_at DESC
      LIMIT $${paramIndex} OFFSET $${paramIndex + 1}
      `,
      [...queryParams, limit, offset],
    );

    this.logger.debug(`📊 Retrieved ${rows.length} runs (total: ${total})`);
    return { runs: await this.hydrateRuns(rows), total };
  }

  async findRunsByKey(
    pipelineId: string,
    logicalKey: string,
  ): Promise<WorkflowRun[]> {
    const rows = await this.db.query<WorkflowRunRow>(
      `
      SELECT * FROM workflow_runs
      WHERE pipeline_id = $1 AND logical_key = $2
      ORDER BY created_at ASC
      `,
      [pipelineId, logicalKey],
    );
    return this.hydrateRuns(rows);
  }

  async deleteRunsFinishedBefore(cutoff: Date): Promise<number> {
    return this.db.transaction(async (client) => {
      const deleted = await client.query<{ id: string }>(
        `
        DELETE FROM workflow_runs
        WHERE state IN ('blocked', 'succeeded', 'failed', 'cancelled')
          AND finished_at < $1
        RETURNING id
        `,
        [cutoff],
      );
      const runIds = deleted.rows.map((row) => row.id);
      if (runIds.length > 0) {
        await client.query('DELETE FROM data_batches WHERE run_id = ANY($1)', [
          runIds,
        ]);
      }
      return deleted.rowCount ?? 0;
    });
  }

  private async hydrateRuns(rows: WorkflowRunRow[]): Promise<WorkflowRun[]> {
    if (rows.length === 0) {
      return [];
    }
    const taskRows = await this.db.query<TaskInstanceRow>(
      'SELECT * FROM task_instances WHERE run_id = ANY($1)',
      [rows.map((row) => row.id)],
    );

    return rows.map((row) => ({
      id: row.id,
      pipelineId: row.pipeline_id,
      logicalKey: row.logical_key,
      epoch: row.epoch,
      state: row.state,
      params: row.params,
      batchRef: row.batch_ref ?? undefined,
      validation: row.validation ?? undefined,
      lastError: row.last_error ?? undefined,
      createdAt: row.created_at,
      startedAt: row.started_at ?? undefined,
      finishedAt: row.finished_at ?? undefined,
      tasks: taskRows
        .filter((task) => task.run_id === row.id)
        .map((task) => ({
          taskId: task.task_id,
          kind: toTaskKind(task.kind),
          state: task.state,
          optional: task.optional,
          dependsOn: task.depends_on,
          attemptCount: task.attempt_count,
          lastError: task.last_error ?? undefined,
          inputRef: task.input_ref ?? undefined,
          outputRef: task.output_ref ?? undefined,
          metrics: task.metrics ?? undefined,
          startedAt: task.started_at ?? undefined,
          finishedAt: task.finished_at ?? undefined,
        })),
    }));
  }

  // ============================================================================
  // PAYLOADS
  // ============================================================================

  async putBatch(runId: string, batch: DataBatch): Promise<string> {
    const handle = batchHandle(runId, batch.id);
    await this.db.query(
      `
      INSERT INTO data_batches (
        handle, run_id, batch_id, logical_key, records, source_ids, ingested_at, record_count
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
      ON CONFLICT (handle) DO NOTHING
      `,
      [
        handle,
        runId,
        batch.id,
        batch.logicalKey,
        JSON.stringify(batch.records),
        batch.provenance.sourceIds,
        batch.provenance.ingestedAt,
        batch.provenance.recordCount,
      ],
    );
    return handle;
  }

  async getBatch(handle: string): Promise<DataBatch | null> {
    const rows = await this.db.query<DataBatchRow>(
      'SELECT * FROM data_batches WHERE handle = $1',
      [handle],
    );
    const row = rows[0];
    if (!row) {
      return null;
    }
    return {
      id: row.batch_id,
      logicalKey: row.logical_key,
      records: row.records,
      provenance: {
        sourceIds: row.source_ids,
        ingestedAt: row.ingested_at,
        recordCount: row.record_count,
      },
    };
  }

  async putTaskOutput(key: TaskOutputKey, output: unknown): Promise<string> {
    const ref = taskOutputRef(key);
    await this.db.query(
      `
      INSERT INTO task_outputs (ref, run_id, task_id, attempt, output)
      VALUES ($1, $2, $3, $4, $5)
      ON CONFLICT (ref) DO UPDATE SET
        output = EXCLUDED.output,
        written_at = CURRENT_TIMESTAMP
      `,
      [ref, key.runId, key.taskId, key.attempt, JSON.stringify(output ?? null)],
    );
    return ref;
  }

  async getTaskOutput(ref: string): Promise<TaskOutputRecord | null> {
    const rows = await this.db.query<TaskOutputRow>(
      'SELECT * FROM task_outputs WHERE ref = $1',
      [ref],
    );
    return rows[0] ? toOutputRecord(rows[0]) : null;
  }

  async listTaskOutputs(
    runId: string,
    taskId: string,
  ): Promise<TaskOutputRecord[]> {
    const rows = await this.db.query<TaskOutputRow>(
      `
      SELECT * FROM task_outputs
      WHERE run_id = $1 AND task_id = $2
      ORDER BY attempt ASC
      `,
      [runId, taskId],
    );
    return rows.map(toOutputRecord);
  }

  // ============================================================================
  // VALIDATION AUDIT
  // ============================================================================

  async saveValidationResult(
    runId: string,
    result: ValidationResult,
  ): Promise<void> {
    await this.db.query(
      `
      INSERT INTO validation_results (
        run_id, batch_id, passed, violations, record_count, validated_at
      ) VALUES ($1, $2, $3, $4, $5, $6)
      ON CONFLICT (run_id) DO UPDATE SET
        batch_id = EXCLUDED.batch_id,
        passed = EXCLUDED.passed,
        violations = EXCLUDED.violations,
        record_count = EXCLUDED.record_count,
        validated_at = EXCLUDED.validated_at
      `,
      [
        runId,
        result.batchId,
        result.passed,
        JSON.stringify(result.violations),
        result.recordCount,
        result.validatedAt,
      ],
    );
  }

  async getValidationResult(runId: string): Promise<ValidationResult | null> {
    const rows = await this.db.query<ValidationResultRow>(
      'SELECT * FROM validation_results WHERE run_id = $1',
      [runId],
    );
    const row = rows[0];
    if (!row) {
      return null;
    }
    return {
      batchId: row.batch_id,
      passed: row.passed,
      violations: row.violations,
      recordCount: row.record_count,
      validatedAt: row.validated_at,
    };
  }

  // ============================================================================
  // MONITORING
  // ============================================================================

  async appendMetricSnapshot(snapshot: ModelMetricSnapshot): Promise<void> {
    await this.db.query(
      `
      INSERT INTO model_metric_snapshots (
        id, metric_id, model_id, metric_name, run_id, task_id, value, recorded_at
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
      `,
      [
        snapshot.id,
        snapshot.metricId,
        snapshot.modelId,
        snapshot.metricName,
        snapshot.runId,
        snapshot.taskId,
        snapshot.value,
        snapshot.recordedAt,
      ],
    );
  }

  async getMetricSnapshots(
    metricId: string,
    limit: number,
  ): Promise<ModelMetricSnapshot[]> {
    const rows = await this.db.query<MetricSnapshotRow>(
      `
      SELECT * FROM (
        SELECT * FROM model_metric_snapshots
        WHERE metric_id = $1
        ORDER BY recorded_at DESC
        LIMIT $2
      ) latest
      ORDER BY recorded_at ASC
      `,
      [metricId, limit],
    );
    return rows.map((row) => ({
      id: row.id,
      metricId: row.metric_id,
      modelId: row.model_id,
      metricName: row.metric_name,
      runId: row.run_id,
      taskId: row.task_id,
      value: row.value,
      recordedAt: row.recorded_at,
    }));
  }

  async saveAlert(alert: Alert): Promise<void> {
    await this.db.query(
      `
      INSERT INTO alerts (
        id, severity, metric_id, model_id, run_id, observed, expected, z_score, created_at
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
      `,
      [
        alert.id,
        alert.severity,
        alert.metricId,
        alert.modelId,
        alert.runId,
        alert.observed,
        alert.expected,
        finiteOrMax(alert.zScore),
        alert.createdAt,
      ],
    );
  }

  async listAlerts(query: AlertQuery = {}): Promise<Alert[]> {
    let whereClause = 'WHERE 1=1';
    const queryParams: unknown[] = [];

    if (query.modelId) {
      queryParams.push(query.modelId);
      whereClause += ` AND model_id = $${queryParams.length}`;
    }
    if (query.severity) {
      queryParams.push(query.severity);
      whereClause += ` AND severity = $${queryParams.length}`;
    }
    if (query.since) {
      queryParams.push(query.since);
      whereClause += ` AND created_at >= $${queryParams.length}`;
    }

    const rows = await this.db.query<AlertRow>(
      `SELECT * FROM alerts ${whereClause} ORDER BY created_at ASC`,
      queryParams,
    );
    return rows.map((row) => ({
      id: row.id,
      severity: row.severity,
      metricId: row.metric_id,
      modelId: row.model_id,
      runId: row.run_id,
      observed: row.observed,
      expected: row.expected,
      zScore: row.z_score,
      createdAt: row.created_at,
    }));
  }

  // ============================================================================
  // FEEDBACK
  // ============================================================================

  async appendFeedback(record: FeedbackRecord): Promise<void> {
    await this.db.query(
      `
      INSERT INTO feedback_records (
        id, model_id, run_id, task_id, rating, correction, submitted_at
      ) VALUES ($1, $2, $3, $4, $5, $6, $7)
      `,
      [
        record.id,
        record.modelId,
        record.runId ?? null,
        record.taskId ?? null,
        record.rating,
        record.correction ?? null,
        record.submittedAt,
      ],
    );
  }

  async listFeedback(query: FeedbackQuery = {}): Promise<FeedbackRecord[]> {
    let whereClause = 'WHERE 1=1';
    const queryParams: unknown[] = [];

    if (query.modelId) {
      queryParams.push(query.modelId);
      whereClause += ` AND model_id = $${queryParams.length}`;
    }
    if (query.since) {
      queryParams.push(query.since);
      whereClause += ` AND submitted_at >= $${queryParams.length}`;
    }

    const rows = await this.db.query<FeedbackRow>(
      `SELECT * FROM feedback_records ${whereClause} ORDER BY submitted_at ASC`,
      queryParams,
    );
    return rows.map((row) => ({
      id: row.id,
      modelId: row.model_id,
      runId: row.run_id ?? undefined,
      taskId: row.task_id ?? undefined,
      rating: row.rating,
      correction: row.correction ?? undefined,
      submittedAt: row.submitted_at,
    }));
  }
}

function toTaskKind(kind: string): TaskKind {
  const match = TASK_KINDS.find((candidate) => candidate === kind);
  if (!match) {
    throw new Error(`Unknown task kind stored: ${kind}`);
  }
  return match;
}

function toOutputRecord(row: TaskOutputRow): TaskOutputRecord {
  return {
    ref: row.ref,
    runId: row.run_id,
    taskId: row.task_id,
    attempt: row.attempt,
    output: row.output,
    writtenAt: row.written_at,
  };
}

/** Postgres DOUBLE PRECISION accepts Infinity, but JSON consumers do not. */
function finiteOrMax(value: number): number {
  return Number.isFinite(value) ? value : Number.MAX_VALUE * Math.sign(value);
}
