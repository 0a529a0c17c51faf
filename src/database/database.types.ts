import type { RunState, TaskErrorInfo, TaskState } from '../engine/run.types';
import type { AlertSeverity } from '../monitoring/monitoring.types';
import type { BatchRecord, Violation } from '../validation/validation.types';

export type WorkflowRunRow = {
  id: string;
  pipeline_id: string;
  logical_key: string;
  epoch: number;
  state: RunState;
  params: Record<string, unknown>;
  batch_ref: string | null;
  validation: { passed: boolean; violationCount: number } | null;
  last_error: string | null;
  created_at: Date;
  started_at: Date | null;
  finished_at: Date | null;
};

export type TaskInstanceRow = {
  run_id: string;
  task_id: string;
  kind: string;
  state: TaskState;
  optional: boolean;
  depends_on: string[];
  attempt_count: number;
  last_error: TaskErrorInfo | null;
  input_ref: string | null;
  output_ref: string | null;
  metrics: Record<string, number> | null;
  started_at: Date | null;
  finished_at: Date | null;
};

export type DataBatchRow = {
  handle: string;
  run_id: string;
  batch_id: string;
  logical_key: string;
  records: BatchRecord[];
  source_ids: string[];
  ingested_at: Date;
  record_count: number;
};

export type TaskOutputRow = {
  ref: string;
  run_id: string;
  task_id: string;
  attempt: number;
  output: unknown;
  written_at: Date;
};

export type ValidationResultRow = {
  run_id: string;
  batch_id: string;
  passed: boolean;
  violations: Violation[];
  record_count: number;
  validated_at: Date;
};

export type MetricSnapshotRow = {
  id: string;
  metric_id: string;
  model_id: string;
  metric_name: string;
  run_id: string;
  task_id: string;
  value: number;
  recorded_at: Date;
};

export type AlertRow = {
  id: string;
  severity: AlertSeverity;
  metric_id: string;
  model_id: string;
  run_id: string;
  observed: number;
  expected: number;
  z_score: number;
  created_at: Date;
};

export type FeedbackRow = {
  id: string;
  model_id: string;
  run_id: string | null;
  task_id: string | null;
  rating: number;
  correction: string | null;
  submitted_at: Date;
};

export type CountRow = {
  total: string;
};
