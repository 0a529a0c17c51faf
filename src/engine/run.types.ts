import type { TaskKind } from '../pipelines/pipeline.types';

export type RunState =
  | 'pending'
  | 'retraining-queued'
  | 'running'
  | 'blocked'
  | 'succeeded'
  | 'failed'
  | 'cancelled';

export type TaskState =
  | 'pending'
  | 'running'
  | 'retry_scheduled'
  | 'succeeded'
  | 'failed'
  | 'skipped'
  | 'cancelled';

export const TERMINAL_RUN_STATES: readonly RunState[] = [
  'blocked',
  'succeeded',
  'failed',
  'cancelled',
];

export const VALID_RUN_TRANSITIONS: Record<RunState, readonly RunState[]> = {
  pending: ['running', 'cancelled'],
  'retraining-queued': ['running', 'cancelled'],
  running: ['blocked', 'succeeded', 'failed', 'cancelled'],
  blocked: [],
  succeeded: [],
  failed: [],
  cancelled: [],
};

export const VALID_TASK_TRANSITIONS: Record<TaskState, readonly TaskState[]> = {
  pending: ['running', 'skipped', 'cancelled'],
  running: ['succeeded', 'failed', 'retry_scheduled', 'cancelled'],
  retry_scheduled: ['running', 'cancelled'],
  succeeded: [],
  failed: [],
  skipped: [],
  cancelled: [],
};

export function isTerminalRunState(state: RunState): boolean {
  return TERMINAL_RUN_STATES.includes(state);
}

export function isSettledTaskState(state: TaskState): boolean {
  return VALID_TASK_TRANSITIONS[state].length === 0;
}

export interface TaskErrorInfo {
  code: string;
  message: string;
  transient: boolean;
  attempt: number;
}

export interface TaskInstance {
  taskId: string;
  kind: TaskKind;
  state: TaskState;
  optional: boolean;
  dependsOn: string[];
  attemptCount: number;
  lastError?: TaskErrorInfo;
  /** Batch handle the task read, when it consumed one. */
  inputRef?: string;
  /** Output key of the last successful attempt. */
  outputRef?: string;
  metrics?: Record<string, number>;
  startedAt?: Date;
  finishedAt?: Date;
}

export interface RunValidationSummary {
  passed: boolean;
  violationCount: number;
}

export interface WorkflowRun {
  id: string;
  pipelineId: string;
  logicalKey: string;
  /** 1 for the first run of a (pipeline, logical key), incremented per re-trigger. */
  epoch: number;
  state: RunState;
  params: Record<string, unknown>;
  batchRef?: string;
  validation?: RunValidationSummary;
  tasks: TaskInstance[];
  lastError?: string;
  createdAt: Date;
  startedAt?: Date;
  finishedAt?: Date;
}

export interface RunQuery {
  pipelineId?: string;
  logicalKey?: string;
  state?: RunState;
  page?: number;
  limit?: number;
}
