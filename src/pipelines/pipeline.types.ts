import type { RuleSet } from '../validation/validation.types';

export const TASK_KINDS = [
  'ingestion',
  'validation',
  'nlp_query',
  'forecast',
  'cluster',
  'retrain',
] as const;

export type TaskKind = (typeof TASK_KINDS)[number];

/** Analysis kinds. Only their metrics describe a model and are watched for drift. */
export const MONITORED_TASK_KINDS: ReadonlySet<TaskKind> = new Set<TaskKind>([
  'nlp_query',
  'forecast',
  'cluster',
]);

export interface RetryOverride {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  maxTotalWaitMs?: number;
}

export interface TaskSpec {
  id: string;
  kind: TaskKind;
  dependsOn: string[];
  /** Failure of an optional task skips its dependents instead of failing the run. */
  optional: boolean;
  timeoutMs: number;
  retry?: RetryOverride;
  /** Model whose metrics this task reports; defaults to `<pipelineId>.<taskId>`. */
  modelId?: string;
  config: TaskConfig;
}

export interface TaskConfig {
  sources?: string[];
  sinceHours?: number;
  rules?: RuleSet;
  [key: string]: unknown;
}

export interface PipelineDefinition {
  readonly id: string;
  readonly name: string;
  readonly description?: string;
  /** Cron expression for the time-based trigger. */
  readonly schedule?: string;
  readonly runTimeoutMs?: number;
  readonly tasks: readonly Readonly<TaskSpec>[];
  readonly registeredAt: Date;
}

export function modelIdFor(pipelineId: string, spec: TaskSpec): string {
  return spec.modelId ?? `${pipelineId}.${spec.id}`;
}
