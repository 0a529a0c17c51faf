import { CancelledError, InputError } from '../common/errors';
import type { BatchRecord, DataBatch } from '../validation/validation.types';
import type { TaskContext } from './task-executor.interface';

export function requireBatch(
  batch: DataBatch | undefined,
  context: TaskContext,
): DataBatch {
  if (!batch) {
    throw new InputError(
      `Task ${context.taskId} needs an ingested batch but run ${context.runId} has none`,
    );
  }
  return batch;
}

export function numberField(record: BatchRecord, field: string): number | null {
  const value = record[field];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export function stringField(record: BatchRecord, field: string): string | null {
  const value = record[field];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

export function throwIfAborted(context: TaskContext): void {
  if (context.signal.aborted) {
    throw new CancelledError(`Task ${context.taskId} was aborted`);
  }
}

export function mean(values: readonly number[]): number {
  return values.length === 0
    ? 0
    : values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function roundTo(value: number, digits = 4): number {
  const factor = Math.pow(10, digits);
  return Math.round(value * factor) / factor;
}
