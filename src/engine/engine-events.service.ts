import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { Observable, Subject } from 'rxjs';
import type { TaskKind } from '../pipelines/pipeline.types';
import type { RunState, TaskErrorInfo, TaskState } from './run.types';

interface RunScopedEvent {
  /** Increases by one per event of the same run, starting at 1. */
  sequence: number;
  runId: string;
  pipelineId: string;
  logicalKey: string;
  at: Date;
}

export interface RunTransitionEvent extends RunScopedEvent {
  type: 'run.transition';
  from: RunState | null;
  to: RunState;
  error?: string;
}

export interface TaskTransitionEvent extends RunScopedEvent {
  type: 'task.transition';
  taskId: string;
  kind: TaskKind;
  modelId: string;
  attempt: number;
  from: TaskState;
  to: TaskState;
  metrics?: Record<string, number>;
  error?: TaskErrorInfo;
}

export type EngineEvent = RunTransitionEvent | TaskTransitionEvent;

/**
 * Ordered stream of run and task transitions. Order is causal per run; events
 * of different runs interleave freely.
 */
@Injectable()
export class EngineEventsService implements OnModuleDestroy {
  private readonly subject = new Subject<EngineEvent>();
  private readonly sequences = new Map<string, number>();

  readonly events$: Observable<EngineEvent> = this.subject.asObservable();

  emitRun(event: Omit<RunTransitionEvent, 'type' | 'sequence'>): void {
    this.subject.next({
      ...event,
      type: 'run.transition',
      sequence: this.nextSequence(event.runId),
    });
  }

  emitTask(event: Omit<TaskTransitionEvent, 'type' | 'sequence'>): void {
    this.subject.next({
      ...event,
      type: 'task.transition',
      sequence: this.nextSequence(event.runId),
    });
  }

  /** Drops the counter of a finished run. */
  forget(runId: string): void {
    this.sequences.delete(runId);
  }

  onModuleDestroy() {
    this.subject.complete();
  }

  private nextSequence(runId: string): number {
    const sequence = (this.sequences.get(runId) ?? 0) + 1;
    this.sequences.set(runId, sequence);
    return sequence;
  }
}
