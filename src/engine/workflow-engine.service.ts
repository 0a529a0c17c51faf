import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { Clock, TimerHandle } from '../common/clock';
import {
  CancelledError,
  ConflictError,
  InputError,
  NotFoundError,
  PipelineError,
  TaskTimeoutError,
  ValidationFailureError,
  describeError,
} from '../common/errors';
import { PersistenceStore } from '../database/persistence.store';
import { ExecutorRegistry } from '../executors/executor-registry.service';
import { TaskResult } from '../executors/task-executor.interface';
import {
  PipelineDefinition,
  TaskSpec,
  modelIdFor,
} from '../pipelines/pipeline.types';
import { PipelinesService } from '../pipelines/pipelines.service';
import { RetryPolicyService, isTransient } from '../retry/retry-policy.service';
import type { DataBatch } from '../validation/validation.types';
import { AdmissionTable } from './admission-table';
import { EngineEventsService } from './engine-events.service';
import {
  RunQuery,
  RunState,
  TaskErrorInfo,
  TaskInstance,
  TaskState,
  VALID_RUN_TRANSITIONS,
  VALID_TASK_TRANSITIONS,
  WorkflowRun,
  isSettledTaskState,
} from './run.types';
import { WorkerPoolService } from './worker-pool.service';

export type EntryState = Extract<RunState, 'pending' | 'retraining-queued'>;

export interface SubmitOptions {
  params?: Record<string, unknown>;
  entryState?: EntryState;
}

interface ActiveRun {
  run: WorkflowRun;
  definition: PipelineDefinition;
  specs: Map<string, Readonly<TaskSpec>>;
  /** Abort controllers of attempts currently executing, by task id. */
  inFlight: Map<string, AbortController>;
  retryTimers: Map<string, TimerHandle>;
  runTimer?: TimerHandle;
  batch?: DataBatch;
  persisted: Promise<void>;
  finishing: boolean;
  settled: Promise<WorkflowRun>;
  resolveSettled: (run: WorkflowRun) => void;
}

const RECOVERABLE_STATES: readonly RunState[] = [
  'pending',
  'retraining-queued',
  'running',
];

/**
 * Drives every run through its state machine: admits runs per logical key,
 * dispatches dependency-eligible tasks to the worker pool, applies the retry
 * policy and settles the run. Never awaits a task inline; completions arrive
 * as callbacks and re-evaluate the owning run.
 */
@Injectable()
export class WorkflowEngineService
  implements OnApplicationBootstrap, OnModuleDestroy
{
  private readonly logger = new Logger(WorkflowEngineService.name);
  private readonly active = new Map<string, ActiveRun>();

  constructor(
    private readonly pipelines: PipelinesService,
    private readonly executors: ExecutorRegistry,
    private readonly retryPolicy: RetryPolicyService,
    private readonly store: PersistenceStore,
    private readonly admission: AdmissionTable,
    private readonly pool: WorkerPoolService,
    private readonly events: EngineEventsService,
    private readonly clock: Clock,
  ) {}

  async onApplicationBootstrap() {
    await this.recoverInterruptedRuns();
  }

  onModuleDestroy() {
    for (const active of this.active.values()) {
      active.runTimer?.cancel();
      active.retryTimers.forEach((timer) => timer.cancel());
      active.inFlight.forEach((controller) =>
        controller.abort(new CancelledError('Engine shutting down')),
      );
    }
  }

  // ============================================================================
  // SUBMISSION & CONTROL
  // ============================================================================

  /**
   * Create and admit a run. A key already held by a non-terminal run raises
   * `ConflictError` and nothing is recorded.
   */
  async submit(
    pipelineId: string,
    logicalKey: string,
    options: SubmitOptions = {},
  ): Promise<string> {
    const definition = this.pipelines.get(pipelineId);
    const runId = uuidv4();

    const admission = this.admission.tryAcquire(pipelineId, logicalKey, runId);
    if (!admission.acquired) {
      this.logger.warn(
        `🚦 Rejected trigger for ${pipelineId}/${logicalKey}: run ${admission.holder} is active`,
      );
      throw new ConflictError(pipelineId, logicalKey, admission.holder);
    }

    try {
      const previous = await this.store.findRunsByKey(pipelineId, logicalKey);
      const run: WorkflowRun = {
        id: runId,
        pipelineId,
        logicalKey,
        epoch: previous.length + 1,
        state: options.entryState ?? 'pending',
        params: { ...options.params },
        tasks: definition.tasks.map(
          (spec): TaskInstance => ({
            taskId: spec.id,
            kind: spec.kind,
            state: 'pending',
            optional: spec.optional,
            dependsOn: [...spec.dependsOn],
            attemptCount: 0,
          }),
        ),
        createdAt: this.clock.now(),
      };
      await this.store.saveRun(run);

      const active = this.track(run, definition);
      this.emitRun(active, null);
      this.admit(active);
      return runId;
    } catch (error) {
      this.admission.release(pipelineId, logicalKey, runId);
      throw error;
    }
  }

  async cancel(runId: string): Promise<WorkflowRun> {
    const active = this.active.get(runId);
    if (active) {
      this.finishRun(active, 'cancelled', 'Cancelled on request');
      return active.settled;
    }

    const stored = await this.getRun(runId);
    throw new InputError(`Run ${runId} is not active (state ${stored.state})`);
  }

  async getRun(runId: string): Promise<WorkflowRun> {
    const active = this.active.get(runId);
    if (active) {
      return structuredClone(active.run);
    }
    const run = await this.store.getRun(runId);
    if (!run) {
      throw new NotFoundError(`Run ${runId} not found`);
    }
    return run;
  }

  async listRuns(query: RunQuery): Promise<{ runs: WorkflowRun[]; total: number }> {
    return this.store.listRuns(query);
  }

  /** Resolves once the run is terminal and its final state is persisted. */
  async waitForRun(runId: string): Promise<WorkflowRun> {
    const active = this.active.get(runId);
    if (active) {
      return active.settled;
    }
    return this.getRun(runId);
  }

  activeRunCount(): number {
    return this.active.size;
  }

  // ============================================================================
  // RUN LIFECYCLE
  // ============================================================================

  private track(run: WorkflowRun, definition: PipelineDefinition): ActiveRun {
    let resolveSettled: (run: WorkflowRun) => void = () => undefined;
    const settled = new Promise<WorkflowRun>((resolve) => {
      resolveSettled = resolve;
    });
    const active: ActiveRun = {
      run,
      definition,
      specs: new Map(definition.tasks.map((spec) => [spec.id, spec])),
      inFlight: new Map(),
      retryTimers: new Map(),
      persisted: Promise.resolve(),
      finishing: false,
      settled,
      resolveSettled,
    };
    this.active.set(run.id, active);
    return active;
  }

  private admit(active: ActiveRun): void {
    const { run } = active;
    this.transitionRun(active, 'running');
    run.startedAt = run.startedAt ?? this.clock.now();

    const budgetMs = this.runBudget(active.definition);
    active.runTimer = this.clock.setTimer(
      () =>
        this.finishRun(active, 'failed', `Run exceeded its ${budgetMs}ms timeout`),
      budgetMs,
    );

    this.logger.log(
      `🚀 Admitted run ${run.id} for ${run.pipelineId}/${run.logicalKey} (epoch ${run.epoch}, ${run.tasks.length} tasks)`,
    );
    this.persist(active);
    this.pump(active);
  }

  /**
   * Dispatch every task whose dependencies all succeeded, skip tasks behind a
   * failed optional branch, and settle the run once nothing is left to do.
   */
  private pump(active: ActiveRun): void {
    if (active.finishing) return;

    let changed = true;
    while (changed) {
      changed = false;
      for (const task of active.run.tasks) {
        if (task.state !== 'pending') continue;
        const dependencies = task.dependsOn.map((id) => this.taskOf(active, id));

        if (dependencies.some((dep) => ['failed', 'skipped', 'cancelled'].includes(dep.state))) {
          this.transitionTask(active, task, 'skipped');
          task.finishedAt = this.clock.now();
          changed = true;
        } else if (dependencies.every((dep) => dep.state === 'succeeded')) {
          this.dispatch(active, task);
        }
      }
    }

    if (active.run.tasks.every((task) => isSettledTaskState(task.state))) {
      this.finishRun(active, 'succeeded');
    } else {
      this.persist(active);
    }
  }

  private dispatch(active: ActiveRun, task: TaskInstance): void {
    const spec = this.specOf(active, task.taskId);
    task.attemptCount++;
    task.startedAt = task.startedAt ?? this.clock.now();
    if (task.kind !== 'ingestion' && active.run.batchRef) {
      task.inputRef = active.run.batchRef;
    }
    this.transitionTask(active, task, 'running');

    const attempt = task.attemptCount;
    const controller = new AbortController();
    active.inFlight.set(task.taskId, controller);
    this.logger.debug(
      `▶️ Dispatching ${active.run.id}/${task.taskId} (${task.kind}, attempt ${attempt})`,
    );

    void this.pool
      .submit(() => this.executeAttempt(active, spec, attempt, controller))
      .then(
        (result) => this.onAttemptSucceeded(active, task, attempt, result),
        (error: unknown) => this.onAttemptFailed(active, task, attempt, error),
      )
      .catch((error: unknown) => {
        this.logger.error(
          `💥 Internal failure handling ${active.run.id}/${task.taskId}`,
          error,
        );
        this.finishRun(active, 'failed', `Internal engine error: ${describeError(error)}`);
      });
  }

  private async executeAttempt(
    active: ActiveRun,
    spec: Readonly<TaskSpec>,
    attempt: number,
    controller: AbortController,
  ): Promise<TaskResult> {
    const timer = this.clock.setTimer(
      () => controller.abort(new TaskTimeoutError(spec.id, spec.timeoutMs)),
      spec.timeoutMs,
    );
    try {
      if (controller.signal.aborted) {
        throw abortReason(controller.signal);
      }
      const executor = this.executors.get(spec.kind);
      const batch = await this.loadBatch(active);
      const { run } = active;
      return await raceAbort(
        executor.execute(batch, spec.config, {
          runId: run.id,
          pipelineId: run.pipelineId,
          logicalKey: run.logicalKey,
          taskId: spec.id,
          attempt,
          params: run.params,
          signal: controller.signal,
        }),
        controller.signal,
      );
    } finally {
      timer.cancel();
    }
  }

  private async onAttemptSucceeded(
    active: ActiveRun,
    task: TaskInstance,
    attempt: number,
    result: TaskResult,
  ): Promise<void> {
    if (this.isStale(active, task, attempt)) return;

    let outputRef: string;
    try {
      outputRef = await this.store.putTaskOutput(
        { runId: active.run.id, taskId: task.taskId, attempt },
        result.output,
      );
    } catch (error) {
      await this.onAttemptFailed(active, task, attempt, error);
      return;
    }
    if (this.isStale(active, task, attempt)) return;

    active.inFlight.delete(task.taskId);
    task.outputRef = outputRef;
    task.metrics = { ...result.metrics };
    task.lastError = undefined;
    task.finishedAt = this.clock.now();
    if (result.batchRef) {
      active.run.batchRef = result.batchRef;
      active.batch = undefined;
    }
    if (task.kind === 'validation') {
      active.run.validation = { passed: true, violationCount: 0 };
    }

    this.transitionTask(active, task, 'succeeded');
    this.logger.log(
      `✅ ${active.run.id}/${task.taskId} succeeded on attempt ${attempt}`,
    );
    this.pump(active);
  }

  private async onAttemptFailed(
    active: ActiveRun,
    task: TaskInstance,
    attempt: number,
    error: unknown,
  ): Promise<void> {
    if (this.isStale(active, task, attempt)) return;
    active.inFlight.delete(task.taskId);
    task.lastError = toErrorInfo(error, attempt);

    if (error instanceof ValidationFailureError) {
      task.finishedAt = this.clock.now();
      active.run.validation = {
        passed: false,
        violationCount: error.result.violations.length,
      };
      this.transitionTask(active, task, 'failed');
      this.finishRun(active, 'blocked', error.message);
      return;
    }

    const spec = this.specOf(active, task.taskId);
    const decision = this.retryPolicy.nextAction(
      task.kind,
      task.attemptCount,
      error,
      spec.retry,
    );

    if (decision.type === 'retry') {
      this.transitionTask(active, task, 'retry_scheduled');
      this.logger.log(
        `🔁 ${active.run.id}/${task.taskId} attempt ${attempt} failed (${describeError(error)}); retrying in ${decision.delayMs}ms`,
      );
      active.retryTimers.set(
        task.taskId,
        this.clock.setTimer(() => {
          active.retryTimers.delete(task.taskId);
          if (!active.finishing && task.state === 'retry_scheduled') {
            this.dispatch(active, task);
            this.persist(active);
          }
        }, decision.delayMs),
      );
      this.persist(active);
      return;
    }

    task.finishedAt = this.clock.now();
    this.transitionTask(active, task, 'failed');
    this.logger.warn(
      `🛑 ${active.run.id}/${task.taskId} abandoned after ${attempt} attempt(s) (${decision.reason}): ${describeError(error)}`,
    );

    if (task.optional) {
      this.pump(active);
    } else {
      this.finishRun(
        active,
        'failed',
        `Task ${task.taskId} failed: ${describeError(error)}`,
      );
    }
  }

  /**
   * Move the run to a terminal state. In-flight attempts are aborted; tasks
   * that never ran are skipped when the run is blocked, cancelled otherwise.
   */
  private finishRun(active: ActiveRun, state: RunState, reason?: string): void {
    if (active.finishing) return;
    active.finishing = true;
    const { run } = active;
    const now = this.clock.now();

    active.runTimer?.cancel();
    for (const task of run.tasks) {
      if (task.state === 'running') {
        active.inFlight
          .get(task.taskId)
          ?.abort(new CancelledError(`Run ${run.id} ended as ${state}`));
        this.transitionTask(active, task, 'cancelled');
        task.finishedAt = now;
      } else if (task.state === 'retry_scheduled') {
        active.retryTimers.get(task.taskId)?.cancel();
        this.transitionTask(active, task, 'cancelled');
        task.finishedAt = now;
      } else if (task.state === 'pending') {
        this.transitionTask(active, task, state === 'blocked' ? 'skipped' : 'cancelled');
        task.finishedAt = now;
      }
    }
    active.inFlight.clear();
    active.retryTimers.clear();

    run.lastError = reason;
    run.finishedAt = now;
    this.transitionRun(active, state, reason);
    this.admission.release(run.pipelineId, run.logicalKey, run.id);

    const log = `🏁 Run ${run.id} (${run.pipelineId}/${run.logicalKey}) finished as ${state}${reason ? `: ${reason}` : ''}`;
    if (state === 'succeeded') {
      this.logger.log(log);
    } else {
      this.logger.warn(log);
    }

    this.persist(active);
    void active.persisted.then(() => {
      this.active.delete(run.id);
      this.events.forget(run.id);
      active.resolveSettled(structuredClone(run));
    });
  }

  // ============================================================================
  // RECOVERY
  // ============================================================================

  /**
   * Re-drive runs a previous process left non-terminal. Attempts that were in
   * flight are executed again from the start.
   */
  async recoverInterruptedRuns(): Promise<number> {
    let recovered = 0;
    for (const state of RECOVERABLE_STATES) {
      const { runs } = await this.store.listRuns({ state, limit: 1000 });
      for (const run of runs) {
        if (this.active.has(run.id)) continue;
        let definition: PipelineDefinition;
        try {
          definition = this.pipelines.get(run.pipelineId);
        } catch (error) {
          this.logger.error(
            `❌ Cannot recover run ${run.id}: ${describeError(error)}`,
          );
          continue;
        }
        const admission = this.admission.tryAcquire(run.pipelineId, run.logicalKey, run.id);
        if (!admission.acquired) continue;

        for (const task of run.tasks) {
          if (task.state === 'running' || task.state === 'retry_scheduled') {
            task.state = 'pending';
          }
        }
        const active = this.track(run, definition);
        recovered++;
        if (run.state === 'running') {
          this.logger.log(`♻️ Resuming run ${run.id} (${run.pipelineId}/${run.logicalKey})`);
          active.runTimer = this.clock.setTimer(
            () => this.finishRun(active, 'failed', 'Run exceeded its timeout'),
            this.runBudget(definition),
          );
          this.pump(active);
        } else {
          this.admit(active);
        }
      }
    }
    if (recovered > 0) {
      this.logger.log(`♻️ Recovered ${recovered} interrupted run(s)`);
    }
    return recovered;
  }

  // ============================================================================
  // HELPERS
  // ============================================================================

  /** Definition budget, else every task's timeout times its attempt allowance. */
  private runBudget(definition: PipelineDefinition): number {
    if (definition.runTimeoutMs !== undefined) {
      return definition.runTimeoutMs;
    }
    return definition.tasks.reduce(
      (total, spec) =>
        total +
        spec.timeoutMs *
          this.retryPolicy.settingsFor(spec.kind, spec.retry).maxAttempts,
      0,
    );
  }

  private async loadBatch(active: ActiveRun): Promise<DataBatch | undefined> {
    const ref = active.run.batchRef;
    if (!ref) return undefined;
    if (!active.batch) {
      const batch = await this.store.getBatch(ref);
      if (!batch) {
        throw new InputError(`Batch ${ref} of run ${active.run.id} is missing`);
      }
      active.batch = batch;
    }
    return active.batch;
  }

  private isStale(active: ActiveRun, task: TaskInstance, attempt: number): boolean {
    return (
      active.finishing ||
      task.state !== 'running' ||
      task.attemptCount !== attempt
    );
  }

  private persist(active: ActiveRun): void {
    active.persisted = active.persisted
      .then(() => this.store.saveRun(active.run))
      .catch((error: unknown) => {
        this.logger.error(`💾 Failed to persist run ${active.run.id}`, error);
      });
  }

  private transitionRun(active: ActiveRun, to: RunState, error?: string): void {
    const { run } = active;
    if (!VALID_RUN_TRANSITIONS[run.state].includes(to)) {
      throw new Error(`Illegal run transition ${run.state} -> ${to} for ${run.id}`);
    }
    const from = run.state;
    run.state = to;
    this.emitRun(active, from, error);
  }

  private transitionTask(active: ActiveRun, task: TaskInstance, to: TaskState): void {
    if (!VALID_TASK_TRANSITIONS[task.state].includes(to)) {
      throw new Error(
        `Illegal task transition ${task.state} -> ${to} for ${active.run.id}/${task.taskId}`,
      );
    }
    const from = task.state;
    task.state = to;
    const { run } = active;
    this.events.emitTask({
      runId: run.id,
      pipelineId: run.pipelineId,
      logicalKey: run.logicalKey,
      at: this.clock.now(),
      taskId: task.taskId,
      kind: task.kind,
      modelId: modelIdFor(run.pipelineId, this.specOf(active, task.taskId)),
      attempt: task.attemptCount,
      from,
      to,
      metrics: to === 'succeeded' ? task.metrics : undefined,
      error: to === 'failed' || to === 'retry_scheduled' ? task.lastError : undefined,
    });
  }

  private emitRun(active: ActiveRun, from: RunState | null, error?: string): void {
    const { run } = active;
    this.events.emitRun({
      runId: run.id,
      pipelineId: run.pipelineId,
      logicalKey: run.logicalKey,
      at: this.clock.now(),
      from,
      to: run.state,
      error,
    });
  }

  private taskOf(active: ActiveRun, taskId: string): TaskInstance {
    const task = active.run.tasks.find((candidate) => candidate.taskId === taskId);
    if (!task) {
      throw new Error(`Run ${active.run.id} has no task ${taskId}`);
    }
    return task;
  }

  private specOf(active: ActiveRun, taskId: string): Readonly<TaskSpec> {
    const spec = active.specs.get(taskId);
    if (!spec) {
      throw new Error(`Pipeline ${active.definition.id} has no task ${taskId}`);
    }
    return spec;
  }
}

function toErrorInfo(error: unknown, attempt: number): TaskErrorInfo {
  let code = 'UNEXPECTED';
  if (error instanceof PipelineError) {
    code = error.code;
  } else if (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
  ) {
    code = error.code;
  }
  return {
    code,
    message: describeError(error),
    transient: isTransient(error),
    attempt,
  };
}

/** Settles with `work`, or rejects with the abort reason as soon as `signal` fires. */
function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    void work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new CancelledError('Attempt aborted');
}
