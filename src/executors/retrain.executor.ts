import { Injectable, Logger } from '@nestjs/common';
import { Clock } from '../common/clock';
import { InputError } from '../common/errors';
import { PersistenceStore } from '../database/persistence.store';
import type { TaskConfig } from '../pipelines/pipeline.types';
import type { DataBatch } from '../validation/validation.types';
import { throwIfAborted } from './record-fields';
import {
  TaskContext,
  TaskExecutor,
  TaskResult,
} from './task-executor.interface';

export interface RetrainOutput {
  modelId: string;
  version: string;
  reason: string;
  feedbackUsed: number;
  trainedAt: string;
}

/**
 * Produces a new model version from the feedback collected for it. Training
 * itself belongs to the model service; this records the version handoff.
 */
@Injectable()
export class RetrainExecutor implements TaskExecutor {
  readonly kind = 'retrain';
  private readonly logger = new Logger(RetrainExecutor.name);

  constructor(
    private readonly store: PersistenceStore,
    private readonly clock: Clock,
  ) {}

  async execute(
    _batch: DataBatch | undefined,
    _config: TaskConfig,
    context: TaskContext,
  ): Promise<TaskResult<RetrainOutput>> {
    const modelId = context.params.modelId;
    if (typeof modelId !== 'string' || modelId.length === 0) {
      throw new InputError(`Retraining run ${context.runId} has no modelId`);
    }
    const reason =
      typeof context.params.reason === 'string'
        ? context.params.reason
        : 'manual';

    const feedback = await this.store.listFeedback({ modelId });
    throwIfAborted(context);

    const trainedAt = this.clock.now();
    const version = `${modelId}@${trainedAt.toISOString()}`;
    this.logger.log(
      `🧠 Retrained ${modelId} -> ${version} (${reason}, ${feedback.length} feedback records)`,
    );

    return {
      output: {
        modelId,
        version,
        reason,
        feedbackUsed: feedback.length,
        trainedAt: trainedAt.toISOString(),
      },
      metrics: { training_records: feedback.length },
    };
  }
}
