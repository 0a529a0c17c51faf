import { Injectable } from '@nestjs/common';
import { InputError, ValidationFailureError } from '../common/errors';
import type { TaskConfig } from '../pipelines/pipeline.types';
import { ValidationGateService } from '../validation/validation-gate.service';
import type { DataBatch } from '../validation/validation.types';
import { requireBatch } from './record-fields';
import {
  TaskContext,
  TaskExecutor,
  TaskResult,
} from './task-executor.interface';

export interface ValidationOutput {
  passed: true;
  recordCount: number;
}

/**
 * Runs the validation gate over the run's batch. A failing verdict is raised
 * as `ValidationFailureError`, which blocks the run.
 */
@Injectable()
export class ValidationExecutor implements TaskExecutor {
  readonly kind = 'validation';

  constructor(private readonly gate: ValidationGateService) {}

  async execute(
    batch: DataBatch | undefined,
    config: TaskConfig,
    context: TaskContext,
  ): Promise<TaskResult<ValidationOutput>> {
    const input = requireBatch(batch, context);
    if (!config.rules) {
      throw new InputError(`Validation task ${context.taskId} has no rules`);
    }

    const result = await this.gate.validateAndRecord(
      context.runId,
      input,
      config.rules,
    );
    if (!result.passed) {
      throw new ValidationFailureError(result);
    }

    return {
      output: { passed: true, recordCount: result.recordCount },
      metrics: {},
    };
  }
}
