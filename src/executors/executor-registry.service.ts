import { Injectable, Logger } from '@nestjs/common';
import { ConfigurationError } from '../common/errors';
import { TaskKind } from '../pipelines/pipeline.types';
import { ClusterExecutor } from './cluster.executor';
import { ForecastExecutor } from './forecast.executor';
import { IngestionExecutor } from './ingestion.executor';
import { NlpQueryExecutor } from './nlp-query.executor';
import { RetrainExecutor } from './retrain.executor';
import { TaskExecutor } from './task-executor.interface';
import { ValidationExecutor } from './validation.executor';

/**
 * One executor per task kind. The engine looks executors up here and never
 * branches on kind itself.
 */
@Injectable()
export class ExecutorRegistry {
  private readonly logger = new Logger(ExecutorRegistry.name);
  private readonly executors: Map<TaskKind, TaskExecutor>;

  constructor(
    ingestion: IngestionExecutor,
    validation: ValidationExecutor,
    nlpQuery: NlpQueryExecutor,
    forecast: ForecastExecutor,
    cluster: ClusterExecutor,
    retrain: RetrainExecutor,
  ) {
    this.executors = new Map<TaskKind, TaskExecutor>(
      [ingestion, validation, nlpQuery, forecast, cluster, retrain].map(
        (executor) => [executor.kind, executor],
      ),
    );
  }

  /**
   * Replace the executor of a kind, e.g. with a model-service client.
   */
  register(executor: TaskExecutor): void {
    this.executors.set(executor.kind, executor);
    this.logger.log(`🔧 Executor for ${executor.kind}: ${executor.constructor.name}`);
  }

  get(kind: TaskKind): TaskExecutor {
    const executor = this.executors.get(kind);
    if (!executor) {
      throw new ConfigurationError(`No executor registered for kind ${kind}`);
    }
    return executor;
  }
}
