import { Module } from '@nestjs/common';
import { ConnectorsModule } from '../connectors/connectors.module';
import { DatabaseModule } from '../database/database.module';
import { ValidationModule } from '../validation/validation.module';
import { ClusterExecutor } from './cluster.executor';
import { ExecutorRegistry } from './executor-registry.service';
import { ForecastExecutor } from './forecast.executor';
import { IngestionExecutor } from './ingestion.executor';
import { NlpQueryExecutor } from './nlp-query.executor';
import { RetrainExecutor } from './retrain.executor';
import { ValidationExecutor } from './validation.executor';

@Module({
  imports: [DatabaseModule, ConnectorsModule, ValidationModule],
  providers: [
    IngestionExecutor,
    ValidationExecutor,
    NlpQueryExecutor,
    ForecastExecutor,
    ClusterExecutor,
    RetrainExecutor,
    ExecutorRegistry,
  ],
  exports: [ExecutorRegistry],
})
export class ExecutorsModule {}
