import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';
import { DatabaseModule } from '../database/database.module';
import { ExecutorsModule } from '../executors/executors.module';
import { PipelinesModule } from '../pipelines/pipelines.module';
import { RetryModule } from '../retry/retry.module';
import { AdmissionTable } from './admission-table';
import { EngineEventsService } from './engine-events.service';
import { RetentionService } from './retention.service';
import { RunsController } from './runs.controller';
import { WorkerPoolService } from './worker-pool.service';
import { WorkflowEngineService } from './workflow-engine.service';

@Module({
  imports: [
    ConfigModule,
    DatabaseModule,
    ExecutorsModule,
    PipelinesModule,
    RetryModule,
  ],
  controllers: [RunsController],
  providers: [
    AdmissionTable,
    WorkerPoolService,
    EngineEventsService,
    WorkflowEngineService,
    RetentionService,
  ],
  exports: [WorkflowEngineService, EngineEventsService],
})
export class EngineModule {}
