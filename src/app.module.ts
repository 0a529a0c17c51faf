import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { CommonModule } from './common/common.module';
import { ConfigModule } from './config/config.module';
import { ConnectorsModule } from './connectors/connectors.module';
import { DatabaseModule } from './database/database.module';
import { EngineModule } from './engine/engine.module';
import { ExecutorsModule } from './executors/executors.module';
import { FeedbackModule } from './feedback/feedback.module';
import { MonitoringModule } from './monitoring/monitoring.module';
import { PipelinesModule } from './pipelines/pipelines.module';
import { RetryModule } from './retry/retry.module';
import { SchedulingModule } from './scheduling/scheduling.module';
import { ValidationModule } from './validation/validation.module';

@Module({
  imports: [
    ScheduleModule.forRoot(),
    CommonModule,
    ConfigModule,
    DatabaseModule,
    ConnectorsModule,
    ValidationModule,
    RetryModule,
    ExecutorsModule,
    PipelinesModule,
    EngineModule,
    MonitoringModule,
    FeedbackModule,
    SchedulingModule,
  ],
})
export class AppModule {}
