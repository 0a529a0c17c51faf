import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';
import { EngineModule } from '../engine/engine.module';
import { PipelinesModule } from '../pipelines/pipelines.module';
import { SchedulesController } from './schedules.controller';
import { TriggerSchedulerService } from './trigger-scheduler.service';

@Module({
  imports: [ConfigModule, EngineModule, PipelinesModule],
  controllers: [SchedulesController],
  providers: [TriggerSchedulerService],
  exports: [TriggerSchedulerService],
})
export class SchedulingModule {}
