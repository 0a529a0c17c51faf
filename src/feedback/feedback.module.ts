import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';
import { DatabaseModule } from '../database/database.module';
import { EngineModule } from '../engine/engine.module';
import { MonitoringModule } from '../monitoring/monitoring.module';
import { FeedbackAggregatorService } from './feedback-aggregator.service';
import { FeedbackController } from './feedback.controller';

@Module({
  imports: [ConfigModule, DatabaseModule, EngineModule, MonitoringModule],
  controllers: [FeedbackController],
  providers: [FeedbackAggregatorService],
  exports: [FeedbackAggregatorService],
})
export class FeedbackModule {}
