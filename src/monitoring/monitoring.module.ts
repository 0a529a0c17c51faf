import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';
import { DatabaseModule } from '../database/database.module';
import { EngineModule } from '../engine/engine.module';
import { AlertNotifier, LoggingAlertNotifier } from './alert-notifier';
import { ModelMonitorService } from './model-monitor.service';
import { MonitoringController } from './monitoring.controller';

@Module({
  imports: [ConfigModule, DatabaseModule, EngineModule],
  controllers: [MonitoringController],
  providers: [
    ModelMonitorService,
    { provide: AlertNotifier, useClass: LoggingAlertNotifier },
  ],
  exports: [ModelMonitorService],
})
export class MonitoringModule {}
