import { Module } from '@nestjs/common';
import { ConnectorsModule } from '../connectors/connectors.module';
import { DatabaseModule } from '../database/database.module';
import { ValidationGateService } from './validation-gate.service';

@Module({
  imports: [DatabaseModule, ConnectorsModule],
  providers: [ValidationGateService],
  exports: [ValidationGateService],
})
export class ValidationModule {}
