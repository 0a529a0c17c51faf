import { Controller, Get, Param, Query } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { OrchestratorConfigService } from '../config/orchestrator-config.service';
import { PersistenceStore } from '../database/persistence.store';
import { AlertQueryDto, MetricHistoryQueryDto } from './dto/alert-query.dto';

@ApiTags('Monitoring')
@Controller('monitoring')
export class MonitoringController {
  constructor(
    private readonly store: PersistenceStore,
    private readonly config: OrchestratorConfigService,
  ) {}

  @Get('alerts')
  @ApiOperation({ summary: 'List model drift alerts' })
  @ApiResponse({ status: 200, description: 'Alerts retrieved.' })
  async listAlerts(@Query() query: AlertQueryDto) {
    return this.store.listAlerts(query);
  }

  @Get('metrics/:metricId')
  @ApiOperation({ summary: 'Latest snapshots of a model metric' })
  @ApiParam({ name: 'metricId', description: '<modelId>:<metricName>' })
  @ApiResponse({ status: 200, description: 'Snapshots, oldest first.' })
  async getMetricHistory(
    @Param('metricId') metricId: string,
    @Query() query: MetricHistoryQueryDto,
  ) {
    return this.store.getMetricSnapshots(
      metricId,
      query.limit ?? this.config.monitorWindowSize,
    );
  }
}
