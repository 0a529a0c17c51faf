import { Controller, Get, HttpCode, Param, Post } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { TriggerSchedulerService } from './trigger-scheduler.service';

@ApiTags('Schedules')
@Controller('schedules')
export class SchedulesController {
  constructor(private readonly scheduler: TriggerSchedulerService) {}

  @Get()
  @ApiOperation({ summary: 'List active cron triggers with their next run' })
  @ApiResponse({ status: 200, description: 'Active triggers.' })
  async getTriggers() {
    return this.scheduler.getTriggers();
  }

  @Post(':pipelineId/trigger')
  @HttpCode(202)
  @ApiOperation({ summary: "Fire a pipeline's scheduled trigger now" })
  @ApiParam({ name: 'pipelineId', description: 'Pipeline id' })
  @ApiResponse({ status: 202, description: 'Run id, or null when the key is already active.' })
  async triggerNow(@Param('pipelineId') pipelineId: string) {
    return { runId: await this.scheduler.trigger(pipelineId) };
  }
}
