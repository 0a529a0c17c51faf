import { Body, Controller, Get, HttpCode, Param, Post, Query } from '@nestjs/common';
import {
  ApiBody,
  ApiOperation,
  ApiParam,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { TriggerRunDto } from '../pipelines/dto';
import { RunQueryDto } from './dto/run-query.dto';
import { WorkflowEngineService } from './workflow-engine.service';

@ApiTags('Runs')
@Controller()
export class RunsController {
  constructor(private readonly engine: WorkflowEngineService) {}

  @Post('pipelines/:id/runs')
  @HttpCode(202)
  @ApiOperation({ summary: 'Trigger a run of a pipeline for a logical key' })
  @ApiParam({ name: 'id', description: 'Pipeline id' })
  @ApiBody({ type: TriggerRunDto })
  @ApiResponse({ status: 202, description: 'Run admitted.' })
  @ApiResponse({ status: 404, description: 'Pipeline not found.' })
  @ApiResponse({ status: 409, description: 'A run for this logical key is already active.' })
  async submitRun(@Param('id') pipelineId: string, @Body() dto: TriggerRunDto) {
    const runId = await this.engine.submit(pipelineId, dto.logicalKey, {
      params: dto.params,
    });
    return { runId };
  }

  @Get('runs')
  @ApiOperation({ summary: 'List runs with filtering and pagination' })
  @ApiResponse({ status: 200, description: 'Runs retrieved.' })
  async listRuns(@Query() query: RunQueryDto) {
    const page = query.page ?? 1;
    const limit = query.limit ?? 20;
    const { runs, total } = await this.engine.listRuns({ ...query, page, limit });
    return {
      data: runs,
      pagination: { page, limit, total, totalPages: Math.ceil(total / limit) },
    };
  }

  @Get('runs/:id')
  @ApiOperation({ summary: 'Get a run with its task instances' })
  @ApiParam({ name: 'id', description: 'Run id' })
  @ApiResponse({ status: 200, description: 'Run found.' })
  @ApiResponse({ status: 404, description: 'Run not found.' })
  async getRun(@Param('id') id: string) {
    return this.engine.getRun(id);
  }

  @Post('runs/:id/cancel')
  @HttpCode(200)
  @ApiOperation({ summary: 'Cancel an active run' })
  @ApiParam({ name: 'id', description: 'Run id' })
  @ApiResponse({ status: 200, description: 'Run cancelled.' })
  @ApiResponse({ status: 404, description: 'Run not found.' })
  async cancelRun(@Param('id') id: string) {
    return this.engine.cancel(id);
  }
}
