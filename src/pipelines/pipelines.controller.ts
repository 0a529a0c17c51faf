import { Body, Controller, Get, Param, Post } from '@nestjs/common';
import {
  ApiBody,
  ApiOperation,
  ApiParam,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { PipelineDefinitionDto } from './dto';
import { PipelinesService } from './pipelines.service';

@ApiTags('Pipelines')
@Controller('pipelines')
export class PipelinesController {
  constructor(private readonly pipelinesService: PipelinesService) {}

  @Get()
  @ApiOperation({ summary: 'List registered and rejected pipeline definitions' })
  @ApiResponse({ status: 200, description: 'Pipeline catalog.' })
  async listPipelines() {
    return this.pipelinesService.list();
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a pipeline definition' })
  @ApiParam({ name: 'id', description: 'Pipeline id' })
  @ApiResponse({ status: 200, description: 'Pipeline found.' })
  @ApiResponse({ status: 404, description: 'Pipeline not found.' })
  @ApiResponse({ status: 422, description: 'Pipeline definition was rejected.' })
  async getPipeline(@Param('id') id: string) {
    return this.pipelinesService.get(id);
  }

  @Post()
  @ApiOperation({ summary: 'Register a pipeline definition' })
  @ApiBody({ type: PipelineDefinitionDto })
  @ApiResponse({ status: 201, description: 'Pipeline registered.' })
  @ApiResponse({ status: 422, description: 'Invalid task graph.' })
  async registerPipeline(@Body() dto: PipelineDefinitionDto) {
    return this.pipelinesService.register(dto);
  }
}
