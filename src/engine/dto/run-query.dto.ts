import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsIn, IsInt, IsOptional, IsString, Max, Min } from 'class-validator';
import { RunState } from '../run.types';

const RUN_STATES: readonly RunState[] = [
  'pending',
  'retraining-queued',
  'running',
  'blocked',
  'succeeded',
  'failed',
  'cancelled',
];

export class RunQueryDto {
  @ApiPropertyOptional({ description: 'Filter by pipeline id' })
  @IsOptional()
  @IsString()
  pipelineId?: string;

  @ApiPropertyOptional({ description: 'Filter by logical key', example: '2024-05-01' })
  @IsOptional()
  @IsString()
  logicalKey?: string;

  @ApiPropertyOptional({ description: 'Filter by run state', enum: RUN_STATES })
  @IsOptional()
  @IsIn(RUN_STATES)
  state?: RunState;

  @ApiPropertyOptional({ description: 'Page number', example: 1 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  page?: number;

  @ApiPropertyOptional({ description: 'Items per page', example: 20 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(200)
  limit?: number;
}
