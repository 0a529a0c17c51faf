import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  Matches,
  Min,
  ValidateNested,
} from 'class-validator';
import { TASK_KINDS, TaskKind } from '../pipeline.types';

const ID_PATTERN = /^[a-z0-9][a-z0-9_.-]*$/;

export class RetryOverrideDto {
  @ApiPropertyOptional({ description: 'Maximum attempts', example: 3 })
  @IsOptional()
  @IsInt()
  @Min(1)
  maxAttempts?: number;

  @ApiPropertyOptional({ description: 'First backoff in ms', example: 1000 })
  @IsOptional()
  @IsInt()
  @Min(0)
  baseDelayMs?: number;

  @ApiPropertyOptional({ description: 'Cap on one backoff in ms' })
  @IsOptional()
  @IsInt()
  @Min(0)
  maxDelayMs?: number;

  @ApiPropertyOptional({ description: 'Cap on summed backoff in ms' })
  @IsOptional()
  @IsInt()
  @Min(0)
  maxTotalWaitMs?: number;
}

export class TaskSpecDto {
  @ApiProperty({ description: 'Task id, unique within the pipeline', example: 'forecast' })
  @IsString()
  @Matches(ID_PATTERN)
  id!: string;

  @ApiProperty({ description: 'Task kind', enum: TASK_KINDS })
  @IsIn(TASK_KINDS)
  kind!: TaskKind;

  @ApiPropertyOptional({ description: 'Ids of tasks that must succeed first', type: [String] })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  dependsOn?: string[];

  @ApiPropertyOptional({ description: 'Skip dependents instead of failing the run' })
  @IsOptional()
  @IsBoolean()
  optional?: boolean;

  @ApiPropertyOptional({ description: 'Per-attempt timeout in ms' })
  @IsOptional()
  @IsInt()
  @Min(1)
  timeoutMs?: number;

  @ApiPropertyOptional({ type: RetryOverrideDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => RetryOverrideDto)
  retry?: RetryOverrideDto;

  @ApiPropertyOptional({ description: 'Model the task reports metrics for' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  modelId?: string;

  @ApiPropertyOptional({ description: 'Kind-specific configuration', type: 'object' })
  @IsOptional()
  @IsObject()
  config?: Record<string, unknown>;
}

export class PipelineDefinitionDto {
  @ApiProperty({ description: 'Pipeline id', example: 'daily-ingest' })
  @IsString()
  @Matches(ID_PATTERN)
  id!: string;

  @ApiProperty({ description: 'Pipeline name', example: 'Daily market ingest' })
  @IsString()
  @IsNotEmpty()
  name!: string;

  @ApiPropertyOptional({ description: 'Pipeline description' })
  @IsOptional()
  @IsString()
  description?: string;

  @ApiPropertyOptional({ description: 'Cron expression of the time-based trigger', example: '0 0 * * *' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  schedule?: string;

  @ApiPropertyOptional({ description: 'Run-level timeout in ms' })
  @IsOptional()
  @IsInt()
  @Min(1)
  runTimeoutMs?: number;

  @ApiProperty({ description: 'Task graph', type: [TaskSpecDto] })
  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => TaskSpecDto)
  tasks!: TaskSpecDto[];
}
