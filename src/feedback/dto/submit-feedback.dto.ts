import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUUID,
  Max,
  MaxLength,
  Min,
} from 'class-validator';

export class SubmitFeedbackDto {
  @ApiProperty({ description: 'Model the feedback is about', example: 'daily-ingest.forecast' })
  @IsString()
  @IsNotEmpty()
  modelId!: string;

  @ApiPropertyOptional({ description: 'Run whose output was rated', format: 'uuid' })
  @IsOptional()
  @IsUUID()
  runId?: string;

  @ApiPropertyOptional({ description: 'Task whose output was rated' })
  @IsOptional()
  @IsString()
  taskId?: string;

  @ApiProperty({ description: 'Rating from 1 (useless) to 5 (excellent)', minimum: 1, maximum: 5 })
  @IsInt()
  @Min(1)
  @Max(5)
  rating!: number;

  @ApiPropertyOptional({ description: 'Free-text correction of the output' })
  @IsOptional()
  @IsString()
  @MaxLength(4000)
  correction?: string;
}
