import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsDate, IsIn, IsInt, IsOptional, IsString, Max, Min } from 'class-validator';
import { AlertSeverity } from '../monitoring.types';

const SEVERITIES: readonly AlertSeverity[] = ['warning', 'critical'];

export class AlertQueryDto {
  @ApiPropertyOptional({ description: 'Filter by model id' })
  @IsOptional()
  @IsString()
  modelId?: string;

  @ApiPropertyOptional({ description: 'Filter by severity', enum: SEVERITIES })
  @IsOptional()
  @IsIn(SEVERITIES)
  severity?: AlertSeverity;

  @ApiPropertyOptional({ description: 'Only alerts created at or after this instant' })
  @IsOptional()
  @Type(() => Date)
  @IsDate()
  since?: Date;
}

export class MetricHistoryQueryDto {
  @ApiPropertyOptional({ description: 'Number of latest snapshots', example: 30 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(1000)
  limit?: number;
}
