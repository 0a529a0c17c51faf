import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsNotEmpty, IsObject, IsOptional, IsString } from 'class-validator';

export class TriggerRunDto {
  @ApiProperty({ description: 'Logical key of the run', example: '2024-05-01' })
  @IsString()
  @IsNotEmpty()
  logicalKey!: string;

  @ApiPropertyOptional({ description: 'Run parameters passed to every task', type: 'object' })
  @IsOptional()
  @IsObject()
  params?: Record<string, unknown>;
}
