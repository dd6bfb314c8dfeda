import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsDateString,
  IsNotEmpty,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';
import type { ScorelineModelParameters } from '../../markets/scoreline.model';

export class RegisterModelDto {
  @ApiProperty({ example: 'match_outcome' })
  @IsString()
  @IsNotEmpty()
  name!: string;

  @ApiProperty({ example: 'dc-2024.10.1' })
  @IsString()
  @IsNotEmpty()
  version!: string;

  @ApiProperty({ example: '2024-10-01' })
  @IsDateString()
  trainedAt!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  accuracy?: number;

  @ApiPropertyOptional()
  @IsOptional()
  @IsNumber()
  @Min(0)
  logLoss?: number;

  @ApiPropertyOptional()
  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(2)
  brierScore?: number;

  @ApiPropertyOptional({ description: 'Fitted scoreline model parameters' })
  @IsOptional()
  @IsObject()
  parameters?: Partial<ScorelineModelParameters>;
}
