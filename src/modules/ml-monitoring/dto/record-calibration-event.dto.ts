import { ApiProperty } from '@nestjs/swagger';
import { IsEnum, IsNotEmpty, IsNumber, IsString, IsUUID, Max, Min } from 'class-validator';
import { MatchOutcome } from '../entities/calibration-event.entity';

export class RecordCalibrationEventDto {
  @ApiProperty({ example: 'fx-1001' })
  @IsString()
  @IsNotEmpty()
  fixtureId!: string;

  @ApiProperty()
  @IsUUID()
  modelVersionId!: string;

  @ApiProperty({ minimum: 0, maximum: 1, example: 0.5 })
  @IsNumber()
  @Min(0)
  @Max(1)
  pHome!: number;

  @ApiProperty({ minimum: 0, maximum: 1, example: 0.3 })
  @IsNumber()
  @Min(0)
  @Max(1)
  pDraw!: number;

  @ApiProperty({ minimum: 0, maximum: 1, example: 0.2 })
  @IsNumber()
  @Min(0)
  @Max(1)
  pAway!: number;

  @ApiProperty({ enum: MatchOutcome })
  @IsEnum(MatchOutcome)
  outcome!: MatchOutcome;
}
