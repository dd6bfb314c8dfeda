import { ApiProperty } from '@nestjs/swagger';
import { IsInt, Min } from 'class-validator';

export class SettleFixtureDto {
  @ApiProperty({ minimum: 0, example: 2 })
  @IsInt()
  @Min(0)
  homeGoals!: number;

  @ApiProperty({ minimum: 0, example: 1 })
  @IsInt()
  @Min(0)
  awayGoals!: number;
}
