import { ApiProperty } from '@nestjs/swagger';
import { IsInt, IsOptional, IsUUID, Max, Min, ValidateIf } from 'class-validator';

export class SetCanaryDto {
  @ApiProperty({ minimum: 0, maximum: 100, example: 10 })
  @IsInt()
  @Min(0)
  @Max(100)
  canaryPercentage!: number;

  @ApiProperty({ nullable: true, description: 'Canary model version id, or null to disable the canary' })
  @IsOptional()
  @ValidateIf((_dto, value) => value !== null)
  @IsUUID()
  canaryVersionId!: string | null;
}
