import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsDateString, IsNotEmpty, IsNumber, IsOptional, IsString, Min } from 'class-validator';

export class StoreOddsDto {
  @ApiProperty({ example: 'fx-1001' })
  @IsString()
  @IsNotEmpty()
  fixtureId!: string;

  @ApiProperty({ example: 'book-a' })
  @IsString()
  @IsNotEmpty()
  bookmaker!: string;

  @ApiProperty({ example: '1X2' })
  @IsString()
  @IsNotEmpty()
  marketCode!: string;

  @ApiProperty({ example: 'HOME' })
  @IsString()
  @IsNotEmpty()
  outcome!: string;

  @ApiProperty({ example: 2.1, description: 'Decimal odds, greater than 1' })
  @IsNumber()
  @Min(1)
  odds!: number;

  @ApiPropertyOptional({ description: 'Defaults to now' })
  @IsOptional()
  @IsDateString()
  quotedAt?: string;
}
