import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsIn, IsOptional, IsString, MinLength } from 'class-validator';
import { Currency, CURRENCIES } from '../../types/game.types';

/**
 * Steam 스토어 검색 요청 DTO
 */
export class SteamSearchDto {
  @ApiProperty({ description: '검색어', example: 'hades' })
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  @IsString()
  @MinLength(1)
  query!: string;

  @ApiPropertyOptional({
    description: '가격 통화',
    enum: [...CURRENCIES],
    default: 'USD',
  })
  @IsOptional()
  @IsIn(CURRENCIES)
  currency?: Currency;
}
