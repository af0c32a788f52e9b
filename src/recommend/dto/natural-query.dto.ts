import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsIn, IsOptional, IsString, MinLength } from 'class-validator';
import { Currency, CURRENCIES } from '../../types/game.types';
import { PaginationQueryDto } from './pagination-query.dto';

/**
 * 자연어 추천 요청 DTO
 */
export class NaturalQueryDto extends PaginationQueryDto {
  @ApiProperty({ description: '자연어 요청', example: 'multiplayer RPG on PC under $20 after 2015' })
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  @IsString()
  @MinLength(1)
  q!: string;

  @ApiPropertyOptional({ description: '가격 통화', enum: [...CURRENCIES], default: 'USD' })
  @IsOptional()
  @IsIn(CURRENCIES)
  currency?: Currency;
}
