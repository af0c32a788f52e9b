import { ApiPropertyOptional } from '@nestjs/swagger';
import { Transform, Type } from 'class-transformer';
import { IsArray, IsIn, IsNumber, IsOptional, IsString, Matches, Min } from 'class-validator';
import { Currency, CURRENCIES } from '../../types/game.types';

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

// "rpg,action" 또는 ["rpg", "action"] 모두 허용
function toNameList({ value }: { value: unknown }): unknown {
  if (typeof value === 'string') {
    return value
      .split(',')
      .map((part) => part.trim())
      .filter(Boolean);
  }
  return value;
}

/**
 * 구조화된 추천 요청 DTO
 */
export class GameFilterDto {
  @ApiPropertyOptional({ description: '제목 검색어', example: 'hades' })
  @IsOptional()
  @IsString()
  query?: string;

  @ApiPropertyOptional({ description: '최소 가격', example: 5 })
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  minPrice?: number;

  @ApiPropertyOptional({ description: '최대 가격', example: 30 })
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  maxPrice?: number;

  @ApiPropertyOptional({ description: '가격 통화', enum: [...CURRENCIES], default: 'USD' })
  @IsOptional()
  @IsIn(CURRENCIES)
  currency?: Currency;

  @ApiPropertyOptional({ description: '장르 (쉼표 구분 가능)', example: ['rpg'], type: [String] })
  @IsOptional()
  @Transform(toNameList)
  @IsArray()
  @IsString({ each: true })
  genres?: string[];

  @ApiPropertyOptional({ description: '플랫폼', example: ['pc'], type: [String] })
  @IsOptional()
  @Transform(toNameList)
  @IsArray()
  @IsString({ each: true })
  platforms?: string[];

  @ApiPropertyOptional({ description: '태그', example: ['multiplayer'], type: [String] })
  @IsOptional()
  @Transform(toNameList)
  @IsArray()
  @IsString({ each: true })
  tags?: string[];

  @ApiPropertyOptional({ description: '출시일 시작(YYYY-MM-DD)', example: '2015-01-01' })
  @IsOptional()
  @Matches(ISO_DATE_PATTERN, { message: 'releaseDateFrom은 YYYY-MM-DD 형식이어야 합니다.' })
  releaseDateFrom?: string;

  @ApiPropertyOptional({ description: '출시일 종료(YYYY-MM-DD)', example: '2024-12-31' })
  @IsOptional()
  @Matches(ISO_DATE_PATTERN, { message: 'releaseDateTo는 YYYY-MM-DD 형식이어야 합니다.' })
  releaseDateTo?: string;
}
