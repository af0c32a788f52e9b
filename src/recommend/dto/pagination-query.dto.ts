import { ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsInt, IsOptional, Max, Min } from 'class-validator';

export const MAX_PAGE_LIMIT = 40;
export const DEFAULT_PAGE_LIMIT = 10;

function toInteger({ value }: { value: unknown }): unknown {
  return typeof value === 'string' ? parseInt(value, 10) : value;
}

export class PaginationQueryDto {
  @ApiPropertyOptional({ description: '페이지 크기', default: DEFAULT_PAGE_LIMIT, minimum: 0, maximum: MAX_PAGE_LIMIT })
  @IsOptional()
  @Transform(toInteger)
  @IsInt()
  @Min(0)
  @Max(MAX_PAGE_LIMIT)
  limit: number = DEFAULT_PAGE_LIMIT;

  @ApiPropertyOptional({ description: '페이지 번호 (1부터)', default: 1, minimum: 1 })
  @IsOptional()
  @Transform(toInteger)
  @IsInt()
  @Min(1)
  page: number = 1;
}
