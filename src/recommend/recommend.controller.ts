import { Body, Controller, Get, HttpCode, Post, Query } from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiTags } from '@nestjs/swagger';
import { StructuredFilter, StructuredFilterSnapshot } from '../models/structured-filter.model';
import { LeftoverMetadata, QueryInterpreterService } from '../resolution/query-interpreter.service';
import { ResponsePage } from '../types/game.types';
import { GameFilterDto } from './dto/game-filter.dto';
import { NaturalQueryDto } from './dto/natural-query.dto';
import { PaginationQueryDto } from './dto/pagination-query.dto';
import { GameAggregatorService } from './game-aggregator.service';

export interface NaturalSearchResponse {
  filter: StructuredFilterSnapshot;
  leftovers: LeftoverMetadata;
  page: ResponsePage;
}

/** 해석되지 않은 장르/플랫폼은 제목 검색어 뒤에 붙인다 */
export function appendLeftovers(query: string, leftovers: LeftoverMetadata): string {
  return [query, ...leftovers.genres, ...leftovers.platforms, ...leftovers.tags]
    .map((part) => part.trim())
    .filter(Boolean)
    .join(' ');
}

@ApiTags('Recommend')
@Controller('api/recommend')
export class RecommendController {
  constructor(
    private readonly aggregator: GameAggregatorService,
    private readonly interpreter: QueryInterpreterService,
  ) {}

  @Post()
  @HttpCode(200)
  @ApiOperation({
    summary: '구조화 조건으로 게임 추천',
    description: 'RAWG 카탈로그를 조회하고 Steam 가격/설명으로 보강합니다.',
  })
  @ApiOkResponse({
    description: '페이지 단위 결과',
    schema: { example: { results: [], total: 0, limit: 10, page: 1, totalPages: 0 } },
  })
  recommend(
    @Body() body: GameFilterDto,
    @Query() pagination: PaginationQueryDto,
  ): Promise<ResponsePage> {
    const filter = StructuredFilter.create(body);
    return this.aggregator.aggregate(filter, pagination.limit, pagination.page);
  }

  @Get('search')
  @ApiOperation({
    summary: '자연어로 게임 추천',
    description: '자연어 요청을 필터로 해석한 뒤 추천을 실행합니다. 해석 결과도 함께 반환합니다.',
  })
  async search(@Query() dto: NaturalQueryDto): Promise<NaturalSearchResponse> {
    const { filter, leftovers } = await this.interpreter.parse(dto.q, dto.currency);
    const effective = filter.withQuery(appendLeftovers(filter.query, leftovers));
    const page = await this.aggregator.aggregate(effective, dto.limit, dto.page);
    return { filter: effective.toJSON(), leftovers, page };
  }
}
