import { Injectable, Logger } from '@nestjs/common';
import { ErrorHandlerUtil } from '../common/utils/error-handler.util';
import { LoggerHelper } from '../common/utils/logger.helper';
import { StructuredFilter } from '../models/structured-filter.model';
import { CatalogProvider } from '../providers/game-provider';
import { GameRecord, ProviderSearchResult } from '../types/game.types';
import { RAWG_SEARCH } from './config/rawg.config';
import { RawgApiService } from './rawg-api.service';
import { RawgGameQuery, RawgGameSearchResult, RawgListResponse } from './rawg.types';
import { mapRawgGame, mapRawgGameDetails } from './utils/rawg-game.mapper';
import { buildGameSearchQuery, planPageWindow } from './utils/rawg-query-builder.util';
import { VocabularyCacheService } from './vocabulary-cache.service';

/**
 * RAWG를 카탈로그로 사용하는 어댑터
 */
@Injectable()
export class RawgCatalogProvider extends CatalogProvider {
  private readonly logger = new Logger(RawgCatalogProvider.name);

  constructor(
    private readonly rawgApi: RawgApiService,
    private readonly vocabulary: VocabularyCacheService,
  ) {
    super();
  }

  async search(
    filter: StructuredFilter,
    limit: number,
    offset: number,
  ): Promise<ProviderSearchResult> {
    const { pages, skip } = planPageWindow(limit, offset, RAWG_SEARCH.pageSize);
    if (pages.length === 0) return { records: [], total: 0 };

    const queryFor = (page: number, pageSize: number) =>
      buildGameSearchQuery(filter, page, pageSize, this.vocabulary, (category, name) =>
        LoggerHelper.logWarning(this.logger, '어휘 매핑', `${category} '${name}'을(를) 찾지 못했습니다.`),
      );

    const responses = await ErrorHandlerUtil.executeRawgApiCall(
      () => Promise.all(pages.map((page) => this.rawgApi.searchGames(queryFor(page, RAWG_SEARCH.pageSize)))),
      this.logger,
      '게임 검색',
      filter.query || undefined,
    );

    // 마지막 페이지 이후(null)는 빈 페이지로 취급
    const found = responses.filter(
      (res): res is RawgListResponse<RawgGameSearchResult> => res !== null,
    );
    const total = found.length
      ? Math.max(0, ...found.map((res) => res.count))
      : await this.countOnly(queryFor(1, 1), filter);
    const records = responses
      .flatMap((res) => res?.results ?? [])
      .slice(skip, skip + limit)
      .map((game) => mapRawgGame(game));

    this.logger.debug(`📚 RAWG 페이지 ${pages.join(',')} → ${records.length}건 (전체 ${total})`);
    return { records, total };
  }

  /** 창 전체가 마지막 페이지 뒤일 때 전체 건수만 조회 */
  private async countOnly(query: RawgGameQuery, filter: StructuredFilter): Promise<number> {
    const res = await ErrorHandlerUtil.executeRawgApiCall(
      () => this.rawgApi.searchGames(query),
      this.logger,
      '게임 건수',
      filter.query || undefined,
    );
    return res?.count ?? 0;
  }

  async getDetails(id: string): Promise<GameRecord | null> {
    const details = await ErrorHandlerUtil.executeRawgApiCall(
      () => this.rawgApi.getGameDetails(id),
      this.logger,
      '게임 상세',
      id,
    );
    return details ? mapRawgGameDetails(details) : null;
  }
}
