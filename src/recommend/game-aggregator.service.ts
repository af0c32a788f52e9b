import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { APP_DEFAULTS, readNumberSetting } from '../config/app.config';
import { runWithConcurrency } from '../common/concurrency/promise-pool.util';
import { normalizeTitle } from '../common/matching';
import { describeError, LoggerHelper } from '../common/utils/logger.helper';
import { StructuredFilter } from '../models/structured-filter.model';
import { CatalogProvider, StorefrontProvider } from '../providers/game-provider';
import { Currency, GameRecord, ResponsePage } from '../types/game.types';
import { mergeStorefrontRecord, selectStorefrontMatch } from './utils/game-merge.util';
import { buildResponsePage } from './utils/response-page.util';

/**
 * 카탈로그 한 페이지를 받아 스토어 정보로 보강하고 가격 조건으로 거른다
 */
@Injectable()
export class GameAggregatorService {
  private readonly logger = new Logger(GameAggregatorService.name);
  private readonly titleCutoff: number;
  private readonly enrichConcurrency: number;

  constructor(
    private readonly catalog: CatalogProvider,
    private readonly storefront: StorefrontProvider,
    config: ConfigService,
  ) {
    this.titleCutoff = readNumberSetting(config, 'TITLE_MATCH_CUTOFF', APP_DEFAULTS.titleMatchCutoff, {
      min: 0,
      max: 1,
    });
    this.enrichConcurrency = readNumberSetting(
      config,
      'ENRICH_CONCURRENCY',
      APP_DEFAULTS.enrichConcurrency,
      { min: 1 },
    );
  }

  /**
   * total은 가격 필터 전 카탈로그 전체 건수
   */
  async aggregate(filter: StructuredFilter, limit: number, page: number): Promise<ResponsePage> {
    const safeLimit = Math.max(0, Math.floor(limit));
    const safePage = Math.max(1, Math.floor(page));
    const offset = (safePage - 1) * safeLimit;
    LoggerHelper.logStart(this.logger, '게임 집계', { limit: safeLimit, page: safePage, query: filter.query });

    const { records, total } = await this.catalog.search(filter, safeLimit, offset);
    const enriched = await runWithConcurrency(records, this.enrichConcurrency, (record) =>
      this.enrich(record, filter.currency),
    );
    const results = enriched.filter((record) => filter.acceptsPrice(record.price));

    LoggerHelper.logComplete(this.logger, '게임 집계', {
      catalog: records.length,
      results: results.length,
      total,
    });
    return buildResponsePage(results, total, safeLimit, safePage);
  }

  /**
   * 스토어 검색 실패나 일치 항목 없음은 카탈로그 레코드를 그대로 둔다
   */
  private async enrich(record: GameRecord, currency: Currency): Promise<GameRecord> {
    const searchTerm = normalizeTitle(record.name);
    try {
      const { records: candidates } = await this.storefront.search(searchTerm, { currency });
      const match = selectStorefrontMatch(record.name, candidates, this.titleCutoff);
      if (!match) {
        this.logger.debug(`🔍 스토어 일치 없음: ${record.name}`);
        return record;
      }
      return mergeStorefrontRecord(record, match.item);
    } catch (error) {
      LoggerHelper.logWarning(this.logger, '스토어 보강', describeError(error), { game: record.name });
      return record;
    }
  }
}
