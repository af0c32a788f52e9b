import { StructuredFilter } from '../models/structured-filter.model';
import { Currency, GameRecord, ProviderSearchResult } from '../types/game.types';

/**
 * 페이지 단위 검색을 제공하는 메타데이터 카탈로그
 */
export abstract class CatalogProvider {
  abstract search(
    filter: StructuredFilter,
    limit: number,
    offset: number,
  ): Promise<ProviderSearchResult>;

  abstract getDetails(id: string): Promise<GameRecord | null>;
}

export interface StorefrontSearchOptions {
  currency?: Currency;
}

/**
 * 가격과 상세 정보를 보강하는 스토어
 */
export abstract class StorefrontProvider {
  abstract search(
    term: string,
    options?: StorefrontSearchOptions,
  ): Promise<ProviderSearchResult>;

  abstract getDetails(
    id: string,
    options?: StorefrontSearchOptions,
  ): Promise<GameRecord | null>;
}
