import { BadRequestException } from '@nestjs/common';
import { ErrorCodes } from '../common/filters/error-codes';
import { isIsoDate } from '../common/utils/date.util';
import { Currency, CURRENCIES, DEFAULT_CURRENCY } from '../types/game.types';

export interface StructuredFilterInput {
  query?: string | null;
  minPrice?: number | null;
  maxPrice?: number | null;
  currency?: Currency | null;
  genres?: readonly string[] | null;
  platforms?: readonly string[] | null;
  tags?: readonly string[] | null;
  releaseDateFrom?: string | null;
  releaseDateTo?: string | null;
}

export interface StructuredFilterSnapshot {
  query: string;
  minPrice: number | null;
  maxPrice: number | null;
  currency: Currency;
  genres: string[];
  platforms: string[];
  tags: string[];
  releaseDateFrom: string | null;
  releaseDateTo: string | null;
}

function invalid(message: string): BadRequestException {
  return new BadRequestException({ code: ErrorCodes.VALIDATION_ERROR, message });
}

function normalizePrice(value: number | null | undefined, field: string): number | null {
  if (value === null || value === undefined) return null;
  if (!Number.isFinite(value) || value < 0) {
    throw invalid(`${field}는 0 이상의 숫자여야 합니다.`);
  }
  return value;
}

function normalizeDate(value: string | null | undefined, field: string): string | null {
  const trimmed = value?.trim();
  if (!trimmed) return null;
  if (!isIsoDate(trimmed)) throw invalid(`${field}는 YYYY-MM-DD 형식이어야 합니다.`);
  return trimmed;
}

// 이름은 소문자로 저장하고 중복을 제거한다
function normalizeNames(values: readonly string[] | null | undefined): string[] {
  const seen = new Set<string>();
  for (const value of values ?? []) {
    const name = value.trim().toLowerCase();
    if (name) seen.add(name);
  }
  return [...seen];
}

/**
 * 카탈로그 검색 조건. 생성 시 검증하며 생성 후에는 바뀌지 않는다
 */
export class StructuredFilter {
  private constructor(
    readonly query: string,
    readonly minPrice: number | null,
    readonly maxPrice: number | null,
    readonly currency: Currency,
    readonly genres: readonly string[],
    readonly platforms: readonly string[],
    readonly tags: readonly string[],
    readonly releaseDateFrom: string | null,
    readonly releaseDateTo: string | null,
  ) {
    Object.freeze(this.genres);
    Object.freeze(this.platforms);
    Object.freeze(this.tags);
    Object.freeze(this);
  }

  static create(input: StructuredFilterInput = {}): StructuredFilter {
    const minPrice = normalizePrice(input.minPrice, 'minPrice');
    const maxPrice = normalizePrice(input.maxPrice, 'maxPrice');
    if (minPrice !== null && maxPrice !== null && maxPrice < minPrice) {
      throw invalid('maxPrice는 minPrice보다 작을 수 없습니다.');
    }

    const currency = input.currency ?? DEFAULT_CURRENCY;
    if (!CURRENCIES.includes(currency)) {
      throw invalid(`지원하지 않는 통화입니다: ${currency}`);
    }

    return new StructuredFilter(
      input.query?.trim() ?? '',
      minPrice,
      maxPrice,
      currency,
      normalizeNames(input.genres),
      normalizeNames(input.platforms),
      normalizeNames(input.tags),
      normalizeDate(input.releaseDateFrom, 'releaseDateFrom'),
      normalizeDate(input.releaseDateTo, 'releaseDateTo'),
    );
  }

  withQuery(query: string): StructuredFilter {
    return StructuredFilter.create({ ...this.toJSON(), query });
  }

  /** 가격이 없는 레코드는 항상 통과 */
  acceptsPrice(price: number | null): boolean {
    if (price === null) return true;
    return price >= (this.minPrice ?? 0) && price <= (this.maxPrice ?? Infinity);
  }

  toJSON(): StructuredFilterSnapshot {
    return {
      query: this.query,
      minPrice: this.minPrice,
      maxPrice: this.maxPrice,
      currency: this.currency,
      genres: [...this.genres],
      platforms: [...this.platforms],
      tags: [...this.tags],
      releaseDateFrom: this.releaseDateFrom,
      releaseDateTo: this.releaseDateTo,
    };
  }
}
