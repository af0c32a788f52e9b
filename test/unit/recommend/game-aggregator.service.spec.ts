import { HttpException, HttpStatus } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { StructuredFilter } from '../../../src/models/structured-filter.model';
import {
  CatalogProvider,
  StorefrontProvider,
  StorefrontSearchOptions,
} from '../../../src/providers/game-provider';
import { GameAggregatorService } from '../../../src/recommend/game-aggregator.service';
import { GameRecord, ProviderSearchResult } from '../../../src/types/game.types';
import { buildGameRecord } from '../../helpers/game-record.factory';

class StubCatalog extends CatalogProvider {
  readonly calls: Array<[StructuredFilter, number, number]> = [];

  constructor(private readonly result: ProviderSearchResult | Error) {
    super();
  }

  async search(filter: StructuredFilter, limit: number, offset: number): Promise<ProviderSearchResult> {
    this.calls.push([filter, limit, offset]);
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }

  async getDetails(): Promise<GameRecord | null> {
    return null;
  }
}

class StubStorefront extends StorefrontProvider {
  readonly terms: Array<[string, StorefrontSearchOptions | undefined]> = [];

  constructor(private readonly byTerm: Record<string, GameRecord[] | Error>) {
    super();
  }

  async search(term: string, options?: StorefrontSearchOptions): Promise<ProviderSearchResult> {
    this.terms.push([term, options]);
    const entry = this.byTerm[term] ?? [];
    if (entry instanceof Error) throw entry;
    return { records: entry, total: entry.length };
  }

  async getDetails(): Promise<GameRecord | null> {
    return null;
  }
}

describe('GameAggregatorService', () => {
  const hades = buildGameRecord({ id: '10', name: 'Hades', genres: ['Action'] });
  const stardew = buildGameRecord({ id: '11', name: 'Stardew Valley' });
  const zed = buildGameRecord({ id: '12', name: 'Zed Game', genres: ['Indie'] });

  const createService = (catalog: CatalogProvider, storefront: StorefrontProvider) =>
    new GameAggregatorService(catalog, storefront, new ConfigService({}));

  it('스토어 정보로 보강하고 가격 조건으로 거른다', async () => {
    const catalog = new StubCatalog({ records: [hades, stardew, zed], total: 45 });
    const storefront = new StubStorefront({
      hades: [buildGameRecord({ id: '1145360', name: 'Hades', price: 24.99 })],
      'stardew valley': new Error('steam down'),
      'zed game': [buildGameRecord({ id: '9', name: 'Zed Game', price: 0, storeUrl: 'https://store.example/9' })],
    });
    const filter = StructuredFilter.create({ maxPrice: 20 });

    const page = await createService(catalog, storefront).aggregate(filter, 3, 2);

    expect(catalog.calls).toEqual([[filter, 3, 3]]);
    expect(page.results.map((record) => record.id)).toEqual(['11', '12']);
    expect(page.results[1]).toEqual({
      ...zed,
      price: 0,
      storeUrl: 'https://store.example/9',
      genres: ['Indie', 'Free To Play'],
    });
    expect(page.total).toBe(45);
    expect(page.limit).toBe(3);
    expect(page.page).toBe(2);
    expect(page.totalPages).toBe(15);
  });

  it('정규화된 제목과 요청 통화로 스토어를 검색한다', async () => {
    const catalog = new StubCatalog({
      records: [buildGameRecord({ name: 'Hades: Definitive Edition' })],
      total: 1,
    });
    const storefront = new StubStorefront({});

    await createService(catalog, storefront).aggregate(
      StructuredFilter.create({ currency: 'EUR' }),
      10,
      1,
    );

    expect(storefront.terms).toEqual([['hades', { currency: 'EUR' }]]);
  });

  it('제목 유사도가 기준 미만이면 카탈로그 레코드를 그대로 둔다', async () => {
    const catalog = new StubCatalog({ records: [hades], total: 1 });
    const storefront = new StubStorefront({
      hades: [buildGameRecord({ id: '77', name: 'Minecraft', price: 30 })],
    });

    const page = await createService(catalog, storefront).aggregate(StructuredFilter.create(), 10, 1);

    expect(page.results).toEqual([hades]);
  });

  it('카탈로그 오류는 그대로 전파한다', async () => {
    const catalog = new StubCatalog(
      new HttpException('RAWG 게임 검색: unavailable', HttpStatus.SERVICE_UNAVAILABLE),
    );
    const service = createService(catalog, new StubStorefront({}));

    await expect(service.aggregate(StructuredFilter.create(), 10, 1)).rejects.toBeInstanceOf(
      HttpException,
    );
  });

  it('limit 0이면 빈 결과와 totalPages 1을 돌려준다', async () => {
    const catalog = new StubCatalog({ records: [], total: 120 });

    const page = await createService(catalog, new StubStorefront({})).aggregate(
      StructuredFilter.create(),
      0,
      1,
    );

    expect(catalog.calls[0].slice(1)).toEqual([0, 0]);
    expect(page).toEqual({ results: [], total: 120, limit: 0, page: 1, totalPages: 1 });
    expect(Object.isFrozen(page)).toBe(true);
  });
});
