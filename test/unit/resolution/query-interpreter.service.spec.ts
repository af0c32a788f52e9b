import { BadRequestException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { todayIsoDate } from '../../../src/common/utils/date.util';
import { QueryInterpreterService } from '../../../src/resolution/query-interpreter.service';
import { SynonymCacheService } from '../../../src/resolution/synonym-cache.service';
import { TermResolverService } from '../../../src/resolution/term-resolver.service';
import { FakeTextGenerator } from '../../helpers/fake-text-generator';
import { InMemoryKeyValueStore } from '../../helpers/in-memory-store';
import { createLoadedVocabulary } from '../../helpers/vocabulary.factory';

const isExtraction = (prompt: string) => prompt.includes('Extract video game search criteria');

describe('QueryInterpreterService', () => {
  const createInterpreter = async (
    extraction: string | Error,
    canonicalization: string | Error = '{}',
  ) => {
    const generator = new FakeTextGenerator((prompt) =>
      isExtraction(prompt) ? extraction : canonicalization,
    );
    const config = new ConfigService({});
    const resolver = new TermResolverService(
      await createLoadedVocabulary(),
      new SynonymCacheService(new InMemoryKeyValueStore()),
      generator,
      config,
    );
    return { interpreter: new QueryInterpreterService(generator, resolver, config), generator };
  };

  it('정규식 조건과 모델 용어를 합쳐 필터를 만든다', async () => {
    const { interpreter } = await createInterpreter(
      '{"query": "", "genres": ["RPG"], "platforms": ["PC"], "tags": ["multiplayer", "under $20"]}',
    );

    const { filter, leftovers } = await interpreter.parse(
      'multiplayer RPG on PC under $20 after 2015',
    );

    expect(filter.toJSON()).toEqual({
      query: '',
      minPrice: null,
      maxPrice: 20,
      currency: 'USD',
      genres: ['rpg'],
      platforms: ['pc'],
      tags: ['multiplayer'],
      releaseDateFrom: '2015-01-01',
      releaseDateTo: todayIsoDate(),
    });
    expect(leftovers).toEqual({ genres: [], platforms: [], tags: [] });
  });

  it('확정하지 못한 장르는 leftovers로 돌려준다', async () => {
    const { interpreter, generator } = await createInterpreter(
      '{"query": "dark", "genres": ["souls like", "action"], "platforms": [], "tags": []}',
      '{"souls like": null}',
    );

    const { filter, leftovers } = await interpreter.parse('dark souls like action games', 'EUR');

    expect(filter.genres).toEqual(['action']);
    expect(filter.query).toBe('dark');
    expect(filter.currency).toBe('EUR');
    expect(leftovers.genres).toEqual(['souls like']);
    expect(generator.prompts).toHaveLength(2);
  });

  it('모델 호출이 실패하면 원문을 검색어로 쓰고 기본 날짜를 채운다', async () => {
    const { interpreter } = await createInterpreter(new Error('connection refused'));

    const { filter } = await interpreter.parse('  cozy farming  ');

    expect(filter.query).toBe('cozy farming');
    expect(filter.genres).toEqual([]);
    expect(filter.releaseDateFrom).toBe('1970-01-01');
    expect(filter.releaseDateTo).toBe(todayIsoDate());
  });

  it('모순된 가격 조건은 검증 오류', async () => {
    const { interpreter } = await createInterpreter('{"query": "", "genres": []}');

    await expect(interpreter.parse('over $50 under $10')).rejects.toBeInstanceOf(
      BadRequestException,
    );
  });
});
