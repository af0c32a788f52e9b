import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { JsonFileStore } from '../../../src/common/storage/json-file.store';
import { KeyValueStore } from '../../../src/common/storage/key-value.store';
import { RawgApiService } from '../../../src/rawg/rawg-api.service';
import { VocabularyCacheService } from '../../../src/rawg/vocabulary-cache.service';
import { VocabularyCategory } from '../../../src/types/game.types';
import { InMemoryKeyValueStore } from '../../helpers/in-memory-store';

const REMOTE: Record<VocabularyCategory, Array<{ id: number; slug: string; name: string }>> = {
  genres: [
    { id: 5, slug: 'role-playing-games-rpg', name: 'RPG' },
    { id: 4, slug: 'action', name: 'Action' },
  ],
  platforms: [{ id: 4, slug: 'pc', name: 'PC' }],
  tags: [{ id: 7, slug: 'multiplayer', name: 'Multiplayer' }],
};

describe('VocabularyCacheService', () => {
  const createRawgApi = () => ({
    // 장르만 두 페이지로 나눠 응답
    listVocabulary: jest.fn(async (category: VocabularyCategory, page: number) => {
      if (category === 'genres') {
        return page === 1
          ? { count: 2, next: 'page-2', results: [REMOTE.genres[0]] }
          : { count: 2, next: null, results: [REMOTE.genres[1]] };
      }
      return { count: REMOTE[category].length, next: null, results: REMOTE[category] };
    }),
  });

  const createService = (
    store: KeyValueStore,
    rawgApi: { listVocabulary: jest.Mock } = createRawgApi(),
  ) =>
    new VocabularyCacheService(
      rawgApi as unknown as RawgApiService,
      store,
      new ConfigService({ VOCABULARY_MAX_AGE_HOURS: 168 }),
    );

  it('저장된 어휘가 없으면 RAWG에서 받아 저장한다', async () => {
    const store = new InMemoryKeyValueStore();
    const rawgApi = createRawgApi();
    const service = createService(store, rawgApi);

    await service.load();

    expect(rawgApi.listVocabulary).toHaveBeenCalledTimes(4);
    expect(service.entries('genres').map((e) => e.name)).toEqual(['RPG', 'Action']);
    expect(service.nameLookup('platforms').get('pc')).toBe(4);
    expect(service.canonicalNames('genres').get('rpg')).toBe('RPG');
    expect(store.saveCount).toBe(1);
    expect(service.status().refreshedThisSession).toBe(true);
  });

  it('최신 스냅샷이 있으면 원격 호출 없이 로드한다', async () => {
    const store = new InMemoryKeyValueStore();
    await store.save(VocabularyCacheService.STORE_KEY, {
      fetchedAt: new Date().toISOString(),
      genres: [{ id: 5, slug: 'rpg', name: 'RPG' }, { broken: true }],
      platforms: [],
      tags: [],
    });
    const rawgApi = createRawgApi();
    const service = createService(store, rawgApi);

    await service.load();

    expect(rawgApi.listVocabulary).not.toHaveBeenCalled();
    expect(service.entries('genres')).toEqual([{ id: 5, slug: 'rpg', name: 'RPG' }]);
    expect(service.status().refreshedThisSession).toBe(false);
  });

  it('오래된 스냅샷은 갱신을 시도하고 실패하면 기존 어휘를 유지한다', async () => {
    const store = new InMemoryKeyValueStore();
    await store.save(VocabularyCacheService.STORE_KEY, {
      fetchedAt: '2000-01-01T00:00:00.000Z',
      genres: [{ id: 5, slug: 'rpg', name: 'RPG' }],
      platforms: [],
      tags: [],
    });
    const rawgApi = { listVocabulary: jest.fn().mockRejectedValue(new Error('RAWG down')) };
    const service = createService(store, rawgApi);

    await service.load();

    expect(rawgApi.listVocabulary).toHaveBeenCalledTimes(1);
    expect(service.entries('genres').map((e) => e.name)).toEqual(['RPG']);
    expect(service.status().fetchedAt).toBe('2000-01-01T00:00:00.000Z');
  });

  it('손상된 스냅샷이면 새로 받는다', async () => {
    const store = new InMemoryKeyValueStore();
    store.corrupt(VocabularyCacheService.STORE_KEY);
    const service = createService(store);

    await service.load();

    expect(service.entries('tags').map((e) => e.name)).toEqual(['Multiplayer']);
  });

  it('세션당 한 번만 갱신하고 force면 다시 받는다', async () => {
    const rawgApi = createRawgApi();
    const service = createService(new InMemoryKeyValueStore(), rawgApi);

    await service.refresh();
    await service.refresh();
    expect(rawgApi.listVocabulary).toHaveBeenCalledTimes(4);

    await service.refresh({ force: true });
    expect(rawgApi.listVocabulary).toHaveBeenCalledTimes(8);
  });

  it('갱신 중 실패하면 기존 어휘를 그대로 둔다', async () => {
    const rawgApi = createRawgApi();
    const service = createService(new InMemoryKeyValueStore(), rawgApi);
    await service.refresh();

    rawgApi.listVocabulary.mockRejectedValueOnce(new Error('timeout'));
    await expect(service.refresh({ force: true })).rejects.toThrow('timeout');
    expect(service.entries('genres')).toHaveLength(2);
  });

  it('파일 저장소로 저장한 어휘를 새 인스턴스가 그대로 읽는다', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'vocab-'));
    try {
      const first = createService(new JsonFileStore(dir));
      await first.refresh();

      const offline = { listVocabulary: jest.fn().mockRejectedValue(new Error('offline')) };
      const second = createService(new JsonFileStore(dir), offline);
      await second.load();

      expect(offline.listVocabulary).not.toHaveBeenCalled();
      expect(second.entries('genres')).toEqual(first.entries('genres'));
      expect(second.entries('platforms')).toEqual(first.entries('platforms'));
      expect(second.entries('tags')).toEqual(first.entries('tags'));
      expect([...second.idLookup('genres')]).toEqual([
        [5, 'RPG'],
        [4, 'Action'],
      ]);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
