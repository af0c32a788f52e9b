import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { JsonFileStore } from '../json-file.store';
import { CorruptStoreError } from '../key-value.store';

describe('JsonFileStore', () => {
  let dir: string;
  let store: JsonFileStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'kv-store-'));
    store = new JsonFileStore(path.join(dir, 'nested'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('없는 키는 null', async () => {
    await expect(store.load('missing')).resolves.toBeNull();
  });

  it('저장한 값을 다시 읽는다', async () => {
    await store.save('synonym-mappings', { genres: { 'role playing': 'RPG' } });

    await expect(store.load('synonym-mappings')).resolves.toEqual({
      genres: { 'role playing': 'RPG' },
    });
    const files = await fs.readdir(path.join(dir, 'nested'));
    expect(files).toEqual(['synonym-mappings.json']);
  });

  it('같은 시각에 같은 키를 동시에 저장해도 파일이 깨지지 않는다', async () => {
    const now = jest.spyOn(Date, 'now').mockReturnValue(1_700_000_000_000);
    const big = (label: string) => ({ label, rows: Array.from({ length: 5000 }, (_, i) => `${label}-${i}`) });
    try {
      const outcomes = await Promise.allSettled([
        store.save('synonym-mappings', big('first')),
        store.save('synonym-mappings', big('second')),
      ]);

      expect(outcomes.map((outcome) => outcome.status)).toEqual(['fulfilled', 'fulfilled']);
      const loaded = await store.load('synonym-mappings');
      expect([big('first'), big('second')]).toContainEqual(loaded);
      await expect(fs.readdir(path.join(dir, 'nested'))).resolves.toEqual(['synonym-mappings.json']);
    } finally {
      now.mockRestore();
    }
  });

  it('손상된 파일은 CorruptStoreError', async () => {
    await fs.mkdir(path.join(dir, 'nested'), { recursive: true });
    await fs.writeFile(path.join(dir, 'nested', 'broken.json'), '{"genres": [', 'utf8');

    await expect(store.load('broken')).rejects.toBeInstanceOf(CorruptStoreError);
  });

  it('경로를 벗어나는 키를 거부한다', async () => {
    await expect(store.save('../escape', {})).rejects.toThrow('허용되지 않는 저장소 키');
  });
});
