import { CorruptStoreError, KeyValueStore } from '../../src/common/storage/key-value.store';

/**
 * 테스트용 메모리 저장소. corrupt()로 손상된 키를 흉내낸다
 */
export class InMemoryKeyValueStore extends KeyValueStore {
  readonly data = new Map<string, string>();
  private readonly corrupted = new Set<string>();
  saveCount = 0;
  failSaves = false;

  async load(key: string): Promise<unknown> {
    if (this.corrupted.has(key)) throw new CorruptStoreError(key, new Error('bad json'));
    const raw = this.data.get(key);
    return raw === undefined ? null : JSON.parse(raw);
  }

  async save(key: string, value: unknown): Promise<void> {
    if (this.failSaves) throw new Error('disk full');
    this.saveCount++;
    this.corrupted.delete(key);
    this.data.set(key, JSON.stringify(value));
  }

  corrupt(key: string): void {
    this.corrupted.add(key);
  }
}
