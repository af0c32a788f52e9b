import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { KeyValueStore } from '../common/storage/key-value.store';
import { describeError, LoggerHelper } from '../common/utils/logger.helper';
import { VOCABULARY_CATEGORIES, VocabularyCategory } from '../types/game.types';

export type SynonymTable = Record<VocabularyCategory, Record<string, string>>;

/**
 * 모델이 확정한 "동의어 → 표기 이름" 매핑. 디스크에 영구 저장한다
 */
@Injectable()
export class SynonymCacheService implements OnApplicationBootstrap {
  static readonly STORE_KEY = 'synonym-mappings';

  private readonly logger = new Logger(SynonymCacheService.name);
  private readonly mappings = new Map<VocabularyCategory, Map<string, string>>(
    VOCABULARY_CATEGORIES.map((category) => [category, new Map()]),
  );

  constructor(private readonly store: KeyValueStore) {}

  async onApplicationBootstrap(): Promise<void> {
    await this.load();
  }

  /**
   * 저장된 매핑 로드. 없거나 손상되었으면 빈 매핑으로 시작한다
   */
  async load(): Promise<void> {
    let raw: unknown = null;
    try {
      raw = await this.store.load(SynonymCacheService.STORE_KEY);
    } catch (error) {
      LoggerHelper.logWarning(this.logger, '동의어 매핑 읽기', `빈 매핑으로 시작합니다: ${describeError(error)}`);
    }

    for (const category of VOCABULARY_CATEGORIES) {
      const target = this.table(category);
      target.clear();
      const section: unknown = typeof raw === 'object' && raw !== null ? Reflect.get(raw, category) : null;
      if (typeof section !== 'object' || section === null) continue;
      for (const [synonym, canonical] of Object.entries(section)) {
        if (typeof canonical === 'string' && canonical.trim()) {
          target.set(synonym.trim().toLowerCase(), canonical);
        }
      }
    }
    this.logger.log(`📖 동의어 매핑 로드: ${this.size()}건`);
  }

  resolve(category: VocabularyCategory, synonym: string): string | null {
    return this.table(category).get(synonym.trim().toLowerCase()) ?? null;
  }

  /**
   * 매핑 추가 후 즉시 저장. 저장 실패는 로그만 남기고 메모리 매핑은 유지한다
   */
  async addMapping(category: VocabularyCategory, synonym: string, canonical: string): Promise<void> {
    const key = synonym.trim().toLowerCase();
    if (!key) return;
    this.table(category).set(key, canonical);
    this.logger.log(`🔗 ${category}: '${key}' → '${canonical}'`);

    try {
      await this.store.save(SynonymCacheService.STORE_KEY, this.snapshot());
    } catch (error) {
      LoggerHelper.logError(this.logger, '동의어 매핑 저장', error, { category, synonym: key });
    }
  }

  snapshot(): SynonymTable {
    return {
      genres: Object.fromEntries(this.table('genres')),
      platforms: Object.fromEntries(this.table('platforms')),
      tags: Object.fromEntries(this.table('tags')),
    };
  }

  private table(category: VocabularyCategory): Map<string, string> {
    let table = this.mappings.get(category);
    if (!table) {
      table = new Map();
      this.mappings.set(category, table);
    }
    return table;
  }

  private size(): number {
    return VOCABULARY_CATEGORIES.reduce((sum, category) => sum + this.table(category).size, 0);
  }
}
