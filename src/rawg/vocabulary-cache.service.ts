import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { readNumberSetting } from '../config/app.config';
import { KeyValueStore } from '../common/storage/key-value.store';
import { describeError, LoggerHelper } from '../common/utils/logger.helper';
import {
  VOCABULARY_CATEGORIES,
  VocabularyCategory,
  VocabularyEntry,
} from '../types/game.types';
import { RAWG_VOCABULARY } from './config/rawg.config';
import { RawgApiService } from './rawg-api.service';

type VocabularyTable = Record<VocabularyCategory, VocabularyEntry[]>;

export interface VocabularySnapshot extends VocabularyTable {
  fetchedAt: string | null;
}

export interface VocabularyStatus {
  fetchedAt: string | null;
  refreshedThisSession: boolean;
  counts: Record<VocabularyCategory, number>;
}

const emptyTable = (): VocabularyTable => ({ genres: [], platforms: [], tags: [] });

function toEntry(value: unknown): VocabularyEntry | null {
  if (typeof value !== 'object' || value === null) return null;
  const id: unknown = Reflect.get(value, 'id');
  const name: unknown = Reflect.get(value, 'name');
  const slug: unknown = Reflect.get(value, 'slug');
  if (typeof id !== 'number' || typeof name !== 'string' || !name.trim()) return null;
  return { id, name, slug: typeof slug === 'string' ? slug : null };
}

/**
 * 저장된 스냅샷 검증. 형식이 맞지 않는 항목은 버린다
 */
export function parseVocabularySnapshot(raw: unknown): VocabularySnapshot | null {
  if (typeof raw !== 'object' || raw === null) return null;
  const fetchedAt: unknown = Reflect.get(raw, 'fetchedAt');
  const snapshot: VocabularySnapshot = {
    ...emptyTable(),
    fetchedAt: typeof fetchedAt === 'string' ? fetchedAt : null,
  };
  for (const category of VOCABULARY_CATEGORIES) {
    const list: unknown = Reflect.get(raw, category);
    if (!Array.isArray(list)) continue;
    snapshot[category] = list
      .map((item: unknown) => toEntry(item))
      .filter((entry): entry is VocabularyEntry => entry !== null);
  }
  return snapshot;
}

/**
 * RAWG 장르/플랫폼/태그 어휘 캐시.
 * 부팅 시 디스크에서 읽고, 비었거나 오래되었으면 RAWG에서 다시 받는다.
 * 원격 갱신은 세션당 한 번 (force 제외).
 */
@Injectable()
export class VocabularyCacheService
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  static readonly STORE_KEY = 'rawg-vocabulary';

  private readonly logger = new Logger(VocabularyCacheService.name);
  private readonly maxPages: number;
  private readonly maxAgeMs: number;

  private table: VocabularyTable = emptyTable();
  private fetchedAt: string | null = null;
  private sessionRefreshed = false;
  private refreshInFlight: Promise<void> | null = null;
  private readonly nameIndex = new Map<VocabularyCategory, Map<string, VocabularyEntry>>();

  constructor(
    private readonly rawgApi: RawgApiService,
    private readonly store: KeyValueStore,
    config: ConfigService,
  ) {
    this.maxPages = readNumberSetting(
      config,
      'RAWG_VOCABULARY_MAX_PAGES',
      RAWG_VOCABULARY.maxPages,
      { min: 1 },
    );
    this.maxAgeMs =
      readNumberSetting(config, 'VOCABULARY_MAX_AGE_HOURS', RAWG_VOCABULARY.maxAgeHours, {
        min: 0,
      }) *
      60 *
      60 *
      1000;
  }

  async onApplicationBootstrap(): Promise<void> {
    try {
      await this.load();
    } catch (error) {
      // 어휘 없이도 서버는 기동한다 (조회 시 slug 폴백)
      LoggerHelper.logError(this.logger, '어휘 캐시 초기화', error);
    }
  }

  async onApplicationShutdown(): Promise<void> {
    if (this.isEmpty()) return;
    try {
      await this.persist();
    } catch (error) {
      LoggerHelper.logError(this.logger, '종료 시 어휘 저장', error);
    }
  }

  @Cron(CronExpression.EVERY_WEEK)
  async scheduledRefresh(): Promise<void> {
    try {
      await this.refresh({ force: true });
    } catch (error) {
      LoggerHelper.logError(this.logger, '주간 어휘 갱신', error);
    }
  }

  /**
   * 디스크 스냅샷 로드. 없거나 손상/비어 있으면 원격 갱신
   */
  async load(): Promise<void> {
    const snapshot = await this.readSnapshot();
    if (!snapshot || VOCABULARY_CATEGORIES.every((c) => snapshot[c].length === 0)) {
      this.logger.log('📭 저장된 어휘가 없어 RAWG에서 새로 받습니다.');
      await this.refresh();
      return;
    }

    this.apply(snapshot, snapshot.fetchedAt);
    LoggerHelper.logComplete(this.logger, '어휘 캐시 로드', this.counts());

    if (this.isStale()) {
      try {
        await this.refresh();
      } catch (error) {
        LoggerHelper.logWarning(
          this.logger,
          '어휘 갱신',
          `오래된 어휘를 계속 사용합니다: ${describeError(error)}`,
        );
      }
    }
  }

  /**
   * 세 카테고리를 모두 받아 교체 후 저장. 실패하면 기존 어휘를 유지한다
   */
  async refresh(options: { force?: boolean } = {}): Promise<void> {
    if (this.sessionRefreshed && !options.force) {
      this.logger.debug('이번 세션에 이미 어휘를 갱신했습니다.');
      return;
    }
    if (!this.refreshInFlight) {
      this.refreshInFlight = this.fetchAll().finally(() => {
        this.refreshInFlight = null;
      });
    }
    return this.refreshInFlight;
  }

  entries(category: VocabularyCategory): readonly VocabularyEntry[] {
    return this.table[category];
  }

  /** 소문자 이름 → 표기 이름 */
  canonicalNames(category: VocabularyCategory): Map<string, string> {
    const out = new Map<string, string>();
    for (const [key, entry] of this.indexFor(category)) out.set(key, entry.name);
    return out;
  }

  /** 소문자 이름 → RAWG id */
  nameLookup(category: VocabularyCategory): Map<string, number> {
    const out = new Map<string, number>();
    for (const [key, entry] of this.indexFor(category)) out.set(key, entry.id);
    return out;
  }

  /** RAWG id → 표기 이름 */
  idLookup(category: VocabularyCategory): Map<number, string> {
    const out = new Map<number, string>();
    for (const entry of this.table[category]) out.set(entry.id, entry.name);
    return out;
  }

  status(): VocabularyStatus {
    return {
      fetchedAt: this.fetchedAt,
      refreshedThisSession: this.sessionRefreshed,
      counts: this.counts(),
    };
  }

  private async fetchAll(): Promise<void> {
    LoggerHelper.logStart(this.logger, 'RAWG 어휘 갱신');
    const fetched = emptyTable();
    for (const category of VOCABULARY_CATEGORIES) {
      fetched[category] = await this.fetchCategory(category);
    }

    this.apply(fetched, new Date().toISOString());
    this.sessionRefreshed = true;
    LoggerHelper.logComplete(this.logger, 'RAWG 어휘 갱신', this.counts());

    try {
      await this.persist();
    } catch (error) {
      LoggerHelper.logError(this.logger, '어휘 저장', error);
    }
  }

  private async fetchCategory(category: VocabularyCategory): Promise<VocabularyEntry[]> {
    const entries: VocabularyEntry[] = [];
    for (let page = 1; page <= this.maxPages; page++) {
      const res = await this.rawgApi.listVocabulary(category, page);
      for (const item of res.results) {
        entries.push({ id: item.id, slug: item.slug ?? null, name: item.name });
      }
      if (!res.next) return entries;
    }
    LoggerHelper.logWarning(
      this.logger,
      `${category} 어휘 수집`,
      `최대 ${this.maxPages}페이지에서 중단했습니다.`,
    );
    return entries;
  }

  private async readSnapshot(): Promise<VocabularySnapshot | null> {
    try {
      return parseVocabularySnapshot(await this.store.load(VocabularyCacheService.STORE_KEY));
    } catch (error) {
      LoggerHelper.logWarning(this.logger, '어휘 스냅샷 읽기', describeError(error));
      return null;
    }
  }

  private async persist(): Promise<void> {
    const snapshot: VocabularySnapshot = { ...this.table, fetchedAt: this.fetchedAt };
    await this.store.save(VocabularyCacheService.STORE_KEY, snapshot);
  }

  private apply(table: VocabularyTable, fetchedAt: string | null): void {
    this.table = {
      genres: [...table.genres],
      platforms: [...table.platforms],
      tags: [...table.tags],
    };
    this.fetchedAt = fetchedAt;
    this.nameIndex.clear();
  }

  private indexFor(category: VocabularyCategory): Map<string, VocabularyEntry> {
    let index = this.nameIndex.get(category);
    if (!index) {
      index = new Map();
      for (const entry of this.table[category]) {
        const key = entry.name.trim().toLowerCase();
        // 같은 이름이 여럿이면 먼저 나온 항목 유지
        if (!index.has(key)) index.set(key, entry);
      }
      this.nameIndex.set(category, index);
    }
    return index;
  }

  private isStale(): boolean {
    if (!this.fetchedAt) return true;
    const fetchedAt = Date.parse(this.fetchedAt);
    return Number.isNaN(fetchedAt) || Date.now() - fetchedAt > this.maxAgeMs;
  }

  private isEmpty(): boolean {
    return VOCABULARY_CATEGORIES.every((category) => this.table[category].length === 0);
  }

  private counts(): Record<VocabularyCategory, number> {
    return {
      genres: this.table.genres.length,
      platforms: this.table.platforms.length,
      tags: this.table.tags.length,
    };
  }
}
