export type VocabularyCategory = 'genres' | 'platforms' | 'tags';

export const VOCABULARY_CATEGORIES: readonly VocabularyCategory[] = [
  'genres',
  'platforms',
  'tags',
];

export const CURRENCIES = ['USD', 'EUR', 'AUD'] as const;
export type Currency = (typeof CURRENCIES)[number];
export const DEFAULT_CURRENCY: Currency = 'USD';

export interface VocabularyEntry {
  id: number;
  slug: string | null;
  name: string;
}

/**
 * 카탈로그/스토어 공통 게임 레코드
 */
export interface GameRecord {
  id: string;
  name: string;
  description: string | null;
  /** YYYY-MM-DD */
  releaseDate: string | null;
  developers: string[];
  publishers: string[];
  genres: string[];
  platforms: string[];
  screenshots: string[];
  /** null: 가격 정보 없음, 0: 무료 */
  price: number | null;
  storeUrl: string | null;
}

export type FrozenGameRecord = {
  readonly [K in keyof GameRecord]: GameRecord[K] extends string[]
    ? readonly string[]
    : GameRecord[K];
};

export interface ResponsePage {
  readonly results: readonly FrozenGameRecord[];
  readonly total: number;
  readonly limit: number;
  readonly page: number;
  readonly totalPages: number;
}

export interface ProviderSearchResult {
  records: GameRecord[];
  total: number;
}

export function emptyGameRecord(id: string, name: string): GameRecord {
  return {
    id,
    name,
    description: null,
    releaseDate: null,
    developers: [],
    publishers: [],
    genres: [],
    platforms: [],
    screenshots: [],
    price: null,
    storeUrl: null,
  };
}

export function freezeGameRecord(record: GameRecord): FrozenGameRecord {
  return Object.freeze({
    ...record,
    developers: Object.freeze([...record.developers]),
    publishers: Object.freeze([...record.publishers]),
    genres: Object.freeze([...record.genres]),
    platforms: Object.freeze([...record.platforms]),
    screenshots: Object.freeze([...record.screenshots]),
  });
}
