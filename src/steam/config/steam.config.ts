import { Currency } from '../../types/game.types';

export const STEAM_STORE_API_URL = 'https://store.steampowered.com/api';
export const STEAM_APP_PAGE_URL = 'https://store.steampowered.com/app';

export const STEAM_REQUEST = {
  timeoutMs: 10_000,
  language: 'english',
  // storesearch 후보 중 상세 조회할 최대 개수
  maxCandidates: 10,
};

// 통화 → 스토어 국가 코드 (EUR은 독일 스토어 기준)
export const CURRENCY_COUNTRY_CODES: Record<Currency, string> = {
  USD: 'us',
  EUR: 'de',
  AUD: 'au',
};

export const STEAM_PLATFORM_LABELS = {
  windows: 'PC',
  mac: 'macOS',
  linux: 'Linux',
} as const;
