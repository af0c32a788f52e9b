// RAWG 호출 정책과 기본값
export const RAWG_API_BASE_URL = 'https://api.rawg.io/api';
export const RAWG_GAME_PAGE_URL = 'https://rawg.io/games';

export const RAWG_SEARCH = {
  // /games 한 페이지 크기. 오프셋 계산의 기준이 된다
  pageSize: 20,
  requestTimeoutMs: 15_000,
};

export const RAWG_VOCABULARY = {
  pageSize: 40,
  maxPages: 20,
  maxAgeHours: 168,
};

export const RAWG_RETRY = {
  max: 3,
  baseDelayMs: 600,
  maxDelayMs: 10_000,
  retryAfterFallbackSec: 5,
};

export const RAWG_CIRCUIT = {
  failureThreshold: 5,
  openMs: 10 * 60 * 1000,
};
