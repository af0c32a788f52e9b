import { findBestMatch, normalizeTitle } from '../../common/matching';
import { BestMatch } from '../../common/matching/similarity-score.util';
import { GameRecord } from '../../types/game.types';

export const FREE_TO_PLAY_GENRE = 'Free To Play';

function preferText(primary: string | null, fallback: string | null): string | null {
  return primary && primary.trim() ? primary : fallback;
}

function preferList(primary: readonly string[], fallback: readonly string[]): string[] {
  return primary.length ? [...primary] : [...fallback];
}

/**
 * 스토어 후보 중 카탈로그 제목과 가장 가까운 항목 (정규화 제목 기준)
 */
export function selectStorefrontMatch(
  catalogTitle: string,
  candidates: readonly GameRecord[],
  cutoff: number,
): BestMatch<GameRecord> | null {
  return findBestMatch(
    normalizeTitle(catalogTitle),
    candidates,
    (candidate) => normalizeTitle(candidate.name),
    cutoff,
  );
}

/**
 * 필드별로 비어 있지 않은 스토어 값을 우선한다. id는 카탈로그 것을 유지.
 * 가격이 0이면 'Free To Play' 장르를 보장한다.
 */
export function mergeStorefrontRecord(catalog: GameRecord, storefront: GameRecord): GameRecord {
  const merged: GameRecord = {
    id: catalog.id,
    name: preferText(storefront.name, catalog.name) ?? catalog.name,
    description: preferText(storefront.description, catalog.description),
    releaseDate: preferText(storefront.releaseDate, catalog.releaseDate),
    developers: preferList(storefront.developers, catalog.developers),
    publishers: preferList(storefront.publishers, catalog.publishers),
    genres: preferList(storefront.genres, catalog.genres),
    platforms: preferList(storefront.platforms, catalog.platforms),
    screenshots: preferList(storefront.screenshots, catalog.screenshots),
    price: storefront.price ?? catalog.price,
    storeUrl: preferText(storefront.storeUrl, catalog.storeUrl),
  };

  const hasFreeGenre = merged.genres.some(
    (genre) => genre.toLowerCase() === FREE_TO_PLAY_GENRE.toLowerCase(),
  );
  if (merged.price === 0 && !hasFreeGenre) {
    merged.genres = [...merged.genres, FREE_TO_PLAY_GENRE];
  }
  return merged;
}
