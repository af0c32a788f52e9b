import { parseReleaseDate } from '../../common/utils/date.util';
import { emptyGameRecord, GameRecord } from '../../types/game.types';
import { RAWG_GAME_PAGE_URL } from '../config/rawg.config';
import { RawgGameDetails, RawgGameSearchResult, RawgNamedRef } from '../rawg.types';

function names(refs: readonly RawgNamedRef[] | null | undefined): string[] {
  return (refs ?? []).map((ref) => ref.name).filter((name) => Boolean(name?.trim()));
}

function collectScreenshots(game: RawgGameSearchResult): string[] {
  const shots = (game.short_screenshots ?? []).map((shot) => shot.image).filter(Boolean);
  if (shots.length) return [...new Set(shots)];
  return game.background_image ? [game.background_image] : [];
}

/**
 * /games 검색 결과 → GameRecord. RAWG는 가격을 제공하지 않는다
 */
export function mapRawgGame(game: RawgGameSearchResult): GameRecord {
  return {
    ...emptyGameRecord(String(game.id), game.name),
    releaseDate: game.tba ? null : parseReleaseDate(game.released),
    genres: names(game.genres),
    platforms: names((game.platforms ?? []).map((ref) => ref.platform)),
    screenshots: collectScreenshots(game),
    storeUrl: game.slug ? `${RAWG_GAME_PAGE_URL}/${game.slug}` : null,
  };
}

export function mapRawgGameDetails(details: RawgGameDetails): GameRecord {
  return {
    ...mapRawgGame(details),
    description: details.description_raw?.trim() || null,
    developers: names(details.developers),
    publishers: names(details.publishers),
  };
}
