import { parseReleaseDate } from '../../common/utils/date.util';
import { GameRecord } from '../../types/game.types';
import { STEAM_APP_PAGE_URL, STEAM_PLATFORM_LABELS } from '../config/steam.config';
import { SteamAppDetailsData, SteamPriceOverview } from '../steam.types';

const MAX_SCREENSHOTS = 5;
const STEAM_PLATFORM_KEYS = ['windows', 'mac', 'linux'] as const;

/** DLC, 사운드트랙, 데모 등은 보강 대상이 아니다 */
export function isGameType(data: SteamAppDetailsData): boolean {
  return data.type?.toLowerCase() === 'game';
}

/**
 * 가격 (센트 → 통화 단위). price_overview가 우선이고, 없으면 무료는 0, 그 외 null
 */
export function parseSteamPrice(
  isFree: boolean | undefined,
  overview: SteamPriceOverview | null | undefined,
): number | null {
  if (overview && Number.isFinite(overview.final)) return Math.round(overview.final) / 100;
  return isFree ? 0 : null;
}

export function parseSteamPlatforms(platforms: SteamAppDetailsData['platforms']): string[] {
  if (!platforms) return [];
  return STEAM_PLATFORM_KEYS.filter((key) => platforms[key] === true)
    .map((key) => STEAM_PLATFORM_LABELS[key]);
}

export function mapSteamApp(data: SteamAppDetailsData): GameRecord {
  return {
    id: String(data.steam_appid),
    name: data.name,
    description: data.short_description?.trim() || null,
    releaseDate: parseReleaseDate(data.release_date?.date),
    developers: data.developers ?? [],
    publishers: data.publishers ?? [],
    genres: (data.genres ?? []).map((genre) => genre.description).filter(Boolean),
    platforms: parseSteamPlatforms(data.platforms),
    screenshots: (data.screenshots ?? [])
      .slice(0, MAX_SCREENSHOTS)
      .map((shot) => shot.path_full)
      .filter(Boolean),
    price: parseSteamPrice(data.is_free, data.price_overview),
    storeUrl: `${STEAM_APP_PAGE_URL}/${data.steam_appid}`,
  };
}
