import { Injectable, Logger } from '@nestjs/common';
import { ErrorHandlerUtil } from '../common/utils/error-handler.util';
import { describeError, LoggerHelper } from '../common/utils/logger.helper';
import { StorefrontProvider, StorefrontSearchOptions } from '../providers/game-provider';
import { DEFAULT_CURRENCY, GameRecord, ProviderSearchResult } from '../types/game.types';
import { CURRENCY_COUNTRY_CODES, STEAM_REQUEST } from './config/steam.config';
import { SteamStoreService } from './services/steam-store.service';
import { mapSteamApp } from './utils/steam-app.mapper';

/**
 * Steam을 스토어 보강 소스로 사용하는 어댑터.
 * 검색 실패는 503으로 던지고, 개별 상세 실패는 로그 후 건너뛴다.
 */
@Injectable()
export class SteamStorefrontProvider extends StorefrontProvider {
  private readonly logger = new Logger(SteamStorefrontProvider.name);

  constructor(private readonly steamStore: SteamStoreService) {
    super();
  }

  async search(term: string, options: StorefrontSearchOptions = {}): Promise<ProviderSearchResult> {
    const countryCode = CURRENCY_COUNTRY_CODES[options.currency ?? DEFAULT_CURRENCY];
    const items = await ErrorHandlerUtil.executeSteamApiCall(
      () => this.steamStore.searchStore(term, countryCode),
      this.logger,
      '스토어 검색',
      term,
    );

    const appIds = items
      .filter((item) => item.type === 'app' && Number.isInteger(item.id))
      .slice(0, STEAM_REQUEST.maxCandidates)
      .map((item) => item.id);

    const details = await Promise.all(
      appIds.map((appId) => this.loadDetails(appId, countryCode)),
    );
    const records = details.filter((record): record is GameRecord => record !== null);

    this.logger.debug(`🔎 Steam '${term}' → 후보 ${appIds.length}건 중 게임 ${records.length}건`);
    return { records, total: records.length };
  }

  async getDetails(id: string, options: StorefrontSearchOptions = {}): Promise<GameRecord | null> {
    const appId = Number(id);
    if (!Number.isInteger(appId) || appId <= 0) return null;
    const countryCode = CURRENCY_COUNTRY_CODES[options.currency ?? DEFAULT_CURRENCY];

    const data = await ErrorHandlerUtil.executeSteamApiCall(
      () => this.steamStore.fetchAppDetails(appId, countryCode),
      this.logger,
      'AppDetails',
      appId,
    );
    return data ? mapSteamApp(data) : null;
  }

  private async loadDetails(appId: number, countryCode: string): Promise<GameRecord | null> {
    try {
      const data = await this.steamStore.fetchAppDetails(appId, countryCode);
      return data ? mapSteamApp(data) : null;
    } catch (error) {
      LoggerHelper.logWarning(this.logger, 'Steam AppDetails', describeError(error), { appId });
      return null;
    }
  }
}
