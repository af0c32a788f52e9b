import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { firstValueFrom } from 'rxjs';
import { APP_DEFAULTS, readNumberSetting } from '../../config/app.config';
import { ConcurrencyLimiter } from '../../common/concurrency/promise-pool.util';
import { STEAM_REQUEST, STEAM_STORE_API_URL } from '../config/steam.config';
import {
  SteamAppDetailsData,
  SteamAppDetailsResponse,
  SteamStoreSearchItem,
  SteamStoreSearchResponse,
} from '../steam.types';
import { isGameType } from '../utils/steam-app.mapper';

/**
 * Steam Store API (storesearch / appdetails)
 *
 * appdetails 호출은 프로세스 전체에서 공유하는 세마포어로 동시 실행 수를 제한한다.
 * 실패는 호출자에게 그대로 던진다.
 */
@Injectable()
export class SteamStoreService {
  private readonly logger = new Logger(SteamStoreService.name);
  private readonly detailLimiter: ConcurrencyLimiter;

  constructor(
    private readonly httpService: HttpService,
    config: ConfigService,
  ) {
    const concurrency = readNumberSetting(
      config,
      'STEAM_DETAIL_CONCURRENCY',
      APP_DEFAULTS.steamDetailConcurrency,
      { min: 1 },
    );
    this.detailLimiter = new ConcurrencyLimiter(concurrency);
    this.logger.log(`♻️ AppDetails 동시 호출 제한: ${concurrency}`);
  }

  /**
   * 스토어 검색. API: /storesearch?term={term}&cc={cc}&l=english
   */
  async searchStore(term: string, countryCode: string): Promise<SteamStoreSearchItem[]> {
    const response = await firstValueFrom(
      this.httpService.get<SteamStoreSearchResponse>(`${STEAM_STORE_API_URL}/storesearch/`, {
        params: { term, cc: countryCode, l: STEAM_REQUEST.language },
        timeout: STEAM_REQUEST.timeoutMs,
      }),
    );
    return response.data?.items ?? [];
  }

  /**
   * 앱 상세 조회. 게임 타입이 아니거나 데이터가 없으면 null
   */
  async fetchAppDetails(
    appId: number,
    countryCode: string,
  ): Promise<SteamAppDetailsData | null> {
    return this.detailLimiter.run(async () => {
      const response = await firstValueFrom(
        this.httpService.get<SteamAppDetailsResponse>(`${STEAM_STORE_API_URL}/appdetails`, {
          params: { appids: appId, cc: countryCode, l: STEAM_REQUEST.language },
          timeout: STEAM_REQUEST.timeoutMs,
        }),
      );

      const appData = response.data?.[String(appId)];
      if (!appData?.success || !appData.data) {
        this.logger.warn(`⚠️ Steam AppDetails 없음: AppID ${appId}`);
        return null;
      }
      if (!isGameType(appData.data)) {
        this.logger.debug(`📋 게임이 아님: AppID ${appId} (${appData.data.type})`);
        return null;
      }
      return appData.data;
    });
  }
}
