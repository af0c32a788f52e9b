import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { isAxiosError } from 'axios';
import { firstValueFrom } from 'rxjs';
import { setTimeout as sleep } from 'timers/promises';
import { readNumberSetting } from '../config/app.config';
import { maskSensitive } from '../common/utils/mask.util';
import { VocabularyCategory } from '../types/game.types';
import {
  RAWG_API_BASE_URL,
  RAWG_CIRCUIT,
  RAWG_RETRY,
  RAWG_SEARCH,
  RAWG_VOCABULARY,
} from './config/rawg.config';
import {
  RawgGameDetails,
  RawgGameQuery,
  RawgGameSearchResult,
  RawgListResponse,
  RawgNamedRef,
} from './rawg.types';

export class RawgRequestError extends Error {
  constructor(
    readonly endpoint: string,
    readonly status: number | null,
    message: string,
  ) {
    super(message);
    this.name = 'RawgRequestError';
  }
}

type RawgParams = Record<string, string | number>;

/**
 * RAWG REST 호출 (재시도 + 429 대기 + 서킷 브레이커)
 */
@Injectable()
export class RawgApiService {
  private readonly logger = new Logger(RawgApiService.name);
  private readonly apiKey: string;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;

  private failureCount = 0;
  private state: 'CLOSED' | 'OPEN' | 'HALF_OPEN' = 'CLOSED';
  private lastFailureAt = 0;

  constructor(
    private readonly httpService: HttpService,
    config: ConfigService,
  ) {
    this.apiKey = config.get<string>('RAWG_API_KEY') ?? '';
    if (!this.apiKey) {
      this.logger.warn('⚠️ RAWG API KEY 미설정: RAWG_API_KEY를 확인하세요.');
    }
    this.maxRetries = readNumberSetting(config, 'RAWG_RETRY_MAX', RAWG_RETRY.max, { min: 1 });
    this.baseDelayMs = readNumberSetting(
      config,
      'RAWG_RETRY_BASE_DELAY_MS',
      RAWG_RETRY.baseDelayMs,
      { min: 0 },
    );
  }

  /**
   * 마지막 페이지 뒤를 요청하면 RAWG는 404("Invalid page")를 준다. 2페이지 이후의 404는 null
   */
  async searchGames(query: RawgGameQuery): Promise<RawgListResponse<RawgGameSearchResult> | null> {
    const params: RawgParams = { page: query.page, page_size: query.page_size };
    for (const key of ['search', 'dates', 'genres', 'platforms', 'tags'] as const) {
      const value = query[key];
      if (value) params[key] = value;
    }
    try {
      const res = await this.request<RawgListResponse<RawgGameSearchResult>>('/games', params);
      return { ...res, count: res.count ?? 0, results: res.results ?? [] };
    } catch (error) {
      if (error instanceof RawgRequestError && error.status === 404 && query.page > 1) {
        this.logger.debug(`📭 RAWG /games ${query.page}페이지 없음 (마지막 페이지 이후)`);
        return null;
      }
      throw error;
    }
  }

  /** 존재하지 않는 게임이면 null */
  async getGameDetails(rawgId: string | number): Promise<RawgGameDetails | null> {
    try {
      return await this.request<RawgGameDetails>(`/games/${encodeURIComponent(String(rawgId))}`, {});
    } catch (error) {
      if (error instanceof RawgRequestError && error.status === 404) return null;
      throw error;
    }
  }

  /** /genres, /platforms, /tags 한 페이지 */
  async listVocabulary(
    category: VocabularyCategory,
    page: number,
    pageSize = RAWG_VOCABULARY.pageSize,
  ): Promise<RawgListResponse<RawgNamedRef>> {
    const res = await this.request<RawgListResponse<RawgNamedRef>>(`/${category}`, {
      page,
      page_size: pageSize,
    });
    return { ...res, results: res.results ?? [] };
  }

  // ---------------- Axios + 재시도 + CB ----------------

  private async request<T>(endpoint: string, params: RawgParams): Promise<T> {
    this.guardCircuit(endpoint);

    let lastError: unknown = null;
    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        const response = await firstValueFrom(
          this.httpService.get<T>(`${RAWG_API_BASE_URL}${endpoint}`, {
            params: { ...params, key: this.apiKey },
            timeout: RAWG_SEARCH.requestTimeoutMs,
          }),
        );
        this.onSuccess();
        return response.data;
      } catch (error) {
        lastError = error;
        const status = isAxiosError(error) ? (error.response?.status ?? null) : null;
        this.logger.warn(
          `⚠️ RAWG API 실패 (${attempt}/${this.maxRetries}) ${endpoint}: ${error instanceof Error ? error.message : String(error)}`,
        );
        this.logger.warn(`   ↳ 요청 파라미터: ${JSON.stringify(maskSensitive(params))}`);

        // 4xx(429 제외)는 재시도해도 결과가 같다
        if (status !== null && status >= 400 && status < 500 && status !== 429) {
          throw new RawgRequestError(endpoint, status, `RAWG ${endpoint} 요청 거부 (${status})`);
        }
        if (attempt === this.maxRetries) break;

        if (status === 429) {
          const waitMs = this.retryAfterMs(error);
          this.logger.warn(`⏳ RateLimit — ${Math.ceil(waitMs / 1000)}s 대기`);
          await sleep(waitMs);
        } else {
          await sleep(
            Math.min(RAWG_RETRY.maxDelayMs, this.baseDelayMs * Math.pow(2, attempt - 1)),
          );
        }
      }
    }

    this.onFailure();
    this.logger.error(`❌ RAWG API 완전 실패: ${endpoint}`);
    const status = isAxiosError(lastError) ? (lastError.response?.status ?? null) : null;
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    throw new RawgRequestError(endpoint, status, `RAWG ${endpoint} 호출 실패: ${reason}`);
  }

  private retryAfterMs(error: unknown): number {
    const header = isAxiosError(error) ? error.response?.headers['retry-after'] : undefined;
    const seconds = Number(header ?? RAWG_RETRY.retryAfterFallbackSec);
    const safeSeconds = Number.isFinite(seconds) ? seconds : RAWG_RETRY.retryAfterFallbackSec;
    return Math.min(RAWG_RETRY.maxDelayMs, Math.max(0, safeSeconds * 1000));
  }

  private guardCircuit(endpoint: string): void {
    if (this.state !== 'OPEN') return;
    if (Date.now() - this.lastFailureAt > RAWG_CIRCUIT.openMs) {
      this.state = 'HALF_OPEN';
      this.logger.log('🔄 RAWG API CB: HALF_OPEN');
      return;
    }
    this.logger.warn('🚫 RAWG API CB: OPEN — 요청 차단');
    throw new RawgRequestError(endpoint, null, 'RAWG API 서킷이 열려 있어 요청을 차단했습니다.');
  }

  private onSuccess(): void {
    this.failureCount = 0;
    this.state = 'CLOSED';
  }

  private onFailure(): void {
    this.failureCount++;
    this.lastFailureAt = Date.now();
    if (this.state === 'HALF_OPEN' || this.failureCount >= RAWG_CIRCUIT.failureThreshold) {
      this.state = 'OPEN';
      this.logger.warn(`🚫 CB OPEN (실패 ${this.failureCount}회)`);
    }
  }
}
