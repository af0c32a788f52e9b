import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

// 환경 변수가 없을 때 사용하는 기본값
export const APP_DEFAULTS = {
  port: 8080,
  cacheDir: 'data',
  titleMatchCutoff: 0.6,
  termMatchCutoff: 0.85,
  enrichConcurrency: 10,
  steamDetailConcurrency: 10,
  llmTimeoutMs: 30_000,
  ollamaHost: 'http://localhost:11434',
  ollamaModel: 'llama3.1',
} as const;

export const CORS_ORIGINS = ['http://localhost:3000', 'http://localhost:5173'];

const logger = new Logger('AppConfig');

interface NumberBounds {
  min?: number;
  max?: number;
}

/**
 * 숫자형 설정 조회. 형식이나 범위가 맞지 않으면 경고 후 기본값 사용
 */
export function readNumberSetting(
  config: ConfigService,
  key: string,
  fallback: number,
  bounds: NumberBounds = {},
): number {
  const raw = config.get<string | number>(key);
  if (raw === undefined || raw === null || raw === '') return fallback;

  const value = Number(raw);
  const tooSmall = bounds.min !== undefined && value < bounds.min;
  const tooLarge = bounds.max !== undefined && value > bounds.max;
  if (!Number.isFinite(value) || tooSmall || tooLarge) {
    logger.warn(`⚠️ ${key}=${raw} 값이 유효하지 않아 기본값 ${fallback}을(를) 사용합니다.`);
    return fallback;
  }
  return value;
}

export function readStringSetting(
  config: ConfigService,
  key: string,
  fallback: string,
): string {
  const raw = config.get<string>(key);
  return typeof raw === 'string' && raw.trim() ? raw.trim() : fallback;
}
