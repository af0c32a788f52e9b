import { Logger } from '@nestjs/common';
import * as JSON5 from 'json5';

const logger = new Logger('JsonExtract');

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseLenient(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (strictError) {
    logger.debug(`엄격한 JSON 파싱 실패, JSON5로 재시도: ${String(strictError)}`);
  }
  try {
    return JSON5.parse(text);
  } catch (lenientError) {
    logger.warn(`⚠️ 모델 응답을 JSON으로 해석하지 못했습니다: ${String(lenientError)}`);
    return undefined;
  }
}

/**
 * 모델 출력에서 첫 '{'부터 마지막 '}'까지를 객체로 해석한다. 실패하면 null
 */
export function extractJsonObject(raw: string): Record<string, unknown> | null {
  const match = /\{[\s\S]*\}/.exec(raw);
  if (!match) return null;
  const parsed = parseLenient(match[0]);
  return isPlainObject(parsed) ? parsed : null;
}

/**
 * 문자열 또는 문자열 배열 값을 공백 제거한 목록으로
 */
export function toStringList(value: unknown): string[] {
  const items = Array.isArray(value) ? value : typeof value === 'string' ? [value] : [];
  return items
    .filter((item): item is string => typeof item === 'string')
    .map((item) => item.trim())
    .filter(Boolean);
}
