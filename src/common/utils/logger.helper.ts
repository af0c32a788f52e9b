import { Logger } from '@nestjs/common';

function describeContext(context: unknown): string {
  if (context === undefined) return '';
  return typeof context === 'object' && context !== null
    ? JSON.stringify(context)
    : String(context);
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === 'object' && error !== null
    ? JSON.stringify(error)
    : String(error);
}

export class LoggerHelper {
  static logStart(logger: Logger, operation: string, context?: unknown): void {
    const contextStr = context !== undefined ? ` (${describeContext(context)})` : '';
    logger.log(`${operation} 시작${contextStr}`);
  }

  static logComplete(
    logger: Logger,
    operation: string,
    stats?: Record<string, unknown>,
  ): void {
    const statsStr = stats
      ? ` - ${Object.entries(stats)
          .map(([key, value]) => `${key}: ${String(value)}`)
          .join(', ')}`
      : '';
    logger.log(`${operation} 완료${statsStr}`);
  }

  static logError(
    logger: Logger,
    operation: string,
    error: unknown,
    context?: unknown,
  ): void {
    const contextStr =
      context !== undefined ? ` (컨텍스트: ${describeContext(context)})` : '';
    logger.error(`${operation} 실패: ${describeError(error)}${contextStr}`);
  }

  static logWarning(
    logger: Logger,
    operation: string,
    reason: string,
    context?: unknown,
  ): void {
    const contextStr = context !== undefined ? ` (${describeContext(context)})` : '';
    logger.warn(`${operation} 경고: ${reason}${contextStr}`);
  }
}
