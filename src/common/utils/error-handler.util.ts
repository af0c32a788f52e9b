/**
 * 외부 호출 에러를 HTTP 예외로 표준화하는 유틸리티
 */

import { HttpException, HttpStatus, Logger } from '@nestjs/common';
import { ErrorCodes } from '../filters/error-codes';
import { describeError, LoggerHelper } from './logger.helper';

export interface ErrorHandlerOptions {
  context?: string;
  identifier?: string;
  httpStatus?: HttpStatus;
  errorCode?: ErrorCodes;
}

export class ErrorHandlerUtil {
  /**
   * 비동기 작업 실행. 실패 시 로그를 남기고 HttpException으로 변환해 던진다
   */
  static async executeWithErrorHandling<T>(
    operation: () => Promise<T>,
    logger: Logger,
    options: ErrorHandlerOptions = {},
  ): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      const context = options.context ?? 'Unknown Operation';
      LoggerHelper.logError(logger, context, error, options.identifier);
      throw this.processError(error, { ...options, context });
    }
  }

  static async executeRawgApiCall<T>(
    rawgCall: () => Promise<T>,
    logger: Logger,
    operation: string,
    identifier?: string | number,
  ): Promise<T> {
    return this.executeWithErrorHandling(rawgCall, logger, {
      context: `RAWG ${operation}`,
      identifier: identifier?.toString(),
      errorCode: ErrorCodes.RAWG_API_ERROR,
      httpStatus: HttpStatus.SERVICE_UNAVAILABLE,
    });
  }

  static async executeSteamApiCall<T>(
    steamCall: () => Promise<T>,
    logger: Logger,
    operation: string,
    identifier?: string | number,
  ): Promise<T> {
    return this.executeWithErrorHandling(steamCall, logger, {
      context: `Steam ${operation}`,
      identifier: identifier?.toString(),
      errorCode: ErrorCodes.STEAM_API_ERROR,
      httpStatus: HttpStatus.SERVICE_UNAVAILABLE,
    });
  }

  private static processError(
    error: unknown,
    options: ErrorHandlerOptions,
  ): HttpException {
    // 이미 HTTP 예외라면 그대로 유지
    if (error instanceof HttpException) return error;

    const baseMessage = describeError(error) || `${options.context} 실패`;
    const message = options.identifier
      ? `${baseMessage} (${options.identifier})`
      : baseMessage;

    return new HttpException(
      {
        code: options.errorCode ?? ErrorCodes.INTERNAL_SERVER_ERROR,
        message: `${options.context}: ${message}`,
      },
      options.httpStatus ?? HttpStatus.INTERNAL_SERVER_ERROR,
    );
  }
}
