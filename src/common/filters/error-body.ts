import { HttpException, HttpStatus } from '@nestjs/common';
import { Request } from 'express';
import { errorCodeFromStatus } from './error-codes';

export interface RequestWithId extends Request {
  requestId?: string;
}

export interface ErrorResponseBody {
  statusCode: number;
  timestamp: string;
  path: string;
  requestId: string | null;
  message: string | string[];
  code: string;
  data: null;
  error: { details: unknown } | null;
  meta: { elapsedMs: number };
}

const isProduction = (): boolean => process.env.NODE_ENV === 'production';

function readField(payload: unknown, field: string): unknown {
  if (typeof payload !== 'object' || payload === null) return undefined;
  return Object.prototype.hasOwnProperty.call(payload, field)
    ? Reflect.get(payload, field)
    : undefined;
}

/**
 * HttpException을 공통 에러 응답 형태로 변환
 */
export function buildHttpErrorBody(
  exception: HttpException,
  request: RequestWithId,
): ErrorResponseBody {
  const status = exception.getStatus();
  const payload = exception.getResponse();

  const payloadMessage = readField(payload, 'message');
  let message: string | string[] = exception.message;
  if (typeof payload === 'string') message = payload;
  else if (typeof payloadMessage === 'string') message = payloadMessage;
  else if (Array.isArray(payloadMessage)) {
    // ValidationPipe는 메시지를 배열로 전달
    message = payloadMessage.map((item: unknown) => String(item));
  }

  const payloadCode = readField(payload, 'code');
  return {
    statusCode: status,
    timestamp: new Date().toISOString(),
    path: request.originalUrl || request.url,
    requestId: request.requestId ?? null,
    message,
    code: typeof payloadCode === 'string' ? payloadCode : errorCodeFromStatus(status),
    data: null,
    error: isProduction() ? null : { details: payload },
    meta: { elapsedMs: 0 },
  };
}

/**
 * 처리되지 않은 예외를 500 응답 형태로 변환
 */
export function buildUnknownErrorBody(
  exception: unknown,
  request: RequestWithId,
): ErrorResponseBody {
  const error = exception instanceof Error ? exception : null;
  return {
    statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
    timestamp: new Date().toISOString(),
    path: request.originalUrl || request.url,
    requestId: request.requestId ?? null,
    message: isProduction()
      ? '서버 내부 오류가 발생했습니다.'
      : (error?.message ?? String(exception)),
    code: errorCodeFromStatus(HttpStatus.INTERNAL_SERVER_ERROR),
    data: null,
    error: isProduction()
      ? null
      : { details: { name: error?.name, stack: error?.stack } },
    meta: { elapsedMs: 0 },
  };
}
