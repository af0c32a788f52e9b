import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { Response } from 'express';
import { Observable, map } from 'rxjs';
import { RequestWithId } from '../filters/error-body';

export interface ApiEnvelope<T> {
  statusCode: number;
  timestamp: string;
  path: string;
  requestId: string | null;
  message: string;
  code: string;
  data: T;
  error: null;
  meta: { elapsedMs: number };
}

/**
 * 컨트롤러 반환값을 공통 응답 봉투로 감싼다
 */
@Injectable()
export class ResponseTransformInterceptor<T>
  implements NestInterceptor<T, ApiEnvelope<T>>
{
  intercept(
    context: ExecutionContext,
    next: CallHandler<T>,
  ): Observable<ApiEnvelope<T>> {
    const ctx = context.switchToHttp();
    const req = ctx.getRequest<RequestWithId>();
    const res = ctx.getResponse<Response>();
    const t0 = Date.now();

    return next.handle().pipe(
      map((data) => ({
        statusCode: res.statusCode,
        timestamp: new Date().toISOString(),
        path: req.originalUrl || req.url,
        requestId: req.requestId ?? null,
        message: 'OK',
        code: 'OK',
        data,
        error: null,
        meta: { elapsedMs: Date.now() - t0 },
      })),
    );
  }
}
