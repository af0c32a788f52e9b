import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';
import {
  buildHttpErrorBody,
  buildUnknownErrorBody,
  RequestWithId,
} from './error-body';

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const req = ctx.getRequest<RequestWithId>();
    const res = ctx.getResponse<Response>();

    // 필터 등록 순서와 무관하게 HttpException은 원래 상태 코드를 유지
    if (exception instanceof HttpException) {
      const body = buildHttpErrorBody(exception, req);
      res.status(body.statusCode).json(body);
      return;
    }

    const body = buildUnknownErrorBody(exception, req);
    this.logger.error(
      `💥 처리되지 않은 예외 [#${body.requestId ?? '-'}] ${body.path}: ${body.message}`,
    );
    res.status(body.statusCode).json(body);
  }
}
