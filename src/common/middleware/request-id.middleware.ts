import { Injectable, NestMiddleware } from '@nestjs/common';
import { NextFunction, Response } from 'express';
import { randomUUID } from 'crypto';
import { RequestWithId } from '../filters/error-body';

export const REQ_ID_HEADER = 'x-request-id';

@Injectable()
export class RequestIdMiddleware implements NestMiddleware {
  use(req: RequestWithId, res: Response, next: NextFunction): void {
    const existing = req.headers[REQ_ID_HEADER];
    const headerValue = Array.isArray(existing) ? existing[0] : existing;
    const id = headerValue?.trim() || randomUUID();
    req.requestId = id;
    res.setHeader(REQ_ID_HEADER, id);
    next();
  }
}
