import 'reflect-metadata';
import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication, ValidationPipe } from '@nestjs/common';
import request from 'supertest';

import { AllExceptionsFilter } from '../src/common/filters/all-exceptions.filter';
import { HttpExceptionFilter } from '../src/common/filters/http-exception.filter';
import { ResponseTransformInterceptor } from '../src/common/interceptors/response.interceptor';
import { RequestIdMiddleware } from '../src/common/middleware/request-id.middleware';
import { StorefrontProvider } from '../src/providers/game-provider';
import { SteamController } from '../src/steam/steam.controller';
import { buildGameRecord } from './helpers/game-record.factory';

describe('SteamController (e2e)', () => {
  let app: INestApplication;

  const storefrontMock = {
    search: jest.fn(),
    getDetails: jest.fn(async (id: string) =>
      id === '504230' ? buildGameRecord({ id, name: 'Celeste', price: 19.99 }) : null,
    ),
  };

  beforeAll(async () => {
    const moduleFixture: TestingModule = await Test.createTestingModule({
      controllers: [SteamController],
      providers: [{ provide: StorefrontProvider, useValue: storefrontMock }],
    }).compile();

    app = moduleFixture.createNestApplication({ logger: false });
    const requestId = new RequestIdMiddleware();
    app.use(requestId.use.bind(requestId));
    app.useGlobalPipes(new ValidationPipe({ transform: true, whitelist: true }));
    app.useGlobalInterceptors(new ResponseTransformInterceptor());
    app.useGlobalFilters(new HttpExceptionFilter(), new AllExceptionsFilter());
    await app.init();
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    storefrontMock.getDetails.mockClear();
  });

  it('GET /api/steam/apps/:appId 통화를 넘겨 상세를 반환한다', async () => {
    const response = await request(app.getHttpServer())
      .get('/api/steam/apps/504230')
      .query({ currency: 'EUR' })
      .expect(200);

    expect(storefrontMock.getDetails).toHaveBeenCalledWith('504230', { currency: 'EUR' });
    expect(response.body.data).toMatchObject({ id: '504230', name: 'Celeste', price: 19.99 });
  });

  it('GET /api/steam/apps/:appId 없는 게임은 404 DATA_NOT_FOUND', async () => {
    const response = await request(app.getHttpServer())
      .get('/api/steam/apps/999999')
      .set('x-request-id', 'req-404')
      .expect(404);

    expect(storefrontMock.getDetails).toHaveBeenCalledWith('999999', { currency: undefined });
    expect(response.body).toMatchObject({
      statusCode: 404,
      path: '/api/steam/apps/999999',
      requestId: 'req-404',
      code: 'DATA_NOT_FOUND',
      message: 'Steam 게임을 찾을 수 없습니다: 999999',
      data: null,
    });
  });

  it('GET /api/steam/apps/:appId 지원하지 않는 통화는 400', async () => {
    const response = await request(app.getHttpServer())
      .get('/api/steam/apps/504230')
      .query({ currency: 'KRW' })
      .expect(400);

    expect(response.body.code).toBe('VALIDATION_ERROR');
    expect(storefrontMock.getDetails).not.toHaveBeenCalled();
  });
});
