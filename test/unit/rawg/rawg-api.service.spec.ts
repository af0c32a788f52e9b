import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { RawgApiService, RawgRequestError } from '../../../src/rawg/rawg-api.service';
import { httpFail, httpOk } from '../../helpers/http';

describe('RawgApiService', () => {
  const createService = () => {
    const httpService = { get: jest.fn() };
    const config = new ConfigService({
      RAWG_API_KEY: 'test-key',
      RAWG_RETRY_MAX: 2,
      RAWG_RETRY_BASE_DELAY_MS: 0,
    });
    const service = new RawgApiService(httpService as unknown as HttpService, config);
    return { service, httpService };
  };

  it('검색 파라미터와 API 키를 함께 보낸다', async () => {
    const { service, httpService } = createService();
    httpService.get.mockReturnValue(httpOk({ count: 1, results: [{ id: 1, slug: 'hades', name: 'Hades' }] }));

    const res = await service.searchGames({ page: 1, page_size: 20, search: 'hades', genres: '' });

    expect(res?.count).toBe(1);
    expect(res?.results[0].name).toBe('Hades');
    expect(httpService.get).toHaveBeenCalledWith('https://api.rawg.io/api/games', {
      params: { page: 1, page_size: 20, search: 'hades', key: 'test-key' },
      timeout: 15000,
    });
  });

  it('5xx는 재시도 후 성공하면 결과를 돌려준다', async () => {
    const { service, httpService } = createService();
    httpService.get
      .mockReturnValueOnce(httpFail(503))
      .mockReturnValueOnce(httpOk({ count: 0, results: [] }));

    await expect(service.searchGames({ page: 1, page_size: 20 })).resolves.toEqual({
      count: 0,
      results: [],
    });
    expect(httpService.get).toHaveBeenCalledTimes(2);
  });

  it('재시도를 모두 소진하면 RawgRequestError', async () => {
    const { service, httpService } = createService();
    httpService.get.mockReturnValue(httpFail(500));

    await expect(service.listVocabulary('genres', 1)).rejects.toBeInstanceOf(RawgRequestError);
    expect(httpService.get).toHaveBeenCalledTimes(2);
  });

  it('상세 404는 재시도 없이 null', async () => {
    const { service, httpService } = createService();
    httpService.get.mockReturnValue(httpFail(404));

    await expect(service.getGameDetails(999)).resolves.toBeNull();
    expect(httpService.get).toHaveBeenCalledTimes(1);
  });

  it('2페이지 이후 404는 마지막 페이지 뒤로 보고 null', async () => {
    const { service, httpService } = createService();
    httpService.get.mockReturnValue(httpFail(404));

    await expect(service.searchGames({ page: 3, page_size: 20 })).resolves.toBeNull();
    expect(httpService.get).toHaveBeenCalledTimes(1);
  });

  it('1페이지 404는 그대로 RawgRequestError', async () => {
    const { service, httpService } = createService();
    httpService.get.mockReturnValue(httpFail(404));

    await expect(service.searchGames({ page: 1, page_size: 20 })).rejects.toBeInstanceOf(
      RawgRequestError,
    );
  });
});
