import { Controller, Get, HttpCode, Logger, Post } from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiTags } from '@nestjs/swagger';
import { ErrorHandlerUtil } from '../common/utils/error-handler.util';
import { VocabularyCacheService, VocabularyStatus } from './vocabulary-cache.service';

@ApiTags('Vocabulary')
@Controller('api/vocabulary')
export class VocabularyController {
  private readonly logger = new Logger(VocabularyController.name);

  constructor(private readonly vocabulary: VocabularyCacheService) {}

  @Get()
  @ApiOperation({ summary: '어휘 캐시 상태 조회' })
  @ApiOkResponse({
    description: '카테고리별 항목 수와 마지막 갱신 시각',
    schema: {
      example: {
        fetchedAt: '2025-10-21T12:00:00.000Z',
        refreshedThisSession: true,
        counts: { genres: 19, platforms: 51, tags: 800 },
      },
    },
  })
  getStatus(): VocabularyStatus {
    return this.vocabulary.status();
  }

  @Post('refresh')
  @HttpCode(200)
  @ApiOperation({
    summary: '어휘 강제 갱신',
    description: 'RAWG에서 장르/플랫폼/태그 목록을 다시 받아 저장합니다.',
  })
  async refresh(): Promise<VocabularyStatus> {
    await ErrorHandlerUtil.executeRawgApiCall(
      () => this.vocabulary.refresh({ force: true }),
      this.logger,
      '어휘 갱신',
    );
    return this.vocabulary.status();
  }
}
