import { Controller, Get } from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiTags } from '@nestjs/swagger';
import { SynonymCacheService, SynonymTable } from './synonym-cache.service';

@ApiTags('Vocabulary')
@Controller('api/vocabulary')
export class SynonymController {
  constructor(private readonly synonyms: SynonymCacheService) {}

  @Get('synonyms')
  @ApiOperation({
    summary: '학습된 동의어 매핑 조회',
    description: '모델이 확정해 저장한 "입력 용어 → 표기 이름" 매핑을 카테고리별로 반환합니다.',
  })
  @ApiOkResponse({
    schema: { example: { genres: { 'role playing': 'RPG' }, platforms: {}, tags: {} } },
  })
  getSynonyms(): SynonymTable {
    return this.synonyms.snapshot();
  }
}
