import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { CatalogProvider } from '../providers/game-provider';
import { RAWG_SEARCH } from './config/rawg.config';
import { RawgApiService } from './rawg-api.service';
import { RawgCatalogProvider } from './rawg-catalog.provider';
import { VocabularyCacheService } from './vocabulary-cache.service';
import { VocabularyController } from './vocabulary.controller';

/**
 * RAWG 연동 모듈
 *
 * 제공 기능:
 * - RAWG API 호출
 * - 장르/플랫폼/태그 어휘 캐시 (주간 갱신)
 * - CatalogProvider 구현
 */
@Module({
  imports: [HttpModule.register({ timeout: RAWG_SEARCH.requestTimeoutMs })],
  controllers: [VocabularyController],
  providers: [
    RawgApiService,
    VocabularyCacheService,
    RawgCatalogProvider,
    { provide: CatalogProvider, useExisting: RawgCatalogProvider },
  ],
  exports: [VocabularyCacheService, CatalogProvider],
})
export class RawgModule {}
