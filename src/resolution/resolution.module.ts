import { Module } from '@nestjs/common';
import { LlmModule } from '../llm/llm.module';
import { RawgModule } from '../rawg/rawg.module';
import { QueryInterpreterService } from './query-interpreter.service';
import { SynonymCacheService } from './synonym-cache.service';
import { SynonymController } from './synonym.controller';
import { TermResolverService } from './term-resolver.service';

/**
 * 용어 해석 모듈
 *
 * 제공 기능:
 * - 동의어 캐시 (디스크 영속)
 * - 용어 → 어휘 표기 이름 확정
 * - 자연어 질의 → StructuredFilter
 */
@Module({
  imports: [RawgModule, LlmModule],
  controllers: [SynonymController],
  providers: [SynonymCacheService, TermResolverService, QueryInterpreterService],
  exports: [TermResolverService, QueryInterpreterService],
})
export class ResolutionModule {}
