import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { APP_DEFAULTS, readNumberSetting } from '../config/app.config';
import { EPOCH_DATE, todayIsoDate } from '../common/utils/date.util';
import { describeError, LoggerHelper } from '../common/utils/logger.helper';
import { TextGenerator } from '../llm/text-generator';
import { extractJsonObject, toStringList } from '../llm/utils/json-extract.util';
import { StructuredFilter } from '../models/structured-filter.model';
import { Currency } from '../types/game.types';
import { buildExtractTermsPrompt } from './prompts/extract-terms.prompt';
import { TermResolverService } from './term-resolver.service';
import { extractConstraints } from './utils/constraint-extractor.util';
import { filterConstraintTerms } from './utils/tag-filter.util';

export interface LeftoverMetadata {
  genres: string[];
  platforms: string[];
  tags: string[];
}

export interface InterpretedQuery {
  filter: StructuredFilter;
  leftovers: LeftoverMetadata;
}

interface ExtractedTerms {
  query: string;
  genres: string[];
  platforms: string[];
  tags: string[];
}

/**
 * 자연어 질의 → StructuredFilter.
 * 가격/연도는 정규식으로, 장르/플랫폼/태그는 모델로 뽑고 어휘로 확정한다.
 */
@Injectable()
export class QueryInterpreterService {
  private readonly logger = new Logger(QueryInterpreterService.name);
  private readonly timeoutMs: number;

  constructor(
    private readonly textGenerator: TextGenerator,
    private readonly termResolver: TermResolverService,
    config: ConfigService,
  ) {
    this.timeoutMs = readNumberSetting(config, 'LLM_TIMEOUT_MS', APP_DEFAULTS.llmTimeoutMs, { min: 1 });
  }

  async parse(text: string, currency?: Currency): Promise<InterpretedQuery> {
    LoggerHelper.logStart(this.logger, '자연어 질의 해석', text);

    const constraints = extractConstraints(text);
    const extracted = await this.extractTerms(text);

    const genres = await this.termResolver.resolve(extracted.genres, 'genres');
    const platforms = await this.termResolver.resolve(extracted.platforms, 'platforms');

    const filter = StructuredFilter.create({
      query: extracted.query,
      currency,
      genres: genres.resolved,
      platforms: platforms.resolved,
      tags: filterConstraintTerms(extracted.tags),
      minPrice: constraints.minPrice ?? null,
      maxPrice: constraints.maxPrice ?? null,
      releaseDateFrom: constraints.releaseDateFrom ?? EPOCH_DATE,
      releaseDateTo: constraints.releaseDateTo ?? todayIsoDate(),
    });

    const leftovers: LeftoverMetadata = {
      genres: genres.unresolved,
      platforms: platforms.unresolved,
      tags: [],
    };
    LoggerHelper.logComplete(this.logger, '자연어 질의 해석', {
      genres: filter.genres.length,
      platforms: filter.platforms.length,
      tags: filter.tags.length,
      leftovers: leftovers.genres.length + leftovers.platforms.length,
    });
    return { filter, leftovers };
  }

  /**
   * 모델 호출이 실패하면 원문 전체를 검색어로 사용한다
   */
  private async extractTerms(text: string): Promise<ExtractedTerms> {
    const fallback: ExtractedTerms = { query: text.trim(), genres: [], platforms: [], tags: [] };

    let raw: string;
    try {
      raw = await this.textGenerator.generate(buildExtractTermsPrompt(text), {
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      LoggerHelper.logWarning(this.logger, '용어 추출', `모델 호출 실패, 원문 검색으로 대체: ${describeError(error)}`);
      return fallback;
    }

    const parsed = extractJsonObject(raw);
    if (!parsed) {
      LoggerHelper.logWarning(this.logger, '용어 추출', '모델 응답을 해석하지 못해 원문 검색으로 대체합니다.');
      return fallback;
    }

    const query = parsed.query;
    return {
      query: typeof query === 'string' ? query.trim() : fallback.query,
      genres: toStringList(parsed.genres),
      platforms: toStringList(parsed.platforms),
      tags: toStringList(parsed.tags),
    };
  }
}
