import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { APP_DEFAULTS, readNumberSetting } from '../config/app.config';
import { findBestMatch } from '../common/matching';
import { describeError, LoggerHelper } from '../common/utils/logger.helper';
import { TextGenerator } from '../llm/text-generator';
import { extractJsonObject } from '../llm/utils/json-extract.util';
import { VocabularyCacheService } from '../rawg/vocabulary-cache.service';
import { VocabularyCategory } from '../types/game.types';
import { buildCanonicalizePrompt } from './prompts/canonicalize-terms.prompt';
import { SynonymCacheService } from './synonym-cache.service';

export interface ResolutionResult {
  /** 입력 순서대로 확정된 표기 이름 */
  resolved: string[];
  /** 확정하지 못한 원래 용어 */
  unresolved: string[];
}

/**
 * 자유 입력 용어 → 어휘 표기 이름.
 * 정확히 일치 → 동의어 캐시 → 유사도 → 모델 순으로 시도하고,
 * 모델은 남은 용어를 모아 한 번만 호출한다.
 */
@Injectable()
export class TermResolverService {
  private readonly logger = new Logger(TermResolverService.name);
  private readonly fuzzyCutoff: number;
  private readonly timeoutMs: number;

  constructor(
    private readonly vocabulary: VocabularyCacheService,
    private readonly synonyms: SynonymCacheService,
    private readonly textGenerator: TextGenerator,
    config: ConfigService,
  ) {
    this.fuzzyCutoff = readNumberSetting(config, 'TERM_MATCH_CUTOFF', APP_DEFAULTS.termMatchCutoff, {
      min: 0,
      max: 1,
    });
    this.timeoutMs = readNumberSetting(config, 'LLM_TIMEOUT_MS', APP_DEFAULTS.llmTimeoutMs, { min: 1 });
  }

  async resolve(terms: readonly string[], category: VocabularyCategory): Promise<ResolutionResult> {
    const inputs = terms.map((term) => term.trim()).filter(Boolean);
    if (inputs.length === 0) return { resolved: [], unresolved: [] };

    const canonicalByKey = this.vocabulary.canonicalNames(category);
    const outcomes = inputs.map((term) => this.resolveLocally(term, category, canonicalByKey));

    const pending = [
      ...new Set(inputs.filter((_, index) => outcomes[index] === null).map((term) => term.toLowerCase())),
    ];
    if (pending.length) {
      const canonicalized = await this.canonicalize(pending, category, canonicalByKey);
      for (const [key, canonical] of canonicalized) {
        await this.synonyms.addMapping(category, key, canonical);
      }
      inputs.forEach((term, index) => {
        if (outcomes[index] === null) outcomes[index] = canonicalized.get(term.toLowerCase()) ?? null;
      });
    }

    const result: ResolutionResult = { resolved: [], unresolved: [] };
    inputs.forEach((term, index) => {
      const outcome = outcomes[index];
      if (outcome) result.resolved.push(outcome);
      else result.unresolved.push(term);
    });

    if (result.unresolved.length) {
      LoggerHelper.logWarning(this.logger, `${category} 용어 해석`, '확정하지 못한 용어가 있습니다.', {
        unresolved: result.unresolved,
      });
    }
    return result;
  }

  private resolveLocally(
    term: string,
    category: VocabularyCategory,
    canonicalByKey: ReadonlyMap<string, string>,
  ): string | null {
    const key = term.toLowerCase();

    const exact = canonicalByKey.get(key);
    if (exact) return exact;

    const cached = this.synonyms.resolve(category, key);
    if (cached) return cached;

    const match = findBestMatch(key, [...canonicalByKey.keys()], (name) => name, this.fuzzyCutoff);
    if (match) {
      this.logger.debug(`🎯 ${category} 유사 일치: '${term}' → '${match.item}' (${match.score.toFixed(2)})`);
      return canonicalByKey.get(match.item) ?? null;
    }
    return null;
  }

  /**
   * 모델 한 번 호출로 여러 용어를 대응. 허용 목록에 없는 답은 버린다
   */
  private async canonicalize(
    keys: readonly string[],
    category: VocabularyCategory,
    canonicalByKey: ReadonlyMap<string, string>,
  ): Promise<Map<string, string>> {
    const result = new Map<string, string>();
    if (canonicalByKey.size === 0) {
      LoggerHelper.logWarning(this.logger, `${category} 용어 해석`, '어휘가 비어 있어 모델 호출을 건너뜁니다.');
      return result;
    }

    let raw: string;
    try {
      raw = await this.textGenerator.generate(
        buildCanonicalizePrompt(category, keys, [...canonicalByKey.values()]),
        { timeoutMs: this.timeoutMs },
      );
    } catch (error) {
      LoggerHelper.logWarning(this.logger, `${category} 모델 호출`, describeError(error));
      return result;
    }

    const parsed = extractJsonObject(raw);
    if (!parsed) {
      LoggerHelper.logWarning(this.logger, `${category} 모델 응답`, 'JSON 객체가 아닙니다.');
      return result;
    }

    const answers = new Map<string, unknown>(
      Object.entries(parsed).map(([term, answer]) => [term.trim().toLowerCase(), answer]),
    );
    for (const key of keys) {
      const answer = answers.get(key);
      if (typeof answer !== 'string') continue;
      const canonical = canonicalByKey.get(answer.trim().toLowerCase());
      if (canonical) result.set(key, canonical);
      else this.logger.debug(`🚫 허용 목록에 없는 답변 무시: '${key}' → '${answer}'`);
    }
    return result;
  }
}
