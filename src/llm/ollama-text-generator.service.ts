import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { firstValueFrom } from 'rxjs';
import { APP_DEFAULTS, readNumberSetting, readStringSetting } from '../config/app.config';
import { GenerateOptions, TextGenerationError, TextGenerator } from './text-generator';

interface OllamaGenerateResponse {
  model?: string;
  response?: unknown;
  done?: boolean;
}

/**
 * 로컬 Ollama 서버(/api/generate)를 사용하는 생성기
 */
@Injectable()
export class OllamaTextGenerator extends TextGenerator {
  private readonly logger = new Logger(OllamaTextGenerator.name);
  private readonly host: string;
  private readonly model: string;
  private readonly defaultTimeoutMs: number;

  constructor(
    private readonly httpService: HttpService,
    config: ConfigService,
  ) {
    super();
    this.host = readStringSetting(config, 'OLLAMA_HOST', APP_DEFAULTS.ollamaHost).replace(/\/+$/, '');
    this.model = readStringSetting(config, 'OLLAMA_MODEL', APP_DEFAULTS.ollamaModel);
    this.defaultTimeoutMs = readNumberSetting(config, 'LLM_TIMEOUT_MS', APP_DEFAULTS.llmTimeoutMs, {
      min: 1,
    });
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const startedAt = Date.now();

    const response = await firstValueFrom(
      this.httpService.post<OllamaGenerateResponse>(
        `${this.host}/api/generate`,
        { model: this.model, prompt, stream: false },
        { timeout: timeoutMs },
      ),
    );

    const text = response.data?.response;
    if (typeof text !== 'string') {
      throw new TextGenerationError('Ollama 응답에 response 필드가 없습니다.');
    }
    this.logger.debug(`🧠 ${this.model} 응답 ${text.length}자 (${Date.now() - startedAt}ms)`);
    return text.trim();
  }
}
