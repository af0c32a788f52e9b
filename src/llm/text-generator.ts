export interface GenerateOptions {
  /** 이 호출에 한정한 타임아웃 */
  timeoutMs?: number;
}

export class TextGenerationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TextGenerationError';
  }
}

/**
 * 프롬프트 → 텍스트 생성기. 실패하거나 시간이 초과되면 예외를 던진다
 */
export abstract class TextGenerator {
  abstract generate(prompt: string, options?: GenerateOptions): Promise<string>;
}
