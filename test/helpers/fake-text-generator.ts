import { GenerateOptions, TextGenerator } from '../../src/llm/text-generator';

type Responder = (prompt: string) => string | Error;

/**
 * 프롬프트마다 정해진 응답(또는 오류)을 돌려주는 생성기
 */
export class FakeTextGenerator extends TextGenerator {
  readonly prompts: string[] = [];
  readonly options: Array<GenerateOptions | undefined> = [];

  constructor(private readonly responder: Responder) {
    super();
  }

  async generate(prompt: string, options?: GenerateOptions): Promise<string> {
    this.prompts.push(prompt);
    this.options.push(options);
    const reply = this.responder(prompt);
    if (reply instanceof Error) throw reply;
    return reply;
  }
}
