import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { OllamaTextGenerator } from './ollama-text-generator.service';
import { TextGenerator } from './text-generator';

@Module({
  imports: [HttpModule],
  providers: [{ provide: TextGenerator, useClass: OllamaTextGenerator }],
  exports: [TextGenerator],
})
export class LlmModule {}
