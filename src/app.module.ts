import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { StorageModule } from './common/storage/storage.module';
import { LlmModule } from './llm/llm.module';
import { RawgModule } from './rawg/rawg.module';
import { RecommendModule } from './recommend/recommend.module';
import { ResolutionModule } from './resolution/resolution.module';
import { SteamModule } from './steam/steam.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    ScheduleModule.forRoot(), // ✅ 어휘 주간 갱신 Cron
    StorageModule, // ✅ 어휘/동의어 JSON 캐시
    RawgModule, // ✅ 카탈로그 + 어휘
    SteamModule, // ✅ 스토어 보강
    LlmModule,
    ResolutionModule, // ✅ 용어 해석 + 자연어 질의
    RecommendModule, // ✅ 추천 API
  ],
})
export class AppModule {}
