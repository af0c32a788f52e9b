import { Module } from '@nestjs/common';
import { RawgModule } from '../rawg/rawg.module';
import { ResolutionModule } from '../resolution/resolution.module';
import { SteamModule } from '../steam/steam.module';
import { GameAggregatorService } from './game-aggregator.service';
import { RecommendController } from './recommend.controller';

/**
 * 게임 추천 모듈 (카탈로그 + 스토어 집계)
 */
@Module({
  imports: [RawgModule, SteamModule, ResolutionModule],
  controllers: [RecommendController],
  providers: [GameAggregatorService],
  exports: [GameAggregatorService],
})
export class RecommendModule {}
