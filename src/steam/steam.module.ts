import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { StorefrontProvider } from '../providers/game-provider';
import { STEAM_REQUEST } from './config/steam.config';
import { SteamStoreService } from './services/steam-store.service';
import { SteamStorefrontProvider } from './steam-storefront.provider';
import { SteamController } from './steam.controller';

/**
 * Steam 스토어 연동 모듈 (StorefrontProvider 구현)
 */
@Module({
  imports: [HttpModule.register({ timeout: STEAM_REQUEST.timeoutMs })],
  controllers: [SteamController],
  providers: [
    SteamStoreService,
    SteamStorefrontProvider,
    { provide: StorefrontProvider, useExisting: SteamStorefrontProvider },
  ],
  exports: [StorefrontProvider],
})
export class SteamModule {}
