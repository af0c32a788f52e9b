import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as path from 'path';
import { APP_DEFAULTS, readStringSetting } from '../../config/app.config';
import { JsonFileStore } from './json-file.store';
import { KeyValueStore } from './key-value.store';

/**
 * 캐시 영속화 모듈 (CACHE_DIR 하위 JSON 파일)
 */
@Global()
@Module({
  providers: [
    {
      provide: KeyValueStore,
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        new JsonFileStore(
          path.resolve(
            process.cwd(),
            readStringSetting(config, 'CACHE_DIR', APP_DEFAULTS.cacheDir),
          ),
        ),
    },
  ],
  exports: [KeyValueStore],
})
export class StorageModule {}
