import { Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import * as path from 'path';
import { CorruptStoreError, KeyValueStore } from './key-value.store';

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && Reflect.get(error, 'code') === 'ENOENT';
}

/**
 * 키마다 <dir>/<key>.json 파일 하나. 임시 파일에 쓴 뒤 rename으로 교체한다
 */
export class JsonFileStore extends KeyValueStore {
  private readonly logger = new Logger(JsonFileStore.name);

  constructor(private readonly baseDir: string) {
    super();
  }

  async load(key: string): Promise<unknown> {
    let raw: string;
    try {
      raw = await fs.readFile(this.resolvePath(key), 'utf8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch (error) {
      throw new CorruptStoreError(key, error);
    }
  }

  async save(key: string, value: unknown): Promise<void> {
    const target = this.resolvePath(key);
    const temp = `${target}.${randomUUID()}.tmp`;

    await fs.mkdir(this.baseDir, { recursive: true });
    await fs.writeFile(temp, JSON.stringify(value, null, 2), 'utf8');
    try {
      await fs.rename(temp, target);
    } catch (error) {
      await fs.rm(temp, { force: true });
      throw error;
    }
    this.logger.debug(`💾 ${key} 저장 완료 → ${target}`);
  }

  private resolvePath(key: string): string {
    if (!/^[a-z0-9][a-z0-9._-]*$/i.test(key)) {
      throw new Error(`허용되지 않는 저장소 키: ${key}`);
    }
    return path.join(this.baseDir, `${key}.json`);
  }
}
