export class CorruptStoreError extends Error {
  constructor(
    readonly key: string,
    cause: unknown,
  ) {
    super(
      `저장된 데이터를 해석할 수 없습니다: ${key} (${cause instanceof Error ? cause.message : String(cause)})`,
    );
    this.name = 'CorruptStoreError';
  }
}

/**
 * 캐시가 사용하는 키-값 영속 저장소.
 * load는 키가 없으면 null, 내용이 손상되었으면 CorruptStoreError를 던진다.
 */
export abstract class KeyValueStore {
  abstract load(key: string): Promise<unknown>;
  abstract save(key: string, value: unknown): Promise<void>;
}
