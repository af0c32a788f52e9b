import { emptyGameRecord, GameRecord } from '../../src/types/game.types';

export function buildGameRecord(overrides: Partial<GameRecord> = {}): GameRecord {
  return {
    ...emptyGameRecord(overrides.id ?? '1', overrides.name ?? 'Sample Game'),
    ...overrides,
  };
}
