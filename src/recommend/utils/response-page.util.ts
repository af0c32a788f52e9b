import { freezeGameRecord, GameRecord, ResponsePage } from '../../types/game.types';

export function computeTotalPages(total: number, limit: number): number {
  if (limit <= 0) return 1;
  return Math.ceil(total / limit);
}

export function buildResponsePage(
  records: readonly GameRecord[],
  total: number,
  limit: number,
  page: number,
): ResponsePage {
  return Object.freeze({
    results: Object.freeze(records.map(freezeGameRecord)),
    total,
    limit,
    page,
    totalPages: computeTotalPages(total, limit),
  });
}
