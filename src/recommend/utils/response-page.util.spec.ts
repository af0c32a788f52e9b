import { buildGameRecord } from '../../../test/helpers/game-record.factory';
import { buildResponsePage, computeTotalPages } from './response-page.util';

describe('computeTotalPages', () => {
  it('limit 기준으로 올림한다', () => {
    expect(computeTotalPages(45, 10)).toBe(5);
    expect(computeTotalPages(40, 10)).toBe(4);
    expect(computeTotalPages(0, 10)).toBe(0);
  });

  it('limit이 0 이하면 1', () => {
    expect(computeTotalPages(45, 0)).toBe(1);
  });
});

describe('buildResponsePage', () => {
  it('결과와 각 레코드를 동결한다', () => {
    const page = buildResponsePage([buildGameRecord({ genres: ['RPG'] })], 1, 10, 1);

    expect(page.totalPages).toBe(1);
    expect(Object.isFrozen(page)).toBe(true);
    expect(Object.isFrozen(page.results)).toBe(true);
    expect(Object.isFrozen(page.results[0])).toBe(true);
    expect(Object.isFrozen(page.results[0].genres)).toBe(true);
  });
});
