interface CommonBlock {
  aStart: number;
  bStart: number;
  size: number;
}

export interface BestMatch<T> {
  item: T;
  index: number;
  score: number;
}

/**
 * 구간 [aLo, aHi) × [bLo, bHi)에서 가장 긴 공통 부분 문자열.
 * 길이가 같으면 a에서 먼저 시작하는 블록, 그다음 b에서 먼저 시작하는 블록을 고른다.
 */
function findLongestBlock(
  a: string,
  aLo: number,
  aHi: number,
  b: string,
  bLo: number,
  bHi: number,
): CommonBlock {
  let best: CommonBlock = { aStart: aLo, bStart: bLo, size: 0 };
  let previous = new Array<number>(bHi - bLo + 1).fill(0);

  for (let i = aLo; i < aHi; i++) {
    const current = new Array<number>(bHi - bLo + 1).fill(0);
    for (let j = bLo; j < bHi; j++) {
      if (a[i] !== b[j]) continue;
      const length = previous[j - bLo] + 1;
      current[j - bLo + 1] = length;
      if (length > best.size) {
        best = { aStart: i - length + 1, bStart: j - length + 1, size: length };
      }
    }
    previous = current;
  }
  return best;
}

function countMatches(
  a: string,
  aLo: number,
  aHi: number,
  b: string,
  bLo: number,
  bHi: number,
): number {
  if (aLo >= aHi || bLo >= bHi) return 0;
  const block = findLongestBlock(a, aLo, aHi, b, bLo, bHi);
  if (block.size === 0) return 0;
  return (
    block.size +
    countMatches(a, aLo, block.aStart, b, bLo, block.bStart) +
    countMatches(a, block.aStart + block.size, aHi, b, block.bStart + block.size, bHi)
  );
}

/**
 * Ratcliff/Obershelp 유사도 (2 × 일치 문자 수 / 전체 길이), 0~1
 */
export function sequenceRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * countMatches(a, 0, a.length, b, 0, b.length)) / total;
}

/**
 * cutoff 이상인 후보 중 점수가 가장 높은 것. 동점이면 앞선 후보
 */
export function findBestMatch<T>(
  target: string,
  candidates: readonly T[],
  toText: (candidate: T) => string,
  cutoff: number,
): BestMatch<T> | null {
  let best: BestMatch<T> | null = null;
  for (let index = 0; index < candidates.length; index++) {
    const item = candidates[index];
    const score = sequenceRatio(target, toText(item));
    if (score >= cutoff && (best === null || score > best.score)) {
      best = { item, index, score };
    }
  }
  return best;
}
