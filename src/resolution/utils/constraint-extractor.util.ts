import { endOfYear, startOfYear } from '../../common/utils/date.util';

export interface ExtractedConstraints {
  minPrice?: number;
  maxPrice?: number;
  releaseDateFrom?: string;
  releaseDateTo?: string;
}

const AMOUNT = String.raw`(\$)?\s*(\d+(?:\.\d{1,2})?)`;

const MAX_PRICE_PATTERN = new RegExp(String.raw`\b(?:under|below|less than)\s*${AMOUNT}`, 'gi');
const MIN_PRICE_PATTERN = new RegExp(String.raw`\b(?:over|above|more than)\s*${AMOUNT}`, 'gi');
const PRICE_RANGE_PATTERN = new RegExp(
  String.raw`\bbetween\s*${AMOUNT}\s*(?:and|to|-)\s*${AMOUNT}`,
  'gi',
);
const AFTER_YEAR_PATTERN = /\b(?:after|since)\s+(\d{4})\b/gi;
const BEFORE_YEAR_PATTERN = /\b(?:before|earlier than)\s+(\d{4})\b/gi;
const YEAR_RANGE_PATTERN = /\bbetween\s+(\d{4})\s*(?:and|to|-)\s*(\d{4})\b/gi;

const YEAR_MIN = 1970;
const YEAR_MAX = 2099;

interface Bound {
  index: number;
  apply: (target: ExtractedConstraints) => void;
}

// "$" 없는 네 자리 연도형 숫자는 가격으로 보지 않는다
function looksLikeYear(dollar: string | undefined, amount: string): boolean {
  if (dollar) return false;
  if (!/^\d{4}$/.test(amount)) return false;
  const year = Number(amount);
  return year >= YEAR_MIN && year <= YEAR_MAX;
}

function collectBounds(
  text: string,
  pattern: RegExp,
  toBound: (match: RegExpMatchArray) => Bound['apply'] | null,
): Bound[] {
  const bounds: Bound[] = [];
  for (const match of text.matchAll(pattern)) {
    const apply = toBound(match);
    if (apply) bounds.push({ index: match.index ?? 0, apply });
  }
  return bounds;
}

function applyInOrder(target: ExtractedConstraints, bounds: Bound[]): void {
  bounds.sort((a, b) => a.index - b.index).forEach((bound) => bound.apply(target));
}

/**
 * 문장에서 가격/출시 연도 조건을 뽑는다.
 * 단일 조건은 뒤에 나온 것이 이기고, between 구간은 단일 조건보다 우선한다.
 */
export function extractConstraints(text: string): ExtractedConstraints {
  const result: ExtractedConstraints = {};

  applyInOrder(result, [
    ...collectBounds(text, MAX_PRICE_PATTERN, ([, dollar, amount]) =>
      looksLikeYear(dollar, amount) ? null : (t) => (t.maxPrice = Number(amount)),
    ),
    ...collectBounds(text, MIN_PRICE_PATTERN, ([, dollar, amount]) =>
      looksLikeYear(dollar, amount) ? null : (t) => (t.minPrice = Number(amount)),
    ),
    ...collectBounds(text, AFTER_YEAR_PATTERN, ([, year]) => (t) =>
      (t.releaseDateFrom = startOfYear(Number(year))),
    ),
    ...collectBounds(text, BEFORE_YEAR_PATTERN, ([, year]) => (t) =>
      (t.releaseDateTo = endOfYear(Number(year) - 1)),
    ),
  ]);

  applyInOrder(result, [
    ...collectBounds(text, PRICE_RANGE_PATTERN, ([, dollarA, amountA, dollarB, amountB]) => {
      if (looksLikeYear(dollarA, amountA) && looksLikeYear(dollarB, amountB)) return null;
      const [low, high] = [Number(amountA), Number(amountB)].sort((a, b) => a - b);
      return (t) => {
        t.minPrice = low;
        t.maxPrice = high;
      };
    }),
    ...collectBounds(text, YEAR_RANGE_PATTERN, ([, yearA, yearB]) => {
      const [from, to] = [Number(yearA), Number(yearB)].sort((a, b) => a - b);
      return (t) => {
        t.releaseDateFrom = startOfYear(from);
        t.releaseDateTo = endOfYear(to);
      };
    }),
  ]);

  return result;
}
