const CONSTRAINT_KEYWORDS =
  /\b(?:under|below|less than|over|above|more than|between|after|since|before|earlier than|price[sd]?|cheap(?:er|est)?|costs?|dollars?|usd|eur|aud|budget|years?)\b/i;

// "$20", "2015", "20" 같은 값 자체
const CONSTRAINT_VALUES = /\$\s*\d|\b\d{4}\b|^\s*\d+(?:\.\d+)?\s*$/;

/**
 * 모델이 태그로 돌려준 가격/연도 표현을 걸러낸다
 */
export function filterConstraintTerms(terms: readonly string[]): string[] {
  return terms
    .map((term) => term.trim())
    .filter(
      (term) =>
        term.length > 0 && !CONSTRAINT_KEYWORDS.test(term) && !CONSTRAINT_VALUES.test(term),
    );
}
