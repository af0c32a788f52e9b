// 스토어마다 붙는 에디션 표기. 긴 표현을 먼저 제거한다
const 에디션표기 = [
  'game of the year edition',
  'goty edition',
  'definitive edition',
  'complete edition',
  'deluxe edition',
  'ultimate edition',
  'enhanced edition',
  'special edition',
  'anniversary edition',
  'gold edition',
  "director's cut",
  'directors cut',
  'remastered',
  'remaster',
  'goty',
];

const 에디션정규식 = 에디션표기.map(
  (phrase) =>
    new RegExp(`(^|\\s)${phrase.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')}(?=\\s|$)`, 'g'),
);

const 상표기호 = /[™®©]/g;
const 비문자숫자 = /[^\p{L}\p{N}]+/gu;

export function stripDiacritics(value: string): string {
  return value.normalize('NFKD').replace(/\p{Diacritic}/gu, '');
}

/**
 * 스토어 간 제목 비교용 정규화.
 * 부제(콜론, 괄호, " - " 뒤)와 에디션 표기를 떼고 구두점을 공백으로 바꾼다.
 * 결과가 비면 소문자로 바꾼 원본을 돌려준다.
 */
export function normalizeTitle(title: string): string {
  const base = stripDiacritics((title ?? '').replace(상표기호, ''))
    .replace(/[’‘]/g, "'")
    .toLowerCase()
    .trim();

  let cleaned = base
    .replace(/\s*\(.*$/, '')
    .replace(/\s*:.*$/, '')
    .replace(/\s+[-–—]\s+.*$/, '');
  for (const pattern of 에디션정규식) {
    cleaned = cleaned.replace(pattern, ' ');
  }

  const collapsed = cleaned.replace(비문자숫자, ' ').trim();
  if (collapsed) return collapsed;
  return base.replace(비문자숫자, ' ').trim() || base;
}
