import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat';

dayjs.extend(customParseFormat);

export const ISO_DATE_FORMAT = 'YYYY-MM-DD';
export const EPOCH_DATE = '1970-01-01';

// 스토어마다 출시일 표기가 달라 순서대로 시도
const RELEASE_DATE_FORMATS = [
  ISO_DATE_FORMAT,
  'MMM D, YYYY',
  'D MMM, YYYY',
  'MMMM D, YYYY',
  'D MMMM, YYYY',
  'MMM YYYY',
  'YYYY',
];

export function parseReleaseDate(raw?: string | null): string | null {
  const trimmed = raw?.trim();
  if (!trimmed) return null;
  for (const format of RELEASE_DATE_FORMATS) {
    const parsed = dayjs(trimmed, format, 'en', true);
    if (parsed.isValid()) return parsed.format(ISO_DATE_FORMAT);
  }
  return null;
}

export function isIsoDate(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return false;
  const parsed = dayjs(value, ISO_DATE_FORMAT, true);
  return parsed.isValid() && parsed.format(ISO_DATE_FORMAT) === value;
}

export function todayIsoDate(): string {
  return dayjs().format(ISO_DATE_FORMAT);
}

export function startOfYear(year: number): string {
  return `${String(year).padStart(4, '0')}-01-01`;
}

export function endOfYear(year: number): string {
  return `${String(year).padStart(4, '0')}-12-31`;
}
