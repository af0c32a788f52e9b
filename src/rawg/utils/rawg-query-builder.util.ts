import slugify from 'slugify';
import { EPOCH_DATE, todayIsoDate } from '../../common/utils/date.util';
import { StructuredFilter } from '../../models/structured-filter.model';
import { VocabularyCategory } from '../../types/game.types';
import { RawgGameQuery } from '../rawg.types';

export interface PageWindow {
  /** 요청할 RAWG 페이지 번호 (1부터) */
  pages: number[];
  /** 합친 결과에서 건너뛸 개수 */
  skip: number;
}

export interface VocabularyIdLookup {
  nameLookup(category: VocabularyCategory): ReadonlyMap<string, number>;
}

/**
 * offset/limit 구간을 덮는 고정 크기 페이지 목록
 */
export function planPageWindow(limit: number, offset: number, pageSize: number): PageWindow {
  if (limit <= 0) return { pages: [], skip: 0 };
  const safeOffset = Math.max(0, offset);
  const first = Math.floor(safeOffset / pageSize) + 1;
  const last = Math.floor((safeOffset + limit - 1) / pageSize) + 1;
  const pages: number[] = [];
  for (let page = first; page <= last; page++) pages.push(page);
  return { pages, skip: safeOffset % pageSize };
}

function toSlug(name: string): string {
  return slugify(name, { lower: true, strict: true });
}

/**
 * 이름 목록을 RAWG id 목록으로. 어휘에 없는 장르/태그는 slug로 보내고
 * 플랫폼은 id만 받으므로 버린다.
 */
function resolveIds(
  names: readonly string[],
  category: VocabularyCategory,
  lookup: VocabularyIdLookup,
  onUnknown: (category: VocabularyCategory, name: string) => void,
): string | undefined {
  const ids = lookup.nameLookup(category);
  const resolved: string[] = [];
  for (const name of names) {
    const id = ids.get(name.toLowerCase());
    if (id !== undefined) {
      resolved.push(String(id));
      continue;
    }
    onUnknown(category, name);
    if (category !== 'platforms') {
      const slug = toSlug(name);
      if (slug) resolved.push(slug);
    }
  }
  return resolved.length ? resolved.join(',') : undefined;
}

export function buildGameSearchQuery(
  filter: StructuredFilter,
  page: number,
  pageSize: number,
  lookup: VocabularyIdLookup,
  onUnknown: (category: VocabularyCategory, name: string) => void = () => undefined,
): RawgGameQuery {
  const query: RawgGameQuery = { page, page_size: pageSize };
  if (filter.query) query.search = filter.query;

  if (filter.releaseDateFrom || filter.releaseDateTo) {
    query.dates = `${filter.releaseDateFrom ?? EPOCH_DATE},${filter.releaseDateTo ?? todayIsoDate()}`;
  }

  const genres = resolveIds(filter.genres, 'genres', lookup, onUnknown);
  if (genres) query.genres = genres;
  const platforms = resolveIds(filter.platforms, 'platforms', lookup, onUnknown);
  if (platforms) query.platforms = platforms;
  const tags = resolveIds(filter.tags, 'tags', lookup, onUnknown);
  if (tags) query.tags = tags;

  return query;
}
