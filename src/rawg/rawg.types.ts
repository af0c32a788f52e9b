export interface RawgNamedRef {
  id: number;
  slug: string;
  name: string;
}

export interface RawgPlatformRef {
  platform: RawgNamedRef;
}

export interface RawgGameSearchResult {
  id: number;
  slug: string;
  name: string;
  released?: string | null;
  tba?: boolean;
  background_image?: string | null;
  short_screenshots?: { id: number; image: string }[] | null;
  platforms?: RawgPlatformRef[] | null;
  genres?: RawgNamedRef[] | null;
  tags?: RawgNamedRef[] | null;
}

export interface RawgGameDetails extends RawgGameSearchResult {
  description_raw?: string | null;
  description?: string | null;
  website?: string | null;
  developers?: RawgNamedRef[] | null;
  publishers?: RawgNamedRef[] | null;
}

export interface RawgListResponse<T> {
  count: number;
  next?: string | null;
  previous?: string | null;
  results: T[];
}

/** /games 쿼리 파라미터 (key 제외) */
export interface RawgGameQuery {
  page: number;
  page_size: number;
  search?: string;
  dates?: string;
  genres?: string;
  platforms?: string;
  tags?: string;
}
