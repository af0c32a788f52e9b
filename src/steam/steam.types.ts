export interface SteamStoreSearchItem {
  type: string;
  name: string;
  id: number;
  tiny_image?: string | null;
}

export interface SteamStoreSearchResponse {
  total?: number;
  items?: SteamStoreSearchItem[] | null;
}

export interface SteamPriceOverview {
  currency: string;
  initial: number;
  final: number;
  discount_percent?: number;
}

export interface SteamAppDetailsData {
  type: string;
  name: string;
  steam_appid: number;
  is_free?: boolean;
  short_description?: string | null;
  release_date?: { coming_soon: boolean; date: string } | null;
  developers?: string[] | null;
  publishers?: string[] | null;
  genres?: { id: string; description: string }[] | null;
  platforms?: { windows?: boolean; mac?: boolean; linux?: boolean } | null;
  screenshots?: { id: number; path_full: string }[] | null;
  price_overview?: SteamPriceOverview | null;
}

export type SteamAppDetailsResponse = Record<
  string,
  { success: boolean; data?: SteamAppDetailsData } | undefined
>;
