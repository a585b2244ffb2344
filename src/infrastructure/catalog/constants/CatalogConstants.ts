export const CATALOG_ROUTES = {
  CATALOG: (mediaType: string, catalogPath: string) => `/catalog/${mediaType}/${catalogPath}.json`,
  SERIES_META: (id: string) => `/meta/series/${encodeURIComponent(id)}.json`,
  MOVIE_STREAMS: (id: string) => `/stream/movie/${encodeURIComponent(id)}.json`,
  EPISODE_STREAMS: (id: string, season: number, episode: number) =>
    `/stream/series/${encodeURIComponent(id)}:${season}:${episode}.json`
} as const;

export const TOP_CATALOG = 'top';

export const searchCatalog = (query: string) => `${TOP_CATALOG}/search=${encodeURIComponent(query)}`;

// Sent by both public catalog add-ons
export const ADDON_HEADERS = {
  'Accept-Language': 'en-US,en;q=0.9'
} as const;
