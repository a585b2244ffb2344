/**
 * Catalog metadata port
 */

import type { MediaItem, PopularMedia, SeriesEpisodes } from '../entities';

export interface ICatalogClient {
  fetchPopular(signal?: AbortSignal): Promise<PopularMedia>;

  /**
   * Searches movies and series concurrently
   * @returns Movies followed by series, capped at the configured limit
   */
  search(query: string, signal?: AbortSignal): Promise<MediaItem[]>;

  fetchSeriesEpisodes(id: string, signal?: AbortSignal): Promise<SeriesEpisodes>;
}
