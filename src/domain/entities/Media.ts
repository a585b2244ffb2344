/**
 * Catalog entries shown to the user before a stream is picked
 */

export type MediaType = 'movie' | 'series';

export interface MediaItem {
  id: string;
  name: string;
  // Usually a MediaType; the catalog may report other kinds
  type: string;
  year: number;
  poster: string;
}

export interface PopularMedia {
  movies: MediaItem[];
  shows: MediaItem[];
}

/**
 * Season number -> ascending, distinct episode numbers
 */
export type SeriesEpisodes = Map<number, number[]>;
