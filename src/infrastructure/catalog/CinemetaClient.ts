import type { AxiosInstance } from 'axios';
import type { ICatalogClient, ILogger } from '../../domain/interfaces';
import type { MediaItem, PopularMedia, SeriesEpisodes } from '../../domain/entities';
import { getJson } from '../http/HttpErrorMapper';
import { CATALOG_ROUTES, TOP_CATALOG, searchCatalog } from './constants/CatalogConstants';
import { parseYear } from './looseNumbers';
import { zCatalogResponse, zSeriesMetaResponse } from './schemas';
import config from '../../config';

/**
 * Cinemeta-compatible catalog client
 */
export class CinemetaClient implements ICatalogClient {
  constructor(
    private http: AxiosInstance,
    private logger: ILogger,
    private resultLimit: number = config.SEARCH_RESULT_LIMIT
  ) { }

  async fetchPopular(signal?: AbortSignal): Promise<PopularMedia> {
    const movies = await this.fetchCatalog('movie', TOP_CATALOG, signal);
    const shows = await this.fetchCatalog('series', TOP_CATALOG, signal);
    this.logger.debug(`[catalog] popular: ${movies.length} movies, ${shows.length} shows`);
    return { movies, shows };
  }

  async search(query: string, signal?: AbortSignal): Promise<MediaItem[]> {
    const trimmed = query.trim();
    if (trimmed === '') {
      return [];
    }

    const [movies, shows] = await Promise.allSettled([
      this.fetchCatalog('movie', searchCatalog(trimmed), signal),
      this.fetchCatalog('series', searchCatalog(trimmed), signal)
    ]);

    // Movie failure wins when both fail
    if (movies.status === 'rejected') {
      throw movies.reason;
    }
    if (shows.status === 'rejected') {
      throw shows.reason;
    }

    return [...movies.value, ...shows.value].slice(0, this.resultLimit);
  }

  async fetchSeriesEpisodes(id: string, signal?: AbortSignal): Promise<SeriesEpisodes> {
    const payload = await getJson(this.http, CATALOG_ROUTES.SERIES_META(id), zSeriesMetaResponse, signal);

    const bySeason: SeriesEpisodes = new Map();
    for (const video of payload.meta?.videos ?? []) {
      const season = Math.trunc(video.season ?? 0);
      const episode = Math.trunc(video.episode ?? 0);
      if (season < 1 || episode < 1) {
        continue;
      }
      bySeason.set(season, [...(bySeason.get(season) ?? []), episode]);
    }

    for (const [season, episodes] of bySeason) {
      bySeason.set(season, [...new Set(episodes)].sort((a, b) => a - b));
    }

    if (bySeason.size === 0) {
      bySeason.set(1, [1]);
    }

    return bySeason;
  }

  private async fetchCatalog(mediaType: string, catalogPath: string, signal?: AbortSignal): Promise<MediaItem[]> {
    const payload = await getJson(this.http, CATALOG_ROUTES.CATALOG(mediaType, catalogPath), zCatalogResponse, signal);

    const items: MediaItem[] = [];
    for (const meta of payload.metas ?? []) {
      const item: MediaItem = {
        id: meta.id ?? '',
        name: meta.name ?? '',
        type: meta.type || mediaType,
        year: parseYear(meta.year),
        poster: meta.poster ?? ''
      };

      if (item.id === '' || item.name === '') {
        continue;
      }
      items.push(item);
    }

    return items;
  }
}
