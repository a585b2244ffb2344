import type { AxiosInstance } from 'axios';
import type { ILogger, IStreamSourceClient } from '../../domain/interfaces';
import type { MediaItem, StreamDescriptor } from '../../domain/entities';
import { InvalidMediaError } from '../../domain/errors';
import { getJson } from '../http/HttpErrorMapper';
import { CATALOG_ROUTES } from './constants/CatalogConstants';
import { parseOptionalInt } from './looseNumbers';
import { zStreamsResponse } from './schemas';

/**
 * Torrentio-compatible stream source
 * Entries with neither a url nor an info-hash are dropped
 */
export class TorrentioClient implements IStreamSourceClient {
  constructor(
    private http: AxiosInstance,
    private logger: ILogger
  ) { }

  async fetchStreams(
    item: Pick<MediaItem, 'id' | 'type'>,
    season: number,
    episode: number,
    signal?: AbortSignal
  ): Promise<StreamDescriptor[]> {
    const payload = await getJson(this.http, this.streamPath(item, season, episode), zStreamsResponse, signal);

    const streams: StreamDescriptor[] = [];
    for (const raw of payload.streams ?? []) {
      const url = (raw.url ?? '').trim();
      const infoHash = (raw.infoHash ?? '').trim();
      if (url === '' && infoHash === '') {
        continue;
      }

      streams.push({
        name: (raw.name ?? '').trim(),
        title: (raw.title ?? '').trim(),
        url,
        infoHash,
        fileIndex: parseOptionalInt(raw.fileIdx),
        sources: raw.sources ?? []
      });
    }

    this.logger.debug(`[sources] ${item.id}: ${streams.length} of ${payload.streams?.length ?? 0} streams usable`);
    return streams;
  }

  private streamPath(item: Pick<MediaItem, 'id' | 'type'>, season: number, episode: number): string {
    if (item.id === '') {
      throw new InvalidMediaError('Missing media id');
    }

    switch (item.type) {
      case 'movie':
        return CATALOG_ROUTES.MOVIE_STREAMS(item.id);
      case 'series':
        return CATALOG_ROUTES.EPISODE_STREAMS(item.id, season, episode);
      default:
        throw new InvalidMediaError(`Unsupported media type: ${item.type}`);
    }
  }
}
