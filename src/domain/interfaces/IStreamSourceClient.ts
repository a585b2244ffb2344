import type { MediaItem, StreamDescriptor } from '../entities';

export interface IStreamSourceClient {
  /**
   * Lists stream candidates for a movie, or for one episode of a series
   */
  fetchStreams(
    item: Pick<MediaItem, 'id' | 'type'>,
    season: number,
    episode: number,
    signal?: AbortSignal
  ): Promise<StreamDescriptor[]>;
}
