/**
 * Use case for listing stream candidates of a movie or episode
 */

import type { IStreamSourceClient, ILogger } from '../../domain/interfaces';
import type { MediaItem, StreamDescriptor } from '../../domain/entities';
import { InvalidMediaError } from '../../domain/errors';

export interface ListStreamsRequest {
    item: Pick<MediaItem, 'id' | 'type'>;
    season?: number;
    episode?: number;
    signal?: AbortSignal;
}

export interface ListStreamsResponse {
    success: boolean;
    streams: StreamDescriptor[];
    count: number;
}

export class ListStreamsUseCase {
    constructor(
        private streamSource: IStreamSourceClient,
        private logger: ILogger
    ) { }

    async execute(request: ListStreamsRequest): Promise<ListStreamsResponse> {
        const season = request.season ?? 1;
        const episode = request.episode ?? 1;

        if (!isEpisodeNumber(season) || !isEpisodeNumber(episode)) {
            throw new InvalidMediaError(`Invalid season/episode: ${season}/${episode}`);
        }

        const streams = await this.streamSource.fetchStreams(request.item, season, episode, request.signal);
        const target = request.item.type === 'series' ? `${request.item.id} S${season}E${episode}` : request.item.id;
        this.logger.info(`📡 ${target}: ${streams.length} streams`);

        return {
            success: true,
            streams,
            count: streams.length
        };
    }
}

function isEpisodeNumber(value: number): boolean {
    return Number.isInteger(value) && value >= 1;
}
