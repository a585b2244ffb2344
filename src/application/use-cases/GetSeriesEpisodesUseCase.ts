/**
 * Use case for the season/episode grid of a series
 */

import type { ICatalogClient } from '../../domain/interfaces';

export interface GetSeriesEpisodesRequest {
    id: string;
    signal?: AbortSignal;
}

export interface SeasonEpisodes {
    season: number;
    episodes: number[];
}

export interface GetSeriesEpisodesResponse {
    success: boolean;
    // Ascending by season
    seasons: SeasonEpisodes[];
}

export class GetSeriesEpisodesUseCase {
    constructor(
        private catalogClient: ICatalogClient
    ) { }

    async execute(request: GetSeriesEpisodesRequest): Promise<GetSeriesEpisodesResponse> {
        const bySeason = await this.catalogClient.fetchSeriesEpisodes(request.id, request.signal);

        const seasons = [...bySeason.entries()]
            .sort(([a], [b]) => a - b)
            .map(([season, episodes]) => ({ season, episodes }));

        return { success: true, seasons };
    }
}
