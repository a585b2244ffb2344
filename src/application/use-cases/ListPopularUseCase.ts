/**
 * Use case for the popular movies and shows shown before any search
 */

import type { ICatalogClient } from '../../domain/interfaces';
import type { MediaItem } from '../../domain/entities';

export interface ListPopularRequest {
    signal?: AbortSignal;
}

export interface ListPopularResponse {
    success: boolean;
    movies: MediaItem[];
    shows: MediaItem[];
}

export class ListPopularUseCase {
    constructor(
        private catalogClient: ICatalogClient
    ) { }

    async execute(request: ListPopularRequest = {}): Promise<ListPopularResponse> {
        const { movies, shows } = await this.catalogClient.fetchPopular(request.signal);

        return {
            success: true,
            movies,
            shows
        };
    }
}
