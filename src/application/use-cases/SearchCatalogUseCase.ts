/**
 * Use case for searching movies and series by title
 */

import type { ICatalogClient, ILogger } from '../../domain/interfaces';
import type { MediaItem } from '../../domain/entities';

export interface SearchCatalogRequest {
    query: string;
    signal?: AbortSignal;
}

export interface SearchCatalogResponse {
    success: boolean;
    results: MediaItem[];
    count: number;
}

export class SearchCatalogUseCase {
    constructor(
        private catalogClient: ICatalogClient,
        private logger: ILogger
    ) { }

    async execute(request: SearchCatalogRequest): Promise<SearchCatalogResponse> {
        const results = await this.catalogClient.search(request.query, request.signal);
        this.logger.info(`🔎 "${request.query.trim()}": ${results.length} results`);

        return {
            success: true,
            results,
            count: results.length
        };
    }
}
