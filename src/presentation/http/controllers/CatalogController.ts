import type { Request, Response } from 'express';
import type { ILogger } from '../../../domain/interfaces';
import type { ListPopularUseCase } from '../../../application/use-cases/ListPopularUseCase';
import type { SearchCatalogUseCase } from '../../../application/use-cases/SearchCatalogUseCase';
import type { GetSeriesEpisodesUseCase } from '../../../application/use-cases/GetSeriesEpisodesUseCase';
import type { ListStreamsUseCase } from '../../../application/use-cases/ListStreamsUseCase';
import { ErrorResponder } from '../utils/ErrorResponder';
import { requestSignal } from '../utils/requestSignal';
import { describeIssues, zStreamsQuery } from '../schemas';
import { HTTP_STATUS } from '../constants/HttpConstants';

/**
 * Controller for catalog browsing and stream listing
 */
export class CatalogController {
    constructor(
        private listPopularUseCase: ListPopularUseCase,
        private searchCatalogUseCase: SearchCatalogUseCase,
        private getSeriesEpisodesUseCase: GetSeriesEpisodesUseCase,
        private listStreamsUseCase: ListStreamsUseCase,
        private logger: ILogger
    ) { }

    /**
     * Handles GET /catalog/popular
     */
    async popular(_req: Request, res: Response): Promise<void> {
        const { signal, dispose } = requestSignal(res);
        try {
            const result = await this.listPopularUseCase.execute({ signal });
            res.json({ movies: result.movies, shows: result.shows });
        } catch (error) {
            ErrorResponder.handle(error, res, this.logger, 'popular');
        } finally {
            dispose();
        }
    }

    /**
     * Handles GET /catalog/search?q=...
     */
    async search(req: Request, res: Response): Promise<void> {
        const query = typeof req.query.q === 'string' ? req.query.q : '';

        if (query.trim() === '') {
            ErrorResponder.sendError(res, 'Search query required', HTTP_STATUS.BAD_REQUEST);
            return;
        }

        const { signal, dispose } = requestSignal(res);
        try {
            const result = await this.searchCatalogUseCase.execute({ query, signal });
            res.json({ results: result.results });
        } catch (error) {
            ErrorResponder.handle(error, res, this.logger, 'search');
        } finally {
            dispose();
        }
    }

    /**
     * Handles GET /catalog/series/:id/episodes
     */
    async episodes(req: Request, res: Response): Promise<void> {
        const { signal, dispose } = requestSignal(res);
        try {
            const result = await this.getSeriesEpisodesUseCase.execute({ id: req.params.id, signal });
            const seasons = Object.fromEntries(result.seasons.map(({ season, episodes }) => [String(season), episodes]));
            res.json({ seasons });
        } catch (error) {
            ErrorResponder.handle(error, res, this.logger, 'episodes');
        } finally {
            dispose();
        }
    }

    /**
     * Handles GET /streams/:type/:id?season=...&episode=...
     */
    async streams(req: Request, res: Response): Promise<void> {
        const query = zStreamsQuery.safeParse(req.query);

        if (!query.success) {
            ErrorResponder.sendError(res, describeIssues(query.error), HTTP_STATUS.BAD_REQUEST);
            return;
        }

        const { signal, dispose } = requestSignal(res);
        try {
            const result = await this.listStreamsUseCase.execute({
                item: { id: req.params.id, type: req.params.type },
                season: query.data.season,
                episode: query.data.episode,
                signal
            });
            res.json({ streams: result.streams });
        } catch (error) {
            ErrorResponder.handle(error, res, this.logger, 'streams');
        } finally {
            dispose();
        }
    }
}
