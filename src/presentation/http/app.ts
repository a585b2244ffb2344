import express, { type ErrorRequestHandler, type Express } from 'express';
import config, { isUnlockEnabled } from '../../config';
import type { ICatalogClient, IFileSelector, ILogger, IStreamSourceClient, IUnlockClient } from '../../domain/interfaces';
import { ConsoleLogger } from '../../infrastructure/logging/ConsoleLogger';
import { createHttpClient } from '../../infrastructure/http/createHttpClient';
import { RealDebridClient } from '../../infrastructure/unlock/RealDebridClient';
import { CinemetaClient } from '../../infrastructure/catalog/CinemetaClient';
import { TorrentioClient } from '../../infrastructure/catalog/TorrentioClient';
import { ADDON_HEADERS } from '../../infrastructure/catalog/constants/CatalogConstants';
import { FileSelector } from '../../infrastructure/torrent/FileSelector';
import { ResolveStreamUseCase } from '../../application/use-cases/ResolveStreamUseCase';
import { ListPopularUseCase } from '../../application/use-cases/ListPopularUseCase';
import { SearchCatalogUseCase } from '../../application/use-cases/SearchCatalogUseCase';
import { GetSeriesEpisodesUseCase } from '../../application/use-cases/GetSeriesEpisodesUseCase';
import { ListStreamsUseCase } from '../../application/use-cases/ListStreamsUseCase';
import { CatalogController } from './controllers/CatalogController';
import { ResolveController } from './controllers/ResolveController';
import { createApiRoutes } from './routes/api.routes';
import { ErrorResponder } from './utils/ErrorResponder';
import { HTTP_STATUS, JSON_BODY_LIMIT } from './constants/HttpConstants';

export interface AppOptions {
    logger?: ILogger;
    unlockClient?: IUnlockClient;
    catalogClient?: ICatalogClient;
    streamSourceClient?: IStreamSourceClient;
    fileSelector?: IFileSelector;
    // Defaults to whether an unlock token is configured
    unlockEnabled?: boolean;
    resolveTimeoutMs?: number;
}

/**
 * Creates and configures Express application
 * Can be used both for production server and testing
 */
export function createApp(options: AppOptions = {}): Express {
    // Initialize dependencies (allow injection for testing)
    const logger = options.logger ?? new ConsoleLogger();
    const addonHeaders = { 'User-Agent': config.USER_AGENT, ...ADDON_HEADERS };

    const unlockClient = options.unlockClient ?? new RealDebridClient(
        createHttpClient({
            baseURL: config.UNLOCK_API_BASE,
            timeout: config.UNLOCK_HTTP_TIMEOUT,
            bearerToken: config.UNLOCK_TOKEN,
            headers: { 'User-Agent': config.USER_AGENT }
        }),
        logger
    );
    const catalogClient = options.catalogClient ?? new CinemetaClient(
        createHttpClient({ baseURL: config.CATALOG_API_BASE, timeout: config.CATALOG_HTTP_TIMEOUT, headers: addonHeaders }),
        logger
    );
    const streamSourceClient = options.streamSourceClient ?? new TorrentioClient(
        createHttpClient({ baseURL: config.STREAM_SOURCE_API_BASE, timeout: config.STREAM_SOURCE_HTTP_TIMEOUT, headers: addonHeaders }),
        logger
    );
    const fileSelector = options.fileSelector ?? new FileSelector();

    // Initialize use cases
    const resolveStreamUseCase = new ResolveStreamUseCase(unlockClient, fileSelector, logger);
    const listPopularUseCase = new ListPopularUseCase(catalogClient);
    const searchCatalogUseCase = new SearchCatalogUseCase(catalogClient, logger);
    const getSeriesEpisodesUseCase = new GetSeriesEpisodesUseCase(catalogClient);
    const listStreamsUseCase = new ListStreamsUseCase(streamSourceClient, logger);

    // Initialize controllers
    const catalogController = new CatalogController(
        listPopularUseCase,
        searchCatalogUseCase,
        getSeriesEpisodesUseCase,
        listStreamsUseCase,
        logger
    );
    const resolveController = new ResolveController(resolveStreamUseCase, logger, {
        unlockEnabled: options.unlockEnabled ?? isUnlockEnabled(config.UNLOCK_TOKEN),
        resolveTimeoutMs: options.resolveTimeoutMs ?? config.RESOLVE_TIMEOUT_MS
    });

    const app: Express = express();
    app.use(express.json({ limit: JSON_BODY_LIMIT }));

    // Setup routes
    app.use('/', createApiRoutes(catalogController, resolveController));

    // Body parser failures arrive here
    const handleError: ErrorRequestHandler = (error: unknown, _req, res, _next) => {
        if (isBodyParseError(error)) {
            ErrorResponder.sendError(res, 'Malformed JSON body', HTTP_STATUS.BAD_REQUEST);
            return;
        }
        ErrorResponder.handle(error, res, logger, 'http');
    };
    app.use(handleError);

    return app;
}

function isBodyParseError(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'type' in error && error.type === 'entity.parse.failed';
}
