import { Router } from 'express';
import type { CatalogController } from '../controllers/CatalogController';
import type { ResolveController } from '../controllers/ResolveController';

/**
 * Creates and configures API routes
 */
export function createApiRoutes(
  catalogController: CatalogController,
  resolveController: ResolveController
): Router {
  const router = Router();

  router.get('/health', (req, res) => resolveController.health(req, res));

  // Catalog browsing
  router.get('/catalog/popular', (req, res) => void catalogController.popular(req, res));
  router.get('/catalog/search', (req, res) => void catalogController.search(req, res));
  router.get('/catalog/series/:id/episodes', (req, res) => void catalogController.episodes(req, res));

  // Stream candidates for a movie or one episode
  router.get('/streams/:type/:id', (req, res) => void catalogController.streams(req, res));

  router.post('/resolve', (req, res) => void resolveController.resolve(req, res));

  return router;
}
