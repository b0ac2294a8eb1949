import { Router } from 'express';
import { ItemController } from '../controllers/ItemController';
import { SampleController } from '../controllers/SampleController';
import { Paginate } from '../middleware/paginate';

/**
 * Creates and configures the paginated routes
 */
export function createItemRoutes(
  paginate: Paginate,
  itemController: ItemController,
  sampleController: SampleController
): Router {
  const router = Router();

  // Sample endpoints
  router.get('/', paginate(() => sampleController.index()));
  router.get('/page', paginate((req, res, pagination) => sampleController.page(req, res, pagination)));
  router.get('/total', paginate((req, res, pagination) => sampleController.total(req, res, pagination)));
  router.get('/range', paginate((req, res, pagination) => sampleController.range(req, res, pagination)));

  // Item collection endpoint
  router.get('/items', paginate((req, res, pagination) => itemController.list(req, res, pagination)));

  return router;
}
