/**
 * Insurance Provider Routes
 */

import { Router, type Request, type Response } from 'express';
import type { AppServices } from '../services/container';
import { asyncHandler } from '../middleware/errorHandler';
import { sendSuccess } from '../middleware/responseHelpers';
import { paginationQuerySchema, providerNameParamSchema } from '../middleware/queryValidation';

export function createProviderRouter({ directory }: AppServices): Router {
  const router = Router();

  router.get('/', asyncHandler(async (req: Request, res: Response) => {
    const page = paginationQuerySchema.parse(req.query);
    sendSuccess(res, await directory.listProviders(page));
  }));

  /**
   * GET /api/insurance-providers/:name
   * Provider with the carriers it insures
   */
  router.get('/:name', asyncHandler(async (req: Request, res: Response) => {
    const { name } = providerNameParamSchema.parse(req.params);
    sendSuccess(res, await directory.getProvider(name));
  }));

  router.post('/:name/recount', asyncHandler(async (req: Request, res: Response) => {
    const { name } = providerNameParamSchema.parse(req.params);
    sendSuccess(res, await directory.recountProvider(name));
  }));

  return router;
}
