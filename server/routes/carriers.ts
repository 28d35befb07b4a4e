/**
 * Carrier Routes
 *
 * Carrier CRUD and officer links.
 */

import { Router, type Request, type Response } from 'express';
import { carrierPatchSchema, insertCarrierSchema } from '@shared/schema';
import type { AppServices } from '../services/container';
import { asyncHandler } from '../middleware/errorHandler';
import { sendCreated, sendSuccess, sendSuccessMessage } from '../middleware/responseHelpers';
import { validateBody } from '../middleware/validation';
import { officerAttachSchema } from '../middleware/validationSchemas';
import { paginationQuerySchema, usdotParamSchema } from '../middleware/queryValidation';

export function createCarrierRouter({ directory }: AppServices): Router {
  const router = Router();

  router.get('/', asyncHandler(async (req: Request, res: Response) => {
    const page = paginationQuerySchema.parse(req.query);
    sendSuccess(res, await directory.listCarriers(page));
  }));

  router.post('/', validateBody(insertCarrierSchema), asyncHandler(async (req: Request, res: Response) => {
    const carrier = await directory.createCarrier(insertCarrierSchema.parse(req.body));
    sendCreated(res, carrier);
  }));

  router.get('/:usdot', asyncHandler(async (req: Request, res: Response) => {
    const { usdot } = usdotParamSchema.parse(req.params);
    sendSuccess(res, await directory.getCarrier(usdot));
  }));

  router.patch('/:usdot', validateBody(carrierPatchSchema), asyncHandler(async (req: Request, res: Response) => {
    const { usdot } = usdotParamSchema.parse(req.params);
    sendSuccess(res, await directory.updateCarrier(usdot, carrierPatchSchema.parse(req.body)));
  }));

  /**
   * DELETE /api/carriers/:usdot
   * Detaches every relationship; policies and events stay as history
   */
  router.delete('/:usdot', asyncHandler(async (req: Request, res: Response) => {
    const { usdot } = usdotParamSchema.parse(req.params);
    await directory.deleteCarrier(usdot);
    sendSuccessMessage(res, `Carrier ${usdot} deleted`);
  }));

  router.get('/:usdot/officers', asyncHandler(async (req: Request, res: Response) => {
    const { usdot } = usdotParamSchema.parse(req.params);
    sendSuccess(res, await directory.listOfficers(usdot));
  }));

  router.post('/:usdot/officers', validateBody(officerAttachSchema), asyncHandler(async (req: Request, res: Response) => {
    const { usdot } = usdotParamSchema.parse(req.params);
    const { fullName } = officerAttachSchema.parse(req.body);
    sendCreated(res, await directory.attachOfficer(usdot, fullName));
  }));

  return router;
}
