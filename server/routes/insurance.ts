/**
 * Insurance Routes
 *
 * Policies, events, coverage gaps and overlaps, fraud patterns,
 * compliance checks and enrichment jobs.
 */

import { Router, type Request, type Response } from 'express';
import type { AppServices } from '../services/container';
import { asyncHandler } from '../middleware/errorHandler';
import { enrichmentRateLimiter } from '../middleware/rateLimit';
import { sendAccepted, sendCreated, sendSuccess } from '../middleware/responseHelpers';
import { validateBody } from '../middleware/validation';
import {
  bulkEnrichSchema,
  eventCreateSchema,
  policyCreateSchema,
} from '../middleware/validationSchemas';
import {
  cargoTypeQuerySchema,
  carrierPoliciesQuerySchema,
  coverageGapsQuerySchema,
  coverageWindowQuerySchema,
  highRiskQuerySchema,
  jobIdParamSchema,
  limitQuerySchema,
  minGapQuerySchema,
  policyIdParamSchema,
  shoppingQuerySchema,
  usdotParamSchema,
} from '../middleware/queryValidation';
import { NotFoundError } from '../lib/errors';
import { createLogger } from '../lib/logger';
import { endDate } from '../services/temporalCoverage';

const log = createLogger({ module: 'insurance-routes' });

export function createInsuranceRouter(services: AppServices): Router {
  const router = Router();
  const { policies, fabric, gapDetector, fraudEngine, orchestrator, jobs, storage } = services;

  // =================================================
  // Policies & Events
  // =================================================

  /**
   * POST /api/insurance/policies
   * Create a policy; links it into the graph when the carrier is known
   */
  router.post('/policies', validateBody(policyCreateSchema), asyncHandler(async (req: Request, res: Response) => {
    const body = policyCreateSchema.parse(req.body);
    const policy = await policies.createPolicy(body);

    if (await storage.carrierExists(policy.carrierUsdot)) {
      await fabric.linkCoveragePeriod(policy.policyId, policy.carrierUsdot, policy.effectiveDate, endDate(policy));
      await fabric.linkProvider(policy.policyId, policy.providerName);
    }

    log.info({ policyId: policy.policyId, carrierUsdot: policy.carrierUsdot }, 'Policy created');
    sendCreated(res, policy);
  }));

  /**
   * GET /api/insurance/policies/:policyId
   */
  router.get('/policies/:policyId', asyncHandler(async (req: Request, res: Response) => {
    const { policyId } = policyIdParamSchema.parse(req.params);
    const policy = await policies.getPolicy(policyId);
    if (!policy) {
      throw new NotFoundError('Policy', policyId);
    }
    sendSuccess(res, policy);
  }));

  /**
   * POST /api/insurance/events
   */
  router.post('/events', validateBody(eventCreateSchema), asyncHandler(async (req: Request, res: Response) => {
    const body = eventCreateSchema.parse(req.body);
    const event = await policies.createEvent(body);
    sendCreated(res, event);
  }));

  // =================================================
  // Carrier views
  // =================================================

  router.get('/carriers/:usdot/policies', asyncHandler(async (req: Request, res: Response) => {
    const { usdot } = usdotParamSchema.parse(req.params);
    const query = carrierPoliciesQuerySchema.parse(req.query);
    const list = await policies.listPoliciesForCarrier(usdot, {
      activeOnly: query.activeOnly,
      includeExpired: query.includeExpired,
      today: services.today(),
    });
    sendSuccess(res, list);
  }));

  router.get('/carriers/:usdot/timeline', asyncHandler(async (req: Request, res: Response) => {
    const { usdot } = usdotParamSchema.parse(req.params);
    sendSuccess(res, await policies.getCarrierTimeline(usdot, services.today()));
  }));

  router.get('/carriers/:usdot/gaps', asyncHandler(async (req: Request, res: Response) => {
    const { usdot } = usdotParamSchema.parse(req.params);
    const { minGapDays } = minGapQuerySchema.parse(req.query);
    sendSuccess(res, await gapDetector.detectGaps(usdot, minGapDays));
  }));

  router.get('/carriers/:usdot/overlaps', asyncHandler(async (req: Request, res: Response) => {
    const { usdot } = usdotParamSchema.parse(req.params);
    sendSuccess(res, await gapDetector.detectOverlaps(usdot));
  }));

  router.get('/carriers/:usdot/coverage', asyncHandler(async (req: Request, res: Response) => {
    const { usdot } = usdotParamSchema.parse(req.params);
    const { windowStart, windowEnd } = coverageWindowQuerySchema.parse(req.query);
    sendSuccess(res, await gapDetector.coverageAccounting(usdot, windowStart, windowEnd));
  }));

  router.get('/carriers/:usdot/risk-score', asyncHandler(async (req: Request, res: Response) => {
    const { usdot } = usdotParamSchema.parse(req.params);
    sendSuccess(res, await fraudEngine.riskScore(usdot));
  }));

  /**
   * POST /api/insurance/carriers/:usdot/enrich
   * Queue a single-carrier enrichment job
   */
  router.post('/carriers/:usdot/enrich', enrichmentRateLimiter, asyncHandler(async (req: Request, res: Response) => {
    const { usdot } = usdotParamSchema.parse(req.params);
    if (!(await storage.carrierExists(usdot))) {
      throw new NotFoundError('Carrier', usdot);
    }
    const job = await jobs.enqueue([usdot], 'carrier');
    sendAccepted(res, { jobId: job.jobId, status: job.status }, `Enrichment queued for carrier ${usdot}`);
  }));

  // =================================================
  // Fraud patterns
  // =================================================

  router.get('/fraud/coverage-gaps', asyncHandler(async (req: Request, res: Response) => {
    const { minGapDays, carrierUsdot } = coverageGapsQuerySchema.parse(req.query);
    const gaps = carrierUsdot === undefined
      ? await gapDetector.detectAllGaps(minGapDays)
      : await gapDetector.detectGaps(carrierUsdot, minGapDays);
    sendSuccess(res, gaps);
  }));

  router.get('/fraud/overlaps', asyncHandler(async (_req: Request, res: Response) => {
    sendSuccess(res, await gapDetector.detectOverlaps());
  }));

  router.get('/fraud/insurance-shopping', asyncHandler(async (req: Request, res: Response) => {
    const { monthsWindow, minProviders } = shoppingQuerySchema.parse(req.query);
    sendSuccess(res, await fraudEngine.detectShopping(monthsWindow, minProviders));
  }));

  router.get('/fraud/underinsured', asyncHandler(async (req: Request, res: Response) => {
    const { cargoType } = cargoTypeQuerySchema.parse(req.query);
    sendSuccess(res, await fraudEngine.detectUnderinsured(cargoType));
  }));

  router.get('/fraud/risk-scores', asyncHandler(async (req: Request, res: Response) => {
    const { limit } = limitQuerySchema.parse(req.query);
    sendSuccess(res, await fraudEngine.riskScores(limit));
  }));

  router.get('/fraud/chameleon-patterns', asyncHandler(async (_req: Request, res: Response) => {
    sendSuccess(res, await fraudEngine.detectChameleonPatterns());
  }));

  router.get('/statistics/summary', asyncHandler(async (_req: Request, res: Response) => {
    sendSuccess(res, await fraudEngine.statisticsSummary());
  }));

  // =================================================
  // Compliance & enrichment
  // =================================================

  /**
   * GET /api/insurance/compliance/check/:usdot
   * Live check against the provider's current filings
   */
  router.get('/compliance/check/:usdot', asyncHandler(async (req: Request, res: Response) => {
    const { usdot } = usdotParamSchema.parse(req.params);
    const query = cargoTypeQuerySchema.parse(req.query);
    sendSuccess(res, await orchestrator.checkCompliance(usdot, query.cargoType));
  }));

  router.post('/bulk-enrich', enrichmentRateLimiter, validateBody(bulkEnrichSchema), asyncHandler(async (req: Request, res: Response) => {
    const { usdots } = bulkEnrichSchema.parse(req.body);
    const job = await jobs.enqueue(usdots, 'bulk');
    sendAccepted(res, { jobId: job.jobId, status: job.status, total: job.total }, `Enrichment queued for ${job.total} carriers`);
  }));

  router.post('/bulk-enrich/high-risk', enrichmentRateLimiter, asyncHandler(async (req: Request, res: Response) => {
    const { limit } = highRiskQuerySchema.parse(req.query);
    const usdots = await orchestrator.selectHighRiskCarriers(limit);
    if (usdots.length === 0) {
      sendSuccess(res, { jobId: null, total: 0 }, 'No carriers match the high-risk profile');
      return;
    }
    const job = await jobs.enqueue(usdots, 'high_risk');
    sendAccepted(res, { jobId: job.jobId, status: job.status, total: job.total }, `Enrichment queued for ${job.total} high-risk carriers`);
  }));

  router.get('/jobs', asyncHandler(async (req: Request, res: Response) => {
    const { limit } = limitQuerySchema.parse(req.query);
    sendSuccess(res, await jobs.listJobs(limit));
  }));

  router.get('/jobs/:jobId', asyncHandler(async (req: Request, res: Response) => {
    const { jobId } = jobIdParamSchema.parse(req.params);
    sendSuccess(res, await jobs.getJob(jobId));
  }));

  return router;
}
