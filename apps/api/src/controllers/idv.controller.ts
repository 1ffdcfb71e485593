import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { parseRcRecord } from '@valuation/adapters';
import type { ValuationUseCasePort } from '@valuation/domain';
import {
  idvCalculateSchema,
  rcOnlySchema,
  registrationIdvSchema,
  skipCacheQuerySchema,
} from './request-schemas.js';

/** Insured Declared Value routes, mounted at /api/v1/idv. */
export function createIdvRouter(service: ValuationUseCasePort): Router {
  const router = Router();

  /** POST /api/v1/idv/calculate - RC record and prices supplied by the caller */
  router.post('/calculate', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = idvCalculateSchema.parse(req.body);
      const { vehicle, valuation } = service.calculateIdv({
        vehicle: parseRcRecord(body.rc_data),
        onRoadPrice: body.original_on_road_price,
        marketMedianEstimate: body.market_median_estimate,
      });
      res.json({ success: true, vehicle, idv: valuation });
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/v1/idv/rc */
  router.post('/rc', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = registrationIdvSchema.parse(req.body);
      const { rcNumber, vehicle, valuation } = await service.idvFromRegistration({
        rcNumber: body.rc_number,
        onRoadPrice: body.original_on_road_price,
        marketMedianEstimate: body.market_median_estimate,
      });
      res.json({ success: true, rcNumber, vehicle, idv: valuation });
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/v1/idv/gemini?skip_cache=true - prices from the configured AI provider */
  router.post('/gemini', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = rcOnlySchema.parse(req.body);
      const { skip_cache } = skipCacheQuerySchema.parse(req.query);
      const outcome = await service.idvWithPriceDiscovery({ rcNumber: body.rc_number, skipCache: skip_cache });
      res.json({ success: true, ...outcome });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
