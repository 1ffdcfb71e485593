import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { ValuationUseCasePort } from '@valuation/domain';
import { rcNumberSchema, recentQuerySchema } from './request-schemas.js';

/** Stored price-discovery valuations, mounted at /api/v1/valuations. */
export function createHistoryRouter(service: ValuationUseCasePort): Router {
  const router = Router();

  /** GET /api/v1/valuations/recent?limit=10 */
  router.get('/recent', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { limit } = recentQuerySchema.parse(req.query);
      const valuations = await service.recent(limit);
      res.json({ success: true, count: valuations.length, valuations });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/v1/valuations/:rcNumber */
  router.get('/:rcNumber', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const rcNumber = rcNumberSchema.parse(req.params['rcNumber']).toUpperCase();
      const valuations = await service.history(rcNumber);
      res.json({ success: true, rcNumber, count: valuations.length, valuations });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
