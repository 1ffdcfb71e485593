import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { ValuationUseCasePort } from '@valuation/domain';
import { rcOnlySchema } from './request-schemas.js';

/** Registration details without valuation, mounted at /api/v1/rc. */
export function createRcRouter(service: ValuationUseCasePort): Router {
  const router = Router();

  router.post('/details', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { rc_number } = rcOnlySchema.parse(req.body);
      const details = await service.lookupRegistration(rc_number);
      res.json({ success: true, ...details });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
