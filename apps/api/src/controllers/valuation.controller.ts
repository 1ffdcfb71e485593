import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { BatchItemOutcome, ValuationUseCasePort } from '@valuation/domain';
import {
  batchSchema,
  manualVehicleSchema,
  registrationValuationSchema,
  toManualCommand,
} from './request-schemas.js';

/** Resale valuation routes, mounted at /api/v1/valuation. */
export function createValuationRouter(service: ValuationUseCasePort): Router {
  const router = Router();

  /** POST /api/v1/valuation/manual */
  router.post('/manual', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = manualVehicleSchema.parse(req.body);
      const { vehicle, valuation } = service.valueManual(toManualCommand(body));
      res.json({ success: true, vehicle, data: valuation });
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/v1/valuation/rc - fetch the RC record, then value it */
  router.post('/rc', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = registrationValuationSchema.parse(req.body);
      const outcome = await service.valueFromRegistration({
        rcNumber: body.rc_number,
        currentExShowroom: body.current_ex_showroom,
        marketListingsMean: body.market_listings_mean,
        marketListingCount: body.market_listing_count,
      });
      res.json({
        success: true,
        rcNumber: outcome.rcNumber,
        rcDetails: outcome.rcDetails,
        vehicle: outcome.vehicle,
        data: outcome.valuation,
      });
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/v1/valuation/batch - invalid items are reported per index */
  router.post('/batch', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { vehicles } = batchSchema.parse(req.body);

      const parsed = vehicles.map((v) => manualVehicleSchema.safeParse(v));
      const valid = parsed.flatMap((p, index) => (p.success ? [{ index, cmd: toManualCommand(p.data) }] : []));
      const computed = service.valueBatch(valid.map((v) => v.cmd));

      const results: BatchItemOutcome[] = parsed.map((p, index): BatchItemOutcome => {
        if (!p.success) {
          const issue = p.error.issues[0];
          const where = issue?.path.join('.') || 'vehicle';
          return { index, success: false, error: `${where}: ${issue?.message ?? 'invalid'}` };
        }
        const position = valid.findIndex((v) => v.index === index);
        const outcome = computed[position];
        if (!outcome) return { index, success: false, error: 'Internal error' };
        return { ...outcome, index };
      });

      res.json({ success: true, results });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
