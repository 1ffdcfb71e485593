import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { ValuationError } from '@valuation/domain';

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  if (err instanceof ZodError) {
    const issue = err.issues[0];
    const where = issue?.path.join('.');
    const message = issue ? (where ? `${where}: ${issue.message}` : issue.message) : 'Invalid request';
    res.status(400).json({ success: false, error: message });
    return;
  }
  if (err instanceof ValuationError) {
    res.status(err.status).json({ success: false, error: err.message });
    return;
  }
  // body-parser marks malformed JSON with status 400
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    res.status(400).json({ success: false, error: 'Malformed JSON body' });
    return;
  }
  console.error('[server] unhandled error', err);
  res.status(500).json({ success: false, error: 'Internal server error' });
}
