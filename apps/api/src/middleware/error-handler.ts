import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { IntegrationActionError } from '@wildlife-telemetry/domain';

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  if (err instanceof ZodError) {
    res.status(400).json({ error: 'validation_error', details: err.errors });
    return;
  }
  if (err instanceof IntegrationActionError) {
    if (err.attentionNeeded) {
      console.error(`[api] ${err.name}: ${err.message}`, { attentionNeeded: true });
    }
    res.status(err.status).json({ error: err.message, type: err.name });
    return;
  }
  if (err instanceof Error) {
    console.error('[api] unhandled error', err);
    res.status(500).json({ error: err.message });
    return;
  }
  res.status(500).json({ error: 'Internal server error' });
}
