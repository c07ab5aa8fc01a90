import { Router, type Response } from 'express';
import type { Configuration } from '@is-it-spam/core';

export type HealthResponse = Pick<Response, 'status' | 'json'>;

/** Reports whether is-it-spam.com is reachable with the configured credentials. */
export function createHealthHandler(config: Configuration) {
  return async (_req: unknown, res: HealthResponse): Promise<void> => {
    try {
      const healthy = await config.client().healthCheck();
      res.status(healthy ? 200 : 503).json({ status: healthy ? 'ok' : 'degraded' });
    } catch (err) {
      res.status(502).json({
        status: 'error',
        error: err instanceof Error ? err.message : String(err),
      });
    }
  };
}

export function createHealthRoutes(config: Configuration): Router {
  const router = Router();
  router.get('/spam-check/health', createHealthHandler(config));
  return router;
}
