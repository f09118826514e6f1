import { Router, Request, Response } from 'express';

const router = Router();

/**
 * GET /health, /healthz
 * Liveness probe
 */
router.get(['/health', '/healthz'], (_req: Request, res: Response) => {
  res.json({ status: 'ok' });
});

export default router;
