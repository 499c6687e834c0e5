import { Router } from 'express';
import type { Request, Response } from 'express';
import { SERVICE_NAMES, VERSION } from '@funnelreport/shared';

const router = Router();

// GET /health - Basic health check
router.get('/', (_req: Request, res: Response) => {
  res.status(200).json({
    service: SERVICE_NAMES.DAILY_REPORT,
    status: 'healthy',
    version: VERSION,
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
  });
});

// GET /health/live - Liveness probe
router.get('/live', (_req: Request, res: Response) => {
  res.status(200).json({
    status: 'alive',
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    pid: process.pid,
  });
});

export { router as healthRoutes };
