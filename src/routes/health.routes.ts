import { Router, Request, Response } from 'express';
import type { DeviceManager } from '../services/device-manager.service';
import type { JobStore } from '../services/job-store.service';

export interface HealthRouteDeps {
  readonly manager: DeviceManager;
  readonly jobs: JobStore;
  readonly version: string;
}

export function createHealthRoutes({ manager, jobs, version }: HealthRouteDeps): Router {
  const router = Router();

  /** GET /health - Liveness, version and fleet counters */
  router.get('/', (_req: Request, res: Response) => {
    const devices = manager.stats();
    res.json({
      success: true,
      data: {
        status: 'ok',
        service: 'print-fleet-gateway',
        version,
        uptime: process.uptime(),
        timestamp: new Date().toISOString(),
        devices,
        online: devices.online,
        offline: devices.offline,
        jobs: jobs.stats(),
      },
    });
  });

  return router;
}
