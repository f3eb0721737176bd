import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import multer from 'multer';
import type { DeviceManager } from './services/device-manager.service';
import type { JobDispatcher } from './services/job-dispatcher.service';
import type { JobStore } from './services/job-store.service';
import type { RemoteBridge } from './services/remote-bridge.service';
import { logger } from './utils/logger';
import { createDeviceRoutes } from './routes/device.routes';
import { createHealthRoutes } from './routes/health.routes';
import { createJobRoutes } from './routes/job.routes';
import { createRemoteRoutes } from './routes/remote.routes';

export interface AppServices {
  readonly manager: DeviceManager;
  readonly jobs: JobStore;
  readonly dispatcher: JobDispatcher;
  readonly bridge: RemoteBridge;
  readonly version: string;
  readonly apiKey: string;
  readonly maxPayloadBytes: number;
}

function errorStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

export function createApp(services: AppServices): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: services.maxPayloadBytes }));
  app.use(express.urlencoded({ extended: true, limit: services.maxPayloadBytes }));

  // API Routes
  app.use('/devices', createDeviceRoutes(services.manager));
  app.use('/jobs', createJobRoutes(services));
  app.use('/health', createHealthRoutes(services));
  app.use('/remote', createRemoteRoutes(services));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ success: false, error: 'Not found' });
  });

  // Body parser and upload failures
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof multer.MulterError) {
      const status = error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
      return res.status(status).json({ success: false, error: error.message, kind: 'validation' });
    }
    const status = errorStatus(error);
    if (status !== undefined && status >= 400 && status < 500) {
      const msg = error instanceof Error ? error.message : 'Bad request';
      return res.status(status).json({ success: false, error: msg, kind: 'validation' });
    }
    logger.error({ error }, 'Unhandled request error');
    return res.status(500).json({ success: false, error: 'Internal server error' });
  });

  return app;
}
