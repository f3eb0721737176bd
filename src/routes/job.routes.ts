import { Router, Request, Response } from 'express';
import multer from 'multer';
import type { DeviceManager } from '../services/device-manager.service';
import type { JobDispatcher } from '../services/job-dispatcher.service';
import type { JobStore } from '../services/job-store.service';
import {
  createJobSchema,
  listJobsQuerySchema,
  printSettingsSchema,
  uploadJobSchema,
} from '../validators/job.validator';
import { sendError } from './respond';

export interface JobRouteDeps {
  readonly manager: DeviceManager;
  readonly jobs: JobStore;
  readonly dispatcher: JobDispatcher;
  readonly maxPayloadBytes: number;
}

export function createJobRoutes({ manager, jobs, dispatcher, maxPayloadBytes }: JobRouteDeps): Router {
  const router = Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxPayloadBytes, files: 1 },
  });

  /** POST /jobs - Submit a print-ready document (base64 encoded) */
  router.post('/', async (req: Request, res: Response) => {
    try {
      const parsed = createJobSchema.parse(req.body);
      const job = await manager.admitJob(parsed.device_id, parsed.settings, parsed.payload, {
        title: parsed.title,
        source: 'api',
      });
      res.status(201).json({ success: true, data: { id: job.id, status: job.status } });
    } catch (error) {
      sendError(res, error);
    }
  });

  /** POST /jobs/upload - Same as POST /jobs with a multipart file */
  router.post('/upload', upload.single('file'), async (req: Request, res: Response) => {
    try {
      if (!req.file || req.file.size === 0) {
        return res.status(400).json({ success: false, error: 'No file uploaded', kind: 'validation' });
      }
      const fields = uploadJobSchema.parse(req.body);
      const settings = printSettingsSchema.parse({
        copies: fields.copies,
        color_mode: fields.color_mode,
        duplex: fields.duplex,
        paper_size: fields.paper_size,
      });
      const job = await manager.admitJob(fields.device_id, settings, req.file.buffer, {
        title: fields.title || req.file.originalname,
        source: 'upload',
      });
      res.status(201).json({ success: true, data: { id: job.id, status: job.status } });
    } catch (error) {
      sendError(res, error);
    }
  });

  /** GET /jobs - List recent print jobs */
  router.get('/', (req: Request, res: Response) => {
    try {
      const { limit } = listJobsQuerySchema.parse(req.query);
      res.json({ success: true, data: jobs.list(limit), stats: jobs.stats() });
    } catch (error) {
      sendError(res, error);
    }
  });

  /** GET /jobs/:id - Get a specific job */
  router.get('/:id', (req: Request, res: Response) => {
    try {
      res.json({ success: true, data: jobs.require(String(req.params.id)) });
    } catch (error) {
      sendError(res, error);
    }
  });

  /** DELETE /jobs/:id - Cancel a job */
  router.delete('/:id', async (req: Request, res: Response) => {
    try {
      const job = await dispatcher.cancel(String(req.params.id));
      res.json({ success: true, data: job });
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
