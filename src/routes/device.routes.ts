import { Router, Request, Response } from 'express';
import type { DeviceManager } from '../services/device-manager.service';
import {
  discoverAddressesSchema,
  discoverNetworkSchema,
  registerDeviceSchema,
} from '../validators/device.validator';
import { sendError } from './respond';

export function createDeviceRoutes(manager: DeviceManager): Router {
  const router = Router();

  /** POST /devices/discover/network - Scan a CIDR range */
  router.post('/discover/network', async (req: Request, res: Response) => {
    try {
      const { cidr } = discoverNetworkSchema.parse(req.body);
      const summary = await manager.discoverNetwork(cidr);
      res.json({ success: true, data: summary });
    } catch (error) {
      sendError(res, error);
    }
  });

  /** POST /devices/discover/ips - Probe an explicit address list */
  router.post('/discover/ips', async (req: Request, res: Response) => {
    try {
      const { addresses } = discoverAddressesSchema.parse(req.body);
      const summary = await manager.discoverAddresses(addresses);
      res.json({ success: true, data: summary });
    } catch (error) {
      sendError(res, error);
    }
  });

  /** POST /devices/discover - Run discovery in the configured mode */
  router.post('/discover', async (_req: Request, res: Response) => {
    try {
      const summary = await manager.discover();
      res.json({ success: true, data: summary });
    } catch (error) {
      sendError(res, error);
    }
  });

  /** GET /devices - List registered devices */
  router.get('/', (_req: Request, res: Response) => {
    res.json({ success: true, data: manager.list(), stats: manager.stats() });
  });

  /** POST /devices - Register a device without discovery */
  router.post('/', (req: Request, res: Response) => {
    try {
      const parsed = registerDeviceSchema.parse(req.body);
      const device = manager.add({
        address: parsed.address,
        model: parsed.model,
        name: parsed.name,
        controllerType: parsed.controller_type,
        adapter: parsed.adapter,
        capabilities: {
          color: parsed.capabilities.color,
          duplex: parsed.capabilities.duplex,
          maxPaperSize: parsed.capabilities.max_paper_size,
          requiresAuth: parsed.capabilities.requires_auth,
        },
        credential: parsed.credential,
      });
      res.status(201).json({ success: true, data: device });
    } catch (error) {
      sendError(res, error);
    }
  });

  /** GET /devices/:id - Get a specific device */
  router.get('/:id', (req: Request, res: Response) => {
    try {
      res.json({ success: true, data: manager.get(String(req.params.id)) });
    } catch (error) {
      sendError(res, error);
    }
  });

  /** GET /devices/:id/status - Live status from the device */
  router.get('/:id/status', async (req: Request, res: Response) => {
    try {
      const id = String(req.params.id);
      const status = await manager.getLiveStatus(id);
      res.json({ success: true, data: { device: manager.get(id), status } });
    } catch (error) {
      sendError(res, error);
    }
  });

  /** POST /devices/:id/test - Run connection checks */
  router.post('/:id/test', async (req: Request, res: Response) => {
    try {
      const checks = await manager.testDevice(String(req.params.id));
      const passed = checks.every((c) => c.status !== 'fail');
      res.json({ success: true, data: { passed, checks } });
    } catch (error) {
      sendError(res, error);
    }
  });

  /** DELETE /devices/:id - Remove a device from the registry */
  router.delete('/:id', (req: Request, res: Response) => {
    try {
      const device = manager.remove(String(req.params.id));
      res.json({ success: true, data: device });
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
