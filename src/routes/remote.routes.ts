import { Router, Request, Response, NextFunction } from 'express';
import { timingSafeEqual } from 'crypto';
import type { RemoteBridge } from '../services/remote-bridge.service';
import { AuthenticationFailedError } from '../utils/errors';
import { testWebhookSchema, webhookEnvelopeSchema } from '../validators/remote.validator';
import { sendError } from './respond';

export interface RemoteRouteDeps {
  readonly bridge: RemoteBridge;
  readonly apiKey: string;
}

function headerValue(req: Request, name: string): string | undefined {
  const value = req.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

export function createRemoteRoutes({ bridge, apiKey }: RemoteRouteDeps): Router {
  const router = Router();

  /** Management endpoints require X-API-Key once a key is configured */
  const requireApiKey = (req: Request, res: Response, next: NextFunction) => {
    if (!apiKey) return next();
    const given = Buffer.from(headerValue(req, 'x-api-key') ?? '', 'utf-8');
    const expected = Buffer.from(apiKey, 'utf-8');
    if (given.length === expected.length && timingSafeEqual(given, expected)) return next();
    return res.status(401).json({ success: false, error: 'Invalid API key', kind: 'AuthenticationFailed' });
  };

  /** GET /remote/status - Bridge configuration and counters */
  router.get('/status', requireApiKey, (_req: Request, res: Response) => {
    res.json({ success: true, data: bridge.status() });
  });

  /** GET /remote/health - Reachability of every configured endpoint */
  router.get('/health', requireApiKey, async (_req: Request, res: Response) => {
    try {
      res.json({ success: true, data: await bridge.checkEndpoints() });
    } catch (error) {
      sendError(res, error);
    }
  });

  /** POST /remote/webhook/receive - Signed event from a remote system */
  router.post('/webhook/receive', async (req: Request, res: Response) => {
    try {
      const envelope = webhookEnvelopeSchema.parse(req.body);
      const result = await bridge.handleInbound(envelope, {
        timestamp: headerValue(req, 'x-timestamp'),
        signature: headerValue(req, 'x-signature'),
      });
      res.json({ success: true, data: result });
    } catch (error) {
      sendError(res, error, error instanceof AuthenticationFailedError ? 401 : undefined);
    }
  });

  /** POST /remote/webhook/test - Send a test event to every webhook endpoint */
  router.post('/webhook/test', requireApiKey, async (req: Request, res: Response) => {
    try {
      const { event_type, data } = testWebhookSchema.parse(req.body ?? {});
      const deliveries = await bridge.send(event_type, data);
      res.json({ success: true, data: { event: event_type, deliveries } });
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
