import type { Response } from 'express';
import { ZodError } from 'zod';
import { GatewayError, httpStatusFor } from '../utils/errors';
import { logger } from '../utils/logger';

/** Map a thrown error onto the JSON envelope and an HTTP status */
export function sendError(res: Response, error: unknown, statusOverride?: number): Response {
  if (error instanceof ZodError) {
    const msg = error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message)).join('; ');
    return res.status(400).json({ success: false, error: msg, kind: 'validation' });
  }
  if (error instanceof GatewayError) {
    return res
      .status(statusOverride ?? httpStatusFor(error))
      .json({ success: false, error: error.message, kind: error.kind });
  }
  logger.error({ error }, 'Unhandled route error');
  const msg = error instanceof Error ? error.message : String(error);
  return res.status(500).json({ success: false, error: msg });
}
