import { z } from 'zod';
import { base64PayloadSchema, printSettingsSchema } from './job.validator';

/** One job offered by a remote source */
export const remoteJobSchema = z.object({
  remote_id: z.union([z.string().min(1), z.number()]).transform(String),
  device_id: z.string().min(1),
  title: z.string().max(200).optional(),
  settings: printSettingsSchema.default({}),
  payload: base64PayloadSchema,
});

export const remoteCommandSchema = z.object({
  type: z.string().min(1),
  data: z.unknown().optional(),
});

/** Items are validated one by one so a bad entry never drops the rest */
export const pollResponseSchema = z.object({
  jobs: z.array(z.unknown()).default([]),
  commands: z.array(z.unknown()).default([]),
});

export const webhookEnvelopeSchema = z.object({
  event_type: z.string().min(1),
  data: z.unknown(),
  timestamp: z.union([z.string(), z.number()]).transform(String),
  signature: z.string().optional(),
});

export type WebhookEnvelope = z.infer<typeof webhookEnvelopeSchema>;

export const testWebhookSchema = z.object({
  event_type: z.string().min(1).default('test'),
  data: z.record(z.unknown()).default({}),
});
