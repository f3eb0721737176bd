import { z } from 'zod';
import { PAPER_SIZE_IDS } from '../models/paper-size.model';
import { DEFAULT_PRINT_SETTINGS, type PrintSettings } from '../models/print-job.model';

const colorModeSchema = z.enum(['color', 'grayscale', 'monochrome']);
const duplexSchema = z.enum(['simplex', 'long-edge', 'short-edge']);
const paperSizeSchema = z.string().transform((s) => s.trim().toUpperCase()).pipe(z.enum(PAPER_SIZE_IDS));

/** Print settings in snake_case or camelCase; missing fields take the defaults */
export const printSettingsSchema = z
  .object({
    copies: z.coerce.number().int().min(1).max(999).optional(),
    color_mode: colorModeSchema.optional(),
    colorMode: colorModeSchema.optional(),
    duplex: duplexSchema.optional(),
    paper_size: paperSizeSchema.optional(),
    paperSize: paperSizeSchema.optional(),
  })
  .transform((s): PrintSettings => ({
    copies: s.copies ?? DEFAULT_PRINT_SETTINGS.copies,
    colorMode: s.color_mode ?? s.colorMode ?? DEFAULT_PRINT_SETTINGS.colorMode,
    duplex: s.duplex ?? DEFAULT_PRINT_SETTINGS.duplex,
    paperSize: s.paper_size ?? s.paperSize ?? DEFAULT_PRINT_SETTINGS.paperSize,
  }));

/** Non-empty base64 document, decoded */
export const base64PayloadSchema = z
  .string()
  .min(1, 'Payload base64 data is required')
  .regex(/^[A-Za-z0-9+/\s]+={0,2}\s*$/, 'Payload must be base64 encoded')
  .transform((s) => Buffer.from(s, 'base64'))
  .refine((buf) => buf.length > 0, 'Payload decodes to zero bytes');

export const createJobSchema = z.object({
  device_id: z.string().min(1, 'device_id is required'),
  title: z.string().max(200).optional(),
  settings: printSettingsSchema.default({}),
  payload: base64PayloadSchema,
});

/** Multipart fields sent alongside an uploaded file */
export const uploadJobSchema = z.object({
  device_id: z.string().min(1, 'device_id is required'),
  title: z.string().max(200).optional(),
  copies: z.string().optional(),
  color_mode: z.string().optional(),
  duplex: z.string().optional(),
  paper_size: z.string().optional(),
});

export const listJobsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(50),
});
