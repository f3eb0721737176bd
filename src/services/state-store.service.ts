import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { Device } from '../models/device.model';
import { PAPER_SIZE_IDS } from '../models/paper-size.model';
import type { PrintJob } from '../models/print-job.model';
import { logger } from '../utils/logger';

/** Registry entry as persisted; the credential never leaves this file */
export interface StoredDevice {
  readonly device: Device;
  readonly credential?: string;
}

export interface StateStore {
  loadDevices(): StoredDevice[];
  saveDevices(devices: readonly StoredDevice[]): void;
  loadJobs(): PrintJob[];
  saveJobs(jobs: readonly PrintJob[]): void;
}

const errorKindSchema = z.enum([
  'Unreachable',
  'AuthenticationFailed',
  'CapabilityMismatch',
  'ProtocolError',
  'Cancelled',
  'DeviceNotFound',
  'JobNotFound',
  'Conflict',
]);

const capabilitiesSchema = z.object({
  color: z.boolean(),
  duplex: z.boolean(),
  maxPaperSize: z.enum(PAPER_SIZE_IDS),
  requiresAuth: z.boolean(),
});

const deviceSchema = z.object({
  id: z.string(),
  address: z.string(),
  name: z.string(),
  model: z.string(),
  controllerType: z.enum(['DirectController', 'ManagedController']),
  adapter: z.enum(['direct', 'managed', 'monitoring', 'raw']),
  capabilities: capabilitiesSchema,
  status: z.enum(['Unknown', 'Discovering', 'Online', 'Offline', 'Error']),
  statusReason: errorKindSchema.nullable(),
  description: z.string(),
  lastProbeAt: z.string().nullable(),
  consecutiveFailures: z.number().int().min(0),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const storedDeviceSchema = z.object({
  device: deviceSchema,
  credential: z.string().optional(),
});

const jobSchema = z.object({
  id: z.string(),
  deviceId: z.string(),
  title: z.string(),
  payloadRef: z.string(),
  payloadSize: z.number().int().min(0),
  settings: z.object({
    copies: z.number().int(),
    colorMode: z.enum(['color', 'grayscale', 'monochrome']),
    duplex: z.enum(['simplex', 'long-edge', 'short-edge']),
    paperSize: z.enum(PAPER_SIZE_IDS),
  }),
  status: z.enum(['Queued', 'Dispatching', 'Printing', 'Completed', 'Failed', 'Cancelled']),
  retryCount: z.number().int().min(0),
  maxRetries: z.number().int().min(0),
  lastError: z.object({ kind: errorKindSchema, message: z.string() }).nullable(),
  remoteId: z.string().nullable(),
  source: z.string(),
  deviceJobRef: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
  completedAt: z.string().nullable(),
});

/** Load a JSON array file, keeping only the records that validate */
function loadRecords<T>(file: string, schema: z.ZodType<T>): T[] {
  if (!fs.existsSync(file)) return [];
  try {
    const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
    if (!Array.isArray(raw)) {
      logger.warn({ file }, 'State file is not an array, ignoring');
      return [];
    }
    const records: T[] = [];
    for (const item of raw) {
      const parsed = schema.safeParse(item);
      if (parsed.success) records.push(parsed.data);
      else logger.warn({ file, issues: parsed.error.issues.length }, 'Skipping invalid state record');
    }
    return records;
  } catch (error) {
    logger.error({ error, file }, 'Failed to load state file');
    return [];
  }
}

/** JSON files in the data directory, written synchronously */
export class FileStateStore implements StateStore {
  private readonly devicesFile: string;
  private readonly jobsFile: string;

  constructor(private readonly dataDir: string) {
    this.devicesFile = path.join(dataDir, 'devices.json');
    this.jobsFile = path.join(dataDir, 'jobs.json');
  }

  private save(file: string, data: unknown): void {
    fs.mkdirSync(this.dataDir, { recursive: true });
    const tmp = `${file}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(data, null, 2), 'utf-8');
    fs.renameSync(tmp, file);
  }

  loadDevices(): StoredDevice[] {
    return loadRecords(this.devicesFile, storedDeviceSchema);
  }

  saveDevices(devices: readonly StoredDevice[]): void {
    this.save(this.devicesFile, devices);
  }

  loadJobs(): PrintJob[] {
    return loadRecords(this.jobsFile, jobSchema);
  }

  saveJobs(jobs: readonly PrintJob[]): void {
    this.save(this.jobsFile, jobs);
  }
}

export class MemoryStateStore implements StateStore {
  private devices: StoredDevice[] = [];
  private jobs: PrintJob[] = [];

  loadDevices(): StoredDevice[] {
    return [...this.devices];
  }

  saveDevices(devices: readonly StoredDevice[]): void {
    this.devices = [...devices];
  }

  loadJobs(): PrintJob[] {
    return [...this.jobs];
  }

  saveJobs(jobs: readonly PrintJob[]): void {
    this.jobs = [...jobs];
  }
}
