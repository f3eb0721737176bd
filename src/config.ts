import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';

dotenv.config();

// Project root (one level above src/ or dist/)
const baseDir = path.join(__dirname, '..');

function readVersion(): string {
  const p = path.join(baseDir, 'package.json');
  try {
    if (fs.existsSync(p)) {
      const pkg: unknown = JSON.parse(fs.readFileSync(p, 'utf-8'));
      const parsed = z.object({ version: z.string() }).safeParse(pkg);
      if (parsed.success) return parsed.data.version;
    }
  } catch {
    // fall through to the placeholder version
  }
  return '0.0.0';
}

export interface MachineEntry {
  readonly address: string;
  readonly credential?: string;
}

/** "10.0.0.5:secret,10.0.0.6:,10.0.0.7" -> entries; an empty password means "not configured" */
export function parseMachineList(raw: string): MachineEntry[] {
  return parseList(raw).map((item) => {
    const idx = item.indexOf(':');
    if (idx === -1) return { address: item };
    const address = item.slice(0, idx).trim();
    const credential = item.slice(idx + 1);
    return credential ? { address, credential } : { address };
  });
}

export function parseList(raw: string | undefined): string[] {
  return (raw || '')
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

const intFromEnv = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

const envSchema = z.object({
  PORT: intFromEnv(8000),
  HOST: z.string().default('127.0.0.1'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  DATA_DIR: z.string().default(path.join(baseDir, 'data')),
  DISCOVERY_MODE: z.enum(['list', 'scan']).default('list'),
  MACHINE_LIST: z.string().default(''),
  DISCOVERY_NETWORK: z.string().default('192.168.0.0/24'),
  DISCOVERY_CONCURRENCY: intFromEnv(50),
  DISCOVER_ON_START: z.enum(['true', 'false']).default('true'),
  SNMP_COMMUNITY: z.string().default('public'),
  SNMP_TIMEOUT_MS: intFromEnv(2000),
  CREDENTIALS_FILE: z.string().optional(),
  HEALTH_INTERVAL_MS: intFromEnv(30_000),
  HEALTH_FAILURE_THRESHOLD: intFromEnv(3),
  PROBE_TIMEOUT_MS: intFromEnv(5000),
  JOB_MAX_RETRIES: intFromEnv(3),
  JOB_BACKOFF_BASE_MS: intFromEnv(1000),
  JOB_BACKOFF_MAX_MS: intFromEnv(30_000),
  JOB_POLL_INTERVAL_MS: intFromEnv(2000),
  JOB_TIMEOUT_MS: intFromEnv(300_000),
  WEBHOOK_ENDPOINTS: z.string().default(''),
  POLLING_ENDPOINTS: z.string().default(''),
  WEBHOOK_MAX_ATTEMPTS: intFromEnv(3),
  WEBHOOK_BACKOFF_BASE_MS: intFromEnv(1000),
  WEBHOOK_BACKOFF_MAX_MS: intFromEnv(10_000),
  REMOTE_POLL_INTERVAL_MS: intFromEnv(30_000),
  WEBHOOK_SECRET: z.string().default(''),
  REMOTE_API_KEY: z.string().default(''),
  REPLAY_WINDOW_SEC: intFromEnv(300),
  MAX_PAYLOAD_MB: intFromEnv(100),
});

const env = envSchema.parse(process.env);

export const config = {
  port: env.PORT,
  host: env.HOST,
  logLevel: env.LOG_LEVEL,
  baseDir,
  dataDir: env.DATA_DIR,
  payloadDir: path.join(env.DATA_DIR, 'payloads'),
  version: readVersion(),
  maxPayloadBytes: env.MAX_PAYLOAD_MB * 1024 * 1024,
  discovery: {
    mode: env.DISCOVERY_MODE,
    machines: parseMachineList(env.MACHINE_LIST),
    network: env.DISCOVERY_NETWORK,
    concurrency: Math.max(1, env.DISCOVERY_CONCURRENCY),
    onStart: env.DISCOVER_ON_START === 'true',
    credentialsFile: env.CREDENTIALS_FILE || path.join(env.DATA_DIR, 'credentials.json'),
  },
  snmp: {
    community: env.SNMP_COMMUNITY,
    timeoutMs: env.SNMP_TIMEOUT_MS,
  },
  health: {
    intervalMs: env.HEALTH_INTERVAL_MS,
    failureThreshold: Math.max(1, env.HEALTH_FAILURE_THRESHOLD),
    probeTimeoutMs: env.PROBE_TIMEOUT_MS,
  },
  jobs: {
    maxRetries: env.JOB_MAX_RETRIES,
    backoffBaseMs: env.JOB_BACKOFF_BASE_MS,
    backoffMaxMs: env.JOB_BACKOFF_MAX_MS,
    pollIntervalMs: env.JOB_POLL_INTERVAL_MS,
    timeoutMs: env.JOB_TIMEOUT_MS,
    callTimeoutMs: env.PROBE_TIMEOUT_MS * 6,
  },
  remote: {
    webhookEndpoints: parseList(env.WEBHOOK_ENDPOINTS),
    pollingEndpoints: parseList(env.POLLING_ENDPOINTS),
    webhookMaxAttempts: Math.max(1, env.WEBHOOK_MAX_ATTEMPTS),
    webhookBackoffBaseMs: env.WEBHOOK_BACKOFF_BASE_MS,
    webhookBackoffMaxMs: env.WEBHOOK_BACKOFF_MAX_MS,
    pollIntervalMs: env.REMOTE_POLL_INTERVAL_MS,
    secret: env.WEBHOOK_SECRET,
    apiKey: env.REMOTE_API_KEY,
    replayWindowSec: env.REPLAY_WINDOW_SEC,
  },
} as const;
