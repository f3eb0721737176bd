import type { PrintJob } from '../models/print-job.model';
import { AuthenticationFailedError, errorMessage, toGatewayError } from '../utils/errors';
import { httpRequest, isSuccess } from '../utils/http-request';
import { logger } from '../utils/logger';
import { backoffDelay, sleep } from '../utils/timing';
import {
  pollResponseSchema,
  remoteCommandSchema,
  remoteJobSchema,
  type WebhookEnvelope,
} from '../validators/remote.validator';
import type { AdmitMeta } from './device-manager.service';
import { LIFECYCLE_EVENTS, type EventHub, type GatewayEvents, type GatewayEventType } from './event-hub.service';
import type { JobStore } from './job-store.service';
import { signPayload, signRequest, unixNow, verifyPayload } from './webhook-signature.service';

export interface RemoteSettings {
  readonly webhookEndpoints: readonly string[];
  readonly pollingEndpoints: readonly string[];
  readonly webhookMaxAttempts: number;
  readonly webhookBackoffBaseMs: number;
  readonly webhookBackoffMaxMs: number;
  readonly pollIntervalMs: number;
  readonly secret: string;
  readonly apiKey: string;
  readonly replayWindowSec: number;
  readonly requestTimeoutMs?: number;
}

/** The part of DeviceManager the bridge needs */
export interface JobAdmitter {
  admitJob(deviceId: string, settings: PrintJob['settings'], payload: Buffer, meta: AdmitMeta): Promise<PrintJob>;
}

export interface RemoteBridgeOptions {
  readonly events: EventHub;
  readonly admitter: JobAdmitter;
  readonly jobs: JobStore;
  readonly settings: RemoteSettings;
  readonly transport?: typeof httpRequest;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly source?: string;
}

export interface OutboundEnvelope {
  readonly event_type: string;
  readonly data: Record<string, unknown>;
  readonly timestamp: string;
  readonly signature: string;
  readonly source: string;
}

export interface DeliveryReport {
  readonly url: string;
  readonly delivered: boolean;
  readonly attempts: number;
  readonly lastStatus?: number;
  readonly error?: string;
}

export interface PollReport {
  readonly url: string;
  readonly admitted: number;
  readonly skipped: number;
  readonly failed: number;
  readonly commands: number;
  readonly error?: string;
}

export interface EndpointCheck {
  readonly url: string;
  readonly status: 'reachable' | 'unreachable';
  readonly httpStatus?: number;
  readonly error?: string;
}

/** Public webhook shape of each lifecycle event; credentials never appear here */
export function toWebhookData<K extends GatewayEventType>(event: K, data: GatewayEvents[K]): Record<string, unknown>;
export function toWebhookData(event: GatewayEventType, data: GatewayEvents[GatewayEventType]): Record<string, unknown> {
  if ('previous' in data) {
    return {
      device_id: data.device.id,
      old_status: data.previous,
      new_status: data.device.status,
      reason: data.reason,
    };
  }
  if ('payloadRef' in data) {
    return {
      job_id: data.id,
      device_id: data.deviceId,
      remote_id: data.remoteId,
      title: data.title,
      status: data.status,
      retry_count: data.retryCount,
      error_message: data.lastError?.message ?? null,
      error_kind: data.lastError?.kind ?? null,
    };
  }
  if ('controllerType' in data) {
    return {
      device_id: data.id,
      device_name: data.name,
      ip_address: data.address,
      model: data.model,
      controller_type: data.controllerType,
      status: data.status,
      capabilities: data.capabilities,
    };
  }
  if ('address' in data) {
    return { device_id: data.id, ip_address: data.address };
  }
  return { ...data, event };
}

/**
 * Outbound signed webhooks plus inbound job polling. Every endpoint is
 * isolated: one failing endpoint never delays or breaks another.
 */
export class RemoteBridge {
  private readonly transport: typeof httpRequest;
  private readonly wait: (ms: number) => Promise<void>;
  private readonly admitting = new Set<string>();
  private readonly unsubscribers: Array<() => void> = [];
  private pollTimer: NodeJS.Timeout | null = null;
  private lastPollAt: string | null = null;
  private delivered = 0;
  private dropped = 0;

  constructor(private readonly options: RemoteBridgeOptions) {
    this.transport = options.transport ?? httpRequest;
    this.wait = options.sleep ?? sleep;
  }

  private get settings(): RemoteSettings {
    return this.options.settings;
  }

  start(): void {
    const { events } = this.options;
    if (this.settings.webhookEndpoints.length > 0) {
      for (const event of LIFECYCLE_EVENTS) {
        this.unsubscribers.push(events.on(event, (data) => {
          this.send(event, toWebhookData(event, data)).catch((error: unknown) => {
            logger.error({ error, event }, 'Webhook fan-out failed');
          });
        }));
      }
    }

    if (this.settings.pollingEndpoints.length > 0) {
      const tick = () => {
        this.pollOnce()
          .catch((error: unknown) => logger.error({ error }, 'Remote poll cycle failed'))
          .finally(() => {
            if (this.pollTimer) this.schedulePoll(tick);
          });
      };
      this.schedulePoll(tick);
    }

    logger.info({
      webhooks: this.settings.webhookEndpoints.length,
      polling: this.settings.pollingEndpoints.length,
    }, 'Remote bridge started');
  }

  stop(): void {
    for (const unsubscribe of this.unsubscribers.splice(0)) unsubscribe();
    if (this.pollTimer) {
      clearTimeout(this.pollTimer);
      this.pollTimer = null;
    }
  }

  private schedulePoll(tick: () => void): void {
    this.pollTimer = setTimeout(tick, this.settings.pollIntervalMs);
    this.pollTimer.unref();
  }

  buildEnvelope(eventType: string, data: Record<string, unknown>, nowSec = unixNow()): OutboundEnvelope {
    const timestamp = String(nowSec);
    return {
      event_type: eventType,
      data,
      timestamp,
      signature: signPayload(this.settings.secret, data, timestamp),
      source: this.options.source ?? 'print-fleet-gateway',
    };
  }

  private authHeaders(timestamp: string, signature: string): Record<string, string> {
    const headers: Record<string, string> = {
      'X-Timestamp': timestamp,
      'X-Signature': signature,
    };
    if (this.settings.apiKey) headers['X-API-Key'] = this.settings.apiKey;
    return headers;
  }

  /** Deliver one event to every webhook endpoint */
  async send(eventType: string, data: Record<string, unknown>): Promise<DeliveryReport[]> {
    const envelope = this.buildEnvelope(eventType, data);
    return Promise.all(this.settings.webhookEndpoints.map((url) => this.deliver(url, envelope)));
  }

  /** POST with bounded retries; the event is dropped after the last attempt */
  async deliver(url: string, envelope: OutboundEnvelope): Promise<DeliveryReport> {
    const { webhookMaxAttempts, webhookBackoffBaseMs, webhookBackoffMaxMs } = this.settings;
    const body = JSON.stringify(envelope);
    let lastStatus: number | undefined;
    let lastError: string | undefined;

    for (let attempt = 1; attempt <= webhookMaxAttempts; attempt++) {
      try {
        const res = await this.transport(url, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            ...this.authHeaders(envelope.timestamp, envelope.signature),
          },
          body,
          timeoutMs: this.settings.requestTimeoutMs,
        });
        lastStatus = res.statusCode;
        if (isSuccess(res)) {
          this.delivered++;
          logger.debug({ url, event: envelope.event_type, attempt }, 'Webhook delivered');
          return { url, delivered: true, attempts: attempt, lastStatus };
        }
        lastError = `HTTP ${res.statusCode}`;
      } catch (error) {
        lastError = errorMessage(error);
      }

      if (attempt < webhookMaxAttempts) {
        const delay = backoffDelay(attempt, webhookBackoffBaseMs, webhookBackoffMaxMs);
        logger.warn({ url, event: envelope.event_type, attempt, delay, error: lastError }, 'Webhook delivery failed, retrying');
        await this.wait(delay);
      }
    }

    this.dropped++;
    logger.error({ url, event: envelope.event_type, attempts: webhookMaxAttempts, error: lastError }, 'Webhook dropped');
    return { url, delivered: false, attempts: webhookMaxAttempts, lastStatus, error: lastError };
  }

  /** Poll every endpoint once */
  async pollOnce(): Promise<PollReport[]> {
    const reports = await Promise.all(this.settings.pollingEndpoints.map((url) => this.pollEndpoint(url)));
    this.lastPollAt = new Date().toISOString();
    return reports;
  }

  async pollEndpoint(url: string): Promise<PollReport> {
    const empty = { url, admitted: 0, skipped: 0, failed: 0, commands: 0 };
    try {
      const timestamp = String(unixNow());
      const res = await this.transport(url, {
        method: 'GET',
        headers: this.authHeaders(timestamp, signRequest(this.settings.secret, 'GET', url, timestamp)),
        timeoutMs: this.settings.requestTimeoutMs,
      });

      if (res.statusCode === 204) return empty;
      if (res.statusCode !== 200) {
        logger.warn({ url, status: res.statusCode }, 'Polling endpoint returned unexpected status');
        return { ...empty, error: `HTTP ${res.statusCode}` };
      }

      const raw: unknown = JSON.parse(res.body);
      const response = pollResponseSchema.parse(raw);
      let admitted = 0;
      let skipped = 0;
      let failed = 0;

      for (const item of response.jobs) {
        const outcome = await this.admitRemote(item, `remote:${url}`);
        if (outcome === 'admitted') admitted++;
        else if (outcome === 'duplicate') skipped++;
        else failed++;
      }

      let commands = 0;
      for (const item of response.commands) {
        const parsed = remoteCommandSchema.safeParse(item);
        if (!parsed.success) {
          logger.warn({ url }, 'Ignoring malformed remote command');
          continue;
        }
        commands++;
        logger.info({ url, command: parsed.data.type }, 'Remote command received');
        this.options.events.emitRemote(`command.${parsed.data.type}`, parsed.data.data ?? {});
      }

      if (admitted + skipped + failed > 0) {
        logger.info({ url, admitted, skipped, failed }, 'Remote jobs processed');
      }
      return { url, admitted, skipped, failed, commands };
    } catch (error) {
      logger.error({ url, error: errorMessage(error) }, 'Polling endpoint failed');
      return { ...empty, error: errorMessage(error) };
    }
  }

  /** Validate, dedupe and admit one remote job; never throws */
  async admitRemote(item: unknown, source: string): Promise<'admitted' | 'duplicate' | 'failed'> {
    const parsed = remoteJobSchema.safeParse(item);
    if (!parsed.success) {
      logger.warn({ source, issues: parsed.error.issues.map((i) => i.message) }, 'Rejected malformed remote job');
      return 'failed';
    }

    const job = parsed.data;
    if (this.admitting.has(job.remote_id) || this.options.jobs.findByRemoteId(job.remote_id)) {
      logger.debug({ remoteId: job.remote_id }, 'Remote job already admitted');
      return 'duplicate';
    }

    this.admitting.add(job.remote_id);
    try {
      await this.options.admitter.admitJob(job.device_id, job.settings, job.payload, {
        title: job.title,
        source,
        remoteId: job.remote_id,
      });
      return 'admitted';
    } catch (error) {
      const failure = toGatewayError(error);
      logger.error({ remoteId: job.remote_id, deviceId: job.device_id, kind: failure.kind, error: failure.message },
        'Remote job admission failed');
      return 'failed';
    } finally {
      this.admitting.delete(job.remote_id);
    }
  }

  /**
   * Verify and dispatch an inbound webhook. Header values take precedence
   * over the envelope's own timestamp and signature.
   */
  async handleInbound(
    envelope: WebhookEnvelope,
    headers: { timestamp?: string; signature?: string } = {}
  ): Promise<{ event: string; admitted?: 'admitted' | 'duplicate' | 'failed' }> {
    if (!this.settings.secret) {
      throw new AuthenticationFailedError('Inbound webhooks are disabled until a shared secret is configured');
    }
    const timestamp = headers.timestamp ?? envelope.timestamp;
    const signature = headers.signature ?? envelope.signature;
    const result = verifyPayload(this.settings.secret, envelope.data, timestamp, signature, this.settings.replayWindowSec);
    if (!result.ok) {
      logger.warn({ event: envelope.event_type, reason: result.reason }, 'Inbound webhook rejected');
      throw new AuthenticationFailedError(`Webhook signature ${result.reason}`);
    }

    this.options.events.emitRemote(envelope.event_type, envelope.data);
    if (envelope.event_type === 'job.submit') {
      const admitted = await this.admitRemote(envelope.data, 'remote:webhook');
      return { event: envelope.event_type, admitted };
    }
    return { event: envelope.event_type };
  }

  /** One GET per configured endpoint, reporting reachability */
  async checkEndpoints(): Promise<{ webhooks: EndpointCheck[]; polling: EndpointCheck[] }> {
    const check = async (url: string): Promise<EndpointCheck> => {
      try {
        const timestamp = String(unixNow());
        const res = await this.transport(url, {
          method: 'GET',
          headers: this.authHeaders(timestamp, signRequest(this.settings.secret, 'GET', url, timestamp)),
          timeoutMs: 5000,
        });
        return { url, status: 'reachable', httpStatus: res.statusCode };
      } catch (error) {
        return { url, status: 'unreachable', error: errorMessage(error) };
      }
    };
    const [webhooks, polling] = await Promise.all([
      Promise.all(this.settings.webhookEndpoints.map(check)),
      Promise.all(this.settings.pollingEndpoints.map(check)),
    ]);
    return { webhooks, polling };
  }

  status() {
    return {
      webhooksConfigured: this.settings.webhookEndpoints.length,
      pollingEndpointsConfigured: this.settings.pollingEndpoints.length,
      pollingActive: this.pollTimer !== null,
      lastPollAt: this.lastPollAt,
      hasSecret: this.settings.secret.length > 0,
      hasApiKey: this.settings.apiKey.length > 0,
      delivered: this.delivered,
      dropped: this.dropped,
    };
  }
}
