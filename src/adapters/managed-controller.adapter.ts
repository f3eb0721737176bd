import type { Capabilities } from '../models/device.model';
import { PAPER_SIZE_IDS, type PaperSizeId } from '../models/paper-size.model';
import type { PrintJob, PrintSettings } from '../models/print-job.model';
import type { SnmpProbe } from '../services/snmp.service';
import { AuthenticationFailedError, JobRejectedError, ProtocolError } from '../utils/errors';
import { isSuccess } from '../utils/http-request';
import { logger } from '../utils/logger';
import { findValue, parseDocument } from '../utils/xml';
import {
  failCheck,
  passCheck,
  type AdapterContext,
  type ConnectionCheck,
  type DeviceStatusReport,
  type ProtocolAdapter,
  type SubmitResult,
} from './adapter';
import { mapDeviceText, mapJobText } from './direct-controller.adapter';
import { SessionAdapter, type SessionAdapterOptions } from './session.adapter';

export const WSI = {
  login: '/wsi/login',
  status: '/wsi/status',
  capabilities: '/wsi/capabilities',
  jobs: '/wsi/jobs',
} as const;

export const MANAGED_ADMIN_USER = 'admin';

export interface ManagedControllerOptions extends SessionAdapterOptions {
  readonly snmp: SnmpProbe;
  readonly user?: string;
}

/** Query parameters the controller job endpoint takes */
export function jobQuery(title: string, settings: PrintSettings): Record<string, string> {
  return {
    title,
    copies: String(settings.copies),
    color: settings.colorMode === 'color' ? 'Color' : 'Grayscale',
    duplex: settings.duplex === 'simplex' ? 'false' : settings.duplex,
    media: settings.paperSize,
  };
}

function parseFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  return /^(true|yes|1|on|color)$/i.test(value.trim());
}

function parsePaper(value: string | undefined, fallback: PaperSizeId): PaperSizeId {
  const upper = (value ?? '').trim().toUpperCase();
  return PAPER_SIZE_IDS.find((id) => id === upper) ?? fallback;
}

/** RIP controller web service (Fiery-style /wsi interface) */
export class ManagedControllerAdapter extends SessionAdapter implements ProtocolAdapter {
  readonly kind = 'managed' as const;
  readonly supportsCancel = true;

  private readonly snmp: SnmpProbe;
  private readonly user: string;

  constructor(ctx: AdapterContext, options: ManagedControllerOptions) {
    super(ctx, options);
    this.snmp = options.snmp;
    this.user = options.user ?? MANAGED_ADMIN_USER;
  }

  async authenticate(): Promise<void> {
    if (this.ctx.credential === undefined) {
      // Controllers without an admin password accept anonymous requests
      this.storeSession({});
      return;
    }

    const res = await this.client.request(WSI.login, {
      json: { user: this.user, pass: this.ctx.credential },
    });
    if (!isSuccess(res)) {
      throw new AuthenticationFailedError(`Controller login rejected (HTTP ${res.statusCode})`, this.ctx.deviceId);
    }

    this.storeSession(res.cookies);
    logger.info({ deviceId: this.ctx.deviceId }, 'Authenticated with controller web service');
  }

  async getStatus(deviceJobRef?: string): Promise<DeviceStatusReport> {
    const res = await this.sessionRequest(WSI.status);
    if (!isSuccess(res)) {
      throw new ProtocolError(`Controller status answered HTTP ${res.statusCode}`, this.ctx.deviceId);
    }
    const doc = parseDocument(res.body);
    const state = mapDeviceText(findValue(doc, ['status', 'state', 'printerStatus']));
    const counter = Number(findValue(doc, ['pageCount', 'totalPages', 'pages']));
    const pagesPrinted = Number.isFinite(counter) ? counter : undefined;

    if (deviceJobRef === undefined) {
      return { state, pagesPrinted };
    }

    const jobRes = await this.sessionRequest(`${WSI.jobs}/${encodeURIComponent(deviceJobRef)}`);
    // Finished jobs are purged from the controller queue
    if (jobRes.statusCode === 404) {
      return { state, pagesPrinted, job: { state: 'completed' } };
    }
    if (!isSuccess(jobRes)) {
      throw new ProtocolError(`Controller job lookup answered HTTP ${jobRes.statusCode}`, this.ctx.deviceId);
    }
    const jobText = findValue(parseDocument(jobRes.body), ['status', 'state']);
    return {
      state,
      pagesPrinted,
      job: { state: mapJobText(jobText), message: jobText },
    };
  }

  async getCapabilities(): Promise<Capabilities> {
    const profile = this.ctx.profile;
    try {
      const res = await this.sessionRequest(WSI.capabilities);
      if (!isSuccess(res)) return profile;
      const doc = parseDocument(res.body);
      return {
        color: parseFlag(findValue(doc, ['color', 'colorSupported']), profile.color),
        duplex: parseFlag(findValue(doc, ['duplex', 'duplexSupported']), profile.duplex),
        maxPaperSize: parsePaper(findValue(doc, ['maxPaperSize', 'maxMedia']), profile.maxPaperSize),
        requiresAuth: profile.requiresAuth,
      };
    } catch (error) {
      if (error instanceof AuthenticationFailedError) throw error;
      logger.debug({ deviceId: this.ctx.deviceId, error }, 'Capability query failed, using family profile');
      return profile;
    }
  }

  async submitJob(job: PrintJob, payload: Buffer): Promise<SubmitResult> {
    const res = await this.sessionRequest(WSI.jobs, {
      method: 'POST',
      body: payload,
      contentType: 'application/octet-stream',
      query: jobQuery(job.title, job.settings),
    });

    if (res.statusCode >= 400 && res.statusCode < 500) {
      throw new JobRejectedError(`Controller refused the job (HTTP ${res.statusCode})`, this.ctx.deviceId);
    }
    if (!isSuccess(res)) {
      throw new ProtocolError(`Controller job submit answered HTTP ${res.statusCode}`, this.ctx.deviceId);
    }

    const ref = findValue(parseDocument(res.body), ['id', 'jobId', 'job_id']);
    if (!ref) {
      throw new ProtocolError('Controller accepted the job without returning an id', this.ctx.deviceId);
    }
    logger.info({ deviceId: this.ctx.deviceId, jobId: job.id, deviceJobRef: ref }, 'Job submitted to controller');
    return { deviceJobRef: ref };
  }

  async cancelJob(deviceJobRef: string): Promise<void> {
    const res = await this.sessionRequest(`${WSI.jobs}/${encodeURIComponent(deviceJobRef)}`, {
      method: 'DELETE',
    });
    if (!isSuccess(res) && res.statusCode !== 404) {
      throw new ProtocolError(`Controller job delete answered HTTP ${res.statusCode}`, this.ctx.deviceId);
    }
  }

  async testConnection(): Promise<ConnectionCheck[]> {
    const checks: ConnectionCheck[] = [];

    const descr = await this.snmp.getDescription(this.ctx.address);
    checks.push(descr
      ? passCheck('snmp', `SNMP working: ${descr}`)
      : failCheck('snmp', 'No SNMP response'));

    try {
      await this.authenticate();
      checks.push(passCheck('authentication', this.ctx.credential === undefined
        ? 'Anonymous access'
        : 'Controller authentication successful'));
    } catch (error) {
      checks.push(failCheck('authentication', error));
      return checks;
    }

    try {
      const status = await this.getStatus();
      checks.push(passCheck('status', `Controller reports ${status.state}`));
    } catch (error) {
      checks.push(failCheck('status', error));
    }

    return checks;
  }
}
