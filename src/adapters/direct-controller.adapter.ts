import type { Capabilities, DeviceState } from '../models/device.model';
import type { PrintJob } from '../models/print-job.model';
import {
  RAW_PRINT_PORT,
  probeTcp,
  sendRawToTcp,
  wrapWithPjl,
} from '../services/raw-stream.service';
import type { SnmpProbe } from '../services/snmp.service';
import { AuthenticationFailedError, ProtocolError } from '../utils/errors';
import { isSuccess } from '../utils/http-request';
import { logger } from '../utils/logger';
import { findRecords, findValue, parseDocument, type DocNode } from '../utils/xml';
import {
  failCheck,
  passCheck,
  type AdapterContext,
  type ConnectionCheck,
  type DeviceJobState,
  type DeviceStatusReport,
  type ProtocolAdapter,
  type SubmitResult,
} from './adapter';
import { SessionAdapter, type SessionAdapterOptions } from './session.adapter';

/** Cookies the admin UI expects before it accepts a login post */
export const BASE_COOKIES: Readonly<Record<string, string>> = {
  bv: 'Chrome/138.0.0.0',
  uatype: 'NN',
  lang: 'En',
  favmode: 'false',
  vm: 'Html',
  param: '',
  access: '',
  bm: 'Low',
  selno: 'En',
};

export const WCD = {
  login: '/wcd/login.cgi',
  system: '/wcd/system.xml',
  jobs: '/wcd/job.xml',
  jobControl: '/wcd/job.cgi',
} as const;

export interface RawTransportOptions {
  readonly sendRaw?: typeof sendRawToTcp;
  readonly probeTcp?: typeof probeTcp;
  readonly rawPort?: number;
  /** Idle bound for raw transfers and the raw port probe */
  readonly timeoutMs?: number;
}

export interface DirectControllerOptions extends SessionAdapterOptions, RawTransportOptions {
  readonly snmp: SnmpProbe;
}

export function mapDeviceText(text: string | undefined): DeviceState {
  const value = (text ?? '').toLowerCase();
  if (!value) return 'unknown';
  if (/error|jam|fault|down|service call/.test(value)) return 'error';
  if (/warm/.test(value)) return 'warmup';
  if (/print|busy|process/.test(value)) return 'printing';
  if (/idle|ready|standby|sleep|energy/.test(value)) return 'idle';
  return 'unknown';
}

export function mapJobText(text: string | undefined): DeviceJobState {
  const value = (text ?? '').toLowerCase();
  if (/complete|finish|done|end/.test(value)) return 'completed';
  if (/error|fail|delete|cancel|abort/.test(value)) return 'failed';
  if (/print|output/.test(value)) return 'printing';
  if (/wait|queue|spool|hold|receiv|rip|pending/.test(value)) return 'pending';
  return 'unknown';
}

/** Cookie-session web admin (bizhub /wcd interface) plus RAW 9100 submission */
export class DirectControllerAdapter extends SessionAdapter implements ProtocolAdapter {
  readonly kind = 'direct' as const;
  readonly supportsCancel = true;

  private readonly snmp: SnmpProbe;
  private readonly sendRaw: typeof sendRawToTcp;
  private readonly probe: typeof probeTcp;
  private readonly rawPort: number;
  private readonly rawTimeoutMs: number | undefined;

  constructor(ctx: AdapterContext, options: DirectControllerOptions) {
    super(ctx, options);
    this.snmp = options.snmp;
    this.sendRaw = options.sendRaw ?? sendRawToTcp;
    this.probe = options.probeTcp ?? probeTcp;
    this.rawPort = options.rawPort ?? RAW_PRINT_PORT;
    this.rawTimeoutMs = options.timeoutMs;
  }

  async authenticate(): Promise<void> {
    const password = this.ctx.credential;
    if (password === undefined) {
      throw new AuthenticationFailedError('No admin credential configured', this.ctx.deviceId);
    }

    const res = await this.client.request(WCD.login, {
      cookies: BASE_COOKIES,
      form: { func: 'PSL_LP1_LOG', password },
    });

    const accepted = (res.statusCode === 200 || res.statusCode === 302)
      && res.setCookieNames.some((name) => name.includes('ID'));
    if (!accepted) {
      throw new AuthenticationFailedError(
        `Login rejected (HTTP ${res.statusCode})`,
        this.ctx.deviceId
      );
    }

    this.storeSession(res.cookies);
    logger.info({ deviceId: this.ctx.deviceId }, 'Authenticated with device web admin');
  }

  private async fetchDocument(path: string): Promise<DocNode> {
    const res = await this.sessionRequest(path);
    if (!isSuccess(res)) {
      throw new ProtocolError(`GET ${path} answered HTTP ${res.statusCode}`, this.ctx.deviceId);
    }
    return parseDocument(res.body);
  }

  async getStatus(deviceJobRef?: string): Promise<DeviceStatusReport> {
    const system = await this.fetchDocument(WCD.system);
    const state = mapDeviceText(findValue(system, ['Status', 'DeviceStatus', 'PrinterStatus']));
    const counter = Number(findValue(system, ['TotalCounter', 'PageCount']));
    const pagesPrinted = Number.isFinite(counter) ? counter : undefined;

    if (deviceJobRef === undefined) {
      return { state, pagesPrinted };
    }

    const jobs = await this.fetchDocument(WCD.jobs);
    const entry = findRecords(jobs, 'JobID').find((record) => {
      const id = findValue(record, ['JobID']);
      const name = findValue(record, ['JobName']);
      return id === deviceJobRef || name === deviceJobRef;
    });

    // Jobs leave the device list once output is finished
    if (!entry) {
      return { state, pagesPrinted, job: { state: 'completed' } };
    }
    const jobText = findValue(entry, ['JobStatus', 'Status']);
    return {
      state,
      pagesPrinted,
      job: { state: mapJobText(jobText), message: jobText },
    };
  }

  async getCapabilities(): Promise<Capabilities> {
    return this.ctx.profile;
  }

  async submitJob(job: PrintJob, payload: Buffer): Promise<SubmitResult> {
    // Refreshes the session and refuses to spool onto a faulted engine
    const status = await this.getStatus();
    if (status.state === 'error') {
      throw new ProtocolError('Device reports an error state', this.ctx.deviceId);
    }

    await this.sendRaw(wrapWithPjl(job.id, job.settings, payload), this.ctx.address, this.rawPort, this.rawTimeoutMs);
    logger.info({ deviceId: this.ctx.deviceId, jobId: job.id, bytes: payload.length }, 'Job spooled to device');
    return { deviceJobRef: job.id };
  }

  async cancelJob(deviceJobRef: string): Promise<void> {
    const res = await this.sessionRequest(WCD.jobControl, {
      form: { func: 'PSL_J_DEL', id: deviceJobRef },
    });
    if (!isSuccess(res) && res.statusCode !== 302) {
      throw new ProtocolError(`Job delete answered HTTP ${res.statusCode}`, this.ctx.deviceId);
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
      checks.push(passCheck('authentication', 'Admin authentication successful'));
    } catch (error) {
      checks.push(failCheck('authentication', error));
    }

    try {
      await this.probe(this.ctx.address, this.rawPort, this.rawTimeoutMs);
      checks.push(passCheck('raw_port', `Port ${this.rawPort} accepts connections`));
    } catch (error) {
      checks.push(failCheck('raw_port', error));
    }

    return checks;
  }
}
