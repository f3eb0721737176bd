import type { Capabilities } from '../models/device.model';
import type { PrintJob } from '../models/print-job.model';
import {
  RAW_PRINT_PORT,
  probeTcp,
  sendRawToTcp,
  wrapWithPjl,
} from '../services/raw-stream.service';
import type { SnmpProbe } from '../services/snmp.service';
import { CapabilityMismatchError } from '../utils/errors';
import { logger } from '../utils/logger';
import {
  failCheck,
  passCheck,
  type AdapterContext,
  type ConnectionCheck,
  type DeviceStatusReport,
  type ProtocolAdapter,
  type SubmitResult,
} from './adapter';
import type { RawTransportOptions } from './direct-controller.adapter';

export interface RawStreamOptions extends RawTransportOptions {
  readonly snmp: SnmpProbe;
}

/**
 * Port 9100 printing with no session. The device gives no job feedback, so a
 * job is complete as soon as the socket write succeeds.
 */
export class RawStreamAdapter implements ProtocolAdapter {
  readonly kind = 'raw' as const;
  readonly supportsCancel = false;

  private readonly snmp: SnmpProbe;
  private readonly sendRaw: typeof sendRawToTcp;
  private readonly probe: typeof probeTcp;
  private readonly port: number;
  private readonly timeoutMs: number | undefined;

  constructor(private readonly ctx: AdapterContext, options: RawStreamOptions) {
    this.snmp = options.snmp;
    this.sendRaw = options.sendRaw ?? sendRawToTcp;
    this.probe = options.probeTcp ?? probeTcp;
    this.port = options.rawPort ?? RAW_PRINT_PORT;
    this.timeoutMs = options.timeoutMs;
  }

  async authenticate(): Promise<void> {
    // RAW port has no login
  }

  async getStatus(deviceJobRef?: string): Promise<DeviceStatusReport> {
    await this.probe(this.ctx.address, this.port, this.timeoutMs);
    return deviceJobRef === undefined
      ? { state: 'idle' }
      : { state: 'idle', job: { state: 'completed' } };
  }

  async getCapabilities(): Promise<Capabilities> {
    return this.ctx.profile;
  }

  async submitJob(job: PrintJob, payload: Buffer): Promise<SubmitResult> {
    await this.sendRaw(wrapWithPjl(job.id, job.settings, payload), this.ctx.address, this.port, this.timeoutMs);
    logger.info({ deviceId: this.ctx.deviceId, jobId: job.id, bytes: payload.length }, 'Job streamed to raw port');
    return { deviceJobRef: job.id };
  }

  async cancelJob(_deviceJobRef: string): Promise<void> {
    throw new CapabilityMismatchError(['raw port printing cannot cancel a sent job'], this.ctx.deviceId);
  }

  async testConnection(): Promise<ConnectionCheck[]> {
    const checks: ConnectionCheck[] = [];
    const descr = await this.snmp.getDescription(this.ctx.address);
    checks.push(descr
      ? passCheck('snmp', `SNMP working: ${descr}`)
      : failCheck('snmp', 'No SNMP response'));

    try {
      await this.probe(this.ctx.address, this.port, this.timeoutMs);
      checks.push(passCheck('raw_port', `Port ${this.port} accepts connections`));
    } catch (error) {
      checks.push(failCheck('raw_port', error));
    }
    return checks;
  }
}
