import type { Capabilities } from '../models/device.model';
import type { PrintJob } from '../models/print-job.model';
import type { SnmpProbe } from '../services/snmp.service';
import { CapabilityMismatchError } from '../utils/errors';
import {
  failCheck,
  passCheck,
  type AdapterContext,
  type ConnectionCheck,
  type DeviceStatusReport,
  type ProtocolAdapter,
  type SubmitResult,
} from './adapter';

/** SNMP-only device: status and page counter, no printing */
export class MonitoringAdapter implements ProtocolAdapter {
  readonly kind = 'monitoring' as const;
  readonly supportsCancel = false;

  constructor(
    private readonly ctx: AdapterContext,
    private readonly snmp: SnmpProbe
  ) {}

  async authenticate(): Promise<void> {
    // SNMP community access only
  }

  async getStatus(): Promise<DeviceStatusReport> {
    const status = await this.snmp.getPrinterStatus(this.ctx.address);
    return { state: status.state, pagesPrinted: status.pagesPrinted };
  }

  async getCapabilities(): Promise<Capabilities> {
    return this.ctx.profile;
  }

  async submitJob(_job: PrintJob, _payload: Buffer): Promise<SubmitResult> {
    throw new CapabilityMismatchError(['device is monitoring-only and accepts no print jobs'], this.ctx.deviceId);
  }

  async cancelJob(_deviceJobRef: string): Promise<void> {
    throw new CapabilityMismatchError(['device does not support job cancellation'], this.ctx.deviceId);
  }

  async testConnection(): Promise<ConnectionCheck[]> {
    try {
      const status = await this.getStatus();
      return [
        passCheck('snmp', `Printer status ${status.state}`),
        { name: 'printing', status: 'skip', message: 'Monitoring-only device' },
      ];
    } catch (error) {
      return [failCheck('snmp', error)];
    }
  }
}
