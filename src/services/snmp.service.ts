import * as snmp from 'net-snmp';
import type { DeviceState } from '../models/device.model';
import { UnreachableError } from '../utils/errors';
import { logger } from '../utils/logger';

export const OID_SYS_DESCR = '1.3.6.1.2.1.1.1.0';
export const OID_HR_DEVICE_STATUS = '1.3.6.1.2.1.25.3.2.1.5.1';
export const OID_HR_PRINTER_STATUS = '1.3.6.1.2.1.25.3.5.1.1.1';
export const OID_PAGE_COUNT = '1.3.6.1.2.1.43.10.2.1.4.1.1';

export interface SnmpPrinterStatus {
  readonly state: DeviceState;
  readonly pagesPrinted?: number;
}

export interface SnmpProbe {
  /** sysDescr.0, or null when the host does not answer */
  getDescription(host: string): Promise<string | null>;
  /** Throws UnreachableError when the host does not answer */
  getPrinterStatus(host: string): Promise<SnmpPrinterStatus>;
}

export interface SnmpOptions {
  readonly community: string;
  readonly timeoutMs: number;
  readonly retries?: number;
  readonly port?: number;
}

/** hrPrinterStatus: other(1) unknown(2) idle(3) printing(4) warmup(5) */
export function mapPrinterStatus(printerStatus: number | undefined, deviceStatus?: number): DeviceState {
  // hrDeviceStatus down(5) wins over whatever the printer MIB says
  if (deviceStatus === 5) return 'error';
  switch (printerStatus) {
    case 3: return 'idle';
    case 4: return 'printing';
    case 5: return 'warmup';
    case 1: return deviceStatus === 3 ? 'error' : 'unknown';
    default: return 'unknown';
  }
}

function varbindText(value: unknown): string {
  if (Buffer.isBuffer(value)) return value.toString('utf-8').replace(/\0+$/, '').trim();
  return String(value ?? '').trim();
}

function varbindNumber(value: unknown): number | undefined {
  const n = typeof value === 'number' ? value : Number(varbindText(value));
  return Number.isFinite(n) ? n : undefined;
}

/** SNMP v2c probe over UDP using net-snmp */
export class NetSnmpProbe implements SnmpProbe {
  constructor(private readonly options: SnmpOptions) {}

  private get(host: string, oids: string[]): Promise<Map<string, unknown>> {
    return new Promise((resolve, reject) => {
      let settled = false;
      const session = snmp.createSession(host, this.options.community, {
        version: snmp.Version2c,
        timeout: this.options.timeoutMs,
        retries: this.options.retries ?? 0,
        port: this.options.port ?? 161,
        transport: 'udp4',
      });

      const finish = (error: Error | null, values?: Map<string, unknown>) => {
        if (settled) return;
        settled = true;
        try {
          session.close();
        } catch (closeError) {
          logger.debug({ host, error: closeError }, 'SNMP session close failed');
        }
        if (error || !values) {
          reject(new UnreachableError(`SNMP query to ${host} failed: ${error ? error.message : 'no response'}`));
        } else {
          resolve(values);
        }
      };

      session.on('error', (error: Error) => finish(error));

      session.get(oids, (error, varbinds) => {
        if (error) {
          finish(error);
          return;
        }
        const values = new Map<string, unknown>();
        for (const vb of varbinds ?? []) {
          if (!snmp.isVarbindError(vb)) {
            values.set(vb.oid, vb.value);
          }
        }
        finish(null, values);
      });
    });
  }

  async getDescription(host: string): Promise<string | null> {
    try {
      const values = await this.get(host, [OID_SYS_DESCR]);
      const descr = varbindText(values.get(OID_SYS_DESCR));
      return descr || null;
    } catch (error) {
      logger.debug({ host, error }, 'SNMP sysDescr query failed');
      return null;
    }
  }

  async getPrinterStatus(host: string): Promise<SnmpPrinterStatus> {
    const values = await this.get(host, [OID_HR_PRINTER_STATUS, OID_HR_DEVICE_STATUS, OID_PAGE_COUNT]);
    return {
      state: mapPrinterStatus(
        varbindNumber(values.get(OID_HR_PRINTER_STATUS)),
        varbindNumber(values.get(OID_HR_DEVICE_STATUS))
      ),
      pagesPrinted: varbindNumber(values.get(OID_PAGE_COUNT)),
    };
  }
}
