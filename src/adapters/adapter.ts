import type {
  AdapterKind,
  Capabilities,
  DeviceState,
  SessionHolder,
} from '../models/device.model';
import type { PrintJob } from '../models/print-job.model';

/** What the device says about a job it accepted */
export type DeviceJobState = 'pending' | 'printing' | 'completed' | 'failed' | 'unknown';

export interface DeviceStatusReport {
  readonly state: DeviceState;
  readonly pagesPrinted?: number;
  readonly job?: {
    readonly state: DeviceJobState;
    readonly message?: string;
  };
}

export interface SubmitResult {
  /** Handle for status polling and cancellation on the device side */
  readonly deviceJobRef: string;
}

export interface ConnectionCheck {
  readonly name: string;
  readonly status: 'pass' | 'fail' | 'skip';
  readonly message: string;
}

/** Everything an adapter knows about the device it drives */
export interface AdapterContext {
  readonly deviceId: string;
  readonly address: string;
  readonly model: string;
  /** Family capability profile from the signature table */
  readonly profile: Capabilities;
  readonly credential?: string;
  readonly session: SessionHolder;
}

/**
 * Uniform device contract. Callers never branch on the device family; every
 * protocol difference lives behind these methods. Failures are thrown as
 * GatewayError subclasses.
 */
export interface ProtocolAdapter {
  readonly kind: AdapterKind;
  readonly supportsCancel: boolean;
  authenticate(): Promise<void>;
  getStatus(deviceJobRef?: string): Promise<DeviceStatusReport>;
  getCapabilities(): Promise<Capabilities>;
  submitJob(job: PrintJob, payload: Buffer): Promise<SubmitResult>;
  cancelJob(deviceJobRef: string): Promise<void>;
  testConnection(): Promise<ConnectionCheck[]>;
}

export function passCheck(name: string, message: string): ConnectionCheck {
  return { name, status: 'pass', message };
}

export function failCheck(name: string, error: unknown): ConnectionCheck {
  return { name, status: 'fail', message: error instanceof Error ? error.message : String(error) };
}
