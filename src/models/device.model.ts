import type { PaperSizeId } from './paper-size.model';
import type { ErrorKind } from '../utils/errors';

export type ControllerType = 'DirectController' | 'ManagedController';

/** Which ProtocolAdapter variant a device is bound to */
export type AdapterKind = 'direct' | 'managed' | 'monitoring' | 'raw';

export type DeviceStatus = 'Unknown' | 'Discovering' | 'Online' | 'Offline' | 'Error';

/** Physical engine state as the device reports it */
export type DeviceState = 'idle' | 'printing' | 'warmup' | 'error' | 'unknown';

export interface Capabilities {
  readonly color: boolean;
  readonly duplex: boolean;
  readonly maxPaperSize: PaperSizeId;
  readonly requiresAuth: boolean;
}

export interface Device {
  readonly id: string;
  readonly address: string;
  readonly name: string;
  readonly model: string;
  readonly controllerType: ControllerType;
  readonly adapter: AdapterKind;
  readonly capabilities: Capabilities;
  readonly status: DeviceStatus;
  readonly statusReason: ErrorKind | null;
  readonly description: string;
  readonly lastProbeAt: string | null;
  readonly consecutiveFailures: number;
  readonly createdAt: string;
  readonly updatedAt: string;
}

/** Fields DeviceManager may change after registration */
export type DevicePatch = Partial<Pick<Device,
  'status' | 'statusReason' | 'capabilities' | 'lastProbeAt' | 'consecutiveFailures'>>;

export interface Session {
  readonly deviceId: string;
  readonly cookies: Readonly<Record<string, string>>;
  readonly issuedAt: string;
  readonly expiresAt: string;
}

/**
 * Access to one device's session. The session is only ever swapped as a
 * whole, never edited in place.
 */
export interface SessionHolder {
  get(): Session | null;
  replace(session: Session | null): void;
}

export interface DeviceStats {
  readonly total: number;
  readonly online: number;
  readonly offline: number;
  readonly error: number;
  readonly unknown: number;
}

export function createSessionHolder(initial: Session | null = null): SessionHolder {
  let current = initial;
  return {
    get: () => current,
    replace: (session) => {
      current = session;
    },
  };
}

export function isSessionExpired(session: Session, now = Date.now()): boolean {
  return Date.parse(session.expiresAt) <= now;
}
