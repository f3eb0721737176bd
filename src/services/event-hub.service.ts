import { EventEmitter } from 'events';
import type { Device, DeviceStatus } from '../models/device.model';
import type { PrintJob } from '../models/print-job.model';
import type { ErrorKind } from '../utils/errors';
import { logger } from '../utils/logger';

export interface StatusChange {
  readonly device: Device;
  readonly previous: DeviceStatus;
  readonly reason: ErrorKind | null;
}

/** Lifecycle events and their payloads */
export interface GatewayEvents {
  'device.discovered': Device;
  'device.status_changed': StatusChange;
  'device.removed': { readonly id: string; readonly address: string };
  'job.queued': PrintJob;
  'job.completed': PrintJob;
  'job.failed': PrintJob;
  'job.cancelled': PrintJob;
  'system.started': { readonly version: string; readonly devices: number };
}

export type GatewayEventType = keyof GatewayEvents;

export const LIFECYCLE_EVENTS: readonly GatewayEventType[] = [
  'device.discovered',
  'device.status_changed',
  'device.removed',
  'job.queued',
  'job.completed',
  'job.failed',
  'job.cancelled',
  'system.started',
];

// Event emitter for Socket.IO and webhook integration
export type AnyEventHandler = (event: string, data: unknown) => void;

const ANY = Symbol('any');

/**
 * In-process event bus. Listener errors are logged and never reach the
 * emitter, so a broken subscriber cannot stall a dispatch loop.
 */
export class EventHub {
  private readonly emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(50);
  }

  emit<K extends GatewayEventType>(event: K, data: GatewayEvents[K]): void {
    this.dispatch(event, data);
    this.dispatch(ANY, event, data);
  }

  /** Re-emit an event received from a remote system as `remote.<type>` */
  emitRemote(type: string, data: unknown): void {
    const event = `remote.${type}`;
    this.dispatch(event, data);
    this.dispatch(ANY, event, data);
  }

  on<K extends GatewayEventType>(event: K, handler: (data: GatewayEvents[K]) => void): () => void {
    const listener = (data: GatewayEvents[K]) => handler(data);
    this.emitter.on(event, listener);
    return () => {
      this.emitter.off(event, listener);
    };
  }

  onRemote(type: string, handler: (data: unknown) => void): () => void {
    const event = `remote.${type}`;
    this.emitter.on(event, handler);
    return () => {
      this.emitter.off(event, handler);
    };
  }

  onAny(handler: AnyEventHandler): () => void {
    this.emitter.on(ANY, handler);
    return () => {
      this.emitter.off(ANY, handler);
    };
  }

  private dispatch(event: string | symbol, ...args: unknown[]): void {
    for (const listener of this.emitter.listeners(event)) {
      try {
        listener(...args);
      } catch (error) {
        logger.error({ error, event: String(event) }, 'Event listener failed');
      }
    }
  }
}
