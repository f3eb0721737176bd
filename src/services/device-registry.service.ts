import type { AdapterContext, AdapterFactory, ProtocolAdapter } from '../adapters';
import {
  createSessionHolder,
  type AdapterKind,
  type Capabilities,
  type Device,
  type DevicePatch,
  type SessionHolder,
} from '../models/device.model';
import { deviceIdFor } from '../models/signature.model';
import { DeviceExistsError, DeviceNotFoundError } from '../utils/errors';
import { KeyedLock } from '../utils/keyed-lock';
import { logger } from '../utils/logger';
import { withTimeout } from '../utils/timing';
import type { DiscoveryResult } from './discovery.service';
import type { StoredDevice } from './state-store.service';

/** Read-only view of one registry entry */
export interface RegistryEntry {
  readonly device: Device;
  readonly adapter: ProtocolAdapter;
  readonly session: SessionHolder;
  readonly credential?: string;
}

interface MutableEntry {
  device: Device;
  adapter: ProtocolAdapter;
  session: SessionHolder;
  credential?: string;
  profile: Capabilities;
}

export interface MergeOutcome {
  readonly device: Device;
  readonly created: boolean;
  /** Status before the merge, for change notifications */
  readonly previousStatus: Device['status'] | null;
}

/** Input for registering a device by hand */
export interface DeviceRegistration {
  readonly address: string;
  readonly model: string;
  readonly name?: string;
  readonly controllerType: Device['controllerType'];
  readonly adapter: AdapterKind;
  readonly capabilities: Capabilities;
  readonly description?: string;
  readonly credential?: string;
}

function nowIso(): string {
  return new Date().toISOString();
}

/**
 * Single owner of device state. Adapters, sessions and credentials live with
 * their entry; `withDevice` serializes work per device through a keyed lock.
 */
export class DeviceRegistry {
  private readonly entries = new Map<string, MutableEntry>();
  private readonly byAddress = new Map<string, string>();
  private readonly lock = new KeyedLock();

  constructor(private readonly createAdapter: AdapterFactory) {}

  private bind(entry: Omit<MutableEntry, 'adapter'>, kind: AdapterKind): ProtocolAdapter {
    // Getters let a re-merged credential or profile reach the bound adapter
    const ctx: AdapterContext = {
      get deviceId() { return entry.device.id; },
      get address() { return entry.device.address; },
      get model() { return entry.device.model; },
      get profile() { return entry.profile; },
      get credential() { return entry.credential; },
      session: entry.session,
    };
    return this.createAdapter(kind, ctx);
  }

  private insert(device: Device, credential: string | undefined): MutableEntry {
    const base = {
      device,
      credential,
      profile: device.capabilities,
      session: createSessionHolder(),
    };
    const entry: MutableEntry = Object.assign(base, { adapter: this.bind(base, device.adapter) });
    this.entries.set(device.id, entry);
    this.byAddress.set(device.address, device.id);
    return entry;
  }

  /**
   * Merge a discovery result by address; a known address keeps its id.
   * Updates to a known device wait for its lock, since they may swap the
   * session or re-bind the adapter.
   */
  async merge(result: DiscoveryResult): Promise<MergeOutcome> {
    const existingId = this.byAddress.get(result.address);
    if (!existingId) return this.register(result);

    const outcome = await this.lock.run(existingId, async () => {
      const existing = this.entries.get(existingId);
      return existing ? this.refresh(existing, result) : null;
    });
    // Removed while we waited; start over against the current map
    return outcome ?? this.merge(result);
  }

  private register(result: DiscoveryResult): MergeOutcome {
    const now = nowIso();
    const device: Device = {
      id: deviceIdFor(result.model, result.address),
      address: result.address,
      name: `${result.family} ${result.model}`,
      model: result.model,
      controllerType: result.controllerType,
      adapter: result.adapter,
      capabilities: result.capabilities,
      status: result.status,
      statusReason: result.statusReason,
      description: result.description,
      lastProbeAt: result.status === 'Online' ? now : null,
      consecutiveFailures: 0,
      createdAt: now,
      updatedAt: now,
    };
    const entry = this.insert(device, result.credential);
    if (result.session) entry.session.replace(result.session);
    logger.info({ deviceId: device.id, address: device.address }, 'Device registered');
    return { device, created: true, previousStatus: null };
  }

  private refresh(existing: MutableEntry, result: DiscoveryResult): MergeOutcome {
    const now = nowIso();
    const previousStatus = existing.device.status;
    const kindChanged = existing.device.adapter !== result.adapter;
    existing.device = {
      ...existing.device,
      name: `${result.family} ${result.model}`,
      model: result.model,
      controllerType: result.controllerType,
      adapter: result.adapter,
      capabilities: result.capabilities,
      description: result.description,
      status: result.status,
      statusReason: result.statusReason,
      lastProbeAt: result.status === 'Online' ? now : existing.device.lastProbeAt,
      consecutiveFailures: result.status === 'Online' ? 0 : existing.device.consecutiveFailures,
      updatedAt: now,
    };
    existing.profile = result.capabilities;
    if (result.credential !== undefined) existing.credential = result.credential;
    if (result.session) existing.session.replace(result.session);
    if (kindChanged) {
      existing.session.replace(result.session);
      existing.adapter = this.bind(existing, result.adapter);
      logger.info({ deviceId: existing.device.id, adapter: result.adapter }, 'Device adapter re-bound');
    }
    return { device: existing.device, created: false, previousStatus };
  }

  /** Register a device by hand. Fails if the address is already known. */
  add(registration: DeviceRegistration): Device {
    if (this.byAddress.has(registration.address)) {
      throw new DeviceExistsError(registration.address);
    }
    const now = nowIso();
    const device: Device = {
      id: deviceIdFor(registration.model, registration.address),
      address: registration.address,
      name: registration.name ?? registration.model,
      model: registration.model,
      controllerType: registration.controllerType,
      adapter: registration.adapter,
      capabilities: registration.capabilities,
      status: 'Unknown',
      statusReason: null,
      description: registration.description ?? '',
      lastProbeAt: null,
      consecutiveFailures: 0,
      createdAt: now,
      updatedAt: now,
    };
    this.insert(device, registration.credential);
    return device;
  }

  remove(id: string): Device | undefined {
    const entry = this.entries.get(id);
    if (!entry) return undefined;
    this.entries.delete(id);
    this.byAddress.delete(entry.device.address);
    entry.session.replace(null);
    return entry.device;
  }

  get(id: string): RegistryEntry | undefined {
    return this.entries.get(id);
  }

  getDevice(id: string): Device | undefined {
    return this.entries.get(id)?.device;
  }

  require(id: string): RegistryEntry {
    const entry = this.entries.get(id);
    if (!entry) throw new DeviceNotFoundError(id);
    return entry;
  }

  findByAddress(address: string): Device | undefined {
    const id = this.byAddress.get(address);
    return id ? this.entries.get(id)?.device : undefined;
  }

  list(): Device[] {
    return Array.from(this.entries.values(), (e) => e.device)
      .sort((a, b) => a.address.localeCompare(b.address, undefined, { numeric: true }));
  }

  size(): number {
    return this.entries.size;
  }

  /** Status and capability fields only; identity is fixed at registration */
  update(id: string, patch: DevicePatch): Device {
    const entry = this.entries.get(id);
    if (!entry) throw new DeviceNotFoundError(id);
    entry.device = { ...entry.device, ...patch, updatedAt: nowIso() };
    if (patch.capabilities) entry.profile = patch.capabilities;
    return entry.device;
  }

  /** Run `fn` with exclusive access to one device */
  withDevice<T>(id: string, fn: (entry: RegistryEntry) => Promise<T>): Promise<T> {
    if (!this.entries.has(id)) {
      return Promise.reject(new DeviceNotFoundError(id));
    }
    return this.lock.run(id, async () => {
      // Re-read under the lock: the device may have been removed meanwhile
      const entry = this.entries.get(id);
      if (!entry) throw new DeviceNotFoundError(id);
      return fn(entry);
    });
  }

  /**
   * One adapter call under the device lock. The caller sees a timeout after
   * `timeoutMs`, but the lock is only released once `fn` itself settles.
   */
  callDevice<T>(id: string, label: string, timeoutMs: number, fn: (entry: RegistryEntry) => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.withDevice(id, (entry) => {
        const call = fn(entry);
        withTimeout(call, timeoutMs, label, id).then(resolve, reject);
        return call;
      }).catch((error: unknown) => {
        // Already settled by the timeout when the call fails late
        reject(error);
      });
    });
  }

  snapshot(): StoredDevice[] {
    return Array.from(this.entries.values(), (e) =>
      e.credential === undefined ? { device: e.device } : { device: e.device, credential: e.credential });
  }

  /** Restored devices start Unknown until the first health probe */
  restore(records: readonly StoredDevice[]): number {
    let restored = 0;
    for (const { device, credential } of records) {
      if (this.entries.has(device.id) || this.byAddress.has(device.address)) continue;
      this.insert({ ...device, status: 'Unknown', statusReason: null, consecutiveFailures: 0 }, credential);
      restored++;
    }
    return restored;
  }
}
