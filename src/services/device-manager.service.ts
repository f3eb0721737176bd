import { v4 as uuidv4 } from 'uuid';
import type { ConnectionCheck, DeviceStatusReport } from '../adapters/adapter';
import type { MachineEntry } from '../config';
import type { Device, DevicePatch, DeviceStats } from '../models/device.model';
import type { PrintJob, PrintSettings } from '../models/print-job.model';
import { capabilityViolations } from '../models/signature.model';
import {
  AuthenticationFailedError,
  CapabilityMismatchError,
  DeviceNotFoundError,
  toGatewayError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import type { DeviceRegistration, DeviceRegistry } from './device-registry.service';
import type { DiscoveryResult, DiscoveryTarget, NetworkDiscovery } from './discovery.service';
import type { EventHub } from './event-hub.service';
import type { JobStore } from './job-store.service';
import type { PayloadStore } from './payload-store.service';
import type { StateStore } from './state-store.service';

export interface HealthSettings {
  readonly intervalMs: number;
  readonly failureThreshold: number;
  readonly probeTimeoutMs: number;
}

export interface DiscoverySettings {
  readonly mode: 'list' | 'scan';
  readonly machines: readonly MachineEntry[];
  readonly network: string;
}

export interface DeviceManagerOptions {
  readonly registry: DeviceRegistry;
  readonly discovery: NetworkDiscovery;
  readonly jobs: JobStore;
  readonly payloads: PayloadStore;
  readonly events: EventHub;
  readonly state?: StateStore;
  readonly discoverySettings: DiscoverySettings;
  readonly health: HealthSettings;
  readonly maxRetries: number;
}

export interface DiscoverySummary {
  readonly found: number;
  readonly created: number;
  readonly updated: number;
  readonly devices: Device[];
}

export interface AdmitMeta {
  readonly title?: string;
  readonly source: string;
  readonly remoteId?: string | null;
}

/**
 * Fleet facade: discovery merges, job admission and the health loop. All
 * device state goes through the registry.
 */
export class DeviceManager {
  private readonly registry: DeviceRegistry;
  private healthTimer: NodeJS.Timeout | null = null;
  private healthRunning = false;

  constructor(private readonly options: DeviceManagerOptions) {
    this.registry = options.registry;
  }

  /** Load the persisted registry; restored devices wait for the first probe */
  restore(): number {
    if (!this.options.state) return 0;
    const count = this.registry.restore(this.options.state.loadDevices());
    if (count > 0) logger.info({ count }, 'Devices restored from state');
    return count;
  }

  /** Run discovery in the configured mode */
  discover(signal?: AbortSignal): Promise<DiscoverySummary> {
    const { mode, machines, network } = this.options.discoverySettings;
    if (mode === 'scan') return this.discoverNetwork(network, signal);
    return this.discoverTargets(machines, signal);
  }

  discoverNetwork(cidr: string, signal?: AbortSignal): Promise<DiscoverySummary> {
    logger.info({ cidr }, 'Starting network discovery');
    return this.mergeAll(this.options.discovery.scanRange(cidr, { signal }));
  }

  discoverAddresses(addresses: readonly string[], signal?: AbortSignal): Promise<DiscoverySummary> {
    return this.discoverTargets(addresses.map((address) => ({ address })), signal);
  }

  private discoverTargets(targets: readonly DiscoveryTarget[], signal?: AbortSignal): Promise<DiscoverySummary> {
    logger.info({ count: targets.length }, 'Starting address discovery');
    return this.mergeAll(this.options.discovery.scanAddresses(targets, { signal }));
  }

  private async mergeAll(results: AsyncIterable<DiscoveryResult>): Promise<DiscoverySummary> {
    let found = 0;
    let created = 0;
    const devices: Device[] = [];

    for await (const result of results) {
      found++;
      const outcome = await this.registry.merge(result);
      devices.push(outcome.device);
      if (outcome.created) {
        created++;
        this.options.events.emit('device.discovered', outcome.device);
      } else if (outcome.previousStatus !== outcome.device.status) {
        this.options.events.emit('device.status_changed', {
          device: outcome.device,
          previous: outcome.previousStatus ?? 'Unknown',
          reason: outcome.device.statusReason,
        });
      }
    }

    this.persist();
    logger.info({ found, created, total: this.registry.size() }, 'Discovery finished');
    return { found, created, updated: found - created, devices };
  }

  add(registration: DeviceRegistration): Device {
    const device = this.registry.add(registration);
    this.persist();
    this.options.events.emit('device.discovered', device);
    return device;
  }

  remove(id: string): Device {
    const device = this.registry.remove(id);
    if (!device) throw new DeviceNotFoundError(id);
    this.persist();
    this.options.events.emit('device.removed', { id: device.id, address: device.address });
    logger.info({ deviceId: id }, 'Device removed');
    return device;
  }

  list(): Device[] {
    return this.registry.list();
  }

  get(id: string): Device {
    return this.registry.require(id).device;
  }

  /**
   * Admission control. Nothing is stored and no job exists unless the device
   * is known and its capability snapshot covers the settings.
   */
  async admitJob(deviceId: string, settings: PrintSettings, payload: Buffer, meta: AdmitMeta): Promise<PrintJob> {
    const device = this.registry.require(deviceId).device;
    const violations = capabilityViolations(device.capabilities, settings);
    if (violations.length > 0) {
      logger.warn({ deviceId, violations }, 'Job rejected at admission');
      throw new CapabilityMismatchError(violations, deviceId);
    }

    const id = uuidv4();
    const payloadRef = await this.options.payloads.put(id, payload);
    const job = this.options.jobs.create({
      id,
      deviceId,
      title: meta.title || `Job ${id.slice(0, 8)}`,
      payloadRef,
      payloadSize: payload.length,
      settings,
      maxRetries: this.options.maxRetries,
      remoteId: meta.remoteId ?? null,
      source: meta.source,
    });
    this.options.events.emit('job.queued', job);
    return job;
  }

  /** Live adapter status, fetched under the device lock */
  getLiveStatus(id: string): Promise<DeviceStatusReport> {
    const { probeTimeoutMs } = this.options.health;
    return this.registry.callDevice(id, 'Status query', probeTimeoutMs, (entry) => entry.adapter.getStatus());
  }

  testDevice(id: string): Promise<ConnectionCheck[]> {
    return this.registry.withDevice(id, async (entry) => {
      const checks = await entry.adapter.testConnection();
      logger.info({ deviceId: id, checks: checks.map((c) => `${c.name}:${c.status}`) }, 'Connection test finished');
      return checks;
    });
  }

  stats(): DeviceStats {
    const devices = this.registry.list();
    const count = (status: Device['status']) => devices.filter((d) => d.status === status).length;
    return {
      total: devices.length,
      online: count('Online'),
      offline: count('Offline'),
      error: count('Error'),
      unknown: count('Unknown') + count('Discovering'),
    };
  }

  /** One health probe: status and capabilities, under the lock, with a timeout */
  async probeDevice(id: string): Promise<Device> {
    const { probeTimeoutMs, failureThreshold } = this.options.health;
    const before = this.registry.require(id).device;

    let patch: DevicePatch;
    try {
      const capabilities = await this.registry.callDevice(id, 'Health probe', probeTimeoutMs, async (entry) => {
        await entry.adapter.getStatus();
        return entry.adapter.getCapabilities();
      });
      patch = {
        status: 'Online',
        statusReason: null,
        consecutiveFailures: 0,
        lastProbeAt: new Date().toISOString(),
        capabilities,
      };
    } catch (error) {
      if (error instanceof DeviceNotFoundError) throw error;
      const failure = toGatewayError(error, id);
      const failures = before.consecutiveFailures + 1;
      logger.warn({ deviceId: id, failures, kind: failure.kind, error: failure.message }, 'Health probe failed');

      if (failure instanceof AuthenticationFailedError) {
        patch = { status: 'Error', statusReason: failure.kind, consecutiveFailures: failures };
      } else if (failures >= failureThreshold) {
        patch = { status: 'Offline', statusReason: failure.kind, consecutiveFailures: failures };
      } else {
        patch = { consecutiveFailures: failures };
      }
    }

    // The device may have been removed while the probe ran
    if (!this.registry.get(id)) return before;
    const after = this.registry.update(id, patch);
    if (after.status !== before.status) {
      logger.info({ deviceId: id, from: before.status, to: after.status }, 'Device status changed');
      this.options.events.emit('device.status_changed', {
        device: after,
        previous: before.status,
        reason: after.statusReason,
      });
    }
    return after;
  }

  /** Probe every device in parallel; one failing device never affects another */
  async runHealthCycle(): Promise<void> {
    const ids = this.registry.list().map((d) => d.id);
    await Promise.all(ids.map(async (id) => {
      try {
        await this.probeDevice(id);
      } catch (error) {
        logger.error({ error, deviceId: id }, 'Health probe crashed');
      }
    }));
    this.persist();
  }

  startHealthLoop(): void {
    if (this.healthTimer) return;
    const tick = async () => {
      if (!this.healthRunning) {
        this.healthRunning = true;
        try {
          await this.runHealthCycle();
        } finally {
          this.healthRunning = false;
        }
      }
      if (this.healthTimer) this.schedule(tick);
    };
    this.schedule(tick);
    logger.info({ intervalMs: this.options.health.intervalMs }, 'Health loop started');
  }

  stopHealthLoop(): void {
    if (this.healthTimer) {
      clearTimeout(this.healthTimer);
      this.healthTimer = null;
    }
  }

  private schedule(tick: () => Promise<void>): void {
    this.healthTimer = setTimeout(() => {
      tick().catch((error: unknown) => logger.error({ error }, 'Health loop tick failed'));
    }, this.options.health.intervalMs);
    this.healthTimer.unref();
  }

  persist(): void {
    if (!this.options.state) return;
    try {
      this.options.state.saveDevices(this.registry.snapshot());
    } catch (error) {
      logger.error({ error }, 'Failed to persist device registry');
    }
  }
}
