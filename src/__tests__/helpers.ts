import type { AdapterContext, ProtocolAdapter } from '../adapters';
import type { ConnectionCheck, DeviceStatusReport, SubmitResult } from '../adapters/adapter';
import type { AdapterKind, Capabilities } from '../models/device.model';
import type { PrintJob, PrintSettings } from '../models/print-job.model';
import { DEFAULT_PRINT_SETTINGS } from '../models/print-job.model';
import type { CredentialTable } from '../services/credential.service';
import { DeviceManager } from '../services/device-manager.service';
import { DeviceRegistry, type DeviceRegistration } from '../services/device-registry.service';
import { NetworkDiscovery } from '../services/discovery.service';
import { EventHub } from '../services/event-hub.service';
import { JobDispatcher, type DispatchSettings } from '../services/job-dispatcher.service';
import { JobStore } from '../services/job-store.service';
import { MemoryPayloadStore } from '../services/payload-store.service';
import type { SnmpPrinterStatus, SnmpProbe } from '../services/snmp.service';
import { AuthenticationFailedError, UnreachableError } from '../utils/errors';
import { sleep } from '../utils/timing';

export const PDF = Buffer.from('%PDF-1.4 test document');

export const MONO_A4: Capabilities = { color: false, duplex: true, maxPaperSize: 'A4', requiresAuth: false };
export const COLOR_A3: Capabilities = { color: true, duplex: true, maxPaperSize: 'A3', requiresAuth: false };

export function settings(overrides: Partial<PrintSettings> = {}): PrintSettings {
  return { ...DEFAULT_PRINT_SETTINGS, ...overrides };
}

/** SNMP agent answering from a fixed sysDescr table */
export class FakeSnmp implements SnmpProbe {
  constructor(private readonly descriptions: Record<string, string> = {}) {}

  async getDescription(host: string): Promise<string | null> {
    return this.descriptions[host] ?? null;
  }

  async getPrinterStatus(host: string): Promise<SnmpPrinterStatus> {
    if (!(host in this.descriptions)) throw new UnreachableError(`No SNMP response from ${host}`);
    return { state: 'idle', pagesPrinted: 10 };
  }
}

/** Scriptable adapter; each behaviour can be swapped per test */
export class FakeAdapter implements ProtocolAdapter {
  supportsCancel = true;
  submitted: string[] = [];
  cancelled: string[] = [];
  statusCalls = 0;

  authenticateImpl: () => Promise<void> = async () => undefined;
  statusImpl: (ref?: string) => Promise<DeviceStatusReport> = async (ref) =>
    ref === undefined ? { state: 'idle' } : { state: 'idle', job: { state: 'completed' } };
  submitImpl: (job: PrintJob, payload: Buffer) => Promise<SubmitResult> = async (job) => ({
    deviceJobRef: `ref-${job.id}`,
  });

  constructor(readonly kind: AdapterKind, readonly ctx: AdapterContext) {}

  authenticate(): Promise<void> {
    return this.authenticateImpl();
  }

  getStatus(deviceJobRef?: string): Promise<DeviceStatusReport> {
    this.statusCalls++;
    return this.statusImpl(deviceJobRef);
  }

  async getCapabilities(): Promise<Capabilities> {
    return this.ctx.profile;
  }

  submitJob(job: PrintJob, payload: Buffer): Promise<SubmitResult> {
    this.submitted.push(job.id);
    return this.submitImpl(job, payload);
  }

  async cancelJob(deviceJobRef: string): Promise<void> {
    this.cancelled.push(deviceJobRef);
  }

  async testConnection(): Promise<ConnectionCheck[]> {
    return [{ name: 'fake', status: 'pass', message: 'ok' }];
  }
}

/**
 * Adapter factory that remembers the last adapter bound per address.
 * `accepts` maps an address to the only admin password it takes.
 */
export class FakeAdapterFactory {
  readonly adapters = new Map<string, FakeAdapter>();
  readonly attempts: Array<{ address: string; credential?: string }> = [];

  constructor(private readonly accepts: Record<string, string> = {}) {}

  create = (kind: AdapterKind, ctx: AdapterContext): FakeAdapter => {
    const adapter = new FakeAdapter(kind, ctx);
    const accepted = this.accepts[ctx.address];
    adapter.authenticateImpl = async () => {
      this.attempts.push({ address: ctx.address, credential: ctx.credential });
      if (accepted !== undefined && ctx.credential !== accepted) {
        throw new AuthenticationFailedError('Login rejected', ctx.deviceId);
      }
    };
    this.adapters.set(ctx.address, adapter);
    return adapter;
  };

  for(address: string): FakeAdapter {
    const adapter = this.adapters.get(address);
    if (!adapter) throw new Error(`No adapter bound for ${address}`);
    return adapter;
  }
}

export const TEST_DISPATCH: DispatchSettings = {
  pollIntervalMs: 5,
  timeoutMs: 2000,
  backoffBaseMs: 1,
  backoffMaxMs: 5,
  callTimeoutMs: 500,
};

export interface FleetOptions {
  readonly descriptions?: Record<string, string>;
  readonly accepts?: Record<string, string>;
  readonly credentials?: CredentialTable;
  readonly maxRetries?: number;
  readonly dispatch?: Partial<DispatchSettings>;
}

/** Registry, stores, manager and dispatcher wired over fakes */
export function buildFleet(options: FleetOptions = {}) {
  const snmp = new FakeSnmp(options.descriptions);
  const fakes = new FakeAdapterFactory(options.accepts);
  const registry = new DeviceRegistry(fakes.create);
  const jobs = new JobStore();
  const payloads = new MemoryPayloadStore();
  const events = new EventHub();
  const discovery = new NetworkDiscovery({
    snmp,
    createAdapter: fakes.create,
    credentials: options.credentials ?? { models: {}, families: {}, default: [] },
    concurrency: 4,
  });
  const manager = new DeviceManager({
    registry,
    discovery,
    jobs,
    payloads,
    events,
    discoverySettings: { mode: 'list', machines: [], network: '10.0.0.0/30' },
    health: { intervalMs: 60_000, failureThreshold: 3, probeTimeoutMs: 500 },
    maxRetries: options.maxRetries ?? 3,
  });
  const dispatcher = new JobDispatcher({
    registry,
    jobs,
    payloads,
    events,
    settings: { ...TEST_DISPATCH, ...options.dispatch },
  });
  return { snmp, fakes, registry, jobs, payloads, events, discovery, manager, dispatcher };
}

export function monoDevice(address: string): DeviceRegistration {
  return {
    address,
    model: 'Mono 4000',
    controllerType: 'DirectController',
    adapter: 'raw',
    capabilities: MONO_A4,
  };
}

export function colorDevice(address: string): DeviceRegistration {
  return {
    address,
    model: 'C300',
    controllerType: 'DirectController',
    adapter: 'direct',
    capabilities: COLOR_A3,
  };
}

export async function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error('Condition not met in time');
    await sleep(5);
  }
}
