import { describe, it, expect } from 'vitest';
import type { DeviceStatusReport, SubmitResult } from '../adapters/adapter';
import type { StatusChange } from '../services/event-hub.service';
import { MemoryStateStore } from '../services/state-store.service';
import { DeviceRegistry } from '../services/device-registry.service';
import {
  AuthenticationFailedError,
  CapabilityMismatchError,
  DeviceExistsError,
  DeviceNotFoundError,
  UnreachableError,
} from '../utils/errors';
import { sleep } from '../utils/timing';
import { COLOR_A3, FakeAdapterFactory, PDF, buildFleet, colorDevice, monoDevice, settings, waitFor } from './helpers';

const MONO_ID = 'mono-4000-10-0-0-5';

describe('DeviceManager health', () => {
  it('goes Offline after the failure threshold and back Online on success', async () => {
    const { manager, fakes, events } = buildFleet();
    manager.add(monoDevice('10.0.0.5'));
    const adapter = fakes.for('10.0.0.5');
    const changes: StatusChange[] = [];
    events.on('device.status_changed', (change) => changes.push(change));

    adapter.statusImpl = async () => {
      throw new UnreachableError('No route to host');
    };
    const afterOne = await manager.probeDevice(MONO_ID);
    expect(afterOne.status).toBe('Unknown');
    expect(afterOne.consecutiveFailures).toBe(1);

    await manager.probeDevice(MONO_ID);
    const afterThree = await manager.probeDevice(MONO_ID);
    expect(afterThree.status).toBe('Offline');
    expect(afterThree.statusReason).toBe('Unreachable');
    expect(afterThree.consecutiveFailures).toBe(3);

    adapter.statusImpl = async () => ({ state: 'idle' });
    const recovered = await manager.probeDevice(MONO_ID);
    expect(recovered.status).toBe('Online');
    expect(recovered.statusReason).toBeNull();
    expect(recovered.consecutiveFailures).toBe(0);
    expect(recovered.lastProbeAt).not.toBeNull();

    expect(changes.map((c) => `${c.previous}->${c.device.status}`)).toEqual(['Unknown->Offline', 'Offline->Online']);
  });

  it('marks a device Error at once when its credential is refused', async () => {
    const { manager, fakes } = buildFleet();
    manager.add(colorDevice('10.0.0.7'));
    fakes.for('10.0.0.7').statusImpl = async () => {
      throw new AuthenticationFailedError('Login rejected');
    };

    const device = await manager.probeDevice('c300-10-0-0-7');
    expect(device.status).toBe('Error');
    expect(device.statusReason).toBe('AuthenticationFailed');
    expect(device.consecutiveFailures).toBe(1);
  });

  it('treats a hung probe as a failure', async () => {
    const { manager, fakes } = buildFleet();
    manager.add(monoDevice('10.0.0.5'));
    fakes.for('10.0.0.5').statusImpl = () => new Promise(() => undefined);

    const device = await manager.probeDevice(MONO_ID);
    expect(device.consecutiveFailures).toBe(1);
  });

  it('keeps the device to itself until a timed-out health check returns', async () => {
    const { manager, dispatcher, fakes, jobs } = buildFleet();
    manager.add(colorDevice('10.0.0.7'));
    const adapter = fakes.for('10.0.0.7');
    let active = 0;
    let maxActive = 0;
    const track = async <T>(ms: number, value: T): Promise<T> => {
      active++;
      maxActive = Math.max(maxActive, active);
      await sleep(ms);
      active--;
      return value;
    };
    let hang = true;
    adapter.statusImpl = (ref) => {
      if (ref === undefined && hang) {
        hang = false;
        return track<DeviceStatusReport>(800, { state: 'idle' });
      }
      return track<DeviceStatusReport>(1, { state: 'idle', job: { state: 'completed' } });
    };
    adapter.submitImpl = (job) => track<SubmitResult>(1, { deviceJobRef: `ref-${job.id}` });
    dispatcher.start();

    const checked = await manager.probeDevice('c300-10-0-0-7');
    expect(checked.consecutiveFailures).toBe(1);
    expect(active).toBe(1);

    const job = await manager.admitJob('c300-10-0-0-7', settings(), PDF, { source: 'api' });
    await waitFor(() => jobs.get(job.id)?.status === 'Completed');
    dispatcher.stop();

    expect(maxActive).toBe(1);
    expect(adapter.submitted).toEqual([job.id]);
  });

  it('probes every device in a cycle independently', async () => {
    const { manager, fakes } = buildFleet();
    manager.add(monoDevice('10.0.0.5'));
    manager.add(colorDevice('10.0.0.7'));
    fakes.for('10.0.0.5').statusImpl = async () => {
      throw new UnreachableError('down');
    };

    await manager.runHealthCycle();
    expect(manager.get(MONO_ID).consecutiveFailures).toBe(1);
    expect(manager.get('c300-10-0-0-7').status).toBe('Online');
  });
});

describe('DeviceManager admission', () => {
  it('rejects a color job for a monochrome device before queueing', async () => {
    const { manager, jobs, events } = buildFleet();
    manager.add(monoDevice('10.0.0.5'));
    let queued = 0;
    events.on('job.queued', () => {
      queued++;
    });

    await expect(manager.admitJob(MONO_ID, settings({ colorMode: 'color' }), PDF, { source: 'api' }))
      .rejects.toBeInstanceOf(CapabilityMismatchError);
    expect(jobs.stats().total).toBe(0);
    expect(queued).toBe(0);
    expect(jobs.list()).toEqual([]);
  });

  it('rejects jobs for unknown devices', async () => {
    const { manager } = buildFleet();
    await expect(manager.admitJob('missing', settings(), PDF, { source: 'api' }))
      .rejects.toBeInstanceOf(DeviceNotFoundError);
  });

  it('stores the payload and queues an admitted job', async () => {
    const { manager, payloads, events } = buildFleet();
    manager.add(colorDevice('10.0.0.7'));
    const queued: string[] = [];
    events.on('job.queued', (job) => queued.push(job.id));

    const job = await manager.admitJob('c300-10-0-0-7', settings({ colorMode: 'color' }), PDF, {
      source: 'api',
      remoteId: 'r-1',
    });

    expect(job.status).toBe('Queued');
    expect(job.retryCount).toBe(0);
    expect(job.maxRetries).toBe(3);
    expect(job.remoteId).toBe('r-1');
    expect(job.title).toBe(`Job ${job.id.slice(0, 8)}`);
    expect(job.payloadSize).toBe(PDF.length);
    expect(payloads.has(job.payloadRef)).toBe(true);
    expect(queued).toEqual([job.id]);
  });
});

describe('DeviceManager registry operations', () => {
  it('refuses a second device at the same address', () => {
    const { manager } = buildFleet();
    manager.add(monoDevice('10.0.0.5'));
    expect(() => manager.add(colorDevice('10.0.0.5'))).toThrow(DeviceExistsError);
  });

  it('removes a device and announces it', () => {
    const { manager, events } = buildFleet();
    manager.add(monoDevice('10.0.0.5'));
    const removed: string[] = [];
    events.on('device.removed', ({ id }) => removed.push(id));

    manager.remove(MONO_ID);
    expect(removed).toEqual([MONO_ID]);
    expect(() => manager.get(MONO_ID)).toThrow(DeviceNotFoundError);
    expect(() => manager.remove(MONO_ID)).toThrow(DeviceNotFoundError);
  });

  it('counts devices by status', async () => {
    const { manager, fakes } = buildFleet();
    manager.add(monoDevice('10.0.0.5'));
    manager.add(colorDevice('10.0.0.7'));
    fakes.for('10.0.0.7').statusImpl = async () => ({ state: 'idle' });
    await manager.probeDevice('c300-10-0-0-7');

    expect(manager.stats()).toEqual({ total: 2, online: 1, offline: 0, error: 0, unknown: 1 });
  });
});

describe('registry persistence', () => {
  it('restores devices as Unknown with their credentials', () => {
    const state = new MemoryStateStore();
    const source = new DeviceRegistry(new FakeAdapterFactory().create);
    source.add({ ...colorDevice('10.0.0.7'), credential: 'test-secret' });
    source.update('c300-10-0-0-7', { status: 'Online', consecutiveFailures: 2 });
    state.saveDevices(source.snapshot());

    const restored = new DeviceRegistry(new FakeAdapterFactory().create);
    expect(restored.restore(state.loadDevices())).toBe(1);
    const entry = restored.require('c300-10-0-0-7');
    expect(entry.device.status).toBe('Unknown');
    expect(entry.device.consecutiveFailures).toBe(0);
    expect(entry.credential).toBe('test-secret');
  });
});

describe('registry merge', () => {
  it('waits for in-flight device work before swapping adapter and session', async () => {
    const registry = new DeviceRegistry(new FakeAdapterFactory().create);
    registry.add(colorDevice('10.0.0.7'));
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const busy = registry.withDevice('c300-10-0-0-7', () => gate);

    const session = {
      deviceId: 'c300-10-0-0-7',
      cookies: { sid: 'abc' },
      issuedAt: '2024-01-01T00:00:00.000Z',
      expiresAt: '2024-01-01T00:30:00.000Z',
    };
    const merged = registry.merge({
      address: '10.0.0.7',
      description: 'bizhub C300 Fiery',
      family: 'fiery',
      model: 'C300',
      controllerType: 'ManagedController',
      adapter: 'managed',
      capabilities: COLOR_A3,
      credential: 'test-secret',
      session,
      status: 'Online',
      statusReason: null,
    });

    await sleep(10);
    const during = registry.require('c300-10-0-0-7');
    expect(during.adapter.kind).toBe('direct');
    expect(during.session.get()).toBeNull();

    release();
    await busy;
    const outcome = await merged;
    const after = registry.require('c300-10-0-0-7');
    expect(outcome.created).toBe(false);
    expect(after.adapter.kind).toBe('managed');
    expect(after.session.get()).toEqual(session);
    expect(after.credential).toBe('test-secret');
  });
});
