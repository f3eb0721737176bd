import { describe, it, expect } from 'vitest';
import type { DiscoveryResult } from '../services/discovery.service';
import type { Device } from '../models/device.model';
import { buildFleet } from './helpers';

const DESCRIPTIONS: Record<string, string> = {
  '192.168.0.200': 'KONICA MINOLTA bizhub C654e',
  '192.168.0.131': 'KONICA MINOLTA bizhub C368',
  '192.168.0.210': 'KONICA MINOLTA bizhub C754e Fiery',
  '192.168.0.220': 'EFI Fiery Controller for bizhub C1070',
  '192.168.0.99': 'KONICA MINOLTA bizhub C250i',
  '192.168.0.1': 'Linux gateway 5.15.0',
};

const CREDENTIALS = {
  models: {},
  families: { 'bizhub-color': ['pw-color'], fiery: ['pw-fiery'] },
  default: ['fallback'],
};

const ACCEPTS: Record<string, string> = {
  '192.168.0.200': 'pw-color',
  '192.168.0.131': 'fallback',
  '192.168.0.210': 'pw-fiery',
  '192.168.0.220': 'configured',
  '192.168.0.99': 'never-guessed',
};

async function collect(results: AsyncIterable<DiscoveryResult>): Promise<DiscoveryResult[]> {
  const out: DiscoveryResult[] = [];
  for await (const result of results) out.push(result);
  return out.sort((a, b) => a.address.localeCompare(b.address, undefined, { numeric: true }));
}

function byAddress(devices: readonly Device[], address: string): Device {
  const device = devices.find((d) => d.address === address);
  if (!device) throw new Error(`No device at ${address}`);
  return device;
}

describe('NetworkDiscovery', () => {
  it('skips silent hosts and hosts that are not printers', async () => {
    const { discovery } = buildFleet({ descriptions: DESCRIPTIONS });
    const results = await collect(discovery.scanAddresses([
      { address: '192.168.0.1' },
      { address: '192.168.0.50' },
    ]));
    expect(results).toEqual([]);
  });

  it('negotiates credentials in table order', async () => {
    const { discovery, fakes } = buildFleet({ descriptions: DESCRIPTIONS, accepts: ACCEPTS, credentials: CREDENTIALS });
    const [result] = await collect(discovery.scanAddresses([{ address: '192.168.0.131' }]));

    expect(result?.status).toBe('Online');
    expect(result?.credential).toBe('fallback');
    expect(fakes.attempts.map((a) => a.credential)).toEqual(['pw-color', 'fallback']);
  });

  it('tries model-specific credentials before the family list', async () => {
    const credentials = { ...CREDENTIALS, models: { '754e': ['pw-754'], C654: ['pw-654'] } };

    const fiery = buildFleet({ descriptions: DESCRIPTIONS, accepts: ACCEPTS, credentials });
    const [c754] = await collect(fiery.discovery.scanAddresses([{ address: '192.168.0.210' }]));
    expect(c754?.credential).toBe('pw-fiery');
    expect(fiery.fakes.attempts.map((a) => a.credential)).toEqual(['pw-754', 'pw-fiery']);

    const direct = buildFleet({ descriptions: DESCRIPTIONS, accepts: ACCEPTS, credentials });
    const [c654] = await collect(direct.discovery.scanAddresses([{ address: '192.168.0.200' }]));
    expect(c654?.credential).toBe('pw-color');
    expect(direct.fakes.attempts.map((a) => a.credential)).toEqual(['pw-654', 'pw-color']);
  });

  it('tries a configured credential first', async () => {
    const { discovery, fakes } = buildFleet({ descriptions: DESCRIPTIONS, accepts: ACCEPTS, credentials: CREDENTIALS });
    const [result] = await collect(discovery.scanAddresses([{ address: '192.168.0.220', credential: 'configured' }]));

    expect(result?.adapter).toBe('managed');
    expect(result?.credential).toBe('configured');
    expect(fakes.attempts).toHaveLength(1);
  });

  it('reports Error when every credential is refused', async () => {
    const { discovery } = buildFleet({ descriptions: DESCRIPTIONS, accepts: ACCEPTS, credentials: CREDENTIALS });
    const [result] = await collect(discovery.scanAddresses([{ address: '192.168.0.99' }]));

    expect(result?.status).toBe('Error');
    expect(result?.statusReason).toBe('AuthenticationFailed');
    expect(result?.credential).toBeUndefined();
    expect(result?.session).toBeNull();
  });

  it('rejects a malformed range before scanning', () => {
    const { discovery } = buildFleet();
    expect(() => discovery.scanRange('10.0.0.0/40')).toThrow('Invalid CIDR range');
  });

  it('starts nothing once the scan is aborted', async () => {
    const { discovery } = buildFleet({ descriptions: DESCRIPTIONS });
    const controller = new AbortController();
    controller.abort();
    const results = await collect(discovery.scanRange('192.168.0.0/24', { signal: controller.signal }));
    expect(results).toEqual([]);
  });
});

describe('DeviceManager discovery', () => {
  const FLEET = ['192.168.0.200', '192.168.0.131', '192.168.0.210', '192.168.0.220'];
  const MACHINES = [
    { address: '192.168.0.200' },
    { address: '192.168.0.131' },
    { address: '192.168.0.210' },
    { address: '192.168.0.220', credential: 'configured' },
  ];

  const fleet = () => buildFleet({ descriptions: DESCRIPTIONS, accepts: ACCEPTS, credentials: CREDENTIALS });

  it('registers each printer with the adapter for its family', async () => {
    const { manager, registry } = fleet();
    const summary = await manager.discoverAddresses(FLEET);

    expect(summary.found).toBe(4);
    expect(summary.created).toBe(4);
    const devices = registry.list();
    expect(devices.map((d) => d.address)).toEqual([
      '192.168.0.131',
      '192.168.0.200',
      '192.168.0.210',
      '192.168.0.220',
    ]);
    expect(byAddress(devices, '192.168.0.200')).toMatchObject({
      id: 'c654e-192-168-0-200',
      adapter: 'direct',
      controllerType: 'DirectController',
      status: 'Online',
    });
    expect(byAddress(devices, '192.168.0.131').adapter).toBe('direct');
    expect(byAddress(devices, '192.168.0.210')).toMatchObject({ adapter: 'managed', controllerType: 'ManagedController' });
    // No configured credential for .220 here, so every table entry is refused
    expect(byAddress(devices, '192.168.0.220')).toMatchObject({ adapter: 'managed', status: 'Error' });
  });

  it('keeps ids and entries stable across repeated discovery', async () => {
    const { manager, registry, events } = fleet();
    const discovered: string[] = [];
    events.on('device.discovered', (device) => discovered.push(device.id));

    const first = await manager.discoverAddresses(FLEET);
    const second = await manager.discoverAddresses(FLEET);

    expect(second.created).toBe(0);
    expect(second.updated).toBe(4);
    expect(registry.size()).toBe(4);
    expect(second.devices.map((d) => d.id).sort()).toEqual(first.devices.map((d) => d.id).sort());
    expect(discovered).toHaveLength(4);
  });

  it('uses configured machine credentials in list mode', async () => {
    const { discovery } = fleet();
    const results = await collect(discovery.scanAddresses(MACHINES));

    expect(results.every((r) => r.status === 'Online')).toBe(true);
    expect(results.find((r) => r.address === '192.168.0.220')?.credential).toBe('configured');
  });

  it('hands the negotiated session to the registry', async () => {
    const { manager, registry } = fleet();
    await manager.discoverAddresses(['192.168.0.200']);
    const entry = registry.require('c654e-192-168-0-200');
    expect(entry.credential).toBe('pw-color');
    expect(entry.adapter.kind).toBe('direct');
  });
});
