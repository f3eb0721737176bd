import { describe, it, expect } from 'vitest';
import {
  AuthenticationFailedError,
  CapabilityMismatchError,
  DeviceExistsError,
  GatewayError,
  JobTimeoutError,
  ProtocolError,
  UnreachableError,
  httpStatusFor,
  toGatewayError,
} from '../utils/errors';
import { expandCidr, isIPv4, parseCidr } from '../utils/ip-range';
import { KeyedLock } from '../utils/keyed-lock';
import { backoffDelay, sleep, withTimeout } from '../utils/timing';

describe('error taxonomy', () => {
  it('marks only transient kinds as retryable', () => {
    expect(new UnreachableError('down').retryable).toBe(true);
    expect(new ProtocolError('garbled').retryable).toBe(true);
    expect(new AuthenticationFailedError('nope').retryable).toBe(false);
    expect(new CapabilityMismatchError(['no color']).retryable).toBe(false);
    expect(new JobTimeoutError(1000).retryable).toBe(false);
  });

  it('carries kind, code and message', () => {
    const error = new DeviceExistsError('10.0.0.5');
    expect(error).toBeInstanceOf(GatewayError);
    expect(error.kind).toBe('Conflict');
    expect(error.code).toBe('DEVICE_EXISTS');
    expect(error.message).toBe('Device already registered at 10.0.0.5');
    expect(error.name).toBe('DeviceExistsError');
  });

  it('joins capability violations into the message', () => {
    const error = new CapabilityMismatchError(['a', 'b'], 'dev-1');
    expect(error.message).toBe('Requested settings not supported: a; b');
    expect(error.violations).toEqual(['a', 'b']);
    expect(error.deviceId).toBe('dev-1');
  });

  it('maps socket errors to Unreachable and anything else to ProtocolError', () => {
    const refused = Object.assign(new Error('connect failed'), { code: 'ECONNREFUSED' });
    const mapped = toGatewayError(refused, 'dev-1');
    expect(mapped).toBeInstanceOf(UnreachableError);
    expect(mapped.message).toBe('ECONNREFUSED: connect failed');
    expect(mapped.deviceId).toBe('dev-1');

    expect(toGatewayError(new Error('bad xml'))).toBeInstanceOf(ProtocolError);
    expect(toGatewayError('plain string').message).toBe('plain string');
  });

  it('passes taxonomy errors through unchanged', () => {
    const original = new AuthenticationFailedError('denied');
    expect(toGatewayError(original)).toBe(original);
  });

  it('maps kinds to HTTP statuses', () => {
    expect(httpStatusFor(new CapabilityMismatchError(['x']))).toBe(422);
    expect(httpStatusFor(new UnreachableError('x'))).toBe(504);
    expect(httpStatusFor(new DeviceExistsError('x'))).toBe(409);
  });
});

describe('ip-range', () => {
  it('validates IPv4 addresses', () => {
    expect(isIPv4('192.168.0.200')).toBe(true);
    expect(isIPv4('192.168.0.256')).toBe(false);
    expect(isIPv4('192.168.0')).toBe(false);
  });

  it('normalizes the network address', () => {
    expect(parseCidr('10.1.2.3/16')).toEqual({ network: '10.1.0.0', prefix: 16 });
    expect(parseCidr('10.1.2.3')).toEqual({ network: '10.1.2.3', prefix: 32 });
  });

  it('rejects malformed ranges', () => {
    expect(() => parseCidr('10.0.0.0/33')).toThrow('Invalid CIDR range: 10.0.0.0/33');
    expect(() => parseCidr('not-a-range')).toThrow('Invalid CIDR range');
  });

  it('skips network and broadcast addresses', () => {
    expect([...expandCidr('192.168.1.0/30')]).toEqual(['192.168.1.1', '192.168.1.2']);
    expect([...expandCidr('10.0.0.0/24')]).toHaveLength(254);
  });

  it('keeps every address of /31 and /32', () => {
    expect([...expandCidr('10.0.0.4/31')]).toEqual(['10.0.0.4', '10.0.0.5']);
    expect([...expandCidr('10.0.0.9/32')]).toEqual(['10.0.0.9']);
  });

  it('expands lazily', () => {
    const iterator = expandCidr('10.0.0.0/8');
    expect(iterator.next().value).toBe('10.0.0.1');
    expect(iterator.next().value).toBe('10.0.0.2');
  });
});

describe('timing', () => {
  it('doubles the backoff per retry up to the cap', () => {
    expect(backoffDelay(1, 100, 1000)).toBe(100);
    expect(backoffDelay(3, 100, 1000)).toBe(400);
    expect(backoffDelay(5, 100, 1000)).toBe(1000);
  });

  it('rejects a call that outlives its timeout', async () => {
    const never = new Promise<void>(() => undefined);
    await expect(withTimeout(never, 10, 'Probe', 'dev-1')).rejects.toThrow('Probe timed out after 10ms');
  });

  it('passes through a result that arrives in time', async () => {
    await expect(withTimeout(Promise.resolve(42), 100, 'Probe')).resolves.toBe(42);
  });
});

describe('KeyedLock', () => {
  it('runs work for one key in arrival order', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    await Promise.all([
      lock.run('a', async () => {
        await sleep(20);
        order.push('first');
      }),
      lock.run('a', async () => {
        order.push('second');
      }),
    ]);
    expect(order).toEqual(['first', 'second']);
  });

  it('does not block other keys', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    await Promise.all([
      lock.run('a', async () => {
        await sleep(20);
        order.push('a');
      }),
      lock.run('b', async () => {
        order.push('b');
      }),
    ]);
    expect(order).toEqual(['b', 'a']);
  });

  it('releases the key when the work throws', async () => {
    const lock = new KeyedLock();
    await expect(lock.run('a', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
    await expect(lock.run('a', async () => 'next')).resolves.toBe('next');
  });
});
