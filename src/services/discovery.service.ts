import type { AdapterFactory } from '../adapters';
import {
  createSessionHolder,
  type AdapterKind,
  type Capabilities,
  type ControllerType,
  type Session,
} from '../models/device.model';
import { deviceIdFor, matchSignature, DEVICE_SIGNATURES, type DeviceSignature } from '../models/signature.model';
import { AuthenticationFailedError, toGatewayError, type ErrorKind } from '../utils/errors';
import { expandCidr } from '../utils/ip-range';
import { logger } from '../utils/logger';
import { credentialCandidates, type CredentialTable } from './credential.service';
import type { SnmpProbe } from './snmp.service';

export interface DiscoveryTarget {
  readonly address: string;
  /** Configured admin password, tried before the table */
  readonly credential?: string;
}

export interface DiscoveryResult {
  readonly address: string;
  readonly description: string;
  readonly family: string;
  readonly model: string;
  readonly controllerType: ControllerType;
  readonly adapter: AdapterKind;
  readonly capabilities: Capabilities;
  readonly credential?: string;
  readonly session: Session | null;
  readonly status: 'Online' | 'Error';
  readonly statusReason: ErrorKind | null;
}

export interface ScanOptions {
  readonly signal?: AbortSignal;
}

export interface DiscoveryOptions {
  readonly snmp: SnmpProbe;
  readonly createAdapter: AdapterFactory;
  readonly credentials: CredentialTable;
  readonly concurrency: number;
  readonly signatures?: readonly DeviceSignature[];
}

/**
 * Run `worker` over `items` with at most `limit` in flight, yielding each
 * non-null result as soon as it is ready. Nothing new starts once `signal`
 * is aborted; probes already in flight are awaited.
 */
async function* pooled<T, R>(
  items: Iterable<T>,
  limit: number,
  worker: (item: T) => Promise<R | null>,
  signal?: AbortSignal
): AsyncGenerator<R> {
  const iterator = items[Symbol.iterator]();
  const inFlight = new Map<number, Promise<{ key: number; value: R | null }>>();
  let nextKey = 0;

  const fill = () => {
    while (inFlight.size < Math.max(1, limit) && !signal?.aborted) {
      const step = iterator.next();
      if (step.done) return;
      const key = nextKey++;
      inFlight.set(key, worker(step.value).then((value) => ({ key, value })));
    }
  };

  fill();
  while (inFlight.size > 0) {
    const { key, value } = await Promise.race(inFlight.values());
    inFlight.delete(key);
    fill();
    if (value !== null) yield value;
  }
}

/**
 * SNMP sweep plus credential negotiation. Performs network I/O only; the
 * caller merges results into the registry.
 */
export class NetworkDiscovery {
  private readonly signatures: readonly DeviceSignature[];

  constructor(private readonly options: DiscoveryOptions) {
    this.signatures = options.signatures ?? DEVICE_SIGNATURES;
  }

  /** Each iteration starts a fresh scan of the range */
  scanRange(cidr: string, scan: ScanOptions = {}): AsyncIterable<DiscoveryResult> {
    // Validate eagerly so a bad range fails the call, not the first iteration
    expandCidr(cidr).next();
    return {
      [Symbol.asyncIterator]: () => {
        const targets = (function* () {
          for (const address of expandCidr(cidr)) yield { address };
        })();
        return pooled(targets, this.options.concurrency, (t) => this.probeHost(t), scan.signal);
      },
    };
  }

  scanAddresses(targets: readonly DiscoveryTarget[], scan: ScanOptions = {}): AsyncIterable<DiscoveryResult> {
    const list = [...targets];
    return {
      [Symbol.asyncIterator]: () =>
        pooled(list, this.options.concurrency, (t) => this.probeHost(t), scan.signal),
    };
  }

  /** Classify one host. Null when it is silent or not a known printer. */
  async probeHost(target: DiscoveryTarget): Promise<DiscoveryResult | null> {
    const { address } = target;
    try {
      const description = await this.options.snmp.getDescription(address);
      if (!description) return null;

      const match = matchSignature(description, this.signatures);
      if (!match) {
        logger.debug({ address, description }, 'Host does not match any printer signature');
        return null;
      }

      const { signature, model } = match;
      const base = {
        address,
        description,
        family: signature.family,
        model,
        controllerType: signature.controllerType,
        adapter: signature.adapter,
      };

      if (!signature.capabilities.requiresAuth) {
        const capabilities = await this.readCapabilities(base, signature.capabilities, target.credential);
        logger.info({ address, model, adapter: signature.adapter }, 'Device discovered');
        return {
          ...base,
          capabilities,
          credential: target.credential,
          session: null,
          status: 'Online',
          statusReason: null,
        };
      }

      return await this.negotiate(base, signature, target.credential);
    } catch (error) {
      logger.warn({ address, error }, 'Discovery probe failed');
      return null;
    }
  }

  private async negotiate(
    base: Omit<DiscoveryResult, 'capabilities' | 'credential' | 'session' | 'status' | 'statusReason'>,
    signature: DeviceSignature,
    preferred?: string
  ): Promise<DiscoveryResult> {
    const deviceId = deviceIdFor(base.model, base.address);
    const candidates = credentialCandidates(
      this.options.credentials,
      { model: base.model, family: signature.credentialKey },
      preferred
    );

    for (const credential of candidates) {
      const session = createSessionHolder();
      const adapter = this.options.createAdapter(base.adapter, {
        deviceId,
        address: base.address,
        model: base.model,
        profile: signature.capabilities,
        credential,
        session,
      });

      try {
        await adapter.authenticate();
      } catch (error) {
        if (error instanceof AuthenticationFailedError) continue;
        const failure = toGatewayError(error, deviceId);
        logger.warn({ address: base.address, kind: failure.kind }, 'Login attempt failed');
        return {
          ...base,
          capabilities: signature.capabilities,
          session: null,
          status: 'Error',
          statusReason: failure.kind,
        };
      }

      const capabilities = await adapter.getCapabilities().catch((error: unknown) => {
        logger.debug({ address: base.address, error }, 'Capability query failed, using family profile');
        return signature.capabilities;
      });
      logger.info({ address: base.address, model: base.model, adapter: base.adapter }, 'Device discovered and authenticated');
      return {
        ...base,
        capabilities,
        credential,
        session: session.get(),
        status: 'Online',
        statusReason: null,
      };
    }

    logger.warn({ address: base.address, tried: candidates.length }, 'No credential accepted by device');
    return {
      ...base,
      capabilities: signature.capabilities,
      session: null,
      status: 'Error',
      statusReason: 'AuthenticationFailed',
    };
  }

  private async readCapabilities(
    base: Pick<DiscoveryResult, 'address' | 'model' | 'adapter'>,
    profile: Capabilities,
    credential?: string
  ): Promise<Capabilities> {
    const adapter = this.options.createAdapter(base.adapter, {
      deviceId: deviceIdFor(base.model, base.address),
      address: base.address,
      model: base.model,
      profile,
      credential,
      session: createSessionHolder(),
    });
    return adapter.getCapabilities().catch((error: unknown) => {
      logger.debug({ address: base.address, error }, 'Capability query failed, using family profile');
      return profile;
    });
  }
}
