import type { AdapterKind } from '../models/device.model';
import type { probeTcp, sendRawToTcp } from '../services/raw-stream.service';
import type { HttpTransport } from '../services/session-client.service';
import type { SnmpProbe } from '../services/snmp.service';
import type { AdapterContext, ProtocolAdapter } from './adapter';
import { DirectControllerAdapter } from './direct-controller.adapter';
import { ManagedControllerAdapter } from './managed-controller.adapter';
import { MonitoringAdapter } from './monitoring.adapter';
import { RawStreamAdapter } from './raw-stream.adapter';

export type { AdapterContext, ProtocolAdapter } from './adapter';

/** Transports shared by every adapter the registry binds */
export interface AdapterDeps {
  readonly snmp: SnmpProbe;
  readonly transport?: HttpTransport;
  readonly sendRaw?: typeof sendRawToTcp;
  readonly probeTcp?: typeof probeTcp;
  readonly webPort?: number;
  readonly rawPort?: number;
  readonly timeoutMs?: number;
}

export type AdapterFactory = (kind: AdapterKind, ctx: AdapterContext) => ProtocolAdapter;

/** Bind the adapter variant for a device family */
export function createAdapter(kind: AdapterKind, ctx: AdapterContext, deps: AdapterDeps): ProtocolAdapter {
  switch (kind) {
    case 'direct':
      return new DirectControllerAdapter(ctx, deps);
    case 'managed':
      return new ManagedControllerAdapter(ctx, deps);
    case 'monitoring':
      return new MonitoringAdapter(ctx, deps.snmp);
    case 'raw':
      return new RawStreamAdapter(ctx, deps);
  }
}

export function adapterFactory(deps: AdapterDeps): AdapterFactory {
  return (kind, ctx) => createAdapter(kind, ctx, deps);
}
