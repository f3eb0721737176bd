import type { AdapterKind, Capabilities, ControllerType } from './device.model';
import { paperFits } from './paper-size.model';
import type { PrintSettings } from './print-job.model';

/**
 * One row of the SNMP sysDescr classification table. `model` is either a
 * fixed label or taken from the first capture group of `pattern`.
 */
export interface DeviceSignature {
  readonly family: string;
  readonly pattern: RegExp;
  readonly model?: string;
  readonly controllerType: ControllerType;
  readonly adapter: AdapterKind;
  readonly capabilities: Capabilities;
  /** Key into the credential table's `families` lists */
  readonly credentialKey: string;
}

export interface SignatureMatch {
  readonly signature: DeviceSignature;
  readonly model: string;
}

const COLOR_A3: Capabilities = { color: true, duplex: true, maxPaperSize: 'A3', requiresAuth: true };
const COLOR_SRA3: Capabilities = { color: true, duplex: true, maxPaperSize: 'SRA3', requiresAuth: true };
const MONO_A4: Capabilities = { color: false, duplex: true, maxPaperSize: 'A4', requiresAuth: false };
const MONITOR_ONLY: Capabilities = { color: false, duplex: false, maxPaperSize: 'A4', requiresAuth: false };

/** Ordered: first match wins. Controller-equipped models must precede their plain siblings. */
export const DEVICE_SIGNATURES: readonly DeviceSignature[] = [
  {
    family: 'fiery',
    pattern: /\b(?:bizhub\s+)?(C\d{3,4}[a-z]*)\b.*\b(?:Fiery|EFI)\b/i,
    controllerType: 'ManagedController',
    adapter: 'managed',
    capabilities: COLOR_SRA3,
    credentialKey: 'fiery',
  },
  {
    family: 'fiery',
    pattern: /\b(?:Fiery|EFI)\b.*\b(?:bizhub\s+)?(C\d{3,4}[a-z]*)\b/i,
    controllerType: 'ManagedController',
    adapter: 'managed',
    capabilities: COLOR_SRA3,
    credentialKey: 'fiery',
  },
  {
    family: 'bizhub-color',
    pattern: /\bbizhub\s+(C\d{3,4}[a-z]*)\b/i,
    controllerType: 'DirectController',
    adapter: 'direct',
    capabilities: COLOR_A3,
    credentialKey: 'bizhub-color',
  },
  {
    family: 'accurio',
    pattern: /\bAccurioPrint\s+(C?\d{3,4}[a-z]*)\b/i,
    controllerType: 'DirectController',
    adapter: 'direct',
    capabilities: COLOR_SRA3,
    credentialKey: 'bizhub-color',
  },
  {
    family: 'bizhub-mono',
    pattern: /\bbizhub\s+(\d{3,4}[a-z]*)\b/i,
    controllerType: 'DirectController',
    adapter: 'raw',
    capabilities: MONO_A4,
    credentialKey: 'bizhub-mono',
  },
  {
    family: 'pagepro',
    pattern: /\b(?:pagepro|magicolor)\s+(\d{3,4}[a-z]*)\b/i,
    controllerType: 'DirectController',
    adapter: 'raw',
    capabilities: MONO_A4,
    credentialKey: 'bizhub-mono',
  },
  {
    family: 'konica-minolta',
    pattern: /\bKONICA\s+MINOLTA\s+(C?\d{3,4}[a-z]*)\b/i,
    controllerType: 'DirectController',
    adapter: 'direct',
    capabilities: COLOR_A3,
    credentialKey: 'bizhub-color',
  },
  {
    family: 'generic-printer',
    pattern: /\b(?:printer|JetDirect|laser)\b/i,
    model: 'generic',
    controllerType: 'DirectController',
    adapter: 'monitoring',
    capabilities: MONITOR_ONLY,
    credentialKey: 'none',
  },
];

export function matchSignature(
  description: string,
  signatures: readonly DeviceSignature[] = DEVICE_SIGNATURES
): SignatureMatch | null {
  for (const signature of signatures) {
    const match = signature.pattern.exec(description);
    if (!match) continue;
    const model = signature.model ?? match[1] ?? signature.family;
    return { signature, model };
  }
  return null;
}

/** Stable id from model and address, e.g. c654e-192-168-0-200 */
export function deviceIdFor(model: string, address: string): string {
  const slug = model.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '');
  return `${slug || 'device'}-${address.replace(/\./g, '-')}`;
}

/** Settings the capability snapshot cannot honour; empty when admissible */
export function capabilityViolations(capabilities: Capabilities, settings: PrintSettings): string[] {
  const violations: string[] = [];
  if (settings.colorMode === 'color' && !capabilities.color) {
    violations.push('color printing requested on a monochrome device');
  }
  if (settings.duplex !== 'simplex' && !capabilities.duplex) {
    violations.push('duplex requested on a simplex-only device');
  }
  if (!paperFits(settings.paperSize, capabilities.maxPaperSize)) {
    violations.push(`paper ${settings.paperSize} exceeds maximum ${capabilities.maxPaperSize}`);
  }
  return violations;
}
