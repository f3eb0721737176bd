import { describe, it, expect } from 'vitest';
import { capabilityViolations, deviceIdFor, matchSignature } from '../models/signature.model';
import { paperFits } from '../models/paper-size.model';
import { credentialCandidates } from '../services/credential.service';
import { COLOR_A3, MONO_A4, settings } from './helpers';

describe('matchSignature', () => {
  it('binds a plain color model to the direct adapter', () => {
    const match = matchSignature('KONICA MINOLTA bizhub C654e');
    expect(match?.model).toBe('C654e');
    expect(match?.signature.adapter).toBe('direct');
    expect(match?.signature.controllerType).toBe('DirectController');
  });

  it('prefers the managed controller when one is reported', () => {
    const match = matchSignature('KONICA MINOLTA bizhub C754e Fiery');
    expect(match?.model).toBe('C754e');
    expect(match?.signature.adapter).toBe('managed');
    expect(match?.signature.controllerType).toBe('ManagedController');
  });

  it('reads the model after the controller name', () => {
    const match = matchSignature('EFI Fiery Controller for bizhub C1070');
    expect(match?.model).toBe('C1070');
    expect(match?.signature.adapter).toBe('managed');
  });

  it('sends monochrome models to the raw adapter', () => {
    const match = matchSignature('KONICA MINOLTA bizhub 367');
    expect(match?.model).toBe('367');
    expect(match?.signature.adapter).toBe('raw');
    expect(match?.signature.capabilities.color).toBe(false);
  });

  it('falls back to monitoring for unknown printers', () => {
    const match = matchSignature('HP ETHERNET MULTI-ENVIRONMENT,JETDIRECT');
    expect(match?.model).toBe('generic');
    expect(match?.signature.adapter).toBe('monitoring');
  });

  it('ignores hosts that are not printers', () => {
    expect(matchSignature('Linux gateway 5.15.0')).toBeNull();
  });
});

describe('deviceIdFor', () => {
  it('builds a stable slug from model and address', () => {
    expect(deviceIdFor('C654e', '192.168.0.200')).toBe('c654e-192-168-0-200');
    expect(deviceIdFor('Mono 4000', '10.0.0.5')).toBe('mono-4000-10-0-0-5');
  });
});

describe('credentialCandidates', () => {
  const table = {
    models: { '754e': ['pw-754'], C654: ['pw-654'], C6: ['pw-c6'] },
    families: { 'bizhub-color': ['pw-a', 'pw-b'] },
    default: ['pw-b', 'fallback'],
  };

  it('tries the preferred credential, then the family, then defaults', () => {
    expect(credentialCandidates(table, { model: 'C368', family: 'bizhub-color' }, 'configured')).toEqual([
      'configured',
      'pw-a',
      'pw-b',
      'fallback',
    ]);
  });

  it('puts model lists ahead of the family list', () => {
    expect(credentialCandidates(table, { model: 'C754e', family: 'bizhub-color' })).toEqual([
      'pw-754',
      'pw-a',
      'pw-b',
      'fallback',
    ]);
    expect(credentialCandidates(table, { model: 'C654e', family: 'bizhub-color' })).toEqual([
      'pw-654',
      'pw-c6',
      'pw-a',
      'pw-b',
      'fallback',
    ]);
  });

  it('uses only defaults for an unknown family', () => {
    expect(credentialCandidates(table, { model: 'X1', family: 'unknown' })).toEqual(['pw-b', 'fallback']);
  });
});

describe('capabilityViolations', () => {
  it('accepts settings the device covers', () => {
    expect(capabilityViolations(COLOR_A3, settings({ colorMode: 'color', paperSize: 'A3' }))).toEqual([]);
  });

  it('lists every unsupported setting', () => {
    const simplexMono = { ...MONO_A4, duplex: false };
    expect(capabilityViolations(simplexMono, settings({ colorMode: 'color', duplex: 'long-edge', paperSize: 'A3' })))
      .toEqual([
        'color printing requested on a monochrome device',
        'duplex requested on a simplex-only device',
        'paper A3 exceeds maximum A4',
      ]);
  });

  it('accepts grayscale on a monochrome device', () => {
    expect(capabilityViolations(MONO_A4, settings({ colorMode: 'grayscale' }))).toEqual([]);
  });
});

describe('paperFits', () => {
  it('compares sheets in either orientation', () => {
    expect(paperFits('A4', 'A3')).toBe(true);
    expect(paperFits('A3', 'A4')).toBe(false);
    expect(paperFits('LETTER', 'A4')).toBe(false);
    expect(paperFits('A5', 'LETTER')).toBe(true);
  });
});
