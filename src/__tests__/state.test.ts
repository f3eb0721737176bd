import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { parseMachineList } from '../config';
import { FALLBACK_CREDENTIALS, loadCredentialTable } from '../services/credential.service';
import { JobStore } from '../services/job-store.service';
import { FileStateStore } from '../services/state-store.service';
import { base64PayloadSchema, printSettingsSchema } from '../validators/job.validator';
import { settings } from './helpers';

describe('parseMachineList', () => {
  it('reads addresses with optional passwords', () => {
    expect(parseMachineList('10.0.0.5:test-secret, 10.0.0.6:,10.0.0.7,,')).toEqual([
      { address: '10.0.0.5', credential: 'test-secret' },
      { address: '10.0.0.6' },
      { address: '10.0.0.7' },
    ]);
  });

  it('keeps colons inside a password', () => {
    expect(parseMachineList('10.0.0.5:a:b')).toEqual([{ address: '10.0.0.5', credential: 'a:b' }]);
  });
});

describe('printSettingsSchema', () => {
  it('accepts both spellings and fills defaults', () => {
    expect(printSettingsSchema.parse({ color_mode: 'grayscale', paperSize: 'letter', copies: '2' })).toEqual({
      copies: 2,
      colorMode: 'grayscale',
      duplex: 'simplex',
      paperSize: 'LETTER',
    });
  });

  it('rejects unknown paper sizes', () => {
    expect(printSettingsSchema.safeParse({ paper_size: 'A0' }).success).toBe(false);
  });
});

describe('base64PayloadSchema', () => {
  it('decodes the document', () => {
    expect(base64PayloadSchema.parse('JVBERi0=').toString('latin1')).toBe('%PDF-');
  });

  it('rejects text that is not base64', () => {
    const result = base64PayloadSchema.safeParse('not base64!');
    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe('Payload must be base64 encoded');
  });
});

describe('FileStateStore', () => {
  let dir = '';

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'fleet-state-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('starts empty without state files', () => {
    const store = new FileStateStore(dir);
    expect(store.loadDevices()).toEqual([]);
    expect(store.loadJobs()).toEqual([]);
  });

  it('round-trips jobs and leaves no temp file behind', () => {
    const store = new FileStateStore(dir);
    const job = new JobStore().create({
      id: 'job-1',
      deviceId: 'dev-1',
      title: 'Invoice',
      payloadRef: 'job-1.bin',
      payloadSize: 5,
      settings: settings(),
      maxRetries: 3,
      source: 'api',
    });

    store.saveJobs([job]);

    expect(store.loadJobs()).toEqual([job]);
    expect(fs.readdirSync(dir)).toEqual(['jobs.json']);
  });

  it('skips records that do not validate', () => {
    const store = new FileStateStore(dir);
    const job = new JobStore().create({
      id: 'job-1',
      deviceId: 'dev-1',
      title: 'Invoice',
      payloadRef: 'job-1.bin',
      payloadSize: 5,
      settings: settings(),
      maxRetries: 3,
      source: 'api',
    });
    fs.writeFileSync(path.join(dir, 'jobs.json'), JSON.stringify([job, { id: 'broken' }]));

    expect(store.loadJobs().map((j) => j.id)).toEqual(['job-1']);
  });

  it('ignores a corrupt file', () => {
    fs.writeFileSync(path.join(dir, 'devices.json'), '{not json');
    expect(new FileStateStore(dir).loadDevices()).toEqual([]);
  });
});

describe('loadCredentialTable', () => {
  let dir = '';

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'fleet-creds-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads the credential table from disk', () => {
    const file = path.join(dir, 'credentials.json');
    fs.writeFileSync(file, JSON.stringify({ models: { C754: ['test-secret'] }, default: [''] }));
    expect(loadCredentialTable(file)).toEqual({ models: { C754: ['test-secret'] }, families: {}, default: [''] });
  });

  it('falls back to the built-in defaults for a missing or malformed file', () => {
    const file = path.join(dir, 'credentials.json');
    fs.writeFileSync(file, JSON.stringify({ default: 'test-secret' }));
    expect(loadCredentialTable(file)).toBe(FALLBACK_CREDENTIALS);
    expect(loadCredentialTable(path.join(dir, 'missing.json'))).toBe(FALLBACK_CREDENTIALS);
  });
});
