import fs from 'fs';
import { z } from 'zod';
import { logger } from '../utils/logger';

type CredentialList = readonly string[];

/**
 * Ordered admin credentials. `models` keys match as a case-insensitive
 * substring of the reported model (`754e` matches `C754e`); `families` keys
 * are signature credential keys; `default` is tried last.
 */
export interface CredentialTable {
  readonly models: Readonly<Record<string, CredentialList>>;
  readonly families: Readonly<Record<string, CredentialList>>;
  readonly default: CredentialList;
}

const credentialTableSchema = z.object({
  models: z.record(z.array(z.string())).default({}),
  families: z.record(z.array(z.string())).default({}),
  default: z.array(z.string()).default([]),
});

export const FALLBACK_CREDENTIALS: CredentialTable = {
  models: {},
  families: {},
  default: ['12345678', '1234567812345678', 'admin', ''],
};

/** Load the credential table from disk, falling back to the built-in defaults */
export function loadCredentialTable(file: string): CredentialTable {
  try {
    if (fs.existsSync(file)) {
      const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
      const table = credentialTableSchema.parse(raw);
      logger.info({
        file,
        models: Object.keys(table.models).length,
        families: Object.keys(table.families).length,
      }, 'Credential table loaded');
      return table;
    }
  } catch (error) {
    logger.error({ error, file }, 'Failed to load credential table');
  }
  return FALLBACK_CREDENTIALS;
}

/** Model entries whose key occurs in `model`, most specific key first */
function modelCredentials(table: CredentialTable, model: string): string[] {
  const upper = model.toUpperCase();
  return Object.keys(table.models)
    .filter((key) => key.length > 0 && upper.includes(key.toUpperCase()))
    .sort((a, b) => b.length - a.length)
    .flatMap((key) => table.models[key] ?? []);
}

/**
 * Candidate credentials in trial order: an explicitly configured one, the
 * model lists, the family list, then the defaults. Duplicates keep their
 * first position.
 */
export function credentialCandidates(
  table: CredentialTable,
  device: { readonly model: string; readonly family: string },
  preferred?: string
): string[] {
  const ordered = [
    ...(preferred !== undefined ? [preferred] : []),
    ...modelCredentials(table, device.model),
    ...(table.families[device.family] ?? []),
    ...table.default,
  ];
  return Array.from(new Set(ordered));
}
