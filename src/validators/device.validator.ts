import { z } from 'zod';
import { PAPER_SIZE_IDS } from '../models/paper-size.model';
import { isIPv4, parseCidr } from '../utils/ip-range';

const ipv4Schema = z.string().trim().refine(isIPv4, 'Invalid IPv4 address');

export const discoverNetworkSchema = z.object({
  cidr: z.string().trim().refine((value) => {
    try {
      parseCidr(value);
      return true;
    } catch {
      return false;
    }
  }, 'Invalid CIDR range'),
});

export const discoverAddressesSchema = z.object({
  addresses: z.array(ipv4Schema).min(1, 'At least one address is required').max(1024),
});

export const registerDeviceSchema = z.object({
  address: ipv4Schema,
  model: z.string().min(1),
  name: z.string().optional(),
  controller_type: z.enum(['DirectController', 'ManagedController']).default('DirectController'),
  adapter: z.enum(['direct', 'managed', 'monitoring', 'raw']),
  capabilities: z.object({
    color: z.boolean().default(false),
    duplex: z.boolean().default(false),
    max_paper_size: z.string().transform((s) => s.toUpperCase()).pipe(z.enum(PAPER_SIZE_IDS)).default('A4'),
    requires_auth: z.boolean().default(false),
  }).default({}),
  credential: z.string().optional(),
});
