const IPV4_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

export function isIPv4(value: string): boolean {
  const match = IPV4_PATTERN.exec(value);
  if (!match) return false;
  return match.slice(1).every((octet) => Number(octet) <= 255);
}

function ipToInt(ip: string): number {
  return ip.split('.').reduce((acc, octet) => acc * 256 + Number(octet), 0);
}

function intToIp(value: number): string {
  return [24, 16, 8, 0].map((shift) => Math.floor(value / 2 ** shift) % 256).join('.');
}

export interface Cidr {
  readonly network: string;
  readonly prefix: number;
}

export function parseCidr(cidr: string): Cidr {
  const [ip, prefixText] = cidr.trim().split('/');
  const prefix = prefixText === undefined ? 32 : Number(prefixText);
  if (!ip || !isIPv4(ip) || !Number.isInteger(prefix) || prefix < 0 || prefix > 32) {
    throw new Error(`Invalid CIDR range: ${cidr}`);
  }
  // Non-strict: host bits in the base address are ignored
  const size = 2 ** (32 - prefix);
  const base = Math.floor(ipToInt(ip) / size) * size;
  return { network: intToIp(base), prefix };
}

/**
 * Lazily yields the host addresses of a range. Network and broadcast
 * addresses are skipped except for /31 and /32.
 */
export function* expandCidr(cidr: string): Generator<string> {
  const { network, prefix } = parseCidr(cidr);
  const size = 2 ** (32 - prefix);
  const base = ipToInt(network);
  const [first, last] = prefix >= 31 ? [0, size - 1] : [1, size - 2];
  for (let offset = first; offset <= last; offset++) {
    yield intToIp(base + offset);
  }
}
