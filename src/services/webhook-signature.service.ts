import { createHmac, timingSafeEqual } from 'crypto';

export type VerifyFailure = 'missing' | 'stale' | 'invalid';

export type VerifyResult = { readonly ok: true } | { readonly ok: false; readonly reason: VerifyFailure };

export function unixNow(): number {
  return Math.floor(Date.now() / 1000);
}

function hmacHex(secret: string, message: string): string {
  return createHmac('sha256', secret).update(message, 'utf-8').digest('hex');
}

/** hex HMAC-SHA256 over JSON(data) followed by the timestamp */
export function signPayload(secret: string, data: unknown, timestamp: string): string {
  return hmacHex(secret, `${JSON.stringify(data)}${timestamp}`);
}

/** Signature for an outbound request without a JSON envelope (polling GETs) */
export function signRequest(secret: string, method: string, url: string, timestamp: string, body = ''): string {
  return hmacHex(secret, `${method}\n${url}\n${timestamp}\n${body}`);
}

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf-8');
  const right = Buffer.from(b, 'utf-8');
  if (left.length !== right.length) return false;
  return timingSafeEqual(left, right);
}

/**
 * Check a signed envelope. The timestamp must be within `windowSec` of now in
 * either direction, even when the signature itself is valid.
 */
export function verifyPayload(
  secret: string,
  data: unknown,
  timestamp: string | undefined,
  signature: string | undefined,
  windowSec: number,
  nowSec = unixNow()
): VerifyResult {
  if (!timestamp || !signature) return { ok: false, reason: 'missing' };

  const sent = Number(timestamp);
  if (!/^\d+$/.test(timestamp) || !Number.isSafeInteger(sent)) return { ok: false, reason: 'invalid' };
  if (Math.abs(nowSec - sent) > windowSec) return { ok: false, reason: 'stale' };

  const expected = signPayload(secret, data, timestamp);
  return safeEqual(signature.toLowerCase(), expected) ? { ok: true } : { ok: false, reason: 'invalid' };
}
