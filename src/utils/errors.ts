export type ErrorKind =
  | 'Unreachable'
  | 'AuthenticationFailed'
  | 'CapabilityMismatch'
  | 'ProtocolError'
  | 'Cancelled'
  | 'DeviceNotFound'
  | 'JobNotFound'
  | 'Conflict';

export class GatewayError extends Error {
  public readonly code: string;
  public readonly kind: ErrorKind;
  public readonly retryable: boolean;
  public readonly deviceId?: string;

  constructor(message: string, kind: ErrorKind, code: string, retryable: boolean, deviceId?: string) {
    super(message);
    this.name = 'GatewayError';
    this.kind = kind;
    this.code = code;
    this.retryable = retryable;
    this.deviceId = deviceId;
  }
}

/** Timeout, refused connection, host down. */
export class UnreachableError extends GatewayError {
  constructor(message: string, deviceId?: string) {
    super(message, 'Unreachable', 'DEVICE_UNREACHABLE', true, deviceId);
    this.name = 'UnreachableError';
  }
}

export class AuthenticationFailedError extends GatewayError {
  constructor(message: string, deviceId?: string) {
    super(message, 'AuthenticationFailed', 'DEVICE_AUTH_FAILED', false, deviceId);
    this.name = 'AuthenticationFailedError';
  }
}

export class CapabilityMismatchError extends GatewayError {
  public readonly violations: readonly string[];

  constructor(violations: readonly string[], deviceId?: string) {
    super(`Requested settings not supported: ${violations.join('; ')}`, 'CapabilityMismatch', 'CAPABILITY_MISMATCH', false, deviceId);
    this.name = 'CapabilityMismatchError';
    this.violations = violations;
  }
}

/** Malformed or unexpected device response. Retried up to the job's bound. */
export class ProtocolError extends GatewayError {
  constructor(message: string, deviceId?: string) {
    super(message, 'ProtocolError', 'PROTOCOL_ERROR', true, deviceId);
    this.name = 'ProtocolError';
  }
}

/** The device understood the job and refused it. */
export class JobRejectedError extends GatewayError {
  constructor(message: string, deviceId?: string) {
    super(message, 'ProtocolError', 'JOB_REJECTED', false, deviceId);
    this.name = 'JobRejectedError';
  }
}

/** The device kept the job past the dispatch deadline. */
export class JobTimeoutError extends GatewayError {
  constructor(timeoutMs: number, deviceId?: string) {
    super(`Job did not finish within ${timeoutMs}ms`, 'ProtocolError', 'JOB_TIMEOUT', false, deviceId);
    this.name = 'JobTimeoutError';
  }
}

export class CancelledError extends GatewayError {
  constructor(jobId: string) {
    super(`Job cancelled: ${jobId}`, 'Cancelled', 'JOB_CANCELLED', false);
    this.name = 'CancelledError';
  }
}

export class DeviceNotFoundError extends GatewayError {
  constructor(deviceId: string) {
    super(`Device not found: ${deviceId}`, 'DeviceNotFound', 'DEVICE_NOT_FOUND', false, deviceId);
    this.name = 'DeviceNotFoundError';
  }
}

export class DeviceExistsError extends GatewayError {
  constructor(address: string) {
    super(`Device already registered at ${address}`, 'Conflict', 'DEVICE_EXISTS', false);
    this.name = 'DeviceExistsError';
  }
}

export class JobNotFoundError extends GatewayError {
  constructor(jobId: string) {
    super(`Job not found: ${jobId}`, 'JobNotFound', 'JOB_NOT_FOUND', false);
    this.name = 'JobNotFoundError';
  }
}

export class JobStateError extends GatewayError {
  constructor(message: string) {
    super(message, 'Conflict', 'JOB_STATE_CONFLICT', false);
    this.name = 'JobStateError';
  }
}

const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EHOSTDOWN',
  'EPIPE',
  'ENOTFOUND',
]);

function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Normalize anything thrown into the taxonomy. */
export function toGatewayError(error: unknown, deviceId?: string): GatewayError {
  if (error instanceof GatewayError) return error;
  const code = errnoCode(error);
  if (code && NETWORK_ERROR_CODES.has(code)) {
    return new UnreachableError(`${code}: ${errorMessage(error)}`, deviceId);
  }
  return new ProtocolError(errorMessage(error), deviceId);
}

const HTTP_STATUS_BY_KIND: Record<ErrorKind, number> = {
  Unreachable: 504,
  AuthenticationFailed: 502,
  CapabilityMismatch: 422,
  ProtocolError: 502,
  Cancelled: 409,
  DeviceNotFound: 404,
  JobNotFound: 404,
  Conflict: 409,
};

export function httpStatusFor(error: GatewayError): number {
  return HTTP_STATUS_BY_KIND[error.kind];
}
