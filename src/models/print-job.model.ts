import type { PaperSizeId } from './paper-size.model';
import type { ErrorKind } from '../utils/errors';

export type PrintJobStatus = 'Queued' | 'Dispatching' | 'Printing' | 'Completed' | 'Failed' | 'Cancelled';

export type ColorMode = 'color' | 'grayscale' | 'monochrome';

export type DuplexMode = 'simplex' | 'long-edge' | 'short-edge';

export interface PrintSettings {
  readonly copies: number;
  readonly colorMode: ColorMode;
  readonly duplex: DuplexMode;
  readonly paperSize: PaperSizeId;
}

export interface JobError {
  readonly kind: ErrorKind;
  readonly message: string;
}

export interface PrintJob {
  readonly id: string;
  readonly deviceId: string;
  readonly title: string;
  readonly payloadRef: string;
  readonly payloadSize: number;
  readonly settings: PrintSettings;
  readonly status: PrintJobStatus;
  readonly retryCount: number;
  readonly maxRetries: number;
  readonly lastError: JobError | null;
  readonly remoteId: string | null;
  readonly source: string;
  readonly deviceJobRef: string | null;
  readonly createdAt: string;
  readonly updatedAt: string;
  readonly completedAt: string | null;
}

export const TERMINAL_JOB_STATUSES: readonly PrintJobStatus[] = ['Completed', 'Failed', 'Cancelled'];

/**
 * Allowed transitions. The only way back to Queued is the retry edge from
 * Dispatching, and that edge also bumps retryCount.
 */
export const JOB_TRANSITIONS: Readonly<Record<PrintJobStatus, readonly PrintJobStatus[]>> = {
  Queued: ['Dispatching', 'Cancelled', 'Failed'],
  Dispatching: ['Printing', 'Queued', 'Failed', 'Cancelled'],
  Printing: ['Completed', 'Failed', 'Cancelled'],
  Completed: [],
  Failed: [],
  Cancelled: [],
};

export const DEFAULT_PRINT_SETTINGS: PrintSettings = {
  copies: 1,
  colorMode: 'monochrome',
  duplex: 'simplex',
  paperSize: 'A4',
};

export function isTerminal(status: PrintJobStatus): boolean {
  return TERMINAL_JOB_STATUSES.includes(status);
}

export function canTransition(from: PrintJobStatus, to: PrintJobStatus): boolean {
  return JOB_TRANSITIONS[from].includes(to);
}

export interface QueueStats {
  readonly total: number;
  readonly queued: number;
  readonly dispatching: number;
  readonly printing: number;
  readonly completed: number;
  readonly failed: number;
  readonly cancelled: number;
}
