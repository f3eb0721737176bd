import { v4 as uuidv4 } from 'uuid';
import {
  canTransition,
  isTerminal,
  type JobError,
  type PrintJob,
  type PrintJobStatus,
  type PrintSettings,
  type QueueStats,
} from '../models/print-job.model';
import { JobNotFoundError, JobStateError } from '../utils/errors';
import { logger } from '../utils/logger';
import type { StateStore } from './state-store.service';

/** How many finished jobs are kept in history */
const HISTORY_LIMIT = 1000;

export interface CreateJobParams {
  readonly id?: string;
  readonly deviceId: string;
  readonly title: string;
  readonly payloadRef: string;
  readonly payloadSize: number;
  readonly settings: PrintSettings;
  readonly maxRetries: number;
  readonly remoteId?: string | null;
  readonly source: string;
}

/** Fields that may change together with a status transition */
export interface JobChanges {
  readonly retryCount?: number;
  readonly lastError?: JobError | null;
  readonly deviceJobRef?: string | null;
}

/**
 * Job history. Every status change goes through `transition`, which checks
 * the transition table and the retry counter.
 */
export class JobStore {
  private readonly jobs = new Map<string, PrintJob>();

  constructor(private readonly state?: StateStore) {}

  /** Create a new print job */
  create(params: CreateJobParams): PrintJob {
    const now = new Date().toISOString();
    const job: PrintJob = {
      id: params.id ?? uuidv4(),
      deviceId: params.deviceId,
      title: params.title,
      payloadRef: params.payloadRef,
      payloadSize: params.payloadSize,
      settings: params.settings,
      status: 'Queued',
      retryCount: 0,
      maxRetries: params.maxRetries,
      lastError: null,
      remoteId: params.remoteId ?? null,
      source: params.source,
      deviceJobRef: null,
      createdAt: now,
      updatedAt: now,
      completedAt: null,
    };

    this.jobs.set(job.id, job);
    this.persist();
    logger.info({ jobId: job.id, deviceId: job.deviceId, source: job.source }, 'Print job created');
    return job;
  }

  /** Move a job along the state machine */
  transition(jobId: string, status: PrintJobStatus, changes: JobChanges = {}): PrintJob {
    const job = this.require(jobId);
    if (!canTransition(job.status, status)) {
      throw new JobStateError(`Job ${jobId} cannot move from ${job.status} to ${status}`);
    }

    const retryCount = changes.retryCount ?? job.retryCount;
    if (retryCount < job.retryCount || retryCount > job.maxRetries) {
      throw new JobStateError(`Job ${jobId} retry count ${retryCount} outside 0..${job.maxRetries}`);
    }
    if (status === 'Queued' && retryCount !== job.retryCount + 1) {
      throw new JobStateError(`Job ${jobId} can only be re-queued by a counted retry`);
    }

    const now = new Date().toISOString();
    const updated: PrintJob = {
      ...job,
      ...changes,
      status,
      retryCount,
      updatedAt: now,
      completedAt: isTerminal(status) ? now : null,
    };

    this.jobs.set(jobId, updated);
    this.persist();
    logger.info({ jobId, status, retryCount, error: updated.lastError?.message }, 'Job status updated');
    return updated;
  }

  /** Get a job by ID */
  get(jobId: string): PrintJob | undefined {
    return this.jobs.get(jobId);
  }

  require(jobId: string): PrintJob {
    const job = this.jobs.get(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    return job;
  }

  findByRemoteId(remoteId: string): PrintJob | undefined {
    for (const job of this.jobs.values()) {
      if (job.remoteId === remoteId) return job;
    }
    return undefined;
  }

  /** Get all jobs (most recent first) */
  list(limit = 50): PrintJob[] {
    return this.sorted()
      .reverse()
      .slice(0, limit);
  }

  /** Non-terminal jobs in creation order */
  pending(): PrintJob[] {
    return this.sorted().filter((job) => !isTerminal(job.status));
  }

  /** Get queue stats */
  stats(): QueueStats {
    const all = Array.from(this.jobs.values());
    const count = (status: PrintJobStatus) => all.filter((j) => j.status === status).length;
    return {
      total: all.length,
      queued: count('Queued'),
      dispatching: count('Dispatching'),
      printing: count('Printing'),
      completed: count('Completed'),
      failed: count('Failed'),
      cancelled: count('Cancelled'),
    };
  }

  /** Load history from the state store; returns how many jobs were restored */
  restore(): number {
    if (!this.state) return 0;
    const records = this.state.loadJobs();
    for (const job of records) {
      // An interrupted dispatch starts over; restarts do not count as retries
      const restored: PrintJob = isTerminal(job.status) ? job : { ...job, status: 'Queued' };
      this.jobs.set(job.id, restored);
    }
    return records.length;
  }

  private sorted(): PrintJob[] {
    return Array.from(this.jobs.values())
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  private persist(): void {
    const all = this.sorted();
    // Drop the oldest finished jobs once history is full
    let excess = all.length - HISTORY_LIMIT;
    const kept = all.filter((job) => {
      if (excess > 0 && isTerminal(job.status)) {
        excess--;
        this.jobs.delete(job.id);
        return false;
      }
      return true;
    });
    if (!this.state) return;
    try {
      this.state.saveJobs(kept);
    } catch (error) {
      logger.error({ error }, 'Failed to persist job history');
    }
  }
}
