import type { DeviceStatusReport } from '../adapters/adapter';
import type { PrintJob } from '../models/print-job.model';
import { isTerminal } from '../models/print-job.model';
import { capabilityViolations } from '../models/signature.model';
import {
  CancelledError,
  GatewayError,
  JobRejectedError,
  JobStateError,
  JobTimeoutError,
  ProtocolError,
  errorMessage,
  toGatewayError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import { backoffDelay, sleepUntil } from '../utils/timing';
import type { DeviceRegistry } from './device-registry.service';
import type { EventHub } from './event-hub.service';
import type { JobStore } from './job-store.service';
import type { PayloadStore } from './payload-store.service';

export interface DispatchSettings {
  readonly pollIntervalMs: number;
  readonly timeoutMs: number;
  readonly backoffBaseMs: number;
  readonly backoffMaxMs: number;
  /** Upper bound for a single status or cancel call */
  readonly callTimeoutMs: number;
}

export interface JobDispatcherOptions {
  readonly registry: DeviceRegistry;
  readonly jobs: JobStore;
  readonly payloads: PayloadStore;
  readonly events: EventHub;
  readonly settings: DispatchSettings;
}

interface CancelSignal {
  requested: boolean;
  readonly wake: Promise<void>;
  fire(): void;
}

function createCancelSignal(): CancelSignal {
  let fire: () => void = () => undefined;
  const wake = new Promise<void>((resolve) => {
    fire = resolve;
  });
  const signal: CancelSignal = {
    requested: false,
    wake,
    fire: () => {
      signal.requested = true;
      fire();
    },
  };
  return signal;
}

/**
 * Per-device FIFO queues drained by one loop per device. A job moves
 * Queued -> Dispatching -> Printing -> terminal. A retryable failure before
 * the device accepts the job takes the counted edge back to Queued and waits
 * out the backoff at the head of the queue; once Printing, transient poll
 * failures only keep the job polling until its deadline.
 */
export class JobDispatcher {
  private readonly queues = new Map<string, string[]>();
  private readonly draining = new Map<string, Promise<void>>();
  private readonly cancels = new Map<string, CancelSignal>();
  private readonly waiters = new Map<string, Array<(job: PrintJob) => void>>();
  private unsubscribe: (() => void) | null = null;
  private stopped = false;

  constructor(private readonly options: JobDispatcherOptions) {}

  /** Subscribe to admissions and re-queue unfinished jobs from history */
  start(): number {
    this.stopped = false;
    this.unsubscribe = this.options.events.on('job.queued', (job) => this.enqueue(job));
    const pending = this.options.jobs.pending();
    for (const job of pending) this.enqueue(job);
    if (pending.length > 0) logger.info({ count: pending.length }, 'Re-queued unfinished jobs');
    return pending.length;
  }

  /** Stop taking new work; loops finish the job they are on */
  stop(): void {
    this.stopped = true;
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  /** Resolves once every drain loop has finished */
  async idle(): Promise<void> {
    while (this.draining.size > 0) {
      await Promise.all(this.draining.values());
    }
  }

  enqueue(job: PrintJob): void {
    const queue = this.queues.get(job.deviceId) ?? [];
    if (queue.includes(job.id)) return;
    queue.push(job.id);
    this.queues.set(job.deviceId, queue);
    this.kick(job.deviceId);
  }

  queueLength(deviceId: string): number {
    return this.queues.get(deviceId)?.length ?? 0;
  }

  /**
   * Cancel a job. A queued job is cancelled at once; an in-flight job is
   * woken, cancelled on the device where supported, and then resolved.
   */
  async cancel(jobId: string): Promise<PrintJob> {
    const job = this.options.jobs.require(jobId);
    if (isTerminal(job.status)) {
      throw new JobStateError(`Job ${jobId} is already ${job.status}`);
    }

    const queue = this.queues.get(job.deviceId) ?? [];
    const inFlight = queue[0] === jobId && this.draining.has(job.deviceId);
    if (!inFlight) {
      const idx = queue.indexOf(jobId);
      if (idx !== -1) queue.splice(idx, 1);
      return this.finishCancelled(job);
    }

    const settled = new Promise<PrintJob>((resolve) => {
      const list = this.waiters.get(jobId) ?? [];
      list.push(resolve);
      this.waiters.set(jobId, list);
    });
    this.signalFor(jobId).fire();
    logger.info({ jobId }, 'Cancellation requested for in-flight job');
    return settled;
  }

  private signalFor(jobId: string): CancelSignal {
    let signal = this.cancels.get(jobId);
    if (!signal) {
      signal = createCancelSignal();
      this.cancels.set(jobId, signal);
    }
    return signal;
  }

  private kick(deviceId: string): void {
    if (this.stopped || this.draining.has(deviceId)) return;
    const loop = this.drain(deviceId)
      .catch((error: unknown) => {
        logger.error({ error, deviceId }, 'Drain loop crashed');
      })
      .finally(() => {
        this.draining.delete(deviceId);
        if (this.queueLength(deviceId) > 0) this.kick(deviceId);
      });
    this.draining.set(deviceId, loop);
  }

  private async drain(deviceId: string): Promise<void> {
    const queue = this.queues.get(deviceId);
    while (queue && queue.length > 0 && !this.stopped) {
      const jobId = queue[0];
      if (jobId === undefined) break;
      try {
        await this.process(jobId);
      } finally {
        if (queue[0] === jobId) queue.shift();
        this.cancels.delete(jobId);
      }
    }
    if (queue && queue.length === 0) this.queues.delete(deviceId);
  }

  /** Run one job to a terminal state, retrying in place */
  private async process(jobId: string): Promise<void> {
    const { backoffBaseMs, backoffMaxMs } = this.options.settings;
    const signal = this.signalFor(jobId);

    for (;;) {
      const job = this.options.jobs.get(jobId);
      if (!job || isTerminal(job.status)) return;
      if (signal.requested) {
        await this.cancelOnDevice(job.deviceId, job.id, job.deviceJobRef);
        this.finishCancelled(job);
        return;
      }

      try {
        await this.attempt(job, signal);
        return;
      } catch (error) {
        const current = this.options.jobs.require(jobId);
        if (error instanceof CancelledError || signal.requested) {
          await this.cancelOnDevice(current.deviceId, current.id, current.deviceJobRef);
          this.finishCancelled(current);
          return;
        }

        const failure = toGatewayError(error, job.deviceId);
        const lastError = { kind: failure.kind, message: failure.message };
        // A job the device accepted is never submitted again
        if (!failure.retryable || current.status === 'Printing' || current.retryCount >= current.maxRetries) {
          this.finishFailed(current, failure);
          return;
        }

        const retried = this.options.jobs.transition(jobId, 'Queued', {
          retryCount: current.retryCount + 1,
          lastError,
        });
        const delay = backoffDelay(retried.retryCount, backoffBaseMs, backoffMaxMs);
        logger.warn({ jobId, retry: retried.retryCount, delay, error: failure.message }, 'Dispatch failed, retrying');
        // Backoff happens outside the device lock
        await sleepUntil(delay, signal.wake);
      }
    }
  }

  private async attempt(job: PrintJob, signal: CancelSignal): Promise<void> {
    const { registry, jobs, payloads } = this.options;
    const { pollIntervalMs, timeoutMs, callTimeoutMs } = this.options.settings;
    const deviceId = job.deviceId;
    const deadline = Date.now() + timeoutMs;

    const entry = registry.require(deviceId);
    const dispatching = jobs.transition(job.id, 'Dispatching');

    const violations = capabilityViolations(entry.device.capabilities, job.settings);
    if (violations.length > 0) {
      throw new ProtocolError(`Capabilities changed since admission: ${violations.join('; ')}`, deviceId);
    }

    let payload: Buffer;
    try {
      payload = await payloads.get(job.payloadRef);
    } catch (error) {
      throw new JobRejectedError(`Payload unavailable: ${errorMessage(error)}`, deviceId);
    }

    // Uploads can be large; the adapter's own idle timeouts catch a stalled link
    const submit = registry.callDevice(deviceId, 'Job submit', timeoutMs, (e) =>
      e.adapter.submitJob(dispatching, payload));
    const { deviceJobRef } = await this.raceCancel(signal, submit, async (late) => {
      logger.info({ jobId: job.id, deviceJobRef: late.deviceJobRef }, 'Submit finished after cancellation');
      await this.cancelOnDevice(deviceId, job.id, late.deviceJobRef);
    });
    jobs.transition(job.id, 'Printing', { deviceJobRef });

    for (;;) {
      if (signal.requested) throw new CancelledError(job.id);

      let report: DeviceStatusReport | null = null;
      try {
        report = await this.raceCancel(signal, registry.callDevice(deviceId, 'Job status', callTimeoutMs, (e) =>
          e.adapter.getStatus(deviceJobRef)));
      } catch (error) {
        if (error instanceof CancelledError) throw error;
        const failure = toGatewayError(error, deviceId);
        if (!failure.retryable) throw failure;
        logger.warn({ jobId: job.id, kind: failure.kind, error: failure.message }, 'Job status poll failed');
      }

      if (report?.job?.state === 'completed') {
        this.finishCompleted(jobs.require(job.id));
        return;
      }
      if (report?.job?.state === 'failed') {
        throw new JobRejectedError(report.job.message || 'Device reported the job as failed', deviceId);
      }
      if (Date.now() >= deadline) {
        throw new JobTimeoutError(timeoutMs, deviceId);
      }
      await sleepUntil(pollIntervalMs, signal.wake);
    }
  }

  /**
   * Settle on `call`, or throw CancelledError as soon as cancellation fires.
   * A call that succeeds after being abandoned is handed to `onLate`.
   */
  private raceCancel<T>(signal: CancelSignal, call: Promise<T>, onLate?: (value: T) => Promise<void>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      let settled = false;
      let abandoned = false;

      signal.wake.then(() => {
        if (settled) return;
        abandoned = true;
        reject(new CancelledError('in-flight'));
      });

      call.then(
        (value) => {
          if (!abandoned) {
            settled = true;
            resolve(value);
            return;
          }
          onLate?.(value).catch((error: unknown) => {
            logger.warn({ error: errorMessage(error) }, 'Late call handling failed');
          });
        },
        (error: unknown) => {
          if (!abandoned) {
            settled = true;
            reject(error);
            return;
          }
          logger.debug({ error: errorMessage(error) }, 'Abandoned call failed after cancellation');
        }
      );
    });
  }

  private async cancelOnDevice(deviceId: string, jobId: string, ref: string | null): Promise<void> {
    if (!ref) return;
    const entry = this.options.registry.get(deviceId);
    if (!entry || !entry.adapter.supportsCancel) return;

    try {
      await this.options.registry.callDevice(deviceId, 'Job cancel', this.options.settings.callTimeoutMs, (e) =>
        e.adapter.cancelJob(ref));
    } catch (error) {
      logger.warn({ jobId, error: errorMessage(error) }, 'Device-side cancel failed');
    }
  }

  private finishCompleted(job: PrintJob): void {
    const done = this.options.jobs.transition(job.id, 'Completed');
    this.release(done);
    this.options.events.emit('job.completed', done);
  }

  private finishFailed(job: PrintJob, failure: GatewayError): void {
    const failed = this.options.jobs.transition(job.id, 'Failed', {
      lastError: { kind: failure.kind, message: failure.message },
    });
    logger.error({ jobId: job.id, kind: failure.kind, error: failure.message }, 'Job failed');
    this.release(failed);
    this.options.events.emit('job.failed', failed);
  }

  private finishCancelled(job: PrintJob): PrintJob {
    const cancelled = this.options.jobs.transition(job.id, 'Cancelled', {
      lastError: { kind: 'Cancelled', message: `Job cancelled: ${job.id}` },
    });
    this.release(cancelled);
    this.options.events.emit('job.cancelled', cancelled);
    return cancelled;
  }

  /** Drop the payload and wake anyone waiting on this job */
  private release(job: PrintJob): void {
    this.options.payloads.delete(job.payloadRef).catch((error: unknown) => {
      logger.warn({ jobId: job.id, error: errorMessage(error) }, 'Payload cleanup failed');
    });
    const list = this.waiters.get(job.id) ?? [];
    this.waiters.delete(job.id);
    for (const resolve of list) resolve(job);
  }
}
