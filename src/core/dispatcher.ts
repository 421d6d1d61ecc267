import { access, constants } from 'node:fs/promises';
import { setTimeout as delay } from 'node:timers/promises';
import { BackoffPolicy, backoffDelay } from './backoff.js';
import { PermanentDeliveryError, RenderError, TransientDeliveryError, errorMessage } from './errors.js';
import { Renderer, composeMessage } from './renderer.js';
import { JobStore } from './store.js';
import { DeliveryResult, MailTransport } from './transport.js';
import { Clock, Job, Logger, OutboundMessage, Outcome, systemClock } from './types.js';
import { maskEmail } from './validation.js';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = (ms, signal) => delay(ms, undefined, { signal });

/** Anything that can hand out admission delays, e.g. RateLimiter. */
export interface Admission {
  acquire(): number;
}

export interface DispatchPolicy {
  /** Attempts a job may use before a transient failure becomes permanent. */
  maxAttempts: number;
  backoff: BackoffPolicy;
  batchSize: number;
  concurrency: number;
}

export interface DispatchEngineOptions {
  store: JobStore;
  limiter: Admission;
  renderer: Renderer;
  transport: MailTransport;
  policy: DispatchPolicy;
  clock?: Clock;
  logger?: Logger;
  sleep?: Sleep;
  random?: () => number;
}

export interface PassOptions {
  signal?: AbortSignal;
  /** Only consider these jobs, e.g. the one a `send` is waiting on. */
  onlyIds?: readonly string[];
}

export interface PassReport {
  fetched: number;
  sent: number;
  retried: number;
  failed: number;
  /** Due jobs another dispatcher or an operator cancel got to first. */
  skipped: number;
  /** Admitted jobs handed back to `pending` because of shutdown. */
  released: number;
  aborted: boolean;
}

type Step = 'continue' | 'stop';

/**
 * Drives due jobs through admission, rendering and delivery, then writes
 * the outcome back. One call to `runPass` handles one bounded batch.
 */
export class DispatchEngine {
  private readonly store: JobStore;
  private readonly limiter: Admission;
  private readonly renderer: Renderer;
  private readonly transport: MailTransport;
  private readonly policy: DispatchPolicy;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly sleep: Sleep;
  private readonly random: () => number;

  constructor(opts: DispatchEngineOptions) {
    this.store = opts.store;
    this.limiter = opts.limiter;
    this.renderer = opts.renderer;
    this.transport = opts.transport;
    this.policy = opts.policy;
    this.clock = opts.clock ?? systemClock;
    this.logger = opts.logger ?? console;
    this.sleep = opts.sleep ?? sleep;
    this.random = opts.random ?? Math.random;
  }

  /**
   * Fetch up to `batchSize` due jobs and attempt them oldest-due first.
   * A failure of one job is recorded on that job; store errors and invariant
   * violations abort the pass and are rethrown.
   */
  async runPass(opts: PassOptions = {}): Promise<PassReport> {
    const { signal } = opts;
    const report: PassReport = { fetched: 0, sent: 0, retried: 0, failed: 0, skipped: 0, released: 0, aborted: false };
    if (signal?.aborted) return { ...report, aborted: true };

    const due = await this.store.fetchDue(this.clock(), this.policy.batchSize, opts.onlyIds);
    report.fetched = due.length;
    if (due.length === 0) return report;

    let next = 0;
    let stopped = false;
    let failure: unknown = null;

    const worker = async () => {
      while (!stopped && next < due.length) {
        const job = due[next++];
        try {
          if ((await this.dispatch(job, report, signal)) === 'stop') stopped = true;
        } catch (err) {
          stopped = true;
          failure ??= err;
        }
      }
    };

    const width = Math.max(1, Math.min(this.policy.concurrency, due.length));
    await Promise.allSettled(Array.from({ length: width }, () => worker()));
    if (failure !== null) throw failure;

    if (signal?.aborted) report.aborted = true;
    this.logger.log(
      `[dispatch] pass done: ${report.sent} sent, ${report.retried} retrying, ${report.failed} failed` +
        (report.skipped ? `, ${report.skipped} skipped` : '') +
        (report.released ? `, ${report.released} released` : '')
    );
    return report;
  }

  private async dispatch(job: Job, report: PassReport, signal?: AbortSignal): Promise<Step> {
    if (signal?.aborted) return 'stop';

    const wait = this.limiter.acquire();
    if (wait > 0) {
      try {
        await this.sleep(wait, signal);
      } catch (err) {
        // not yet admitted: the job is still pending
        if (signal?.aborted) return 'stop';
        throw err;
      }
    }

    if (!(await this.store.markInFlight(job.id))) {
      report.skipped++;
      return 'continue';
    }

    if (signal?.aborted) {
      await this.store.release(job.id);
      report.released++;
      this.logger.warn(`[dispatch] job ${job.id} released before delivery (shutting down)`);
      return 'stop';
    }

    const attemptAt = this.clock();
    const current = await this.store.beginAttempt(job.id, attemptAt);
    const outcome = await this.attempt(current);
    await this.settle(current, attemptAt, outcome, report);
    return 'continue';
  }

  private async attempt(job: Job): Promise<Outcome> {
    let message: OutboundMessage;
    try {
      message = await composeMessage(this.renderer, job);
    } catch (err) {
      const reason = err instanceof RenderError ? `render failed: ${err.message}` : errorMessage(err);
      return { type: 'permanent', error: reason };
    }

    for (const file of message.attachments) {
      try {
        await access(file, constants.R_OK);
      } catch {
        return { type: 'permanent', error: `attachment unreadable: ${file}` };
      }
    }

    let res: DeliveryResult;
    try {
      res = await this.transport.deliver(message, job.recipient);
    } catch (err) {
      if (err instanceof TransientDeliveryError) return { type: 'transient', error: err.message };
      if (err instanceof PermanentDeliveryError) return { type: 'permanent', error: err.message };
      return { type: 'permanent', error: `transport error: ${errorMessage(err)}` };
    }
    switch (res.status) {
      case 'ok':
        return { type: 'sent', messageId: res.messageId };
      case 'transient_error':
        return { type: 'transient', error: res.error };
      case 'permanent_error':
        return { type: 'permanent', error: res.error };
    }
  }

  private async settle(job: Job, attemptAt: Date, outcome: Outcome, report: PassReport) {
    const who = maskEmail(job.recipient);
    const n = job.attempt_count;

    if (outcome.type === 'sent') {
      await this.store.recordResult(job.id, outcome);
      report.sent++;
      this.logger.log(`[dispatch] ✅ job ${job.id} sent to ${who} (attempt ${n})`);
      return;
    }

    if (outcome.type === 'permanent') {
      await this.store.recordResult(job.id, outcome);
      report.failed++;
      this.logger.error(`[dispatch] ❌ job ${job.id} to ${who} failed permanently: ${outcome.error}`);
      return;
    }

    if (n >= this.policy.maxAttempts) {
      const error = `retry budget exhausted after ${n} attempts: ${outcome.error}`;
      await this.store.recordResult(job.id, { type: 'permanent', error });
      report.failed++;
      this.logger.error(`[dispatch] ❌ job ${job.id} to ${who} ${error}`);
      return;
    }

    await this.store.recordResult(job.id, outcome);
    const wait = backoffDelay(n, this.policy.backoff, this.random);
    const notBefore = new Date(Math.max(this.clock().getTime(), attemptAt.getTime()) + wait);
    await this.store.scheduleRetry(job.id, notBefore);
    report.retried++;
    this.logger.warn(
      `[dispatch] job ${job.id} to ${who} failed (attempt ${n}), retry at ${notBefore.toISOString()}: ${outcome.error}`
    );
  }
}
