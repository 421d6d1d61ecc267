import { PassReport, Sleep, sleep as defaultSleep } from './dispatcher.js';
import { SchedulerInvariantViolation, errorMessage } from './errors.js';
import { MailQueue } from './queue.js';
import { isTerminal } from './state.js';
import { Job, Logger } from './types.js';

export interface WorkerOptions {
  pollIntervalMs: number;
  signal?: AbortSignal;
  /** Stop as soon as a pass finds nothing due. */
  once?: boolean;
  /** Resolve jobs a previous process left behind before the first pass. */
  recover?: boolean;
  logger?: Logger;
  sleep?: Sleep;
}

export interface WorkerTotals {
  passes: number;
  sent: number;
  retried: number;
  failed: number;
}

type Queue = Pick<MailQueue, 'runPass' | 'recover' | 'get'>;

/** Sleep that resolves false instead of throwing when the signal fires. */
async function idle(sleep: Sleep, ms: number, signal?: AbortSignal) {
  try {
    await sleep(ms, signal);
    return true;
  } catch (err) {
    if (signal?.aborted) return false;
    throw err;
  }
}

/**
 * Run scheduling passes until the signal is aborted. A pass that fails on the
 * store is logged and tried again on the next tick; an invariant violation
 * stops the loop and is rethrown.
 */
export async function workerLoop(queue: Queue, opts: WorkerOptions): Promise<WorkerTotals> {
  const logger = opts.logger ?? console;
  const sleep = opts.sleep ?? defaultSleep;
  const { signal } = opts;
  const totals: WorkerTotals = { passes: 0, sent: 0, retried: 0, failed: 0 };

  if (opts.recover ?? true) {
    const r = await queue.recover();
    if (r.requeued || r.failed || r.rescheduled) {
      logger.warn(`[worker] recovered ${r.requeued} requeued, ${r.failed} failed, ${r.rescheduled} rescheduled`);
    }
  }

  logger.log(`[worker] started (poll every ${opts.pollIntervalMs}ms)`);
  while (!signal?.aborted) {
    let report: PassReport | null = null;
    try {
      report = await queue.runPass({ signal });
    } catch (err) {
      if (err instanceof SchedulerInvariantViolation) {
        logger.error(`[worker] ❌ stopping: ${err.message}`);
        throw err;
      }
      logger.error(`[worker] ❌ pass failed, retrying in ${opts.pollIntervalMs}ms: ${errorMessage(err)}`);
    }

    if (report) {
      totals.passes++;
      totals.sent += report.sent;
      totals.retried += report.retried;
      totals.failed += report.failed;
      if (opts.once && report.fetched === 0) break;
      // a full batch likely means more is due right now
      if (report.fetched > 0 && !report.aborted) continue;
    }

    if (!(await idle(sleep, opts.pollIntervalMs, signal))) break;
  }

  logger.log(`[worker] stopped after ${totals.passes} passes: ${totals.sent} sent, ${totals.failed} failed`);
  return totals;
}

export interface DrainOptions extends Pick<WorkerOptions, 'pollIntervalMs' | 'signal' | 'sleep'> {
  /** False when another process dispatches; then only wait for the outcome. */
  dispatch?: boolean;
}

/**
 * Wait until one job reaches a terminal state, dispatching that job alone
 * and waiting out its retry backoff in between. Other due jobs are left to
 * the worker. Returns the job as last seen, which is not terminal only if the
 * signal fired first.
 */
export async function drainJob(queue: Pick<MailQueue, 'runPass' | 'get'>, id: string, opts: DrainOptions): Promise<Job | null> {
  const sleep = opts.sleep ?? defaultSleep;
  for (;;) {
    const job = await queue.get(id);
    if (!job || isTerminal(job.state)) return job;
    if (opts.dispatch ?? true) await queue.runPass({ signal: opts.signal, onlyIds: [id] });
    const after = await queue.get(id);
    if (!after || isTerminal(after.state)) return after;
    if (!(await idle(sleep, opts.pollIntervalMs, opts.signal))) return after;
  }
}
