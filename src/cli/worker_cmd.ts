import { Command } from 'commander';
import { workerLoop } from '../core/worker.js';
import { DISPATCH_LOCK, claimLock, releaseLock } from '../db/repo.js';
import { action, openContext } from './context.js';

export async function startWorker(opts: { once?: boolean }) {
  const ctx = openContext({ send: true });
  const holder = claimLock(ctx.db, DISPATCH_LOCK, process.pid, new Date());
  if (holder !== process.pid) {
    ctx.transport?.close();
    throw new Error(`Another process (pid ${holder}) is already dispatching from this queue`);
  }
  const ctrl = new AbortController();
  const stop = () => {
    if (ctrl.signal.aborted) return;
    console.log('\n[worker] shutting down after the current delivery...');
    ctrl.abort();
  };
  process.on('SIGINT', stop);
  process.on('SIGTERM', stop);

  try {
    await workerLoop(ctx.queue, {
      pollIntervalMs: ctx.settings.poll_interval_ms,
      signal: ctrl.signal,
      once: opts.once,
    });
  } finally {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
    releaseLock(ctx.db, DISPATCH_LOCK, process.pid);
    ctx.transport?.close();
  }
}

export function registerWorkerCommand(program: Command) {
  program
    .command('worker')
    .description('Dispatch due jobs')
    .command('start')
    .option('--once', 'exit when nothing is due')
    .action(action(async (opts: { once?: boolean }) => startWorker(opts)));
}
