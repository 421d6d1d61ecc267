import { Command } from 'commander';
import { ValidationError } from '../core/errors.js';
import { SubmitRequest } from '../core/queue.js';
import { TemplateRef } from '../core/types.js';
import { maskEmail } from '../core/validation.js';
import { drainJob } from '../core/worker.js';
import { DISPATCH_LOCK, claimLock, releaseLock } from '../db/repo.js';
import { action, collect, openContext, parseVars, templateFile } from './context.js';

interface MessageOptions {
  to: string;
  subject: string;
  body?: string;
  html?: string;
  template?: string;
  attach?: string[];
  cc?: string[];
  bcc?: string[];
  var?: string[];
}

interface ScheduleOptions extends MessageOptions {
  when: string;
}

function bodyRef(opts: MessageOptions): TemplateRef {
  const given = [opts.body, opts.html, opts.template].filter((v) => v !== undefined);
  if (given.length !== 1) {
    throw new ValidationError('Provide exactly one of --body, --html or --template');
  }
  if (opts.template !== undefined) return templateFile(opts.template);
  return { kind: 'inline', source: opts.html ?? opts.body ?? '' };
}

function toRequest(opts: MessageOptions): SubmitRequest {
  return {
    recipient: opts.to,
    cc: opts.cc ?? [],
    bcc: opts.bcc ?? [],
    subject: { kind: 'inline', source: opts.subject },
    body: bodyRef(opts),
    variables: parseVars(opts.var),
    attachments: opts.attach ?? [],
  };
}

function messageOptions(cmd: Command) {
  return cmd
    .requiredOption('-t, --to <email>', 'recipient address')
    .requiredOption('-s, --subject <text>', 'subject line ({{name}} placeholders allowed)')
    .option('-b, --body <text>', 'plain-text body')
    .option('--html <html>', 'HTML body')
    .option('--template <file>', 'body template file')
    .option('-a, --attach <file>', 'attach a file (repeatable)', collect)
    .option('--cc <email>', 'carbon copy (repeatable)', collect)
    .option('--bcc <email>', 'blind carbon copy (repeatable)', collect)
    .option('--var <name=value>', 'template variable (repeatable)', collect);
}

export function registerSendCommands(program: Command) {
  messageOptions(program.command('send').description('Send one email now'))
    .action(
      action(async (opts: MessageOptions) => {
        const ctx = openContext({ send: true });
        const holder = claimLock(ctx.db, DISPATCH_LOCK, process.pid, new Date());
        const dispatch = holder === process.pid;
        try {
          const id = await ctx.queue.submit(toRequest(opts));
          console.log(`Queued job ${id} for ${maskEmail(opts.to)}`);
          if (!dispatch) console.log(`   Worker pid ${holder} is dispatching; waiting for it to send the job.`);
          const job = await drainJob(ctx.queue, id, { pollIntervalMs: ctx.settings.poll_interval_ms, dispatch });
          if (job?.state === 'sent') {
            console.log(`✅ Email sent to ${opts.to}`);
          } else if (job) {
            console.error(`❌ Job ${id} ended ${job.state}: ${job.last_error ?? 'no error recorded'}`);
            process.exitCode = 1;
          }
        } finally {
          if (dispatch) releaseLock(ctx.db, DISPATCH_LOCK, process.pid);
          ctx.transport?.close();
        }
      })
    );

  messageOptions(program.command('schedule').description('Schedule one email for later'))
    .requiredOption('-w, --when <time>', `when to send, e.g. "in 2 hours", "tomorrow 9am", "2026-03-01 14:30"`)
    .action(
      action(async (opts: ScheduleOptions) => {
        const { queue } = openContext();
        const id = await queue.submit({ ...toRequest(opts), when: opts.when });
        const job = await queue.get(id);
        console.log(`✅ Scheduled job ${id} for ${maskEmail(opts.to)} at ${job?.not_before ?? opts.when}`);
        console.log('   Run `mailctl worker start` to process scheduled emails.');
      })
    );
}
