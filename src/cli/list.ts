import { Command } from 'commander';
import { ValidationError } from '../core/errors.js';
import { JOB_STATES, Job, JobState, JobSummary, isJobState } from '../core/types.js';
import { action, openContext } from './context.js';

interface ListOptions {
  state?: string;
  campaign?: string;
  limit: string;
}

function truncate(s: string, max: number) {
  return s.length <= max ? s : `${s.slice(0, max - 3)}...`;
}

function parseState(value: string): JobState {
  if (!isJobState(value)) {
    throw new ValidationError(`Unknown state '${value}'. Use one of: ${JOB_STATES.join(', ')}`);
  }
  return value;
}

export function formatJobRow(job: Job) {
  const error = job.last_error ? `  ${truncate(job.last_error, 60)}` : '';
  return `${job.id}  ${job.state.padEnd(16)} ${job.recipient.padEnd(30)} ${job.not_before}  x${job.attempt_count}${error}`;
}

export function formatSummary(summary: JobSummary) {
  const lines = JOB_STATES.map((s) => `  ${s.padEnd(16)} ${summary.counts[s]}`);
  lines.push(`  ${'total'.padEnd(16)} ${summary.total}`);
  if (summary.oldestPending) lines.push(`  next due         ${summary.oldestPending}`);
  return lines.join('\n');
}

export function registerListCommands(program: Command) {
  program
    .command('list')
    .description('List jobs')
    .option('--state <state>', JOB_STATES.join('|'))
    .option('--campaign <id>', 'only jobs of this campaign')
    .option('--limit <n>', 'at most N jobs', '50')
    .action(
      action(async (opts: ListOptions) => {
        const limit = Number(opts.limit);
        const { queue } = openContext();
        const jobs = await queue.list({
          state: opts.state === undefined ? undefined : parseState(opts.state),
          campaignId: opts.campaign,
          limit: Number.isInteger(limit) && limit > 0 ? limit : 50,
        });
        if (jobs.length === 0) {
          console.log('No jobs found.');
          return;
        }
        for (const job of jobs) console.log(formatJobRow(job));
      })
    );

  program
    .command('status')
    .description('Show job counts, overall or for one campaign')
    .option('--campaign <id>', 'campaign id')
    .action(
      action(async (opts: { campaign?: string }) => {
        const { queue } = openContext();
        const summary = await queue.summary(opts.campaign);
        console.log(opts.campaign ? `Campaign ${opts.campaign}` : 'All jobs');
        console.log(formatSummary(summary));
        console.log(`  → ${summary.sent} sent, ${summary.failed} failed, ${summary.pending} still to go`);
      })
    );

  program
    .command('cancel')
    .argument('<id>', 'job id')
    .description('Cancel a pending job')
    .action(
      action(async (id: string) => {
        const { queue } = openContext();
        if (await queue.cancel(id)) {
          console.log(`✅ Cancelled job ${id}`);
          return;
        }
        const job = await queue.get(id);
        throw new Error(job ? `Job ${id} is ${job.state}; only pending jobs can be cancelled` : `No job ${id}`);
      })
    );

  program
    .command('reschedule')
    .argument('<id>', 'job id')
    .argument('<when>', 'new send time')
    .description('Move a pending job to a new send time')
    .action(
      action(async (id: string, when: string) => {
        const { queue } = openContext();
        if (await queue.reschedule(id, when)) {
          const job = await queue.get(id);
          console.log(`✅ Job ${id} now due at ${job?.not_before}`);
          return;
        }
        const job = await queue.get(id);
        throw new Error(job ? `Job ${id} is ${job.state}; only pending jobs can be rescheduled` : `No job ${id}`);
      })
    );
}
