import { Command } from 'commander';
import { ValidationError } from '../core/errors.js';
import { loadRecipients } from '../core/recipients.js';
import { action, collect, openContext, templateFile } from './context.js';

interface BulkOptions {
  recipients: string;
  template: string;
  subject: string;
  when?: string;
  limit?: string;
  attach?: string[];
  skipInvalid?: boolean;
}

export function registerBulkCommand(program: Command) {
  program
    .command('bulk')
    .description('Queue one personalized email per CSV row')
    .requiredOption('-r, --recipients <csv>', 'CSV with an email column; other columns become variables')
    .requiredOption('-t, --template <file>', 'body template file')
    .requiredOption('-s, --subject <text>', 'subject line ({{name}} placeholders allowed)')
    .option('-w, --when <time>', 'send time for the whole campaign')
    .option('--limit <n>', 'only the first N rows')
    .option('-a, --attach <file>', 'attach a file to every email (repeatable)', collect)
    .option('--skip-invalid', 'report invalid rows without recording them as failed jobs')
    .action(
      action(async (opts: BulkOptions) => {
        const { queue } = openContext();
        const rows = await loadRecipients(opts.recipients);
        const limit = opts.limit === undefined ? undefined : Number(opts.limit);
        if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
          throw new ValidationError(`--limit must be a positive integer, got '${opts.limit}'`);
        }

        const result = await queue.submitCampaign({
          body: templateFile(opts.template),
          subject: { kind: 'inline', source: opts.subject },
          rows,
          when: opts.when,
          limit,
          attachments: opts.attach,
          invalidRows: opts.skipInvalid ? 'skip' : undefined,
        });

        console.log(`✅ Campaign ${result.campaignId}: ${result.jobIds.length} emails queued`);
        if (result.rejected.length) {
          console.log(`⚠️  ${result.rejected.length} rows rejected:`);
          for (const r of result.rejected.slice(0, 10)) console.log(`   row ${r.row}: ${r.reason}`);
          if (result.rejected.length > 10) console.log(`   ... and ${result.rejected.length - 10} more`);
        }
        console.log(`   Track it with: mailctl status --campaign ${result.campaignId}`);
      })
    );
}
