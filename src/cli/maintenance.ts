import { Command } from 'commander';
import { loadPaths, loadSmtpConfig } from '../config.js';
import { ValidationError, errorMessage } from '../core/errors.js';
import { TemplateRenderer, listTemplates } from '../core/renderer.js';
import { SmtpTransport } from '../transport/smtp.js';
import { action, openContext } from './context.js';

export function registerMaintenanceCommands(program: Command) {
  program
    .command('templates')
    .description('List templates in TEMPLATE_DIR and the variables they use')
    .action(
      action(async () => {
        const { templateDir } = loadPaths();
        const templates = await listTemplates(new TemplateRenderer(templateDir), templateDir);
        if (templates.length === 0) {
          console.log(`No templates found in ${templateDir}`);
          return;
        }
        for (const t of templates) {
          const vars = t.error ? `❌ ${t.error}` : t.variables.join(', ') || '(no variables)';
          console.log(`${t.name.padEnd(24)} ${t.type.padEnd(5)} ${vars}`);
        }
      })
    );

  program
    .command('verify')
    .description('Check the SMTP connection and credentials without sending')
    .action(
      action(async () => {
        const config = loadSmtpConfig();
        const transport = new SmtpTransport(config);
        console.log(`Connecting to ${config.host}:${config.port}...`);
        try {
          await transport.verify();
          console.log(`✅ SMTP connection OK (sending as ${config.sender.email})`);
        } catch (err) {
          throw new Error(`SMTP connection failed: ${errorMessage(err)}`);
        } finally {
          transport.close();
        }
      })
    );

  program
    .command('prune')
    .description('Delete sent, failed and cancelled jobs older than N days')
    .requiredOption('--days <n>', 'age in days')
    .action(
      action(async (opts: { days: string }) => {
        const days = Number(opts.days);
        if (!Number.isInteger(days) || days < 0) {
          throw new ValidationError(`--days must be a non-negative integer, got '${opts.days}'`);
        }
        const { queue } = openContext();
        const removed = await queue.prune(days);
        console.log(`✅ Removed ${removed} finished jobs older than ${days} days`);
      })
    );
}
