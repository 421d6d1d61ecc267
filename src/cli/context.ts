import { existsSync } from 'node:fs';
import path from 'node:path';
import { Paths, Settings, loadPaths, loadSettings, loadSmtpConfig } from '../config.js';
import { ValidationError, errorMessage } from '../core/errors.js';
import { MailQueue, createMailQueue } from '../core/queue.js';
import { TemplateRef } from '../core/types.js';
import { DB, getDB } from '../db/db.js';
import { SmtpTransport } from '../transport/smtp.js';

export interface CliContext {
  db: DB;
  paths: Paths;
  settings: Settings;
  queue: MailQueue;
  transport: SmtpTransport | null;
}

/**
 * Open the job database and build a queue. SMTP settings are only required
 * when `send` is set, so inspecting jobs works without them.
 */
export function openContext(opts: { send?: boolean } = {}): CliContext {
  const paths = loadPaths();
  const db = getDB(paths.dbPath);
  const settings = loadSettings(db);
  const transport = opts.send ? new SmtpTransport(loadSmtpConfig()) : null;
  const queue = createMailQueue({
    db,
    settings,
    templateDir: paths.templateDir,
    timezone: paths.timezone,
    transport: transport ?? undefined,
  });
  return { db, paths, settings, queue, transport };
}

/** Run a command action, reporting failures as `❌ message` with exit code 1. */
export function action<A extends unknown[]>(fn: (...args: A) => Promise<void> | void) {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (err) {
      if (err instanceof ValidationError && err.issues.length > 1) {
        console.error('❌ Invalid input:');
        for (const issue of err.issues) console.error(`   - ${issue}`);
      } else {
        console.error(`❌ ${errorMessage(err)}`);
      }
      process.exitCode = 1;
    }
  };
}

/** commander collector for repeatable options. */
export function collect(value: string, previous: string[] = []) {
  return [...previous, value];
}

/** `--var name=value` pairs into a variables map. */
export function parseVars(pairs: string[] = []) {
  const vars: Record<string, string> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) throw new ValidationError(`--var expects name=value, got '${pair}'`);
    vars[pair.slice(0, eq).trim()] = pair.slice(eq + 1);
  }
  return vars;
}

/**
 * A template argument names a file relative to the working directory, or
 * failing that, one under TEMPLATE_DIR.
 */
export function templateFile(file: string): TemplateRef {
  const local = path.resolve(file);
  return { kind: 'file', path: existsSync(local) ? local : file };
}
