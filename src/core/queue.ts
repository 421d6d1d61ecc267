import { subDays } from 'date-fns';
import { Settings } from '../config.js';
import { DB } from '../db/db.js';
import { SqliteJobStore } from '../db/repo.js';
import { CampaignExpander, CampaignResult, InvalidRowMode, RecipientRow } from './campaign.js';
import { DispatchEngine, PassOptions, PassReport, Sleep } from './dispatcher.js';
import { ConfigurationError, ValidationError } from './errors.js';
import { RateLimiter } from './rate_limiter.js';
import { TemplateRenderer } from './renderer.js';
import { JobStore } from './store.js';
import { TimeParser } from './time_parser.js';
import { MailTransport } from './transport.js';
import { checkSendTime } from './validation.js';
import {
  Clock,
  Job,
  JobFilter,
  JobSpec,
  JobSummary,
  Logger,
  RecoveryPolicy,
  RecoveryReport,
  TemplateRef,
  systemClock,
} from './types.js';

export interface SubmitRequest extends Omit<JobSpec, 'notBefore'> {
  /** Operator time expression, e.g. "tomorrow 9am". Must not be in the past. */
  when?: string;
  notBefore?: Date;
}

export interface CampaignRequest {
  body: TemplateRef;
  subject: TemplateRef;
  rows: RecipientRow[];
  when?: string;
  attachments?: string[];
  limit?: number;
  invalidRows?: InvalidRowMode;
  campaignId?: string;
}

export interface MailQueueOptions {
  store: JobStore;
  /** Absent for a queue that only submits and inspects jobs. */
  engine?: DispatchEngine;
  expander: CampaignExpander;
  timeParser: TimeParser;
  recoveryPolicy?: RecoveryPolicy;
  invalidRows?: InvalidRowMode;
  clock?: Clock;
}

/**
 * Operator surface of the scheduler. Everything the CLI and the dashboard
 * do goes through here.
 */
export class MailQueue {
  readonly store: JobStore;
  private readonly engine: DispatchEngine | null;
  private readonly expander: CampaignExpander;
  private readonly timeParser: TimeParser;
  private readonly recoveryPolicy: RecoveryPolicy;
  private readonly invalidRows: InvalidRowMode;
  private readonly clock: Clock;

  constructor(opts: MailQueueOptions) {
    this.store = opts.store;
    this.engine = opts.engine ?? null;
    this.expander = opts.expander;
    this.timeParser = opts.timeParser;
    this.recoveryPolicy = opts.recoveryPolicy ?? 'requeue';
    this.invalidRows = opts.invalidRows ?? 'record';
    this.clock = opts.clock ?? systemClock;
  }

  async submit(req: SubmitRequest): Promise<string> {
    const { when, notBefore, ...spec } = req;
    return this.store.create({ ...spec, notBefore: this.resolveWhen(when, notBefore) });
  }

  async submitCampaign(req: CampaignRequest): Promise<CampaignResult> {
    return this.expander.expand(req.body, req.rows, req.subject, {
      campaignId: req.campaignId,
      notBefore: this.resolveWhen(req.when),
      attachments: req.attachments,
      limit: req.limit,
      invalidRows: req.invalidRows ?? this.invalidRows,
    });
  }

  list(filter: JobFilter = {}): Promise<Job[]> {
    return this.store.list(filter);
  }

  get(id: string): Promise<Job | null> {
    return this.store.get(id);
  }

  /** False when the job is unknown or no longer pending. */
  cancel(id: string): Promise<boolean> {
    return this.store.cancel(id);
  }

  async reschedule(id: string, when: string): Promise<boolean> {
    const at = this.resolveWhen(when);
    return this.store.reschedule(id, at ?? this.clock());
  }

  async runPass(opts: PassOptions = {}): Promise<PassReport> {
    if (!this.engine) throw new ConfigurationError('no mail transport configured; cannot dispatch');
    return this.engine.runPass(opts);
  }

  summary(campaignId?: string): Promise<JobSummary> {
    return this.store.summarize({ campaignId });
  }

  recover(): Promise<RecoveryReport> {
    return this.store.recover(this.recoveryPolicy, this.clock());
  }

  async prune(days: number): Promise<number> {
    if (!Number.isInteger(days) || days < 0) {
      throw new ValidationError(`days must be a non-negative integer, got ${days}`);
    }
    return this.store.prune(subDays(this.clock(), days));
  }

  /** Turn an operator time expression into an instant; unset means "now". */
  private resolveWhen(when?: string, notBefore?: Date): Date | undefined {
    if (when === undefined) return notBefore;
    if (notBefore !== undefined) throw new ValidationError('give either when or notBefore, not both');
    const now = this.clock();
    const at = checkSendTime(this.timeParser.parse(when, now));
    if (at.getTime() < now.getTime()) {
      throw new ValidationError(`Cannot schedule in the past: ${at.toISOString()}`);
    }
    return at;
  }
}

export interface MailQueueDeps {
  db: DB;
  settings: Settings;
  templateDir: string;
  timezone: string;
  transport?: MailTransport;
  clock?: Clock;
  logger?: Logger;
  sleep?: Sleep;
  random?: () => number;
}

/** Wire a queue over one SQLite database with the given runtime settings. */
export function createMailQueue(deps: MailQueueDeps): MailQueue {
  const { settings } = deps;
  const clock = deps.clock ?? systemClock;
  const renderer = new TemplateRenderer(deps.templateDir);
  const store = new SqliteJobStore(deps.db, { renderer, clock });
  const engine = deps.transport && new DispatchEngine({
    store,
    limiter: new RateLimiter({
      ratePerMinute: settings.rate_per_minute,
      burst: settings.burst,
      windowMs: settings.window_ms,
      clock,
    }),
    renderer,
    transport: deps.transport,
    policy: {
      maxAttempts: settings.max_attempts,
      backoff: {
        baseMs: settings.backoff_base_ms,
        maxMs: settings.backoff_max_ms,
        jitter: settings.backoff_jitter,
      },
      batchSize: settings.batch_size,
      concurrency: settings.concurrency,
    },
    clock,
    logger: deps.logger,
    sleep: deps.sleep,
    random: deps.random,
  });
  return new MailQueue({
    store,
    engine,
    expander: new CampaignExpander(store, { clock, logger: deps.logger }),
    timeParser: new TimeParser(deps.timezone),
    recoveryPolicy: settings.recovery_policy,
    invalidRows: settings.invalid_rows,
    clock,
  });
}
