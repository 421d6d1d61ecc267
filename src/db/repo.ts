import { monotonicFactory } from 'ulid';
import { z } from 'zod';
import { RenderError, SchedulerInvariantViolation, ValidationError } from '../core/errors.js';
import { Renderer } from '../core/renderer.js';
import { assertTransition } from '../core/state.js';
import { JobStore, RejectedJobSpec } from '../core/store.js';
import {
  Clock,
  Job,
  JobFilter,
  JobSpec,
  JobState,
  JobSummary,
  Outcome,
  RecoveryPolicy,
  RecoveryReport,
  TERMINAL_STATES,
  isJobState,
  systemClock,
} from '../core/types.js';
import { checkSendTime, parseJobSpec, templateRefSchema, variablesSchema } from '../core/validation.js';
import { DB } from './db.js';

interface JobRow {
  id: string;
  recipient: string;
  cc: string;
  bcc: string;
  subject_template: string;
  body_template: string;
  variables: string;
  attachments: string;
  not_before: string;
  state: string;
  attempt_count: number;
  last_error: string | null;
  last_attempt_at: string | null;
  message_id: string | null;
  campaign_id: string | null;
  created_at: string;
  updated_at: string;
}

type InsertRow = Omit<JobRow, 'last_attempt_at' | 'message_id'>;

const PATCH_COLUMNS = ['not_before', 'attempt_count', 'last_error', 'last_attempt_at', 'message_id'] as const;
type PatchColumn = (typeof PATCH_COLUMNS)[number];
type Patch = Partial<Record<PatchColumn, string | number | null>>;

const stringList = z.array(z.string());

function decode<T>(schema: z.ZodType<T>, raw: string, column: string, id: string): T {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    throw new SchedulerInvariantViolation(`corrupt ${column} on job ${id}`);
  }
  const res = schema.safeParse(value);
  if (!res.success) throw new SchedulerInvariantViolation(`corrupt ${column} on job ${id}`);
  return res.data;
}

function toJob(row: JobRow): Job {
  if (!isJobState(row.state)) {
    throw new SchedulerInvariantViolation(`unknown state '${row.state}' on job ${row.id}`);
  }
  return {
    ...row,
    state: row.state,
    cc: decode(stringList, row.cc, 'cc', row.id),
    bcc: decode(stringList, row.bcc, 'bcc', row.id),
    subject_template: decode(templateRefSchema, row.subject_template, 'subject_template', row.id),
    body_template: decode(templateRefSchema, row.body_template, 'body_template', row.id),
    variables: decode(variablesSchema, row.variables, 'variables', row.id),
    attachments: decode(stringList, row.attachments, 'attachments', row.id),
  };
}

export interface SqliteJobStoreOptions {
  /** Used at creation time to check that every placeholder has a value. */
  renderer: Pick<Renderer, 'variablesOf'>;
  clock?: Clock;
}

export class SqliteJobStore implements JobStore {
  private readonly renderer: Pick<Renderer, 'variablesOf'>;
  private readonly clock: Clock;
  private readonly nextId = monotonicFactory();

  constructor(private readonly db: DB, opts: SqliteJobStoreOptions) {
    this.renderer = opts.renderer;
    this.clock = opts.clock ?? systemClock;
  }

  async create(input: JobSpec): Promise<string> {
    const spec = parseJobSpec(input);

    const missing: string[] = [];
    for (const [what, ref] of [['subject', spec.subject], ['body', spec.body]] as const) {
      let names: string[];
      try {
        names = await this.renderer.variablesOf(ref);
      } catch (err) {
        if (err instanceof RenderError) throw new ValidationError(`${what}: ${err.message}`);
        throw err;
      }
      for (const n of names) {
        if (!Object.prototype.hasOwnProperty.call(spec.variables, n) && !missing.includes(n)) missing.push(n);
      }
    }
    if (missing.length) {
      throw new ValidationError(`missing template variables: ${missing.join(', ')}`);
    }

    const now = this.clock();
    const id = this.nextId(now.getTime());
    this.insert({
      id,
      recipient: spec.recipient,
      cc: JSON.stringify(spec.cc),
      bcc: JSON.stringify(spec.bcc),
      subject_template: JSON.stringify(spec.subject),
      body_template: JSON.stringify(spec.body),
      variables: JSON.stringify(spec.variables),
      attachments: JSON.stringify(spec.attachments),
      not_before: (spec.notBefore ?? now).toISOString(),
      state: 'pending',
      attempt_count: 0,
      last_error: null,
      campaign_id: spec.campaignId ?? null,
      created_at: now.toISOString(),
      updated_at: now.toISOString(),
    });
    return id;
  }

  async createRejected(spec: RejectedJobSpec, reason: string): Promise<string> {
    const now = this.clock();
    const id = this.nextId(now.getTime());
    this.insert({
      id,
      recipient: spec.recipient,
      cc: JSON.stringify(spec.cc ?? []),
      bcc: JSON.stringify(spec.bcc ?? []),
      subject_template: JSON.stringify(spec.subject),
      body_template: JSON.stringify(spec.body),
      variables: JSON.stringify(spec.variables ?? {}),
      attachments: JSON.stringify(spec.attachments ?? []),
      not_before: now.toISOString(),
      state: 'failed_permanent',
      attempt_count: 0,
      last_error: reason,
      campaign_id: spec.campaignId ?? null,
      created_at: now.toISOString(),
      updated_at: now.toISOString(),
    });
    return id;
  }

  async get(id: string) {
    return this.load(id);
  }

  async fetchDue(now: Date, limit: number, ids?: readonly string[]) {
    if (ids && ids.length === 0) return [];
    const only = ids ? `AND id IN (${ids.map(() => '?').join(', ')})` : '';
    const rows = this.db
      .prepare<(string | number)[], JobRow>(`
        SELECT * FROM jobs
        WHERE state = 'pending' AND not_before <= ? ${only}
        ORDER BY not_before ASC, created_at ASC, id ASC
        LIMIT ?
      `)
      .all(now.toISOString(), ...(ids ?? []), limit);
    return rows.map(toJob);
  }

  async markInFlight(id: string) {
    // single conditional update: the admission point between dispatchers
    const res = this.db
      .prepare<[string, string]>(`UPDATE jobs SET state = 'in_flight', updated_at = ? WHERE id = ? AND state = 'pending'`)
      .run(this.stamp(), id);
    return res.changes === 1;
  }

  async beginAttempt(id: string, at: Date): Promise<Job> {
    return this.db
      .transaction(() => {
        const job = this.require(id);
        if (job.state !== 'in_flight') {
          throw new SchedulerInvariantViolation(`attempt on job ${id} in state ${job.state}`);
        }
        this.update(id, 'in_flight', 'in_flight', {
          attempt_count: job.attempt_count + 1,
          last_attempt_at: at.toISOString(),
        });
        return this.require(id);
      })
      .immediate();
  }

  async recordResult(id: string, outcome: Outcome): Promise<Job> {
    switch (outcome.type) {
      case 'sent':
        return this.move(id, 'in_flight', 'sent', () => ({ message_id: outcome.messageId, last_error: null }));
      case 'transient':
        return this.move(id, 'in_flight', 'failed_transient', () => ({ last_error: outcome.error }));
      case 'permanent':
        return this.move(id, 'in_flight', 'failed_permanent', () => ({ last_error: outcome.error }));
    }
  }

  async scheduleRetry(id: string, notBefore: Date): Promise<Job> {
    return this.move(id, 'failed_transient', 'pending', (job) => {
      if (job.last_attempt_at !== null && notBefore.getTime() <= Date.parse(job.last_attempt_at)) {
        throw new SchedulerInvariantViolation(
          `retry for job ${id} at ${notBefore.toISOString()} is not after its last attempt ${job.last_attempt_at}`
        );
      }
      return { not_before: notBefore.toISOString() };
    });
  }

  async release(id: string): Promise<Job> {
    return this.move(id, 'in_flight', 'pending', () => ({}));
  }

  async cancel(id: string) {
    const res = this.db
      .prepare<[string, string]>(`UPDATE jobs SET state = 'cancelled', updated_at = ? WHERE id = ? AND state = 'pending'`)
      .run(this.stamp(), id);
    return res.changes === 1;
  }

  async reschedule(id: string, notBefore: Date) {
    checkSendTime(notBefore);
    const res = this.db
      .prepare<[string, string, string]>(`UPDATE jobs SET not_before = ?, updated_at = ? WHERE id = ? AND state = 'pending'`)
      .run(notBefore.toISOString(), this.stamp(), id);
    return res.changes === 1;
  }

  async list(filter: JobFilter = {}) {
    const where: string[] = [];
    const params: (string | number)[] = [];
    if (filter.state) {
      where.push('state = ?');
      params.push(filter.state);
    }
    if (filter.campaignId) {
      where.push('campaign_id = ?');
      params.push(filter.campaignId);
    }
    let sql = 'SELECT * FROM jobs';
    if (where.length) sql += ' WHERE ' + where.join(' AND ');
    sql += ' ORDER BY created_at ASC, id ASC';
    if (filter.limit !== undefined) {
      sql += ' LIMIT ?';
      params.push(filter.limit);
    }
    return this.db.prepare<(string | number)[], JobRow>(sql).all(...params).map(toJob);
  }

  async summarize(filter: Pick<JobFilter, 'campaignId'> = {}): Promise<JobSummary> {
    const scope = filter.campaignId ? 'WHERE campaign_id = ?' : '';
    const params = filter.campaignId ? [filter.campaignId] : [];
    const rows = this.db
      .prepare<string[], { state: string; c: number }>(`SELECT state, COUNT(*) AS c FROM jobs ${scope} GROUP BY state`)
      .all(...params);

    const counts: Record<JobState, number> = {
      pending: 0,
      in_flight: 0,
      sent: 0,
      failed_transient: 0,
      failed_permanent: 0,
      cancelled: 0,
    };
    for (const row of rows) {
      if (isJobState(row.state)) counts[row.state] = row.c;
    }

    const oldest = this.db
      .prepare<string[], { m: string | null }>(
        `SELECT MIN(not_before) AS m FROM jobs WHERE state = 'pending' ${filter.campaignId ? 'AND campaign_id = ?' : ''}`
      )
      .get(...params);

    const total = Object.values(counts).reduce((a, b) => a + b, 0);
    return {
      counts,
      sent: counts.sent,
      failed: counts.failed_permanent,
      pending: counts.pending + counts.in_flight + counts.failed_transient,
      total,
      oldestPending: oldest?.m ?? null,
    };
  }

  async recover(policy: RecoveryPolicy, now: Date): Promise<RecoveryReport> {
    const at = now.toISOString();
    return this.db
      .transaction(() => {
        const report: RecoveryReport = { requeued: 0, failed: 0, rescheduled: 0 };
        const stranded = this.db
          .prepare<[], { id: string }>(`SELECT id FROM jobs WHERE state = 'in_flight'`)
          .all();
        for (const { id } of stranded) {
          if (policy === 'requeue') {
            this.update(id, 'in_flight', 'pending', { not_before: at, last_error: 'interrupted; requeued on restart' }, at);
            report.requeued++;
          } else {
            this.update(id, 'in_flight', 'failed_permanent', { last_error: 'interrupted by process exit' }, at);
            report.failed++;
          }
        }
        const waiting = this.db
          .prepare<[], { id: string }>(`SELECT id FROM jobs WHERE state = 'failed_transient'`)
          .all();
        for (const { id } of waiting) {
          this.update(id, 'failed_transient', 'pending', { not_before: at }, at);
          report.rescheduled++;
        }
        return report;
      })
      .immediate();
  }

  /**
   * Delete terminal jobs last touched before `olderThan`. Maintenance only;
   * the scheduler itself never deletes rows.
   */
  async prune(olderThan: Date) {
    const placeholders = TERMINAL_STATES.map(() => '?').join(', ');
    const res = this.db
      .prepare<string[]>(`DELETE FROM jobs WHERE state IN (${placeholders}) AND updated_at < ?`)
      .run(...TERMINAL_STATES, olderThan.toISOString());
    return res.changes;
  }

  private insert(row: InsertRow) {
    this.db
      .prepare<[InsertRow]>(`
        INSERT INTO jobs (
          id, recipient, cc, bcc, subject_template, body_template, variables, attachments,
          not_before, state, attempt_count, last_error, campaign_id, created_at, updated_at
        ) VALUES (
          @id, @recipient, @cc, @bcc, @subject_template, @body_template, @variables, @attachments,
          @not_before, @state, @attempt_count, @last_error, @campaign_id, @created_at, @updated_at
        )
      `)
      .run(row);
  }

  private load(id: string) {
    const row = this.db.prepare<[string], JobRow>('SELECT * FROM jobs WHERE id = ?').get(id);
    return row ? toJob(row) : null;
  }

  private require(id: string) {
    const job = this.load(id);
    if (!job) throw new SchedulerInvariantViolation(`job ${id} does not exist`);
    return job;
  }

  private move(id: string, from: JobState, to: JobState, patch: (job: Job) => Patch): Job {
    assertTransition(id, from, to);
    return this.db
      .transaction(() => {
        const job = this.require(id);
        if (job.state !== from) {
          throw new SchedulerInvariantViolation(`illegal transition ${job.state} -> ${to} for job ${id}`);
        }
        this.update(id, from, to, patch(job));
        return this.require(id);
      })
      .immediate();
  }

  private update(id: string, from: JobState, to: JobState, patch: Patch, at = this.stamp()) {
    const cols = PATCH_COLUMNS.filter((c) => patch[c] !== undefined);
    const sets = ['state = ?', 'updated_at = ?', ...cols.map((c) => `${c} = ?`)];
    const params: (string | number | null)[] = [to, at, ...cols.map((c) => patch[c] ?? null)];
    const res = this.db
      .prepare<(string | number | null)[]>(`UPDATE jobs SET ${sets.join(', ')} WHERE id = ? AND state = ?`)
      .run(...params, id, from);
    if (res.changes !== 1) {
      throw new SchedulerInvariantViolation(`job ${id} left state ${from} before it could move to ${to}`);
    }
  }

  private stamp() {
    return this.clock().toISOString();
  }
}

/** Whether a process id is still running on this host. */
export type PidCheck = (pid: number) => boolean;

export const pidAlive: PidCheck = (pid) => {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: alive, owned by someone else
    return err instanceof Error && 'code' in err && err.code === 'EPERM';
  }
};

/** Name of the lock held by whichever process is dispatching. */
export const DISPATCH_LOCK = 'dispatch';

interface LockRow {
  pid: number;
}

/**
 * Take the named lock for `pid`. A lock left by a process that is no longer
 * running is taken over. Returns the pid holding the lock afterwards.
 */
export function claimLock(db: DB, name: string, pid: number, now: Date, alive: PidCheck = pidAlive): number {
  return db
    .transaction(() => {
      const row = db.prepare<[string], LockRow>('SELECT pid FROM locks WHERE name = ?').get(name);
      if (row && row.pid !== pid && alive(row.pid)) return row.pid;
      db.prepare<[string, number, string]>(`
        INSERT INTO locks(name, pid, acquired_at)
        VALUES (?, ?, ?)
        ON CONFLICT(name)
        DO UPDATE SET pid = excluded.pid, acquired_at = excluded.acquired_at
      `).run(name, pid, now.toISOString());
      return pid;
    })
    .immediate();
}

export function releaseLock(db: DB, name: string, pid: number) {
  return db.prepare<[string, number]>('DELETE FROM locks WHERE name = ? AND pid = ?').run(name, pid).changes === 1;
}

interface ConfigRow {
  key: string;
  value: string;
}

export function getConfigAll(db: DB) {
  const rows = db.prepare<[], ConfigRow>('SELECT key, value FROM config ORDER BY key').all();
  const res: Record<string, string> = {};
  for (const row of rows) res[row.key] = row.value;
  return res;
}

/**
 * Set or update a config key/value pair
 */
export function setConfig(db: DB, key: string, value: string) {
  db.prepare<[string, string]>(`
    INSERT INTO config(key, value)
    VALUES (?, ?)
    ON CONFLICT(key)
    DO UPDATE SET value = excluded.value
  `).run(key, value);
}

export function unsetConfig(db: DB, key: string) {
  return db.prepare<[string]>('DELETE FROM config WHERE key = ?').run(key).changes === 1;
}
