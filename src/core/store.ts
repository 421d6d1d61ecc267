import {
  Job,
  JobFilter,
  JobSpec,
  JobSummary,
  Outcome,
  RecoveryPolicy,
  RecoveryReport,
} from './types.js';

/** A row that failed validation but is still recorded, e.g. a bad CSV line. */
export type RejectedJobSpec = Omit<JobSpec, 'notBefore'>;

/**
 * Durable table of delivery jobs; the only source of truth for job state.
 *
 * Every state change goes through one of these methods. Methods that move a
 * job out of a state it is not in throw SchedulerInvariantViolation, except
 * `markInFlight`, `cancel` and `reschedule`, which report false instead.
 */
export interface JobStore {
  /** Validate and insert a `pending` job. Throws ValidationError. */
  create(spec: JobSpec): Promise<string>;
  /** Insert a job directly as `failed_permanent`, skipping validation. */
  createRejected(spec: RejectedJobSpec, reason: string): Promise<string>;
  get(id: string): Promise<Job | null>;
  /** Pending jobs with `not_before <= now`, oldest-due first; `ids` narrows to those jobs. */
  fetchDue(now: Date, limit: number, ids?: readonly string[]): Promise<Job[]>;
  /** Atomic `pending -> in_flight`; false if someone else got there first. */
  markInFlight(id: string): Promise<boolean>;
  /** Count an attempt on an `in_flight` job; call right before delivering. */
  beginAttempt(id: string, at: Date): Promise<Job>;
  recordResult(id: string, outcome: Outcome): Promise<Job>;
  /** `failed_transient -> pending`; `notBefore` must be after the last attempt. */
  scheduleRetry(id: string, notBefore: Date): Promise<Job>;
  /** `in_flight -> pending` for an admitted job whose attempt was never issued. */
  release(id: string): Promise<Job>;
  cancel(id: string): Promise<boolean>;
  reschedule(id: string, notBefore: Date): Promise<boolean>;
  list(filter?: JobFilter): Promise<Job[]>;
  summarize(filter?: Pick<JobFilter, 'campaignId'>): Promise<JobSummary>;
  /** Resolve jobs a crashed process left `in_flight` or `failed_transient`. */
  recover(policy: RecoveryPolicy, now: Date): Promise<RecoveryReport>;
  /** Delete terminal jobs last updated before `olderThan`; returns the count. */
  prune(olderThan: Date): Promise<number>;
}
