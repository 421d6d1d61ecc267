export const JOB_STATES = [
  'pending',
  'in_flight',
  'sent',
  'failed_transient',
  'failed_permanent',
  'cancelled',
] as const;

export type JobState = (typeof JOB_STATES)[number];

export const TERMINAL_STATES: readonly JobState[] = ['sent', 'failed_permanent', 'cancelled'];

/**
 * Where a subject or body comes from: literal text, or a template file
 * resolved against the template directory.
 */
export type TemplateRef =
  | { kind: 'inline'; source: string }
  | { kind: 'file'; path: string };

export type Variables = Record<string, string>;

export interface Job {
  id: string;
  recipient: string;
  cc: string[];
  bcc: string[];
  subject_template: TemplateRef;
  body_template: TemplateRef;
  variables: Variables;
  attachments: string[];
  not_before: string;
  state: JobState;
  attempt_count: number;
  last_error: string | null;
  last_attempt_at: string | null;
  message_id: string | null;
  campaign_id: string | null;
  created_at: string;
  updated_at: string;
}

/** Input to JobStore.create. */
export interface JobSpec {
  recipient: string;
  cc?: string[];
  bcc?: string[];
  subject: TemplateRef;
  body: TemplateRef;
  variables?: Variables;
  attachments?: string[];
  notBefore?: Date;
  campaignId?: string;
}

export type Outcome =
  | { type: 'sent'; messageId: string | null }
  | { type: 'transient'; error: string }
  | { type: 'permanent'; error: string };

export interface JobFilter {
  state?: JobState;
  campaignId?: string;
  limit?: number;
}

export interface JobSummary {
  counts: Record<JobState, number>;
  sent: number;
  failed: number;
  pending: number;
  total: number;
  oldestPending: string | null;
}

export type RecoveryPolicy = 'requeue' | 'fail';

export interface RecoveryReport {
  requeued: number;
  failed: number;
  rescheduled: number;
}

/** A fully rendered message, ready for the transport. */
export interface OutboundMessage {
  subject: string;
  html: string | null;
  text: string;
  cc: string[];
  bcc: string[];
  attachments: string[];
}

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

/** Current instant; injected everywhere time matters. */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function isJobState(value: string): value is JobState {
  return (JOB_STATES as readonly string[]).includes(value);
}
