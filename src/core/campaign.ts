import { monotonicFactory } from 'ulid';
import { ValidationError } from './errors.js';
import { JobStore } from './store.js';
import { Clock, Logger, TemplateRef, Variables, systemClock } from './types.js';
import { isValidEmail, maskEmail } from './validation.js';

export type RecipientRow = Record<string, string>;

/** What to do with a row that cannot become a job. */
export type InvalidRowMode = 'record' | 'skip';

export interface ExpandOptions {
  campaignId?: string;
  notBefore?: Date;
  attachments?: string[];
  invalidRows?: InvalidRowMode;
  /** Only expand the first N rows. */
  limit?: number;
}

export interface RejectedRow {
  /** 1-based position among the data rows. */
  row: number;
  email: string;
  reason: string;
  /** Synthetic failed_permanent job, when invalid rows are recorded. */
  jobId?: string;
}

export interface CampaignResult {
  campaignId: string;
  jobIds: string[];
  rejected: RejectedRow[];
}

const newCampaignId = monotonicFactory();

/**
 * Splits a bulk request into one independent job per recipient row. A bad
 * row never blocks the others.
 */
export class CampaignExpander {
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(private readonly store: JobStore, opts: { clock?: Clock; logger?: Logger } = {}) {
    this.clock = opts.clock ?? systemClock;
    this.logger = opts.logger ?? console;
  }

  async expand(
    body: TemplateRef,
    rows: RecipientRow[],
    subject: TemplateRef,
    opts: ExpandOptions = {}
  ): Promise<CampaignResult> {
    const campaignId = opts.campaignId ?? newCampaignId(this.clock().getTime());
    const mode = opts.invalidRows ?? 'record';
    const selected = opts.limit === undefined ? rows : rows.slice(0, opts.limit);
    const result: CampaignResult = { campaignId, jobIds: [], rejected: [] };

    for (const [i, raw] of selected.entries()) {
      const { email, variables } = splitRow(raw);
      const base = { subject, body, variables, attachments: opts.attachments ?? [], campaignId };

      let reason: string | null = null;
      if (!email) {
        reason = 'missing email';
      } else if (!isValidEmail(email)) {
        reason = `'${email}' is not a valid email address`;
      } else {
        try {
          result.jobIds.push(await this.store.create({ ...base, recipient: email, notBefore: opts.notBefore }));
        } catch (err) {
          if (!(err instanceof ValidationError)) throw err;
          reason = err.message;
        }
      }

      if (reason === null) continue;
      const rejected: RejectedRow = { row: i + 1, email, reason };
      if (mode === 'record') {
        rejected.jobId = await this.store.createRejected({ ...base, recipient: email }, `invalid row: ${reason}`);
      }
      result.rejected.push(rejected);
      this.logger.warn(`[campaign] ${campaignId} row ${i + 1} (${email ? maskEmail(email) : 'no email'}): ${reason}`);
    }

    this.logger.log(
      `[campaign] ${campaignId}: ${result.jobIds.length} queued, ${result.rejected.length} rejected of ${selected.length} rows`
    );
    return result;
  }
}

/**
 * Find the `email` column (any case) and turn every other column into a
 * template variable. Column names keep their case.
 */
export function splitRow(row: RecipientRow): { email: string; variables: Variables } {
  let email = '';
  const variables: Variables = {};
  for (const [key, value] of Object.entries(row)) {
    const name = key.trim();
    if (name.toLowerCase() === 'email') {
      email = value.trim();
    } else if (name) {
      variables[name] = value.trim();
    }
  }
  return { email, variables };
}
