import { ZodError } from 'zod';

export class MailctlError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Bad input; the job is never created. */
export class ValidationError extends MailctlError {
  readonly issues: string[];

  constructor(issues: string[] | string) {
    const list = Array.isArray(issues) ? issues : [issues];
    super('VALIDATION', list.join('; '));
    this.issues = list;
  }

  static fromZod(err: ZodError) {
    return new ValidationError(formatZodIssues(err));
  }
}

export class TransientDeliveryError extends MailctlError {
  constructor(message: string) {
    super('TRANSIENT_DELIVERY', message);
  }
}

export class PermanentDeliveryError extends MailctlError {
  constructor(message: string) {
    super('PERMANENT_DELIVERY', message);
  }
}

/** A template that cannot render now will not render on retry either. */
export class RenderError extends MailctlError {
  constructor(message: string) {
    super('RENDER', message);
  }
}

/**
 * An illegal state transition was attempted. Indicates a concurrency or logic
 * bug; it aborts the scheduling pass.
 */
export class SchedulerInvariantViolation extends MailctlError {
  constructor(message: string) {
    super('INVARIANT', message);
  }
}

export class UnparseableTimeError extends MailctlError {
  readonly expression: string;

  constructor(expression: string) {
    super('UNPARSEABLE_TIME', `Couldn't understand the time: '${expression}'`);
    this.expression = expression;
  }
}

export class ConfigurationError extends MailctlError {
  constructor(message: string) {
    super('CONFIGURATION', message);
  }
}

export function formatZodIssues(err: ZodError) {
  return err.errors.map((e) => (e.path.length ? `${e.path.join('.')}: ${e.message}` : e.message));
}

export function errorMessage(err: unknown) {
  return err instanceof Error ? err.message : String(err);
}
