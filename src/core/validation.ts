import { z } from 'zod';
import { ValidationError } from './errors.js';
import { JobSpec } from './types.js';

// Practical pattern, not full RFC 5322.
export const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

export function isValidEmail(value: string) {
  const email = value.trim();
  if (!EMAIL_PATTERN.test(email)) return false;
  const [local, domain] = email.split('@');
  if (local.startsWith('.') || local.endsWith('.') || local.includes('..')) return false;
  return !domain.includes('..') && !domain.startsWith('.') && !domain.startsWith('-');
}

export const emailSchema = z
  .string()
  .trim()
  .min(1, 'email address is required')
  .refine(isValidEmail, (v) => ({ message: `'${v}' is not a valid email address` }));

export const templateRefSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('inline'), source: z.string() }),
  z.object({ kind: z.literal('file'), path: z.string().min(1) }),
]);

/** Last instant whose ISO form still sorts correctly as text. */
export const MAX_INSTANT = new Date('9999-12-31T23:59:59.999Z');

/** Reject send times the job table cannot order. */
export function checkSendTime(at: Date): Date {
  if (Number.isNaN(at.getTime())) throw new ValidationError('send time is out of range');
  if (at.getTime() > MAX_INSTANT.getTime()) {
    throw new ValidationError(`send time ${at.toISOString()} is after ${MAX_INSTANT.toISOString()}`);
  }
  return at;
}

export const variablesSchema = z.record(z.string(), z.string());

export const jobSpecSchema = z.object({
  recipient: emailSchema,
  cc: z.array(emailSchema).default([]),
  bcc: z.array(emailSchema).default([]),
  subject: templateRefSchema,
  body: templateRefSchema,
  variables: variablesSchema.default({}),
  attachments: z.array(z.string().min(1)).default([]),
  notBefore: z.date().max(MAX_INSTANT, { message: `send time is after ${MAX_INSTANT.toISOString()}` }).optional(),
  campaignId: z.string().min(1).optional(),
});

export type ValidJobSpec = z.infer<typeof jobSpecSchema>;

export function parseJobSpec(spec: JobSpec): ValidJobSpec {
  const res = jobSpecSchema.safeParse(spec);
  if (!res.success) throw ValidationError.fromZod(res.error);
  return res.data;
}

/**
 * "sarah.chen@example.com" -> "sar***@example.com"
 */
export function maskEmail(email: string) {
  const at = email.indexOf('@');
  if (at < 0) return '***';
  const local = email.slice(0, at);
  const shown = local.length <= 3 ? local.slice(0, 1) : local.slice(0, 3);
  return `${shown}***${email.slice(at)}`;
}
