import assert from 'node:assert/strict';
import { mkdtempSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import test from 'node:test';
import { SendMailOptions } from 'nodemailer';
import { SmtpConfig } from '../config.js';
import { OutboundMessage } from '../core/types.js';
import { Mailer, SmtpTransport, classifySmtpError } from './smtp.js';

const config: SmtpConfig = {
  host: 'smtp.example.com',
  port: 587,
  username: 'mailer',
  password: 'test-secret',
  secure: false,
  timeoutSec: 30,
  sender: { name: 'Mail Bot', email: 'bot@example.com', replyTo: 'replies@example.com' },
};

class FakeMailer implements Mailer {
  readonly sent: SendMailOptions[] = [];
  verified = 0;
  closed = false;

  constructor(private readonly failure?: Error) {}

  async sendMail(mail: SendMailOptions) {
    if (this.failure) throw this.failure;
    this.sent.push(mail);
    return { messageId: '<abc@example.com>' };
  }

  async verify(): Promise<true> {
    this.verified++;
    return true;
  }

  close() {
    this.closed = true;
  }
}

const smtpError = (message: string, fields: { code?: string; responseCode?: number }) =>
  Object.assign(new Error(message), fields);

function message(overrides: Partial<OutboundMessage> = {}): OutboundMessage {
  return { subject: 'Hi', html: null, text: 'Hello', cc: [], bcc: [], attachments: [], ...overrides };
}

test('5xx replies are permanent, 4xx replies transient', () => {
  assert.deepEqual(classifySmtpError(smtpError('Mailbox unavailable', { code: 'EENVELOPE', responseCode: 550 })), {
    status: 'permanent_error',
    error: 'SMTP 550: Mailbox unavailable',
  });
  assert.deepEqual(classifySmtpError(smtpError('Try again later', { code: 'EENVELOPE', responseCode: 421 })), {
    status: 'transient_error',
    error: 'SMTP 421: Try again later',
  });
});

test('error codes decide when there is no reply code', () => {
  assert.deepEqual(classifySmtpError(smtpError('Invalid login', { code: 'EAUTH' })), {
    status: 'permanent_error',
    error: 'EAUTH: Invalid login',
  });
  assert.deepEqual(classifySmtpError(smtpError('connect ECONNREFUSED', { code: 'ECONNECTION' })), {
    status: 'transient_error',
    error: 'ECONNECTION: connect ECONNREFUSED',
  });
  assert.equal(classifySmtpError(smtpError('Greeting never received', { code: 'ETIMEDOUT' })).status, 'transient_error');
  assert.equal(classifySmtpError(smtpError('odd', { code: 'ESOMETHING' })).status, 'transient_error');
});

test('errors without a code are permanent', () => {
  assert.deepEqual(classifySmtpError(new Error('weird')), { status: 'permanent_error', error: 'weird' });
  assert.deepEqual(classifySmtpError('oops'), { status: 'permanent_error', error: 'oops' });
});

test('deliver hands nodemailer the sender, recipients and parts', async () => {
  const dir = mkdtempSync(path.join(os.tmpdir(), 'mailctl-smtp-'));
  const file = path.join(dir, 'flyer.pdf');
  writeFileSync(file, 'pdf');
  const mailer = new FakeMailer();
  const transport = new SmtpTransport(config, mailer);

  const res = await transport.deliver(
    message({ html: '<p>Hello</p>', cc: ['cc@example.com'], attachments: [file] }),
    'ana@example.com'
  );
  assert.deepEqual(res, { status: 'ok', messageId: '<abc@example.com>' });
  assert.deepEqual(mailer.sent, [
    {
      from: { name: 'Mail Bot', address: 'bot@example.com' },
      to: 'ana@example.com',
      cc: ['cc@example.com'],
      bcc: undefined,
      replyTo: 'replies@example.com',
      subject: 'Hi',
      text: 'Hello',
      html: '<p>Hello</p>',
      attachments: [{ filename: 'flyer.pdf', path: file }],
    },
  ]);
});

test('a failed send is classified', async () => {
  const transport = new SmtpTransport(config, new FakeMailer(smtpError('Mailbox busy', { responseCode: 452 })));
  assert.deepEqual(await transport.deliver(message(), 'ana@example.com'), {
    status: 'transient_error',
    error: 'SMTP 452: Mailbox busy',
  });
});

test('verify and close reach the mailer', async () => {
  const mailer = new FakeMailer();
  const transport = new SmtpTransport(config, mailer);
  await transport.verify();
  transport.close();
  assert.equal(mailer.verified, 1);
  assert.equal(mailer.closed, true);
});
