import assert from 'node:assert/strict';
import { mkdtempSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import test from 'node:test';
import { loadEnvFile, loadPaths, loadSettings, loadSmtpConfig, parseSettings, updateSetting } from './config.js';
import { ConfigurationError } from './core/errors.js';
import { openDB } from './db/db.js';

const smtpEnv = {
  SMTP_HOST: 'smtp.example.com',
  SMTP_USERNAME: 'mailer',
  SMTP_PASSWORD: 'test-secret',
  SENDER_NAME: 'Mail Bot',
  SENDER_EMAIL: 'bot@example.com',
};

test('SMTP settings with defaults', () => {
  assert.deepEqual(loadSmtpConfig(smtpEnv), {
    host: 'smtp.example.com',
    port: 587,
    username: 'mailer',
    password: 'test-secret',
    secure: false,
    timeoutSec: 30,
    sender: { name: 'Mail Bot', email: 'bot@example.com', replyTo: 'bot@example.com' },
  });
  const custom = loadSmtpConfig({ ...smtpEnv, SMTP_PORT: '465', SMTP_SECURE: 'yes', REPLY_TO_EMAIL: 'help@example.com' });
  assert.equal(custom.port, 465);
  assert.equal(custom.secure, true);
  assert.equal(custom.sender.replyTo, 'help@example.com');
});

test('every missing SMTP value is reported at once', () => {
  assert.throws(
    () => loadSmtpConfig({ SMTP_HOST: 'smtp.example.com', SMTP_PASSWORD: '' }),
    (err: unknown) => {
      assert.ok(err instanceof ConfigurationError);
      for (const key of ['SMTP_USERNAME', 'SMTP_PASSWORD', 'SENDER_NAME', 'SENDER_EMAIL']) {
        assert.ok(err.message.includes(key), key);
      }
      assert.ok(err.message.endsWith('Add them to your .env file (see .env.example).'));
      return true;
    }
  );
  assert.throws(() => loadSmtpConfig({ ...smtpEnv, SENDER_EMAIL: 'not-an-email' }), ConfigurationError);
});

test('paths default sensibly and the zone is validated', () => {
  assert.deepEqual(loadPaths({}), { dbPath: './data/mailctl.db', templateDir: './templates', timezone: 'UTC' });
  assert.deepEqual(loadPaths({ MAILCTL_DB: '', TEMPLATE_DIR: '/srv/templates', SCHEDULER_TIMEZONE: '+02:00' }), {
    dbPath: './data/mailctl.db',
    templateDir: '/srv/templates',
    timezone: '+02:00',
  });
  assert.throws(() => loadPaths({ SCHEDULER_TIMEZONE: 'Mars/Olympus' }), ConfigurationError);
});

test('runtime settings defaults', () => {
  const s = parseSettings({});
  assert.equal(s.rate_per_minute, 8);
  assert.equal(s.burst, undefined);
  assert.equal(s.max_attempts, 4);
  assert.equal(s.backoff_base_ms, 60_000);
  assert.equal(s.concurrency, 1);
  assert.equal(s.recovery_policy, 'requeue');
  assert.equal(s.invalid_rows, 'record');
});

test('runtime settings are validated', () => {
  assert.throws(() => parseSettings({ rate_per_minute: '0' }), ConfigurationError);
  assert.throws(() => parseSettings({ recovery_policy: 'maybe' }), ConfigurationError);
  assert.throws(
    () => parseSettings({ backoff_base_ms: '5000', backoff_max_ms: '1000' }),
    /backoff_max_ms must be at least backoff_base_ms/
  );
});

test('config set stores, validates and resets values', () => {
  const db = openDB(':memory:');
  updateSetting(db, 'rate_per_minute', '12');
  assert.equal(loadSettings(db).rate_per_minute, 12);

  assert.throws(() => updateSetting(db, 'rate_per_minute', 'abc'), ConfigurationError);
  assert.equal(loadSettings(db).rate_per_minute, 12);
  assert.throws(() => updateSetting(db, 'colour', 'blue'), /Unknown setting 'colour'/);

  updateSetting(db, 'rate_per_minute', '');
  assert.equal(loadSettings(db).rate_per_minute, 8);
});

test('.env in the working directory is loaded without overriding the environment', () => {
  const dir = mkdtempSync(path.join(os.tmpdir(), 'mailctl-env-'));
  writeFileSync(path.join(dir, '.env'), 'MAILCTL_TEST_FROM_FILE=file\nMAILCTL_TEST_PRESET=file\n');
  process.env.MAILCTL_TEST_PRESET = 'env';
  try {
    assert.equal(loadEnvFile(dir), path.join(dir, '.env'));
    assert.equal(process.env.MAILCTL_TEST_FROM_FILE, 'file');
    assert.equal(process.env.MAILCTL_TEST_PRESET, 'env');
  } finally {
    delete process.env.MAILCTL_TEST_FROM_FILE;
    delete process.env.MAILCTL_TEST_PRESET;
  }
});
