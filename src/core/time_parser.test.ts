import assert from 'node:assert/strict';
import test from 'node:test';
import { ConfigurationError, UnparseableTimeError } from './errors.js';
import { TimeParser, parseZone } from './time_parser.js';

const now = new Date('2026-03-02T10:00:00Z');
const iso = (p: TimeParser, expr: string, at = now) => p.parse(expr, at).toISOString();

test('now and relative offsets', () => {
  const p = new TimeParser();
  assert.equal(iso(p, 'now'), '2026-03-02T10:00:00.000Z');
  assert.equal(iso(p, 'in 30 minutes'), '2026-03-02T10:30:00.000Z');
  assert.equal(iso(p, 'in 2h'), '2026-03-02T12:00:00.000Z');
  assert.equal(iso(p, 'In  2   Hours'), '2026-03-02T12:00:00.000Z');
  assert.equal(iso(p, 'in 3 days'), '2026-03-05T10:00:00.000Z');
  assert.equal(iso(p, 'in 1 week'), '2026-03-09T10:00:00.000Z');
});

test('today and tomorrow, defaulting to 9am', () => {
  const p = new TimeParser('UTC');
  assert.equal(iso(p, 'tomorrow'), '2026-03-03T09:00:00.000Z');
  assert.equal(iso(p, 'tomorrow 9am'), '2026-03-03T09:00:00.000Z');
  assert.equal(iso(p, 'tomorrow at 14:30'), '2026-03-03T14:30:00.000Z');
  assert.equal(iso(p, 'today 5pm'), '2026-03-02T17:00:00.000Z');
  assert.equal(iso(p, 'today 12am'), '2026-03-02T00:00:00.000Z');
});

test('wall-clock forms are read in the configured zone', () => {
  const plus2 = new TimeParser('+02:00');
  assert.equal(iso(plus2, 'tomorrow 9am'), '2026-03-03T07:00:00.000Z');
  // 23:30 UTC is already the next day at +02:00
  assert.equal(iso(plus2, 'tomorrow 9am', new Date('2026-03-02T23:30:00Z')), '2026-03-04T07:00:00.000Z');

  const minus5 = new TimeParser('-05:00');
  assert.equal(iso(minus5, '2026-03-10 14:00'), '2026-03-10T19:00:00.000Z');
});

test('absolute dates with and without an offset', () => {
  const p = new TimeParser();
  assert.equal(iso(p, '2026-03-10 14:00'), '2026-03-10T14:00:00.000Z');
  assert.equal(iso(p, '2026-03-10T14:00:30'), '2026-03-10T14:00:30.000Z');
  assert.equal(iso(p, '2026-03-10T14:00:00Z'), '2026-03-10T14:00:00.000Z');
  assert.equal(iso(p, '2026-03-10T14:00:00+02:00'), '2026-03-10T12:00:00.000Z');
});

test('anything else is unparseable', () => {
  const p = new TimeParser();
  for (const expr of ['next tuesday', 'in x hours', 'tomorrow 13pm', 'today 9:75', '2026-02-30 10:00', '']) {
    assert.throws(() => p.parse(expr, now), UnparseableTimeError, expr);
  }
  assert.throws(
    () => p.parse('next tuesday', now),
    (err: unknown) => err instanceof UnparseableTimeError && err.message === "Couldn't understand the time: 'next tuesday'"
  );
});

test('zones are UTC or a fixed offset', () => {
  assert.equal(parseZone('UTC'), 0);
  assert.equal(parseZone('+05:30'), 330);
  assert.equal(parseZone('-03:00'), -180);
  assert.throws(() => parseZone('Europe/Paris'), ConfigurationError);
  assert.throws(() => parseZone('+15:00'), ConfigurationError);
});
