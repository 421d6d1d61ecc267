import { addHours, addMinutes, isValid, parseISO } from 'date-fns';
import { ConfigurationError, UnparseableTimeError } from './errors.js';

const RELATIVE = /^in (\d+) ?(minutes?|mins?|m|hours?|hrs?|h|days?|d|weeks?|w)$/;
const ANCHOR = /^(today|tomorrow)(?: at)?(?: (\d{1,2})(?::(\d{2}))? ?(am|pm)?)?$/;
const WALL_CLOCK = /^(\d{4})-(\d{2})-(\d{2})[ t](\d{2}):(\d{2})(?::(\d{2}))?$/;
const ZONED_ISO = /^\d{4}-\d{2}-\d{2}t\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:z|[+-]\d{2}:?\d{2})$/;
const ZONE = /^([+-])(\d{2}):(\d{2})$/;

const DEFAULT_HOUR = 9;

/**
 * Parse a zone setting: `UTC` or a fixed offset such as `+02:00`.
 * Returns minutes east of UTC.
 */
export function parseZone(zone: string) {
  const z = zone.trim();
  if (/^(utc|z|gmt)$/i.test(z)) return 0;
  const m = ZONE.exec(z);
  if (!m) throw new ConfigurationError(`Unsupported timezone '${zone}'. Use UTC or an offset like +02:00`);
  const minutes = Number(m[2]) * 60 + Number(m[3]);
  if (Number(m[2]) > 14 || Number(m[3]) > 59) {
    throw new ConfigurationError(`Timezone offset out of range: '${zone}'`);
  }
  return m[1] === '-' ? -minutes : minutes;
}

/**
 * Resolves operator time expressions to instants. Wall-clock forms
 * ("tomorrow 9am", "2025-12-30 14:00") are read in the configured zone,
 * never the host's.
 *
 * Accepted:
 *   now
 *   in 30 minutes | in 2 hours | in 3 days | in 1 week   (also 30m, 2h, 3d, 1w)
 *   today 5pm | tomorrow | tomorrow 9am | tomorrow at 14:30
 *   2025-12-30 14:00[:00] | 2025-12-30T14:00
 *   2025-12-30T14:00:00Z | 2025-12-30T14:00:00+02:00
 */
export class TimeParser {
  readonly offsetMinutes: number;

  constructor(timezone = 'UTC') {
    this.offsetMinutes = parseZone(timezone);
  }

  parse(expression: string, now: Date): Date {
    const expr = expression.trim().toLowerCase().replace(/\s+/g, ' ');

    if (expr === 'now') return new Date(now.getTime());

    const rel = RELATIVE.exec(expr);
    if (rel) return this.relative(Number(rel[1]), rel[2], now);

    const anchor = ANCHOR.exec(expr);
    if (anchor) {
      const time = anchor[2] === undefined ? { hour: DEFAULT_HOUR, minute: 0 } : clockTime(anchor[2], anchor[3], anchor[4]);
      if (!time) throw new UnparseableTimeError(expression);
      return this.anchored(now, anchor[1] === 'tomorrow' ? 1 : 0, time.hour, time.minute);
    }

    const wall = WALL_CLOCK.exec(expr);
    if (wall) {
      const [y, mo, d, h, mi, s] = wall.slice(1).map((v) => (v === undefined ? 0 : Number(v)));
      const utc = Date.UTC(y, mo - 1, d, h, mi, s);
      const check = new Date(utc);
      if (check.getUTCMonth() !== mo - 1 || check.getUTCDate() !== d || h > 23 || mi > 59 || s > 59) {
        throw new UnparseableTimeError(expression);
      }
      return addMinutes(check, -this.offsetMinutes);
    }

    if (ZONED_ISO.test(expr)) {
      const parsed = parseISO(expression.trim());
      if (isValid(parsed)) return parsed;
    }

    throw new UnparseableTimeError(expression);
  }

  private relative(amount: number, unit: string, now: Date) {
    switch (unit[0]) {
      case 'm':
        return addMinutes(now, amount);
      case 'h':
        return addHours(now, amount);
      case 'd':
        return addHours(now, amount * 24);
      default:
        return addHours(now, amount * 24 * 7);
    }
  }

  private anchored(now: Date, dayOffset: number, hour: number, minute: number) {
    const wall = addMinutes(now, this.offsetMinutes);
    const utc = Date.UTC(wall.getUTCFullYear(), wall.getUTCMonth(), wall.getUTCDate() + dayOffset, hour, minute);
    return addMinutes(new Date(utc), -this.offsetMinutes);
  }
}

function clockTime(h: string, m: string | undefined, meridiem: string | undefined) {
  let hour = Number(h);
  const minute = m === undefined ? 0 : Number(m);
  if (minute > 59) return null;
  if (meridiem) {
    if (hour < 1 || hour > 12) return null;
    if (meridiem === 'pm' && hour < 12) hour += 12;
    if (meridiem === 'am' && hour === 12) hour = 0;
  } else if (hour > 23) {
    return null;
  }
  return { hour, minute };
}
