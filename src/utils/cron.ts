/**
 * Five-field cron expressions (minute hour day-of-month month day-of-week).
 *
 * Supported per field: `*`, `*\/N`, `A`, `A-B`, `A-B/N`, `A/N` and comma lists
 * of those. Month and weekday fields also accept three-letter names
 * (JAN..DEC, SUN..SAT). Day-of-week 7 is Sunday, like 0.
 *
 * Evaluation happens in the process-local time zone, the same zone node-cron
 * ticks in when no timezone option is given.
 */

import { ValidationError } from './errors';

interface FieldSpec {
  name: string;
  min: number;
  max: number;
  aliases?: Record<string, number>;
}

const MONTH_NAMES: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

const DAY_NAMES: Record<string, number> = {
  sun: 0, mon: 1, tue: 2, wed: 3, thu: 4, fri: 5, sat: 6,
};

const FIELDS: readonly FieldSpec[] = [
  { name: 'minute', min: 0, max: 59 },
  { name: 'hour', min: 0, max: 23 },
  { name: 'day-of-month', min: 1, max: 31 },
  { name: 'month', min: 1, max: 12, aliases: MONTH_NAMES },
  { name: 'day-of-week', min: 0, max: 7, aliases: DAY_NAMES },
];

// Upper bound for the search in next(); covers leap-day-only schedules
const SEARCH_HORIZON_MS = 5 * 366 * 24 * 60 * 60 * 1000;

export interface CronSchedule {
  readonly expression: string;
  /** First occurrence strictly after `after`, at minute resolution. */
  next(after: Date): Date;
  matches(date: Date): boolean;
}

const invalid = (expression: string, reason: string): ValidationError =>
  new ValidationError(`Invalid cron expression "${expression}": ${reason}`);

const parseValue = (
  raw: string,
  field: FieldSpec,
  expression: string,
): number => {
  const alias = field.aliases?.[raw.toLowerCase()];
  if (alias !== undefined) {
    return alias;
  }

  if (!/^\d+$/.test(raw)) {
    throw invalid(expression, `"${raw}" is not a valid ${field.name} value`);
  }

  const value = Number(raw);
  if (value < field.min || value > field.max) {
    throw invalid(
      expression,
      `${field.name} value ${value} is outside ${field.min}-${field.max}`,
    );
  }
  return value;
};

const parseField = (
  source: string,
  field: FieldSpec,
  expression: string,
): Set<number> => {
  const values = new Set<number>();

  for (const part of source.split(',')) {
    if (part === '') {
      throw invalid(expression, `empty list item in ${field.name} field`);
    }

    const [rangePart, stepPart, extra] = part.split('/');
    if (extra !== undefined) {
      throw invalid(expression, `"${part}" has more than one step`);
    }

    let step = 1;
    if (stepPart !== undefined) {
      if (!/^\d+$/.test(stepPart) || Number(stepPart) === 0) {
        throw invalid(expression, `"${stepPart}" is not a valid step`);
      }
      step = Number(stepPart);
    }

    let start: number;
    let end: number;

    if (rangePart === '*') {
      start = field.min;
      end = field.max;
    } else if (rangePart.includes('-')) {
      const [from, to, rest] = rangePart.split('-');
      if (rest !== undefined || from === '' || to === '') {
        throw invalid(expression, `"${rangePart}" is not a valid range`);
      }
      start = parseValue(from, field, expression);
      end = parseValue(to, field, expression);
      if (start > end) {
        throw invalid(expression, `range "${rangePart}" is reversed`);
      }
    } else {
      start = parseValue(rangePart, field, expression);
      // "A/N" means every N starting at A
      end = stepPart !== undefined ? field.max : start;
    }

    for (let value = start; value <= end; value += step) {
      values.add(value);
    }
  }

  return values;
};

class ParsedCronSchedule implements CronSchedule {
  constructor(
    readonly expression: string,
    private readonly minutes: Set<number>,
    private readonly hours: Set<number>,
    private readonly daysOfMonth: Set<number>,
    private readonly months: Set<number>,
    private readonly daysOfWeek: Set<number>,
  ) {}

  // Both day fields must match, as node-cron requires when it ticks
  private dayMatches(date: Date): boolean {
    return (
      this.daysOfMonth.has(date.getDate()) && this.daysOfWeek.has(date.getDay())
    );
  }

  matches(date: Date): boolean {
    return (
      this.minutes.has(date.getMinutes()) &&
      this.hours.has(date.getHours()) &&
      this.months.has(date.getMonth() + 1) &&
      this.dayMatches(date)
    );
  }

  next(after: Date): Date {
    const candidate = new Date(after.getTime());
    candidate.setSeconds(0, 0);
    candidate.setMinutes(candidate.getMinutes() + 1);

    const limit = after.getTime() + SEARCH_HORIZON_MS;

    while (candidate.getTime() <= limit) {
      if (!this.months.has(candidate.getMonth() + 1)) {
        candidate.setMonth(candidate.getMonth() + 1, 1);
        candidate.setHours(0, 0, 0, 0);
        continue;
      }
      if (!this.dayMatches(candidate)) {
        candidate.setDate(candidate.getDate() + 1);
        candidate.setHours(0, 0, 0, 0);
        continue;
      }
      if (!this.hours.has(candidate.getHours())) {
        candidate.setHours(candidate.getHours() + 1, 0, 0, 0);
        continue;
      }
      if (!this.minutes.has(candidate.getMinutes())) {
        candidate.setMinutes(candidate.getMinutes() + 1, 0, 0);
        continue;
      }
      return candidate;
    }

    throw invalid(this.expression, 'no occurrence within five years');
  }
}

/**
 * Parses a standard five-field cron expression.
 * Throws ValidationError when the expression is malformed or can never fire.
 */
export const parseCron = (expression: string): CronSchedule => {
  const normalized = expression.trim().replace(/\s+/g, ' ');
  const parts = normalized.split(' ');

  if (normalized === '' || parts.length !== FIELDS.length) {
    throw invalid(
      expression,
      `expected ${FIELDS.length} fields, got ${normalized === '' ? 0 : parts.length}`,
    );
  }

  const [minutes, hours, daysOfMonth, months, daysOfWeek] = FIELDS.map(
    (field, index) => parseField(parts[index], field, expression),
  );

  // 7 is an alias for Sunday
  if (daysOfWeek.delete(7)) {
    daysOfWeek.add(0);
  }

  const schedule = new ParsedCronSchedule(
    normalized,
    minutes,
    hours,
    daysOfMonth,
    months,
    daysOfWeek,
  );

  // Rejects expressions such as "0 0 31 2 *" that can never fire
  schedule.next(new Date());

  return schedule;
};

export const isValidCron = (expression: string): boolean => {
  try {
    parseCron(expression);
    return true;
  } catch {
    return false;
  }
};

/**
 * Upcoming occurrences of an expression, for previews.
 */
export const nextRuns = (
  expression: string,
  count: number,
  from: Date = new Date(),
): Date[] => {
  const schedule = parseCron(expression);
  const runs: Date[] = [];
  let cursor = from;

  for (let i = 0; i < count; i++) {
    cursor = schedule.next(cursor);
    runs.push(cursor);
  }

  return runs;
};

/**
 * Common cron expressions
 */
export const CronPresets = {
  everyMinute: '* * * * *',
  every5Minutes: '*/5 * * * *',
  every15Minutes: '*/15 * * * *',
  every30Minutes: '*/30 * * * *',
  hourly: '0 * * * *',
  daily: (hour: number, minute = 0) => `${minute} ${hour} * * *`,
  weekdays: (hour: number, minute = 0) => `${minute} ${hour} * * 1-5`,
  weekends: (hour: number, minute = 0) => `${minute} ${hour} * * 0,6`,
  weekly: (dayOfWeek: number, hour: number, minute = 0) =>
    `${minute} ${hour} * * ${dayOfWeek}`,
  monthly: (dayOfMonth: number, hour: number, minute = 0) =>
    `${minute} ${hour} ${dayOfMonth} * *`,
};
