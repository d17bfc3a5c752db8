import { InvalidInputError } from './simulation.errors';
import { DailyBar } from './simulation.types';

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export interface CalendarDate {
  year: number;
  month: number; // 1-12
  day: number;
}

export function parseBarDate(date: string): CalendarDate {
  const match = DATE_PATTERN.exec(date);
  if (!match) {
    throw new InvalidInputError(`bar date must be in YYYY-MM-DD format, got "${date}"`);
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const parsed = new Date(Date.UTC(year, month - 1, day));
  if (parsed.getUTCMonth() !== month - 1 || parsed.getUTCDate() !== day) {
    throw new InvalidInputError(`bar date "${date}" is not a calendar date`);
  }

  return { year, month, day };
}

export function assertValidBar(bar: DailyBar): void {
  parseBarDate(bar.date);

  for (const field of ['open', 'high', 'low', 'close'] as const) {
    const price = bar[field];
    if (!Number.isFinite(price) || price <= 0) {
      throw new InvalidInputError(`${bar.date}: ${field} must be a positive number, got ${price}`);
    }
  }

  if (bar.low > bar.open || bar.low > bar.close || bar.low > bar.high) {
    throw new InvalidInputError(`${bar.date}: low ${bar.low} is above open, close or high`);
  }
  if (bar.high < bar.open || bar.high < bar.close) {
    throw new InvalidInputError(`${bar.date}: high ${bar.high} is below open or close`);
  }
}

/** Validates every bar and that dates strictly increase. */
export function assertBarSeries(bars: readonly DailyBar[]): void {
  if (bars.length === 0) {
    throw new InvalidInputError('bar series is empty');
  }

  let previousDate: string | null = null;
  for (const bar of bars) {
    assertValidBar(bar);
    // ISO dates compare chronologically as strings
    if (previousDate !== null && bar.date <= previousDate) {
      throw new InvalidInputError(
        `bars must be chronological without duplicates: ${bar.date} follows ${previousDate}`,
      );
    }
    previousDate = bar.date;
  }
}
