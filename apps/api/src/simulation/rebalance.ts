import { parseBarDate } from './daily-bar';
import { RebalanceFrequency } from './simulation.types';

/**
 * Whether the bar dated `date` starts a new rebalance period.
 *
 * Period boundaries are found by comparing against the previous bar in the
 * series, so the first trading day of a month or quarter triggers even when
 * the calendar first is a weekend or holiday. Without a previous bar no
 * period boundary exists.
 */
export function shouldRebalance(
  date: string,
  previousDate: string | null,
  frequency: RebalanceFrequency,
): boolean {
  switch (frequency) {
    case 'None':
      return false;
    case 'Daily':
      return true;
    case 'Monthly':
      return previousDate !== null && monthKey(date) !== monthKey(previousDate);
    case 'Quarterly':
      return previousDate !== null && quarterKey(date) !== quarterKey(previousDate);
  }
}

function monthKey(date: string): number {
  const { year, month } = parseBarDate(date);
  return year * 12 + (month - 1);
}

function quarterKey(date: string): number {
  const { year, month } = parseBarDate(date);
  return year * 4 + Math.floor((month - 1) / 3);
}
