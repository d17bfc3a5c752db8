import { assertBarSeries, assertValidBar, parseBarDate } from './daily-bar';
import { InvalidInputError } from './simulation.errors';
import { DailyBar } from './simulation.types';

const bar = (overrides: Partial<DailyBar> = {}): DailyBar => ({
  date: overrides.date ?? '2024-01-02',
  open: overrides.open ?? 100,
  high: overrides.high ?? 105,
  low: overrides.low ?? 95,
  close: overrides.close ?? 102,
});

describe('daily bars', () => {
  it('parses calendar dates', () => {
    expect(parseBarDate('2024-02-29')).toEqual({ year: 2024, month: 2, day: 29 });
  });

  it('rejects dates that do not exist', () => {
    expect(() => parseBarDate('2023-02-29')).toThrow(InvalidInputError);
    expect(() => parseBarDate('2024-1-2')).toThrow(/YYYY-MM-DD/);
  });

  it('accepts a well-formed bar', () => {
    expect(() => assertValidBar(bar())).not.toThrow();
  });

  it.each([
    ['low above close', bar({ low: 103 })],
    ['low above open', bar({ low: 101, close: 102 })],
    ['high below close', bar({ high: 101 })],
    ['non-positive price', bar({ open: 0 })],
    ['non-finite price', bar({ close: Number.NaN })],
  ])('rejects a bar with %s', (_label, malformed) => {
    expect(() => assertValidBar(malformed)).toThrow(InvalidInputError);
  });

  it('rejects an empty series', () => {
    expect(() => assertBarSeries([])).toThrow('bar series is empty');
  });

  it('rejects duplicate and out-of-order dates', () => {
    expect(() => assertBarSeries([bar({ date: '2024-01-03' }), bar({ date: '2024-01-03' })])).toThrow(
      InvalidInputError,
    );
    expect(() => assertBarSeries([bar({ date: '2024-01-04' }), bar({ date: '2024-01-03' })])).toThrow(
      /chronological/,
    );
  });
});
