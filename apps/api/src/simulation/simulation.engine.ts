import { assertBarSeries } from './daily-bar';
import { LeveragedAccount } from './leveraged-account';
import { InvalidInputError } from './simulation.errors';
import {
  BenchmarkSummary,
  DailyBar,
  DailyResult,
  REBALANCE_FREQUENCIES,
  RebalanceAction,
  SimulationParameters,
  SimulationReport,
  SimulationSummary,
  SweepEntry,
} from './simulation.types';
import { targetUnits } from './target-units';

// Unit changes at or below this size are reported as a hold
const UNIT_CHANGE_THRESHOLD = 0.01;

const RATE_FIELDS = [
  'maxDropPercent',
  'marginRequirement',
  'marginCloseoutFraction',
  'annualCostRate',
] as const;

export function assertParameters(params: SimulationParameters): void {
  if (!Number.isFinite(params.initialCapital) || params.initialCapital <= 0) {
    throw new InvalidInputError(`initialCapital must be positive, got ${params.initialCapital}`);
  }
  for (const field of RATE_FIELDS) {
    const value = params[field];
    if (!Number.isFinite(value) || value < 0 || value >= 1) {
      throw new InvalidInputError(`${field} must be in [0, 1), got ${value}`);
    }
  }
  if (!REBALANCE_FREQUENCIES.includes(params.rebalanceFrequency)) {
    throw new InvalidInputError(`unknown rebalance frequency "${params.rebalanceFrequency}"`);
  }
}

/**
 * Runs one leveraged account over the bar series and returns a row per bar.
 *
 * Bars must be chronological with unique dates. Neither input is mutated and
 * repeated calls with the same inputs return identical rows.
 */
export function runSimulation(
  bars: readonly DailyBar[],
  params: SimulationParameters,
): DailyResult[] {
  assertParameters(params);
  assertBarSeries(bars);

  const firstClose = bars[0].close;
  const initialUnits = targetUnits(
    params.initialCapital,
    firstClose,
    params.maxDropPercent,
    params.marginRequirement,
    params.marginCloseoutFraction,
  );
  const account = new LeveragedAccount(params.initialCapital, initialUnits);

  return bars.map((bar) => {
    const unitsBefore = account.state.units;
    account.applyDailyTick(bar, params);
    const { equity, units, isLiquidated, cumulativeCost } = account.state;

    let unitChange = units - unitsBefore;
    let action: RebalanceAction = 'Hold';
    if (unitChange > UNIT_CHANGE_THRESHOLD) {
      action = 'Buy';
    } else if (unitChange < -UNIT_CHANGE_THRESHOLD) {
      action = 'Sell';
    } else {
      unitChange = 0;
    }

    return {
      date: bar.date,
      equity,
      units,
      liquidated: isLiquidated,
      benchmarkEquity: (params.initialCapital * bar.close) / firstClose,
      cumulativeCost,
      unitChange,
      action,
      liquidationTrigger:
        bar.close * units * params.marginRequirement * params.marginCloseoutFraction,
    };
  });
}

export function simulate(
  bars: readonly DailyBar[],
  params: SimulationParameters,
): SimulationReport {
  const days = runSimulation(bars, params);
  const last = days[days.length - 1];
  const liquidationDay = days.find((day) => day.liquidated);

  const summary: SimulationSummary = {
    liquidated: liquidationDay !== undefined,
    liquidationDate: liquidationDay?.date ?? null,
    finalEquity: last.equity,
    totalReturnPct: returnPct(last.equity, params.initialCapital),
    totalCostsPaid: last.cumulativeCost,
    initialUnits: days[0].units,
    rebalanceCount: days.filter((day) => day.action !== 'Hold').length,
  };

  const benchmark: BenchmarkSummary = {
    finalEquity: last.benchmarkEquity,
    totalReturnPct: returnPct(last.benchmarkEquity, params.initialCapital),
    unitsHeld: params.initialCapital / bars[0].close,
  };

  return { parameters: { ...params }, summary, benchmark, days };
}

/** One independent run per candidate drop size over the same bars. */
export function sweepMaxDrop(
  bars: readonly DailyBar[],
  params: SimulationParameters,
  maxDropPercents: readonly number[],
): SweepEntry[] {
  return maxDropPercents.map((maxDropPercent) => ({
    maxDropPercent,
    summary: simulate(bars, { ...params, maxDropPercent }).summary,
  }));
}

function returnPct(finalEquity: number, initialCapital: number): number {
  return (finalEquity / initialCapital - 1) * 100;
}
