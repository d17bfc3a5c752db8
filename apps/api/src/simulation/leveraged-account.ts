import { assertValidBar } from './daily-bar';
import { shouldRebalance } from './rebalance';
import { InvalidInputError } from './simulation.errors';
import { DailyBar, SimulationParameters } from './simulation.types';
import { targetUnits } from './target-units';

const DAYS_PER_YEAR = 365;

export interface AccountState {
  equity: number;
  units: number;
  previousClose: number | null;
  previousDate: string | null;
  isLiquidated: boolean;
  liquidationDate: string | null;
  cumulativeCost: number;
}

/**
 * A single leveraged long position, marked to market once per daily bar.
 *
 * P&L is always measured from the previous close, never from an entry price,
 * so units added by a rebalance only earn on moves after they were bought.
 * Liquidation is terminal: the account keeps its last equity and units and
 * ignores every later bar.
 */
export class LeveragedAccount {
  private equity: number;
  private units: number;
  private previousClose: number | null = null;
  private previousDate: string | null = null;
  private isLiquidated = false;
  private liquidationDate: string | null = null;
  private cumulativeCost = 0;

  constructor(initialCapital: number, initialUnits: number) {
    if (!Number.isFinite(initialCapital) || initialCapital <= 0) {
      throw new InvalidInputError(`initial capital must be positive, got ${initialCapital}`);
    }
    if (!Number.isFinite(initialUnits) || initialUnits < 0) {
      throw new InvalidInputError(`initial units must be non-negative, got ${initialUnits}`);
    }
    this.equity = initialCapital;
    this.units = initialUnits;
  }

  get state(): AccountState {
    return {
      equity: this.equity,
      units: this.units,
      previousClose: this.previousClose,
      previousDate: this.previousDate,
      isLiquidated: this.isLiquidated,
      liquidationDate: this.liquidationDate,
      cumulativeCost: this.cumulativeCost,
    };
  }

  applyDailyTick(bar: DailyBar, params: SimulationParameters): void {
    assertValidBar(bar);

    if (this.isLiquidated) {
      return;
    }

    if (this.previousClose === null) {
      // First bar only establishes the reference close
      this.advanceReference(bar);
      return;
    }

    if (this.checkLiquidation(bar, this.previousClose, params)) {
      this.advanceReference(bar);
      return;
    }

    this.markToMarket(bar.close, this.previousClose);
    this.accrueHoldingCost(bar.close, params.annualCostRate);

    if (shouldRebalance(bar.date, this.previousDate, params.rebalanceFrequency)) {
      this.units = targetUnits(
        this.equity,
        bar.close,
        params.maxDropPercent,
        params.marginRequirement,
        params.marginCloseoutFraction,
      );
    }

    this.advanceReference(bar);
  }

  /** Tests the worst point of the day; the broker closes out at the trigger level. */
  private checkLiquidation(
    bar: DailyBar,
    previousClose: number,
    params: SimulationParameters,
  ): boolean {
    const pnlAtLow = (bar.low - previousClose) * this.units;
    const equityAtLow = this.equity + pnlAtLow;

    const marginRequired = bar.low * this.units * params.marginRequirement;
    const trigger = marginRequired * params.marginCloseoutFraction;

    if (equityAtLow > trigger) {
      return false;
    }

    this.isLiquidated = true;
    this.liquidationDate = bar.date;
    this.equity = trigger;
    return true;
  }

  private markToMarket(close: number, previousClose: number): void {
    const priceChange = close - previousClose;
    this.equity += this.units * priceChange;
  }

  private accrueHoldingCost(close: number, annualCostRate: number): void {
    const dailyCost = close * this.units * (annualCostRate / DAYS_PER_YEAR);
    this.equity -= dailyCost;
    this.cumulativeCost += dailyCost;
  }

  private advanceReference(bar: DailyBar): void {
    this.previousClose = bar.close;
    this.previousDate = bar.date;
  }
}
