export const REBALANCE_FREQUENCIES = ['None', 'Daily', 'Monthly', 'Quarterly'] as const;

export type RebalanceFrequency = (typeof REBALANCE_FREQUENCIES)[number];

export type RebalanceAction = 'Buy' | 'Sell' | 'Hold';

export interface SimulationParameters {
  maxDropPercent: number; // decimal, e.g. 0.30 for a 30% drop
  marginRequirement: number; // e.g. 0.05
  marginCloseoutFraction: number; // e.g. 0.50
  annualCostRate: number; // e.g. 0.0533
  rebalanceFrequency: RebalanceFrequency;
  initialCapital: number;
}

export interface DailyBar {
  date: string; // YYYY-MM-DD
  open: number;
  high: number;
  low: number;
  close: number;
}

export interface DailyResult {
  date: string;
  equity: number;
  units: number;
  liquidated: boolean;
  benchmarkEquity: number;
  cumulativeCost: number;
  unitChange: number;
  action: RebalanceAction;
  liquidationTrigger: number;
}

export interface SimulationSummary {
  liquidated: boolean;
  liquidationDate: string | null;
  finalEquity: number;
  totalReturnPct: number;
  totalCostsPaid: number;
  initialUnits: number;
  rebalanceCount: number;
}

export interface BenchmarkSummary {
  finalEquity: number;
  totalReturnPct: number;
  unitsHeld: number;
}

export interface SimulationReport {
  parameters: SimulationParameters;
  summary: SimulationSummary;
  benchmark: BenchmarkSummary;
  days: DailyResult[];
}

export interface SweepEntry {
  maxDropPercent: number;
  summary: SimulationSummary;
}

/** Broker-side terms; sourced from configuration rather than the request. */
export interface BrokerTerms {
  marginRequirement: number;
  marginCloseoutFraction: number;
  annualCostRate: number;
}

export const DEFAULT_BROKER_TERMS: BrokerTerms = {
  marginRequirement: 0.05,
  marginCloseoutFraction: 0.5, // broker closes out at 50% of required margin
  annualCostRate: 0.0533,
};
