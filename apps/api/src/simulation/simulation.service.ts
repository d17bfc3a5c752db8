import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { MarketDataError } from '../data/data.types';
import { PolygonService } from '../data/polygon.service';
import { SimulationRun } from '../entities/simulation-run.entity';
import { assertBarSeries } from './daily-bar';
import { RunSimulationDto, SimulationRequestDto, SweepSimulationDto } from './dto/run-simulation.dto';
import { InvalidInputError } from './simulation.errors';
import { simulate, sweepMaxDrop } from './simulation.engine';
import {
  BrokerTerms,
  DailyBar,
  DEFAULT_BROKER_TERMS,
  SimulationParameters,
  SimulationReport,
  SweepEntry,
} from './simulation.types';

export interface SimulationStats {
  totalRuns: number;
  liquidatedRuns: number;
  liquidationRate: number;
  avgReturnPct: number;
  avgBenchmarkReturnPct: number;
  avgOutperformancePct: number;
  bestRun: { symbol: string; totalReturnPct: number } | null;
  worstRun: { symbol: string; totalReturnPct: number } | null;
}

const BROKER_TERM_ENV: ReadonlyArray<[keyof BrokerTerms, string]> = [
  ['marginRequirement', 'MARGIN_REQUIREMENT'],
  ['marginCloseoutFraction', 'MARGIN_CLOSEOUT_FRACTION'],
  ['annualCostRate', 'ANNUAL_COST_RATE'],
];

@Injectable()
export class SimulationService {
  private readonly logger = new Logger(SimulationService.name);
  private readonly brokerTerms: BrokerTerms;

  constructor(
    @InjectRepository(SimulationRun)
    private simulationRunRepo: Repository<SimulationRun>,
    private readonly polygonService: PolygonService,
    private readonly configService: ConfigService,
  ) {
    this.brokerTerms = this.loadBrokerTerms();
  }

  private loadBrokerTerms(): BrokerTerms {
    const terms: BrokerTerms = { ...DEFAULT_BROKER_TERMS };

    for (const [key, envName] of BROKER_TERM_ENV) {
      const raw = this.configService.get<string>(envName);
      if (raw === undefined || raw === '') continue;

      const value = Number(raw);
      if (!Number.isFinite(value) || value < 0 || value >= 1) {
        this.logger.warn(
          `Ignoring ${envName}=${raw}: must be a decimal in [0, 1), using ${terms[key]}`,
        );
        continue;
      }
      terms[key] = value;
    }

    return terms;
  }

  getBrokerTerms(): BrokerTerms {
    return { ...this.brokerTerms };
  }

  toParameters(input: SimulationRequestDto, maxDropPercent: number): SimulationParameters {
    return {
      initialCapital: input.initialCapital,
      maxDropPercent,
      rebalanceFrequency: input.rebalanceFrequency,
      marginRequirement: input.marginRequirement ?? this.brokerTerms.marginRequirement,
      marginCloseoutFraction:
        input.marginCloseoutFraction ?? this.brokerTerms.marginCloseoutFraction,
      annualCostRate: input.annualCostRate ?? this.brokerTerms.annualCostRate,
    };
  }

  async runSimulation(input: RunSimulationDto): Promise<SimulationReport> {
    const { symbol, startDate, endDate } = input;
    const params = this.toParameters(input, input.maxDropPercent);

    this.logger.log(
      `Running simulation for ${symbol} ${startDate} → ${endDate} (drop ${(params.maxDropPercent * 100).toFixed(0)}%, rebalance ${params.rebalanceFrequency})`,
    );

    const bars = await this.fetchBars(symbol, startDate, endDate);
    const report = simulate(bars, params);
    const { summary, benchmark } = report;

    this.logger.log(
      `Simulation complete: ${symbol} ${bars.length} days, equity ${summary.finalEquity.toFixed(2)} (${summary.totalReturnPct.toFixed(2)}%)` +
        (summary.liquidated ? `, liquidated on ${summary.liquidationDate}` : ''),
    );

    await this.simulationRunRepo.save({
      symbol,
      startDate,
      endDate,
      parameters: params,
      liquidated: summary.liquidated,
      liquidationDate: summary.liquidationDate,
      finalEquity: summary.finalEquity,
      totalReturnPct: summary.totalReturnPct,
      totalCostsPaid: summary.totalCostsPaid,
      initialUnits: summary.initialUnits,
      rebalanceCount: summary.rebalanceCount,
      benchmarkFinalEquity: benchmark.finalEquity,
      benchmarkReturnPct: benchmark.totalReturnPct,
      tradingDays: bars.length,
    });

    return report;
  }

  async runSweep(input: SweepSimulationDto): Promise<SweepEntry[]> {
    const { symbol, startDate, endDate, maxDropPercents } = input;
    // Each sweep point replaces the drop size
    const params = this.toParameters(input, maxDropPercents[0]);

    this.logger.log(`Running ${maxDropPercents.length}-point drop sweep for ${symbol}`);

    const bars = await this.fetchBars(symbol, startDate, endDate);
    return sweepMaxDrop(bars, params, maxDropPercents);
  }

  /** Malformed bars from the provider surface as an upstream failure. */
  private async fetchBars(symbol: string, from: string, to: string): Promise<DailyBar[]> {
    const bars = await this.polygonService.getDailyBars(symbol, from, to);
    try {
      assertBarSeries(bars);
    } catch (error) {
      if (error instanceof InvalidInputError) {
        this.logger.error(`Rejected market data for ${symbol}: ${error.message}`);
        throw new MarketDataError(`Invalid market data for ${symbol}: ${error.message}`, 'upstream');
      }
      throw error;
    }
    return bars;
  }

  async getSimulationHistory(limit = 50): Promise<SimulationRun[]> {
    return this.simulationRunRepo.find({
      order: { createdAt: 'DESC' },
      take: limit,
    });
  }

  async getSimulationStats(): Promise<SimulationStats> {
    const runs = await this.simulationRunRepo.find();

    if (runs.length === 0) {
      return {
        totalRuns: 0,
        liquidatedRuns: 0,
        liquidationRate: 0,
        avgReturnPct: 0,
        avgBenchmarkReturnPct: 0,
        avgOutperformancePct: 0,
        bestRun: null,
        worstRun: null,
      };
    }

    // Postgres decimals come back as strings
    const returnOf = (run: SimulationRun) => Number(run.totalReturnPct);
    const benchmarkOf = (run: SimulationRun) => Number(run.benchmarkReturnPct);

    const liquidatedRuns = runs.filter((r) => r.liquidated).length;
    const avgReturnPct = runs.reduce((sum, r) => sum + returnOf(r), 0) / runs.length;
    const avgBenchmarkReturnPct = runs.reduce((sum, r) => sum + benchmarkOf(r), 0) / runs.length;

    const sorted = [...runs].sort((a, b) => returnOf(b) - returnOf(a));
    const best = sorted[0];
    const worst = sorted[sorted.length - 1];

    return {
      totalRuns: runs.length,
      liquidatedRuns,
      liquidationRate: (liquidatedRuns / runs.length) * 100,
      avgReturnPct,
      avgBenchmarkReturnPct,
      avgOutperformancePct: avgReturnPct - avgBenchmarkReturnPct,
      bestRun: { symbol: best.symbol, totalReturnPct: returnOf(best) },
      worstRun: { symbol: worst.symbol, totalReturnPct: returnOf(worst) },
    };
  }

  async clearSimulationHistory(): Promise<number> {
    const count = await this.simulationRunRepo.count();
    await this.simulationRunRepo.clear();
    this.logger.log(`Cleared ${count} simulation runs`);
    return count;
  }
}
