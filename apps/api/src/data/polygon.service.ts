import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DailyBar } from '../simulation/simulation.types';
import { MarketDataError, PolygonAggregate, PolygonAggregatesResponse } from './data.types';

@Injectable()
export class PolygonService {
  private readonly logger = new Logger(PolygonService.name);
  private readonly apiKey: string;
  private readonly baseUrl = 'https://api.polygon.io';

  constructor(private readonly configService: ConfigService) {
    this.apiKey = this.configService.get<string>('POLYGON_API_KEY', '');
    if (!this.apiKey) {
      this.logger.warn('POLYGON_API_KEY not configured');
    }
  }

  private async fetch<T>(endpoint: string): Promise<T> {
    const url = `${this.baseUrl}${endpoint}${endpoint.includes('?') ? '&' : '?'}apiKey=${this.apiKey}`;
    const response = await fetch(url);

    if (!response.ok) {
      throw new MarketDataError(
        `Polygon API error: ${response.status} ${response.statusText}`,
        'upstream',
      );
    }

    return response.json() as Promise<T>;
  }

  /**
   * Daily OHLC bars for `symbol` between two YYYY-MM-DD dates (inclusive),
   * oldest first. Rows missing a price are dropped and a repeated date keeps
   * the last row seen.
   */
  async getDailyBars(symbol: string, from: string, to: string): Promise<DailyBar[]> {
    const data = await this.fetch<PolygonAggregatesResponse>(
      `/v2/aggs/ticker/${encodeURIComponent(symbol)}/range/1/day/${from}/${to}?adjusted=true&sort=asc&limit=50000`,
    );

    const byDate = new Map<string, DailyBar>();
    for (const aggregate of data.results ?? []) {
      const bar = toDailyBar(aggregate);
      if (bar) {
        byDate.set(bar.date, bar);
      }
    }

    const bars = [...byDate.values()].sort((a, b) => a.date.localeCompare(b.date));
    if (bars.length === 0) {
      throw new MarketDataError(`No data available for ${symbol} between ${from} and ${to}`, 'no_data');
    }

    const dropped = (data.results?.length ?? 0) - bars.length;
    if (dropped > 0) {
      this.logger.warn(`Dropped ${dropped} incomplete or duplicate bars for ${symbol}`);
    }

    this.logger.log(`Fetched ${bars.length} daily bars for ${symbol} (${from} → ${to})`);
    return bars;
  }
}

function toDailyBar(aggregate: PolygonAggregate): DailyBar | null {
  const { o, h, l, c, t } = aggregate;
  if (o === undefined || h === undefined || l === undefined || c === undefined || t === undefined) {
    return null;
  }

  return {
    date: new Date(t).toISOString().split('T')[0],
    open: o,
    high: h,
    low: l,
    close: c,
  };
}
