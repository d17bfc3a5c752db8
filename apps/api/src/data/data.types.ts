export interface PolygonAggregate {
  o?: number;
  h?: number;
  l?: number;
  c?: number;
  v?: number;
  t?: number; // epoch millis, start of the aggregate window
}

export interface PolygonAggregatesResponse {
  status?: string;
  resultsCount?: number;
  results?: PolygonAggregate[];
}

export type MarketDataFailure = 'no_data' | 'upstream';

export class MarketDataError extends Error {
  constructor(
    message: string,
    readonly reason: MarketDataFailure,
  ) {
    super(message);
    this.name = 'MarketDataError';
  }
}
