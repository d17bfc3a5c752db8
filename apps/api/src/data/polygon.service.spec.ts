import { ConfigService } from '@nestjs/config';
import { MarketDataError } from './data.types';
import { PolygonService } from './polygon.service';

const jsonResponse = (body: unknown, init: ResponseInit = { status: 200 }) =>
  new Response(JSON.stringify(body), init);

// Polygon stamps daily aggregates at the start of the session, New York time
const sessionStart = (date: string) => Date.parse(`${date}T05:00:00Z`);

describe('PolygonService', () => {
  let service: PolygonService;
  let fetchMock: jest.SpyInstance;

  beforeEach(() => {
    service = new PolygonService(new ConfigService({ POLYGON_API_KEY: 'test-key' }));
    fetchMock = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('requests daily aggregates for the date range', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({ results: [{ o: 100, h: 102, l: 99, c: 101, v: 1000, t: sessionStart('2024-01-02') }] }),
    );

    await service.getDailyBars('SPY', '2024-01-02', '2024-01-31');

    expect(fetchMock).toHaveBeenCalledWith(
      'https://api.polygon.io/v2/aggs/ticker/SPY/range/1/day/2024-01-02/2024-01-31?adjusted=true&sort=asc&limit=50000&apiKey=test-key',
    );
  });

  it('maps aggregates to chronological daily bars', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({
        results: [
          { o: 103, h: 104, l: 100, c: 101, t: sessionStart('2024-01-04') },
          { o: 100, h: 102, l: 99, c: 101, t: sessionStart('2024-01-02') },
          { o: 101, h: 103, l: 100, t: sessionStart('2024-01-03') },
        ],
      }),
    );

    const bars = await service.getDailyBars('SPY', '2024-01-02', '2024-01-04');

    expect(bars).toEqual([
      { date: '2024-01-02', open: 100, high: 102, low: 99, close: 101 },
      { date: '2024-01-04', open: 103, high: 104, low: 100, close: 101 },
    ]);
  });

  it('keeps the last row for a repeated date', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({
        results: [
          { o: 100, h: 102, l: 99, c: 101, t: sessionStart('2024-01-02') },
          { o: 100, h: 103, l: 99, c: 102, t: sessionStart('2024-01-02') },
        ],
      }),
    );

    const bars = await service.getDailyBars('SPY', '2024-01-02', '2024-01-02');

    expect(bars).toEqual([{ date: '2024-01-02', open: 100, high: 103, low: 99, close: 102 }]);
  });

  it('reports an empty range as missing data', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ resultsCount: 0 }));

    const error = await service.getDailyBars('SPY', '2024-01-06', '2024-01-07').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MarketDataError);
    expect(error).toMatchObject({ reason: 'no_data' });
  });

  it('reports an HTTP failure as an upstream error', async () => {
    fetchMock.mockResolvedValue(new Response('rate limited', { status: 429, statusText: 'Too Many Requests' }));

    const error = await service.getDailyBars('SPY', '2024-01-02', '2024-01-31').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MarketDataError);
    expect(error).toMatchObject({ reason: 'upstream', message: 'Polygon API error: 429 Too Many Requests' });
  });
});
