import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { VercelRequest, VercelResponse } from '@vercel/node';
import handler from '../api/backtest';

const MONTHS = [
  { month: '2024-01', stock_pnl: 100, total_pnl: 80 },
  { month: '2024-02', stock_pnl: -50, total_pnl: -10 },
];

function mockFetch(resp: { ok: boolean; status?: number; body: unknown }) {
  return vi.fn(async (_url: string, _init: RequestInit) => ({
    ok: resp.ok,
    status: resp.status ?? (resp.ok ? 200 : 500),
    text: async () => (typeof resp.body === 'string' ? resp.body : JSON.stringify(resp.body)),
  }));
}

let responseData: unknown;
let statusCode: number;

const mockRes: Partial<VercelResponse> = {
  status: vi.fn().mockImplementation((code: number) => {
    statusCode = code;
    return mockRes;
  }) as unknown as VercelResponse['status'],
  json: vi.fn().mockImplementation((data: unknown) => {
    responseData = data;
    return mockRes;
  }) as unknown as VercelResponse['json'],
};

function post(body: unknown): Promise<void> {
  const req: Partial<VercelRequest> = { method: 'POST', query: {}, headers: {}, body };
  return handler(req as VercelRequest, mockRes as VercelResponse);
}

describe('POST /api/backtest', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    process.env.BACKTEST_API_URL = 'https://backtest.example.com/run';
    responseData = undefined;
    statusCode = 0;
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
    delete process.env.BACKTEST_API_URL;
  });

  it('returns 405 for non-POST requests', async () => {
    const req: Partial<VercelRequest> = { method: 'GET', query: {} };
    await handler(req as VercelRequest, mockRes as VercelResponse);
    expect(statusCode).toBe(405);
  });

  it('returns 400 with field errors for an invalid body', async () => {
    await post({ ticker: 'SPY', contracts: 2, strategy: 'straddle' });

    expect(statusCode).toBe(400);
    const data = responseData as { success: boolean; error: string; details: Array<{ field: string }> };
    expect(data.success).toBe(false);
    expect(data.error).toBe('Validation failed');
    expect(data.details.map((d) => d.field)).toEqual(['strategy']);
  });

  it('forwards the resolved payload to the configured service URL', async () => {
    const fetchMock = mockFetch({ ok: true, body: { status: 'done', results: MONTHS } });
    vi.stubGlobal('fetch', fetchMock);

    await post({ ticker: 'spy', contracts: 2, strategy: 'put_spread' });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://backtest.example.com/run');
    expect(JSON.parse(String(init.body))).toEqual({
      ticker: 'SPY',
      shares: 200,
      strategy: 'rolling_put_spread',
      spread_width_percent: 5,
    });
  });

  it('fills the summary on the client when the service omits it', async () => {
    vi.stubGlobal('fetch', mockFetch({ ok: true, body: { status: 'done', results: MONTHS } }));

    await post({ ticker: 'SPY', shares: 100, strategy: 'atm_puts' });

    expect(statusCode).toBe(200);
    const data = responseData as {
      success: boolean;
      summarySource: string;
      results: unknown[];
      summary: { totalStockPl: number; totalStrategyPl: number; totalHedgePl: number };
    };
    expect(data.success).toBe(true);
    expect(data.summarySource).toBe('client');
    expect(data.results).toEqual(MONTHS);
    expect(data.summary).toMatchObject({ totalStockPl: 50, totalStrategyPl: 70, totalHedgePl: 20 });
  });

  it('maps the service summary when present', async () => {
    vi.stubGlobal(
      'fetch',
      mockFetch({
        ok: true,
        body: { status: 'done', results: MONTHS, summary: { months: 2, total_strategy_pl: 70, monthly_volatility: 45 } },
      }),
    );

    await post({ ticker: 'SPY', shares: 100, strategy: 'atm_puts' });

    const data = responseData as { summarySource: string; summary: Record<string, number> };
    expect(data.summarySource).toBe('service');
    expect(data.summary).toMatchObject({ months: 2, totalStrategyPl: 70, monthlyVolatility: 45, totalStockPl: 0 });
  });

  it('returns 502 with the upstream status and raw body on a transport failure', async () => {
    vi.stubGlobal('fetch', mockFetch({ ok: false, status: 500, body: 'Traceback: division by zero' }));

    await post({ ticker: 'SPY', shares: 100, strategy: 'atm_puts' });

    expect(statusCode).toBe(502);
    expect(responseData).toEqual({
      success: false,
      error: 'Backtest service error',
      status: 500,
      details: 'Traceback: division by zero',
    });
  });

  it('returns a distinct 502 when the service sends no results', async () => {
    vi.stubGlobal('fetch', mockFetch({ ok: true, body: { status: 'done' } }));

    await post({ ticker: 'SPY', shares: 100, strategy: 'atm_puts' });

    expect(statusCode).toBe(502);
    expect(responseData).toEqual({ success: false, error: 'No results returned', status: 200 });
  });

  it('parses a text/plain JSON body', async () => {
    vi.stubGlobal('fetch', mockFetch({ ok: true, body: { status: 'done', results: MONTHS } }));

    await post(JSON.stringify({ ticker: 'SPY', shares: 100, strategy: 'atm_puts' }));

    expect(statusCode).toBe(200);
  });
});
