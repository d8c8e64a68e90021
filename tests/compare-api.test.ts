import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { VercelRequest, VercelResponse } from '@vercel/node';
import handler from '../api/compare';
import healthHandler from '../api/health';

const MONTHS = [
  { stock_pnl: 100, total_pnl: 80 },
  { stock_pnl: -50, total_pnl: -10 },
  { stock_pnl: 200, total_pnl: 150 },
  { stock_pnl: -20, total_pnl: 0 },
];

function summary(avg: number, vol: number) {
  return {
    months: 4,
    win_rate_percent: 50,
    total_stock_pl: 230,
    total_hedge_pl: -20,
    total_strategy_pl: 210,
    max_drawdown: 30,
    monthly_volatility: vol,
    avg_monthly_strategy_pl: avg,
    hedge_pct_of_stock: -8.7,
  };
}

// Ratios: atm 0.4, otm 0.6, put_spread 0.9, collar 0.7, zero_cost_collar 0.2; buy & hold 0.5
const SUMMARIES: Record<string, ReturnType<typeof summary>> = {
  rolling_atm_puts: summary(40, 100),
  rolling_otm_puts: summary(60, 100),
  rolling_put_spread: summary(90, 100),
  rolling_collar: summary(70, 100),
  rolling_zero_cost_collar: summary(20, 100),
};

function serviceFetch(failing: string[] = []) {
  return vi.fn(async (_url: string, init: RequestInit) => {
    const { strategy } = JSON.parse(String(init.body)) as { strategy: string };
    if (failing.includes(strategy)) {
      return { ok: false, status: 503, text: async () => 'service unavailable' };
    }
    return {
      ok: true,
      status: 200,
      text: async () => JSON.stringify({ status: 'done', results: MONTHS, summary: SUMMARIES[strategy] }),
    };
  });
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

type CompareBody = {
  success: boolean;
  rows: Array<{ strategy: string }>;
  failures: Array<{ strategy: string; kind: string; status: number | null; message: string }>;
  best: { strategy: string; riskAdjusted: number };
};

describe('POST /api/compare', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    responseData = undefined;
    statusCode = 0;
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('returns 405 for non-POST requests', async () => {
    const req: Partial<VercelRequest> = { method: 'PUT', query: {} };
    await handler(req as VercelRequest, mockRes as VercelResponse);
    expect(statusCode).toBe(405);
  });

  it('returns 400 when the position size is missing', async () => {
    await post({ ticker: 'SPY' });
    expect(statusCode).toBe(400);
  });

  it('returns six rows and the best risk-adjusted strategy', async () => {
    vi.stubGlobal('fetch', serviceFetch());

    await post({ ticker: 'SPY', contracts: 2 });

    expect(statusCode).toBe(200);
    const data = responseData as CompareBody;
    expect(data.success).toBe(true);
    expect(data.rows).toHaveLength(6);
    expect(data.rows[0].strategy).toBe('buy_and_hold');
    expect(data.failures).toEqual([]);
    expect(data.best.strategy).toBe('put_spread');
    expect(data.best.riskAdjusted).toBeCloseTo(0.9, 10);
  });

  it('reports a failed strategy and keeps the other five rows', async () => {
    vi.stubGlobal('fetch', serviceFetch(['rolling_put_spread']));

    await post({ ticker: 'SPY', contracts: 2, parallel: true });

    expect(statusCode).toBe(200);
    const data = responseData as CompareBody;
    expect(data.rows).toHaveLength(5);
    expect(data.failures).toEqual([
      { strategy: 'put_spread', kind: 'transport', status: 503, message: 'Error 503: service unavailable' },
    ]);
    expect(data.best.strategy).toBe('collar');
  });

  it('returns 502 when every call fails', async () => {
    vi.stubGlobal(
      'fetch',
      serviceFetch([
        'rolling_atm_puts',
        'rolling_otm_puts',
        'rolling_put_spread',
        'rolling_collar',
        'rolling_zero_cost_collar',
      ]),
    );

    await post({ ticker: 'SPY', shares: 100 });

    expect(statusCode).toBe(502);
    const data = responseData as { success: boolean; error: string };
    expect(data.success).toBe(false);
    expect(data.error).toBe('No strategy results returned.');
  });
});

describe('GET /api/health', () => {
  it('reports ok with the version and uptime', () => {
    const req: Partial<VercelRequest> = { method: 'GET', query: {} };
    healthHandler(req as VercelRequest, mockRes as VercelResponse);

    expect(statusCode).toBe(200);
    const data = responseData as Record<string, unknown>;
    expect(Object.keys(data).sort()).toEqual(['status', 'timestamp', 'uptime', 'version']);
    expect(data.status).toBe('ok');
    expect(data.version).toBe('1.0.0');
  });
});
