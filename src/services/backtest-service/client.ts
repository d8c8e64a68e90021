// Backtest service REST client
// One POST per strategy run; failures come back as values, never thrown

import { logger } from '../../lib/logger';
import { getServiceConfig } from '../../lib/config';
import { isRecord } from '../../lib/validation';
import { BacktestError } from '../../backtest/errors';
import { toPayload } from '../../backtest/strategies';
import type { StrategyRequest } from '../../backtest/types';
import type {
  BacktestClientConfig,
  BacktestResponse,
  MonthlyResult,
  ServiceSummary,
  SubmitResult,
} from './types';

const NO_RESULTS_MESSAGE = 'No results returned';

const SUMMARY_FIELDS: readonly (keyof ServiceSummary)[] = [
  'months',
  'win_rate_percent',
  'total_stock_pl',
  'total_hedge_pl',
  'total_strategy_pl',
  'max_drawdown',
  'monthly_volatility',
  'avg_monthly_strategy_pl',
  'hedge_pct_of_stock',
];

// ─── Response parsing ────────────────────────────────────────────────────────

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/** Keeps every field of the month; null if `stock_pnl` is missing or not numeric. */
function parseMonth(raw: unknown): MonthlyResult | null {
  if (!isRecord(raw)) return null;

  const { stock_pnl, total_pnl, ...rest } = raw;
  if (!isFiniteNumber(stock_pnl)) return null;

  const month: MonthlyResult = { stock_pnl };
  Object.assign(month, rest);
  if (isFiniteNumber(total_pnl)) {
    month.total_pnl = total_pnl;
  }
  return month;
}

/** Missing or non-numeric summary fields read as 0. */
function parseSummary(raw: unknown): ServiceSummary | undefined {
  if (!isRecord(raw)) return undefined;

  const summary: ServiceSummary = {
    months: 0,
    win_rate_percent: 0,
    total_stock_pl: 0,
    total_hedge_pl: 0,
    total_strategy_pl: 0,
    max_drawdown: 0,
    monthly_volatility: 0,
    avg_monthly_strategy_pl: 0,
    hedge_pct_of_stock: 0,
  };
  for (const field of SUMMARY_FIELDS) {
    const value = raw[field];
    if (isFiniteNumber(value)) {
      summary[field] = value;
    }
  }
  return summary;
}

/**
 * Validate a decoded response body. Returns null when `results` is absent,
 * not an array, or holds a month without a numeric `stock_pnl`.
 * Unknown top-level fields are dropped.
 */
export function parseBacktestResponse(body: unknown): BacktestResponse | null {
  if (!isRecord(body) || !Array.isArray(body.results)) return null;

  const results: MonthlyResult[] = [];
  for (const raw of body.results) {
    const month = parseMonth(raw);
    if (!month) return null;
    results.push(month);
  }

  const response: BacktestResponse = {
    status: typeof body.status === 'string' ? body.status : 'ok',
    results,
  };
  const summary = parseSummary(body.summary);
  if (summary) {
    response.summary = summary;
  }
  return response;
}

function describeFetchError(error: unknown, timeoutMs: number): string {
  if (error instanceof Error) {
    if (error.name === 'TimeoutError' || error.name === 'AbortError') {
      return `Request timed out after ${timeoutMs}ms`;
    }
    return error.message;
  }
  return String(error);
}

// ─── Client ──────────────────────────────────────────────────────────────────

export class BacktestServiceClient {
  private readonly config: BacktestClientConfig;

  constructor(config: BacktestClientConfig) {
    this.config = config;
  }

  get apiUrl(): string {
    return this.config.apiUrl;
  }

  /**
   * Submit one strategy run. Single attempt, no retry.
   *
   * - non-2xx status, network error or timeout → `transport`
   * - 2xx without a usable `results` array → `malformed`
   */
  async submit(request: StrategyRequest): Promise<SubmitResult> {
    const payload = toPayload(request);
    const context = { ticker: payload.ticker, shares: payload.shares, strategy: payload.strategy };

    logger.debug('Submitting backtest', { ...context, url: this.config.apiUrl });

    let status: number;
    let ok: boolean;
    let text: string;
    try {
      const response = await fetch(this.config.apiUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
      status = response.status;
      ok = response.ok;
      text = await response.text();
    } catch (error) {
      const msg = describeFetchError(error, this.config.timeoutMs);
      logger.error('Backtest request failed', { ...context, error: msg });
      return {
        ok: false,
        error: new BacktestError('transport', `Backtest request failed: ${msg}`, { status: null, body: msg }),
      };
    }

    if (!ok) {
      logger.error('Backtest service returned an error', { ...context, status });
      return {
        ok: false,
        error: new BacktestError('transport', `Error ${status}: ${text}`, { status, body: text }),
      };
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(text);
    } catch {
      logger.warn('Backtest response is not JSON', { ...context, status });
      return { ok: false, error: new BacktestError('malformed', NO_RESULTS_MESSAGE, { status, body: text }) };
    }

    const data = parseBacktestResponse(decoded);
    if (!data) {
      logger.warn('Backtest response has no usable results', { ...context, status });
      return { ok: false, error: new BacktestError('malformed', NO_RESULTS_MESSAGE, { status, body: text }) };
    }

    logger.info('Backtest completed', {
      ...context,
      months: data.results.length,
      hasSummary: data.summary !== undefined,
    });
    return { ok: true, data };
  }
}

/** Client configured from BACKTEST_API_URL / BACKTEST_TIMEOUT_MS */
export function createBacktestClient(config: BacktestClientConfig = getServiceConfig()): BacktestServiceClient {
  return new BacktestServiceClient(config);
}
