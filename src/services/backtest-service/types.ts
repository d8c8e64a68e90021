// Backtest service API types
// Wire contract of the external rolling-hedge backtest endpoint (snake_case JSON)

import type { BacktestError } from '../../backtest/errors';

// ─── Request ─────────────────────────────────────────────────────────────────

/** Strategy identifiers as the service spells them */
export type WireStrategyName =
  | 'rolling_atm_puts'
  | 'rolling_otm_puts'
  | 'rolling_put_spread'
  | 'rolling_collar'
  | 'rolling_zero_cost_collar';

/** POST body. At most one of the optional parameters is present. */
export interface BacktestPayload {
  ticker: string;
  shares: number;
  strategy: WireStrategyName;
  otm_percent?: number;
  spread_width_percent?: number;
  upside_cap_percent?: number;
  coverage_ratio?: number;
}

// ─── Response ────────────────────────────────────────────────────────────────

/**
 * One simulated month. Only `stock_pnl` is required; every other field the
 * service sends is passed through untouched (dates, strikes, premiums...).
 */
export interface MonthlyResult {
  stock_pnl: number;
  total_pnl?: number;
  [field: string]: unknown;
}

/** Summary block computed by the service for a single strategy run */
export interface ServiceSummary {
  months: number;
  win_rate_percent: number;
  total_stock_pl: number;
  total_hedge_pl: number;
  total_strategy_pl: number;
  max_drawdown: number;
  monthly_volatility: number;
  avg_monthly_strategy_pl: number;
  hedge_pct_of_stock: number;
}

export interface BacktestResponse {
  status: string;
  results: MonthlyResult[];
  /** Absent on some runs; single-run callers must tolerate that */
  summary?: ServiceSummary;
}

// ─── Client ──────────────────────────────────────────────────────────────────

export interface BacktestClientConfig {
  /** Full URL of the backtest endpoint */
  apiUrl: string;
  /** Abort the request after this many milliseconds */
  timeoutMs: number;
}

/** Outcome of a single submit. Never thrown; failures are values. */
export type SubmitResult =
  | { ok: true; data: BacktestResponse }
  | { ok: false; error: BacktestError };
