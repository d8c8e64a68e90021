// Backtest types — strategy requests, summaries, comparison rows

import type { BacktestError } from './errors';

/** The five rolling hedge strategies the service simulates */
export type StrategyName = 'atm_puts' | 'otm_puts' | 'put_spread' | 'collar' | 'zero_cost_collar';

interface RequestBase {
  /** Upper-cased equity ticker (e.g. 'SPY') */
  ticker: string;
  /** Shares held; always a positive integer */
  shares: number;
}

/** A fully-resolved request: each strategy carries exactly its own parameter */
export type StrategyRequest =
  | (RequestBase & { strategy: 'atm_puts' })
  | (RequestBase & { strategy: 'otm_puts'; otmPercent: number })
  | (RequestBase & { strategy: 'put_spread'; spreadWidthPercent: number })
  | (RequestBase & { strategy: 'collar'; upsideCapPercent: number })
  | (RequestBase & { strategy: 'zero_cost_collar'; coverageRatio: number });

/** User overrides; anything unset falls back to the strategy default */
export interface StrategyParams {
  otmPercent?: number;
  spreadWidthPercent?: number;
  upsideCapPercent?: number;
  coverageRatio?: number;
}

/** P&L column a reduction runs over */
export type PnlColumn = 'stock_pnl' | 'total_pnl';

export interface SummaryMetrics {
  months: number;
  /** Share of months with P&L > 0, as a percentage (0-100) */
  winRatePercent: number;
  totalStockPl: number;
  totalHedgePl: number;
  totalStrategyPl: number;
  /** Largest peak-to-trough decline of the cumulative series (>= 0) */
  maxDrawdown: number;
  /** Sample standard deviation of monthly P&L */
  monthlyVolatility: number;
  avgMonthlyStrategyPl: number;
  /** Hedge P&L relative to the absolute stock P&L, in percent */
  hedgePctOfStock: number;
}

export type ComparisonKey = StrategyName | 'buy_and_hold';

export interface ComparisonRow {
  strategy: ComparisonKey;
  /** Display name (e.g. 'Buy & Hold', 'Zero-Cost Collar') */
  label: string;
  finalPnl: number;
  buyHoldPnl: number;
  hedgePnl: number;
  winRatePercent: number;
  maxDrawdown: number;
  volatility: number;
  riskAdjusted: number;
}

/** A strategy dropped from a comparison, and why */
export interface StrategyFailure {
  strategy: ComparisonKey;
  error: BacktestError;
}

export interface ComparisonOutcome {
  /** Buy & Hold first (when it succeeded), then strategies in fixed order */
  rows: ComparisonRow[];
  failures: StrategyFailure[];
}

export interface CompareOptions {
  /** Issue the strategy calls concurrently instead of one after another */
  parallel?: boolean;
}
