// Backtest analytics — pure reductions over monthly P&L series

import type { MonthlyResult, ServiceSummary } from '../services/backtest-service/types';
import type { PnlColumn, SummaryMetrics } from './types';

/** Running total of a series, in order */
export function cumulative(values: number[]): number[] {
  const out: number[] = [];
  let running = 0;
  for (const v of values) {
    running += v;
    out.push(running);
  }
  return out;
}

/**
 * Largest gap between the running maximum of the cumulative series and the
 * series itself. The running max starts at the first cumulative value, so a
 * series that opens with a loss has no drawdown until it later falls below
 * a previous high.
 */
export function maxDrawdown(pnls: number[]): number {
  if (pnls.length === 0) return 0;

  let peak = -Infinity;
  let maxDD = 0;

  for (const value of cumulative(pnls)) {
    if (value > peak) {
      peak = value;
    }
    const drawdown = peak - value;
    if (drawdown > maxDD) {
      maxDD = drawdown;
    }
  }

  return maxDD;
}

export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Sample standard deviation (n - 1). 0 for fewer than two points or a constant series. */
export function sampleStdDev(values: number[]): number {
  if (values.length < 2) return 0;
  // The mean of repeated decimals is not exact, which leaves a tiny non-zero spread
  if (values.every((v) => v === values[0])) return 0;

  const avg = mean(values);
  const variance = values.reduce((sum, v) => sum + (v - avg) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

export function winRatePercent(values: number[]): number {
  if (values.length === 0) return 0;
  const wins = values.filter((v) => v > 0).length;
  return (wins / values.length) * 100;
}

/** Mean monthly P&L over its volatility; 0 when volatility is not positive */
export function riskAdjusted(avgMonthly: number, volatility: number): number {
  return volatility > 0 ? avgMonthly / volatility : 0;
}

/** Extract a P&L column. Months without `total_pnl` count as unhedged. */
export function pnlSeries(results: MonthlyResult[], column: PnlColumn): number[] {
  if (column === 'stock_pnl') {
    return results.map((r) => r.stock_pnl);
  }
  return results.map((r) => r.total_pnl ?? r.stock_pnl);
}

/**
 * Reduce a monthly series into summary metrics. Totals always cover both
 * columns; the risk metrics (win rate, drawdown, volatility, average) run
 * over `column`, which defaults to the unhedged stock P&L.
 */
export function summarize(results: MonthlyResult[], column: PnlColumn = 'stock_pnl'): SummaryMetrics {
  const stock = pnlSeries(results, 'stock_pnl');
  const strategy = pnlSeries(results, 'total_pnl');
  const selected = column === 'stock_pnl' ? stock : strategy;

  const totalStockPl = stock.reduce((sum, v) => sum + v, 0);
  const totalStrategyPl = strategy.reduce((sum, v) => sum + v, 0);
  const totalHedgePl = totalStrategyPl - totalStockPl;

  return {
    months: results.length,
    winRatePercent: winRatePercent(selected),
    totalStockPl,
    totalHedgePl,
    totalStrategyPl,
    maxDrawdown: maxDrawdown(selected),
    monthlyVolatility: sampleStdDev(selected),
    avgMonthlyStrategyPl: mean(selected),
    hedgePctOfStock: totalStockPl !== 0 ? (totalHedgePl / Math.abs(totalStockPl)) * 100 : 0,
  };
}

/** Map the service's snake_case summary onto SummaryMetrics */
export function fromServiceSummary(summary: ServiceSummary): SummaryMetrics {
  return {
    months: summary.months,
    winRatePercent: summary.win_rate_percent,
    totalStockPl: summary.total_stock_pl,
    totalHedgePl: summary.total_hedge_pl,
    totalStrategyPl: summary.total_strategy_pl,
    maxDrawdown: summary.max_drawdown,
    monthlyVolatility: summary.monthly_volatility,
    avgMonthlyStrategyPl: summary.avg_monthly_strategy_pl,
    hedgePctOfStock: summary.hedge_pct_of_stock,
  };
}
