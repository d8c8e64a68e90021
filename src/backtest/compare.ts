// Multi-strategy comparison — buy-and-hold baseline plus every rolling hedge, ranked

import { logger } from '../lib/logger';
import type { BacktestServiceClient } from '../services/backtest-service/client';
import type { SubmitResult } from '../services/backtest-service/types';
import { riskAdjusted, summarize } from './analytics';
import { BacktestError } from './errors';
import { STRATEGY_LABELS, STRATEGY_NAMES, buildStrategyRequest } from './strategies';
import type {
  CompareOptions,
  ComparisonOutcome,
  ComparisonRow,
  StrategyFailure,
  StrategyName,
  StrategyParams,
} from './types';

export const BUY_AND_HOLD_LABEL = 'Buy & Hold';

/** Row for the unhedged baseline, reduced client-side from `stock_pnl` */
export function buyAndHoldRow(result: SubmitResult): ComparisonRow | BacktestError {
  if (!result.ok) return result.error;

  const metrics = summarize(result.data.results, 'stock_pnl');
  return {
    strategy: 'buy_and_hold',
    label: BUY_AND_HOLD_LABEL,
    finalPnl: metrics.totalStockPl,
    buyHoldPnl: metrics.totalStockPl,
    hedgePnl: 0,
    winRatePercent: metrics.winRatePercent,
    maxDrawdown: metrics.maxDrawdown,
    volatility: metrics.monthlyVolatility,
    riskAdjusted: riskAdjusted(metrics.avgMonthlyStrategyPl, metrics.monthlyVolatility),
  };
}

/** Row for a hedged strategy, taken from the service's summary */
export function strategyRow(strategy: StrategyName, result: SubmitResult): ComparisonRow | BacktestError {
  if (!result.ok) return result.error;

  const summary = result.data.summary;
  if (!summary) {
    return new BacktestError('malformed', 'Response has no summary');
  }

  return {
    strategy,
    label: STRATEGY_LABELS[strategy],
    finalPnl: summary.total_strategy_pl,
    buyHoldPnl: summary.total_stock_pl,
    hedgePnl: summary.total_hedge_pl,
    winRatePercent: summary.win_rate_percent,
    maxDrawdown: summary.max_drawdown,
    volatility: summary.monthly_volatility,
    riskAdjusted: riskAdjusted(summary.avg_monthly_strategy_pl, summary.monthly_volatility),
  };
}

/**
 * Run the buy-and-hold baseline and every strategy for one position.
 *
 * The baseline is an ATM-puts run with only its stock column used. Strategy
 * calls use their default parameters unless `params` overrides them. A call
 * that fails, or a strategy response without a summary, is recorded in
 * `failures` and left out of `rows`; the comparison carries on.
 */
export async function compareAll(
  client: BacktestServiceClient,
  ticker: string,
  shares: number,
  params: StrategyParams = {},
  options: CompareOptions = {},
): Promise<ComparisonOutcome> {
  const rows: ComparisonRow[] = [];
  const failures: StrategyFailure[] = [];

  logger.info('Comparison starting', { ticker, shares, parallel: options.parallel === true });

  const baseline = buyAndHoldRow(await client.submit(buildStrategyRequest(ticker, shares, 'atm_puts')));
  if (baseline instanceof BacktestError) {
    logger.warn('Buy & Hold baseline dropped', { kind: baseline.kind, error: baseline.message });
    failures.push({ strategy: 'buy_and_hold', error: baseline });
  } else {
    rows.push(baseline);
  }

  const run = (strategy: StrategyName): Promise<SubmitResult> =>
    client.submit(buildStrategyRequest(ticker, shares, strategy, params));

  let results: SubmitResult[];
  if (options.parallel) {
    results = await Promise.all(STRATEGY_NAMES.map(run));
  } else {
    results = [];
    for (const strategy of STRATEGY_NAMES) {
      results.push(await run(strategy));
    }
  }

  STRATEGY_NAMES.forEach((strategy, i) => {
    const row = strategyRow(strategy, results[i]);
    if (row instanceof BacktestError) {
      logger.warn('Strategy dropped from comparison', { strategy, kind: row.kind, error: row.message });
      failures.push({ strategy, error: row });
    } else {
      rows.push(row);
    }
  });

  logger.info('Comparison finished', {
    ticker,
    rows: rows.length,
    failed: failures.map((f) => f.strategy),
  });

  return { rows, failures };
}

/**
 * Row with the highest risk-adjusted ratio; the first one wins a tie.
 * Throws `empty_ranking` when there is nothing to rank.
 */
export function rank(rows: ComparisonRow[]): ComparisonRow {
  if (rows.length === 0) {
    throw new BacktestError('empty_ranking', 'Cannot rank an empty comparison');
  }

  let best = rows[0];
  for (const row of rows.slice(1)) {
    if (row.riskAdjusted > best.riskAdjusted) {
      best = row;
    }
  }
  return best;
}
