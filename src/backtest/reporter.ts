// Backtest reporter — formats single runs and comparisons for terminal output

import type { BacktestResponse, MonthlyResult } from '../services/backtest-service/types';
import { cumulative, fromServiceSummary, pnlSeries, summarize } from './analytics';
import { rank } from './compare';
import { STRATEGY_LABELS, describeParameter, toWireStrategy } from './strategies';
import type { ComparisonOutcome, StrategyRequest, SummaryMetrics } from './types';

const RULE = '========================================';
const BAR_WIDTH = 40;

export interface BarItem {
  label: string;
  value: number;
}

/**
 * Format a single strategy run.
 *
 * Includes: request, summary (the service's, or one reduced client-side
 * from `total_pnl` when the service sent none), buy & hold vs strategy bars,
 * the monthly table and the cumulative P&L curve.
 */
export function formatRunReport(request: StrategyRequest, response: BacktestResponse): string {
  const lines: string[] = [];

  lines.push('');
  lines.push(RULE);
  lines.push('         BACKTEST RESULTS');
  lines.push(RULE);
  lines.push('');

  lines.push(`  Ticker:       ${request.ticker}`);
  lines.push(`  Shares:       ${request.shares}`);
  lines.push(`  Strategy:     ${STRATEGY_LABELS[request.strategy]} (${toWireStrategy(request.strategy)})`);
  const parameter = describeParameter(request);
  if (parameter) {
    lines.push(`  Parameter:    ${parameter}`);
  }
  lines.push(`  Status:       ${response.status}`);
  lines.push('');

  const source = response.summary ? 'service' : 'client';
  const metrics: SummaryMetrics = response.summary
    ? fromServiceSummary(response.summary)
    : summarize(response.results, 'total_pnl');

  lines.push(`--- Summary (${source}) ---`);
  lines.push(...formatSummary(metrics));
  lines.push('');

  lines.push('--- Buy & Hold vs Strategy ---');
  lines.push(
    renderBarChart([
      { label: 'Buy & Hold', value: metrics.totalStockPl },
      { label: 'Strategy', value: metrics.totalStrategyPl },
    ]),
  );
  lines.push('');

  lines.push('--- Monthly Results ---');
  lines.push(renderTable(response.results));
  lines.push('');

  const hasStrategyColumn = response.results.some((r) => r.total_pnl !== undefined);
  if (hasStrategyColumn && response.results.length > 1) {
    lines.push('--- Cumulative Strategy vs Stock P&L ---');
    lines.push(
      renderCumulativeChart(
        cumulative(pnlSeries(response.results, 'total_pnl')),
        cumulative(pnlSeries(response.results, 'stock_pnl')),
      ),
    );
    lines.push('');
  }

  lines.push(RULE);
  lines.push('');

  return lines.join('\n');
}

/** Summary block lines, two-space indented */
export function formatSummary(metrics: SummaryMetrics): string[] {
  return [
    `  Months tested:         ${metrics.months}`,
    `  Win rate:              ${metrics.winRatePercent.toFixed(1)}%`,
    `  Buy & Hold stock P&L:  ${formatUsd(metrics.totalStockPl)}`,
    `  Hedge net P&L:         ${formatUsd(metrics.totalHedgePl)}`,
    `  Strategy final P&L:    ${formatUsd(metrics.totalStrategyPl)}`,
    `  Hedge vs stock:        ${metrics.hedgePctOfStock.toFixed(1)}%`,
    `  Max drawdown:          ${formatUsd(metrics.maxDrawdown)}`,
    `  Monthly volatility:    ${formatUsd(metrics.monthlyVolatility)}`,
  ];
}

/**
 * Format a comparison: table, best risk-adjusted strategy, bar charts for
 * final P&L, max drawdown and volatility, and the strategies that dropped out.
 */
export function formatComparisonReport(ticker: string, shares: number, outcome: ComparisonOutcome): string {
  const lines: string[] = [];

  lines.push('');
  lines.push(RULE);
  lines.push('       STRATEGY COMPARISON');
  lines.push(RULE);
  lines.push('');
  lines.push(`  Ticker:       ${ticker}`);
  lines.push(`  Shares:       ${shares}`);
  lines.push('');

  if (outcome.rows.length === 0) {
    lines.push('  No strategy results returned.');
  } else {
    lines.push('--- Multi-Strategy Comparison ---');
    lines.push(
      padRight('Strategy', 18) +
        padLeft('Final P&L', 12) +
        padLeft('B&H P&L', 12) +
        padLeft('Hedge P&L', 12) +
        padLeft('Win %', 8) +
        padLeft('Max DD', 12) +
        padLeft('Volatility', 12) +
        padLeft('Risk-Adj', 10),
    );
    lines.push('-'.repeat(96));
    for (const row of outcome.rows) {
      lines.push(
        padRight(row.label, 18) +
          padLeft(formatUsd(row.finalPnl), 12) +
          padLeft(formatUsd(row.buyHoldPnl), 12) +
          padLeft(formatUsd(row.hedgePnl), 12) +
          padLeft(row.winRatePercent.toFixed(1), 8) +
          padLeft(formatUsd(row.maxDrawdown), 12) +
          padLeft(formatUsd(row.volatility), 12) +
          padLeft(row.riskAdjusted.toFixed(2), 10),
      );
    }
    lines.push('');

    lines.push(`  Best risk-adjusted strategy: ${rank(outcome.rows).label}`);
    lines.push('');

    lines.push('--- Final P&L ---');
    lines.push(renderBarChart(outcome.rows.map((r) => ({ label: r.label, value: r.finalPnl }))));
    lines.push('');
    lines.push('--- Max Drawdown ---');
    lines.push(renderBarChart(outcome.rows.map((r) => ({ label: r.label, value: r.maxDrawdown }))));
    lines.push('');
    lines.push('--- Monthly Volatility ---');
    lines.push(renderBarChart(outcome.rows.map((r) => ({ label: r.label, value: r.volatility }))));
  }
  lines.push('');

  if (outcome.failures.length > 0) {
    lines.push('--- Dropped ---');
    for (const failure of outcome.failures) {
      const label = failure.strategy === 'buy_and_hold' ? 'Buy & Hold' : STRATEGY_LABELS[failure.strategy];
      lines.push(`  ${padRight(label, 18)}${failure.error.message}`);
    }
    lines.push('');
  }

  lines.push(RULE);
  lines.push('');

  return lines.join('\n');
}

/** Whole-dollar amount with thousands separators, e.g. -$1,235 */
export function formatUsd(value: number): string {
  const rounded = Math.round(Math.abs(value));
  const sign = value < 0 && rounded !== 0 ? '-' : '';
  return `${sign}$${rounded.toLocaleString('en-US')}`;
}

/** Pad a string to a fixed width (right-padded) */
export function padRight(str: string, width: number): string {
  return str.length >= width ? str : str + ' '.repeat(width - str.length);
}

/** Pad a string to a fixed width (left-padded) */
export function padLeft(str: string, width: number): string {
  return str.length >= width ? str : ' '.repeat(width - str.length) + str;
}

/**
 * Horizontal bars scaled to the largest absolute value.
 * Positive values draw with '█', negative ones with '░'.
 */
export function renderBarChart(items: BarItem[], width = BAR_WIDTH): string {
  if (items.length === 0) return '  (no data)';

  const maxAbs = Math.max(...items.map((i) => Math.abs(i.value)));
  const labelWidth = Math.max(...items.map((i) => i.label.length)) + 1;

  return items
    .map((item) => {
      const length = maxAbs > 0 ? Math.round((Math.abs(item.value) / maxAbs) * width) : 0;
      const bar = (item.value < 0 ? '░' : '█').repeat(length);
      return `  ${padRight(item.label, labelWidth)}|${bar} ${formatUsd(item.value)}`;
    })
    .join('\n');
}

function formatCell(value: unknown): string {
  if (value === undefined || value === null) return '-';
  if (typeof value === 'number') return Number.isInteger(value) ? String(value) : value.toFixed(2);
  if (typeof value === 'string') return value;
  return JSON.stringify(value);
}

/** Monthly table; columns in first-seen order across all months */
export function renderTable(results: MonthlyResult[]): string {
  if (results.length === 0) return '  (no months)';

  const columns: string[] = [];
  for (const month of results) {
    for (const key of Object.keys(month)) {
      if (!columns.includes(key)) columns.push(key);
    }
  }

  const cells = results.map((month) => columns.map((c) => formatCell(month[c])));
  const widths = columns.map((c, i) => Math.max(c.length, ...cells.map((row) => row[i].length)) + 2);

  const lines: string[] = [];
  lines.push(columns.map((c, i) => padLeft(c, widths[i])).join(''));
  lines.push('-'.repeat(widths.reduce((sum, w) => sum + w, 0)));
  for (const row of cells) {
    lines.push(row.map((cell, i) => padLeft(cell, widths[i])).join(''));
  }
  return lines.join('\n');
}

/**
 * Render two cumulative series on one ASCII grid: 'S' strategy, 'B' buy & hold,
 * '*' where they share a cell.
 */
export function renderCumulativeChart(strategy: number[], stock: number[]): string {
  const HEIGHT = 10;
  const WIDTH = 60;

  const sampledStrategy = resample(strategy, WIDTH);
  const sampledStock = resample(stock, WIDTH);
  const columns = Math.max(sampledStrategy.length, sampledStock.length);
  if (columns === 0) return '  (no months)';

  const all = [...sampledStrategy, ...sampledStock];
  const maxVal = Math.max(...all, 0);
  const minVal = Math.min(...all, 0);
  const range = maxVal - minVal || 1;

  const grid: string[][] = [];
  for (let row = 0; row < HEIGHT; row++) {
    grid.push(new Array<string>(columns).fill(' '));
  }

  const plot = (series: number[], mark: string): void => {
    for (let col = 0; col < series.length; col++) {
      const normalized = (series[col] - minVal) / range;
      const row = HEIGHT - 1 - Math.round(normalized * (HEIGHT - 1));
      grid[row][col] = grid[row][col] === ' ' ? mark : '*';
    }
  };
  plot(sampledStock, 'B');
  plot(sampledStrategy, 'S');

  const lines: string[] = [];
  for (let row = 0; row < HEIGHT; row++) {
    const yValue = maxVal - (row / (HEIGHT - 1)) * range;
    lines.push(`  ${padLeft(formatUsd(yValue), 10)} |${grid[row].join('')}`);
  }
  lines.push(`  ${padLeft('', 10)} +${'─'.repeat(columns)}`);
  lines.push(`  ${padLeft('', 10)}  S = strategy  B = buy & hold  * = both`);

  return lines.join('\n');
}

/** Downsample to at most `width` points, keeping first and last */
function resample(values: number[], width: number): number[] {
  if (values.length <= width) return [...values];

  const sampled: number[] = [];
  for (let i = 0; i < width; i++) {
    const idx = Math.round((i / (width - 1)) * (values.length - 1));
    sampled.push(values[idx]);
  }
  return sampled;
}
