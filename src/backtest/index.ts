// Backtest module — barrel export

export {
  cumulative,
  fromServiceSummary,
  maxDrawdown,
  mean,
  riskAdjusted,
  sampleStdDev,
  summarize,
  winRatePercent,
} from './analytics';
export { buyAndHoldRow, compareAll, rank, strategyRow } from './compare';
export { BacktestError, isBacktestError } from './errors';
export { formatComparisonReport, formatRunReport } from './reporter';
export {
  STRATEGY_DEFAULTS,
  STRATEGY_LABELS,
  STRATEGY_NAMES,
  buildStrategyRequest,
  contractsToShares,
  toPayload,
} from './strategies';
export type { BacktestErrorKind } from './errors';
export type {
  CompareOptions,
  ComparisonOutcome,
  ComparisonRow,
  StrategyFailure,
  StrategyName,
  StrategyParams,
  StrategyRequest,
  SummaryMetrics,
} from './types';
