// Backtest service — barrel export

export { BacktestServiceClient, createBacktestClient, parseBacktestResponse } from './client';
export type {
  BacktestClientConfig,
  BacktestPayload,
  BacktestResponse,
  MonthlyResult,
  ServiceSummary,
  SubmitResult,
  WireStrategyName,
} from './types';
