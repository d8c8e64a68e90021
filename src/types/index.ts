// Hedge Backtester - Shared Type Definitions

import type { BacktestErrorKind } from '../backtest/errors';
import type { ComparisonKey, ComparisonRow, StrategyRequest, SummaryMetrics } from '../backtest/types';
import type { MonthlyResult } from '../services/backtest-service/types';

/**
 * Validation Error
 */
export interface ValidationError {
  field: string;
  message: string;
}

/**
 * Result of validating untrusted input (API body, CLI flags)
 */
export interface ValidationResult<T> {
  valid: boolean;
  errors?: ValidationError[];
  value?: T;
}

/**
 * Error response returned by the API handlers
 */
export interface ApiErrorResponse {
  success: false;
  error: string;
  /** Upstream HTTP status when the backtest service rejected the call */
  status?: number | null;
  details?: string | ValidationError[];
}

/**
 * Logger levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log entry structure
 */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
}

/**
 * Successful single-run response of POST /api/backtest
 */
export interface BacktestApiResponse {
  success: true;
  status: string;
  request: StrategyRequest;
  results: MonthlyResult[];
  summary: SummaryMetrics;
  /** Whether the summary came from the service or was reduced locally */
  summarySource: 'service' | 'client';
}

/**
 * Strategy dropped from a comparison, as reported over HTTP
 */
export interface ComparisonFailureDto {
  strategy: ComparisonKey;
  kind: BacktestErrorKind;
  status: number | null;
  message: string;
}

/**
 * Successful response of POST /api/compare
 */
export interface CompareApiResponse {
  success: true;
  ticker: string;
  shares: number;
  rows: ComparisonRow[];
  failures: ComparisonFailureDto[];
  best: ComparisonRow;
}
