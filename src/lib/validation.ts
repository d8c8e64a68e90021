// Request validation utilities for the API handlers and the CLI

import {
  PARAM_KEYS,
  PARAM_SPECS,
  STRATEGY_NAMES,
  buildStrategyRequest,
  contractsToShares,
  isStrategyName,
} from '../backtest/strategies';
import { BacktestError } from '../backtest/errors';
import type { StrategyParams, StrategyRequest } from '../backtest/types';
import type { ValidationError, ValidationResult } from '../types';

export const MIN_CONTRACTS = 1;
export const MAX_CONTRACTS = 10;

const TICKER_PATTERN = /^[A-Z0-9.-]{1,10}$/;

/** Validated input for a multi-strategy comparison */
export interface CompareInput {
  ticker: string;
  shares: number;
  params: StrategyParams;
  parallel: boolean;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Request bodies may arrive pre-parsed (application/json) or as raw text.
 * Unparsable text becomes undefined so validation rejects it.
 */
export function parseJsonBody(body: unknown): unknown {
  if (typeof body !== 'string') return body;
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null;
}

/**
 * Normalizes a ticker: trims and upper-cases. e.g. " spy " → "SPY"
 */
export function normalizeTicker(ticker: string): string {
  return ticker.trim().toUpperCase();
}

function validateTicker(data: Record<string, unknown>, errors: ValidationError[]): string | undefined {
  if (typeof data.ticker !== 'string' || data.ticker.trim() === '') {
    errors.push({ field: 'ticker', message: 'Ticker is required and must be a string' });
    return undefined;
  }
  const ticker = normalizeTicker(data.ticker);
  if (!TICKER_PATTERN.test(ticker)) {
    errors.push({ field: 'ticker', message: 'Ticker must be 1-10 letters, digits, dots or dashes' });
    return undefined;
  }
  return ticker;
}

/**
 * Position size comes either as `shares` or as option `contracts`
 * (1 contract = 100 shares, 1-10 contracts).
 */
function validateShares(data: Record<string, unknown>, errors: ValidationError[]): number | undefined {
  const hasShares = isPresent(data.shares);
  const hasContracts = isPresent(data.contracts);

  if (hasShares && hasContracts) {
    errors.push({ field: 'shares', message: 'Provide either shares or contracts, not both' });
    return undefined;
  }

  if (hasShares) {
    if (typeof data.shares !== 'number' || !Number.isInteger(data.shares)) {
      errors.push({ field: 'shares', message: 'Shares must be an integer' });
      return undefined;
    }
    if (data.shares <= 0) {
      errors.push({ field: 'shares', message: 'Shares must be a positive integer' });
      return undefined;
    }
    return data.shares;
  }

  if (hasContracts) {
    if (typeof data.contracts !== 'number' || !Number.isInteger(data.contracts)) {
      errors.push({ field: 'contracts', message: 'Contracts must be an integer' });
      return undefined;
    }
    if (data.contracts < MIN_CONTRACTS || data.contracts > MAX_CONTRACTS) {
      errors.push({
        field: 'contracts',
        message: `Contracts must be between ${MIN_CONTRACTS} and ${MAX_CONTRACTS}`,
      });
      return undefined;
    }
    return contractsToShares(data.contracts);
  }

  errors.push({ field: 'shares', message: 'Either shares or contracts is required' });
  return undefined;
}

function validateParams(data: Record<string, unknown>, errors: ValidationError[]): StrategyParams {
  const params: StrategyParams = {};

  for (const key of PARAM_KEYS) {
    const value = data[key];
    if (!isPresent(value)) continue;

    const spec = PARAM_SPECS[key];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      errors.push({ field: key, message: `${spec.description} must be a number` });
    } else if (value < spec.min || value > spec.max) {
      errors.push({ field: key, message: `${spec.description} must be between ${spec.min} and ${spec.max}` });
    } else {
      params[key] = value;
    }
  }

  return params;
}

/**
 * Validates a single-strategy backtest request body and resolves it into a
 * StrategyRequest with defaults applied.
 */
export function validateBacktestRequest(body: unknown): ValidationResult<StrategyRequest> {
  if (!isRecord(body)) {
    return {
      valid: false,
      errors: [{ field: 'body', message: 'Request body must be a JSON object' }],
    };
  }

  const errors: ValidationError[] = [];
  const ticker = validateTicker(body, errors);
  const shares = validateShares(body, errors);
  const params = validateParams(body, errors);
  const strategy = body.strategy;

  if (!isStrategyName(strategy)) {
    errors.push({
      field: 'strategy',
      message: `Strategy must be one of: ${STRATEGY_NAMES.join(', ')}`,
    });
  }

  if (errors.length > 0 || ticker === undefined || shares === undefined || !isStrategyName(strategy)) {
    return { valid: false, errors };
  }

  return { valid: true, value: buildStrategyRequest(ticker, shares, strategy, params) };
}

/**
 * Validates a compare-all request body. Parameter overrides are optional and
 * apply to their own strategy only.
 */
export function validateCompareRequest(body: unknown): ValidationResult<CompareInput> {
  if (!isRecord(body)) {
    return {
      valid: false,
      errors: [{ field: 'body', message: 'Request body must be a JSON object' }],
    };
  }

  const errors: ValidationError[] = [];
  const ticker = validateTicker(body, errors);
  const shares = validateShares(body, errors);
  const params = validateParams(body, errors);

  if (isPresent(body.parallel) && typeof body.parallel !== 'boolean') {
    errors.push({ field: 'parallel', message: 'Parallel must be a boolean' });
  }

  if (errors.length > 0 || ticker === undefined || shares === undefined) {
    return { valid: false, errors };
  }

  return { valid: true, value: { ticker, shares, params, parallel: body.parallel === true } };
}

/** Fold field errors into a single `validation` error */
export function toValidationError(errors: ValidationError[] = []): BacktestError {
  const message = errors.map((e) => `${e.field}: ${e.message}`).join('; ');
  return new BacktestError('validation', message || 'Invalid request');
}
