// Strategy catalogue: defaults, parameter ranges, request building and wire encoding

import type { BacktestPayload, WireStrategyName } from '../services/backtest-service/types';
import type { StrategyName, StrategyParams, StrategyRequest } from './types';

/** Fixed order used by comparisons and listings */
export const STRATEGY_NAMES: readonly StrategyName[] = [
  'atm_puts',
  'otm_puts',
  'put_spread',
  'collar',
  'zero_cost_collar',
];

export const STRATEGY_LABELS: Record<StrategyName, string> = {
  atm_puts: 'ATM Puts',
  otm_puts: 'OTM Puts',
  put_spread: 'Put Spread',
  collar: 'Collar',
  zero_cost_collar: 'Zero-Cost Collar',
};

export const SHARES_PER_CONTRACT = 100;

/** Applied at request-building time when the caller leaves a parameter unset */
export const STRATEGY_DEFAULTS = {
  otmPercent: 5,
  spreadWidthPercent: 5,
  upsideCapPercent: 10,
  coverageRatio: 1.0,
} as const satisfies Required<StrategyParams>;

export interface ParamSpec {
  /** Strategy the parameter belongs to */
  strategy: StrategyName;
  min: number;
  max: number;
  /** Human-readable name for reports and validation messages */
  description: string;
}

export const PARAM_KEYS: readonly (keyof StrategyParams)[] = [
  'otmPercent',
  'spreadWidthPercent',
  'upsideCapPercent',
  'coverageRatio',
];

export const PARAM_SPECS: Record<keyof StrategyParams, ParamSpec> = {
  otmPercent: { strategy: 'otm_puts', min: 1, max: 15, description: 'OTM % for puts' },
  spreadWidthPercent: { strategy: 'put_spread', min: 1, max: 15, description: 'Put spread width %' },
  upsideCapPercent: { strategy: 'collar', min: 2, max: 25, description: 'Upside cap %' },
  coverageRatio: { strategy: 'zero_cost_collar', min: 0.5, max: 1.2, description: 'Coverage ratio' },
};

export function isStrategyName(value: unknown): value is StrategyName {
  return typeof value === 'string' && STRATEGY_NAMES.some((name) => name === value);
}

export function contractsToShares(contracts: number): number {
  return contracts * SHARES_PER_CONTRACT;
}

/**
 * Resolve a request for one strategy. Only the strategy's own parameter is
 * kept; overrides meant for other strategies are ignored.
 */
export function buildStrategyRequest(
  ticker: string,
  shares: number,
  strategy: StrategyName,
  params: StrategyParams = {},
): StrategyRequest {
  const base = { ticker: ticker.trim().toUpperCase(), shares };

  switch (strategy) {
    case 'atm_puts':
      return { ...base, strategy };
    case 'otm_puts':
      return { ...base, strategy, otmPercent: params.otmPercent ?? STRATEGY_DEFAULTS.otmPercent };
    case 'put_spread':
      return {
        ...base,
        strategy,
        spreadWidthPercent: params.spreadWidthPercent ?? STRATEGY_DEFAULTS.spreadWidthPercent,
      };
    case 'collar':
      return {
        ...base,
        strategy,
        upsideCapPercent: params.upsideCapPercent ?? STRATEGY_DEFAULTS.upsideCapPercent,
      };
    case 'zero_cost_collar':
      return { ...base, strategy, coverageRatio: params.coverageRatio ?? STRATEGY_DEFAULTS.coverageRatio };
  }
}

export function toWireStrategy(strategy: StrategyName): WireStrategyName {
  return `rolling_${strategy}`;
}

/** Encode a request as the service's JSON body */
export function toPayload(request: StrategyRequest): BacktestPayload {
  const payload: BacktestPayload = {
    ticker: request.ticker,
    shares: request.shares,
    strategy: toWireStrategy(request.strategy),
  };

  switch (request.strategy) {
    case 'otm_puts':
      payload.otm_percent = request.otmPercent;
      break;
    case 'put_spread':
      payload.spread_width_percent = request.spreadWidthPercent;
      break;
    case 'collar':
      payload.upside_cap_percent = request.upsideCapPercent;
      break;
    case 'zero_cost_collar':
      payload.coverage_ratio = request.coverageRatio;
      break;
    case 'atm_puts':
      break;
  }

  return payload;
}

/** Short description of the request's parameter, e.g. 'Upside cap %: 10' */
export function describeParameter(request: StrategyRequest): string | null {
  switch (request.strategy) {
    case 'atm_puts':
      return null;
    case 'otm_puts':
      return `${PARAM_SPECS.otmPercent.description}: ${request.otmPercent}`;
    case 'put_spread':
      return `${PARAM_SPECS.spreadWidthPercent.description}: ${request.spreadWidthPercent}`;
    case 'collar':
      return `${PARAM_SPECS.upsideCapPercent.description}: ${request.upsideCapPercent}`;
    case 'zero_cost_collar':
      return `${PARAM_SPECS.coverageRatio.description}: ${request.coverageRatio}`;
  }
}
