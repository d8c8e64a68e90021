// Backtest error kinds

/**
 * - `transport`: non-2xx status, network failure or timeout (`status` is null for the last two)
 * - `malformed`: 2xx response without usable results or summary
 * - `empty_ranking`: rank() called with no rows
 * - `validation`: rejected user input
 */
export type BacktestErrorKind = 'transport' | 'malformed' | 'empty_ranking' | 'validation';

export class BacktestError extends Error {
  readonly kind: BacktestErrorKind;
  /** HTTP status from the backtest service, when there was one */
  readonly status: number | null;
  /** Raw response body (or transport error message) */
  readonly body: string | null;

  constructor(kind: BacktestErrorKind, message: string, options: { status?: number | null; body?: string | null } = {}) {
    super(message);
    this.name = 'BacktestError';
    this.kind = kind;
    this.status = options.status ?? null;
    this.body = options.body ?? null;
  }
}

export function isBacktestError(err: unknown): err is BacktestError {
  return err instanceof BacktestError;
}
