import type { VercelRequest, VercelResponse } from '@vercel/node';
import { logger } from '../src/lib/logger';
import { parseJsonBody, validateCompareRequest } from '../src/lib/validation';
import { createBacktestClient } from '../src/services/backtest-service';
import { compareAll, rank } from '../src/backtest';
import type { ApiErrorResponse, CompareApiResponse } from '../src/types';

/**
 * POST /api/compare — run buy & hold plus every strategy and rank them by
 * risk-adjusted return. Strategies that fail are listed in `failures`.
 */
export default async function handler(req: VercelRequest, res: VercelResponse): Promise<void> {
  if (req.method !== 'POST') {
    const response: ApiErrorResponse = {
      success: false,
      error: 'Method not allowed',
      details: 'Only POST requests are accepted',
    };
    res.status(405).json(response);
    return;
  }

  const validation = validateCompareRequest(parseJsonBody(req.body));
  if (!validation.valid || !validation.value) {
    logger.warn('Compare request rejected', { errors: validation.errors });
    const response: ApiErrorResponse = {
      success: false,
      error: 'Validation failed',
      details: validation.errors,
    };
    res.status(400).json(response);
    return;
  }

  const { ticker, shares, params, parallel } = validation.value;

  try {
    const outcome = await compareAll(createBacktestClient(), ticker, shares, params, { parallel });
    const failures = outcome.failures.map((f) => ({
      strategy: f.strategy,
      kind: f.error.kind,
      status: f.error.status,
      message: f.error.message,
    }));

    if (outcome.rows.length === 0) {
      res.status(502).json({
        success: false,
        error: 'No strategy results returned.',
        details: failures.map((f) => `${f.strategy}: ${f.message}`).join('; '),
      });
      return;
    }

    const response: CompareApiResponse = {
      success: true,
      ticker,
      shares,
      rows: outcome.rows,
      failures,
      best: rank(outcome.rows),
    };
    res.status(200).json(response);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    logger.error('Compare handler failed', { error: message });
    res.status(500).json({ success: false, error: 'Internal server error', details: message });
  }
}
