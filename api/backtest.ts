import type { VercelRequest, VercelResponse } from '@vercel/node';
import { logger } from '../src/lib/logger';
import { parseJsonBody, validateBacktestRequest } from '../src/lib/validation';
import { createBacktestClient } from '../src/services/backtest-service';
import { fromServiceSummary, summarize } from '../src/backtest';
import type { ApiErrorResponse, BacktestApiResponse } from '../src/types';

/**
 * POST /api/backtest — run one strategy through the backtest service.
 *
 * When the service omits its summary, one is reduced from the monthly
 * `total_pnl` column so callers always get the same shape back.
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

  const validation = validateBacktestRequest(parseJsonBody(req.body));
  if (!validation.valid || !validation.value) {
    logger.warn('Backtest request rejected', { errors: validation.errors });
    const response: ApiErrorResponse = {
      success: false,
      error: 'Validation failed',
      details: validation.errors,
    };
    res.status(400).json(response);
    return;
  }

  const request = validation.value;

  try {
    const result = await createBacktestClient().submit(request);

    if (!result.ok) {
      const { error } = result;
      const response: ApiErrorResponse =
        error.kind === 'transport'
          ? { success: false, error: 'Backtest service error', status: error.status, details: error.body ?? error.message }
          : { success: false, error: error.message, status: error.status };
      res.status(502).json(response);
      return;
    }

    const { data } = result;
    const response: BacktestApiResponse = {
      success: true,
      status: data.status,
      request,
      results: data.results,
      summary: data.summary ? fromServiceSummary(data.summary) : summarize(data.results, 'total_pnl'),
      summarySource: data.summary ? 'service' : 'client',
    };
    res.status(200).json(response);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    logger.error('Backtest handler failed', { error: message });
    res.status(500).json({ success: false, error: 'Internal server error', details: message });
  }
}
