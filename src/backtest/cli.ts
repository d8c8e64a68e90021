/* eslint-disable no-console */
// Backtest CLI — entry point for `npm run backtest`

import { enableFileLogging } from '../lib/logger';
import { getServiceConfig, loadEnv } from '../lib/config';
import { toValidationError, validateBacktestRequest, validateCompareRequest } from '../lib/validation';
import { createBacktestClient } from '../services/backtest-service';
import { USAGE, parseCliArgs } from './args';
import { compareAll } from './compare';
import { isBacktestError } from './errors';
import { formatComparisonReport, formatRunReport } from './reporter';
import { STRATEGY_LABELS } from './strategies';

// ─── Main ─────────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const options = parseCliArgs(process.argv.slice(2));

  if (options.help) {
    console.log(USAGE);
    return;
  }

  loadEnv();

  // JSON log lines share stdout with the report; keep them quiet unless asked
  if (options.verbose) {
    process.env.LOG_LEVEL = 'debug';
  } else if (!process.env.LOG_LEVEL) {
    process.env.LOG_LEVEL = 'warn';
  }
  if (options.logFile) {
    console.log(`Logging to ${enableFileLogging('logs', 'backtest')}`);
  }

  const config = getServiceConfig();
  const client = createBacktestClient(config);

  if (options.compare) {
    const validation = validateCompareRequest(options.body);
    if (!validation.valid || !validation.value) {
      throw toValidationError(validation.errors);
    }
    const { ticker, shares, params, parallel } = validation.value;

    console.log(`Running all strategies for ${ticker} (${shares} shares) against ${config.apiUrl}...`);
    const outcome = await compareAll(client, ticker, shares, params, { parallel });
    console.log(formatComparisonReport(ticker, shares, outcome));

    if (outcome.rows.length === 0) {
      process.exit(1);
    }
    return;
  }

  const validation = validateBacktestRequest(options.body);
  if (!validation.valid || !validation.value) {
    throw toValidationError(validation.errors);
  }
  const request = validation.value;

  console.log(
    `Running ${STRATEGY_LABELS[request.strategy]} backtest for ${request.ticker} (${request.shares} shares)...`,
  );
  const result = await client.submit(request);

  if (!result.ok) {
    console.error(result.error.message);
    process.exit(1);
  }

  console.log(`✅ ${result.data.status}`);
  console.log(formatRunReport(request, result.data));
}

main().catch((err: unknown) => {
  if (isBacktestError(err) && err.kind === 'validation') {
    console.error(`Invalid request: ${err.message}`);
    console.error('');
    console.error(USAGE);
  } else {
    console.error('Fatal error:', err instanceof Error ? err.message : err);
  }
  process.exit(1);
});
