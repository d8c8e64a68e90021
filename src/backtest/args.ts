// CLI argument parsing for `npm run backtest`

export interface CliOptions {
  /** Run every strategy plus the buy-and-hold baseline */
  compare: boolean;
  parallel: boolean;
  verbose: boolean;
  logFile: boolean;
  help: boolean;
  /** Untrusted request body, checked by the validators */
  body: Record<string, unknown>;
}

export const USAGE = [
  'Usage: npm run backtest -- [--ticker SPY] [--contracts 2 | --shares 200] [--strategy atm_puts]',
  '                           [--otm-percent 5] [--spread-width 5] [--upside-cap 10] [--coverage-ratio 1.0]',
  '                           [--compare] [--parallel] [--verbose] [--log-file]',
  '  --strategy        atm_puts | otm_puts | put_spread | collar | zero_cost_collar (default: atm_puts)',
  '  --contracts       Option contracts to hedge, 1 contract = 100 shares (default: 2)',
  '  --shares          Share count instead of contracts',
  '  --compare         Compare all strategies against buy & hold, ranked by risk-adjusted return',
  '  --parallel        Issue the comparison requests concurrently',
  '  --log-file        Also write logs to logs/backtest-<timestamp>.log',
].join('\n');

const NUMERIC_FLAGS: ReadonlyArray<[flag: string, field: string]> = [
  ['--otm-percent', 'otmPercent'],
  ['--spread-width', 'spreadWidthPercent'],
  ['--upside-cap', 'upsideCapPercent'],
  ['--coverage-ratio', 'coverageRatio'],
];

export function getArg(argv: string[], flag: string): string | undefined {
  const idx = argv.indexOf(flag);
  if (idx === -1 || idx + 1 >= argv.length) return undefined;
  const value = argv[idx + 1];
  return value.startsWith('--') ? undefined : value;
}

/** Non-numeric values come through as NaN so validation can reject them. */
function toNumber(raw: string): number {
  return raw.trim() === '' ? NaN : Number(raw);
}

export function parseCliArgs(argv: string[]): CliOptions {
  const body: Record<string, unknown> = {
    ticker: getArg(argv, '--ticker') ?? 'SPY',
    strategy: getArg(argv, '--strategy') ?? 'atm_puts',
  };

  const shares = getArg(argv, '--shares');
  const contracts = getArg(argv, '--contracts');
  if (shares !== undefined) {
    body.shares = toNumber(shares);
  }
  if (contracts !== undefined || shares === undefined) {
    body.contracts = toNumber(contracts ?? '2');
  }

  for (const [flag, field] of NUMERIC_FLAGS) {
    const raw = getArg(argv, flag);
    if (raw !== undefined) {
      body[field] = toNumber(raw);
    }
  }

  const compare = argv.includes('--compare');
  const parallel = argv.includes('--parallel');
  if (compare) {
    body.parallel = parallel;
  }

  return {
    compare,
    parallel,
    verbose: argv.includes('--verbose'),
    logFile: argv.includes('--log-file'),
    help: argv.includes('--help') || argv.includes('-h'),
    body,
  };
}
