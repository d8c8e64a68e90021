// Runtime configuration from environment variables (+ optional .env.local)

import { existsSync, readFileSync } from 'fs';

export const DEFAULT_API_URL = 'http://localhost:8000/backtest_mvp';
export const DEFAULT_TIMEOUT_MS = 60_000;

export interface ServiceConfig {
  /** Full URL of the backtest endpoint (POST) */
  apiUrl: string;
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
}

/**
 * Load KEY=value lines from an env file into process.env.
 * Variables that are already set win. Returns the number of keys applied.
 */
export function loadEnv(path = '.env.local'): number {
  if (!existsSync(path)) return 0;

  let applied = 0;
  const envContent = readFileSync(path, 'utf-8');
  for (const line of envContent.split('\n')) {
    const match = line.match(/^([A-Z_][A-Z0-9_]*)=(.+)$/);
    if (match && !process.env[match[1]]) {
      process.env[match[1]] = match[2].trim();
      applied++;
    }
  }
  return applied;
}

export function getServiceConfig(): ServiceConfig {
  const apiUrl = process.env.BACKTEST_API_URL?.trim() || DEFAULT_API_URL;
  const rawTimeout = Number(process.env.BACKTEST_TIMEOUT_MS?.trim());
  const timeoutMs = Number.isFinite(rawTimeout) && rawTimeout > 0 ? rawTimeout : DEFAULT_TIMEOUT_MS;
  return { apiUrl, timeoutMs };
}
