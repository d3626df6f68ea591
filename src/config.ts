import { DEFAULT_MAX_ATTEMPTS } from './fetch/backoff.js';
import { DEFAULT_USER_AGENT } from './fetch/fetcher.js';

export interface AppConfig {
  token: string | undefined;
  cacheDir: string;
  userAgent: string;
  maxAttempts: number;
}

export const DEFAULT_CACHE_DIR = './stargazer_cache';

/**
 * Reads settings from the environment (after dotenv has populated it).
 * Command-line flags override these in the CLI.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    token: env.GITHUB_TOKEN?.trim() || undefined,
    cacheDir: env.STARGAZER_CACHE_DIR?.trim() || DEFAULT_CACHE_DIR,
    userAgent: env.STARGAZER_USER_AGENT?.trim() || DEFAULT_USER_AGENT,
    maxAttempts: parsePositiveInteger(env.STARGAZER_MAX_ATTEMPTS, DEFAULT_MAX_ATTEMPTS, 'STARGAZER_MAX_ATTEMPTS'),
  };
}

export function requireToken(config: AppConfig): string {
  if (!config.token) {
    throw new Error('GITHUB_TOKEN is missing; set it in the environment or pass --token.');
  }
  return config.token;
}

export function parsePositiveInteger(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive number.`);
  }
  return Math.floor(parsed);
}
