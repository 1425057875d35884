/**
 * Typed readers over process.env. Values are read on every call so tests can
 * adjust the environment between cases.
 */

export function envString(name: string, fallback: string): string {
  const raw = (process.env[name] ?? '').trim();
  return raw || fallback;
}

export function envOptional(name: string): string | undefined {
  const raw = (process.env[name] ?? '').trim();
  return raw || undefined;
}

export function envNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

export function isDevelopment(): boolean {
  const env = envOptional('NODE_ENV') ?? envOptional('FLASK_ENV');
  return env === 'development';
}

export function openAiApiKey(): string | undefined {
  return envOptional('OPENAI_API_KEY');
}

export function openAiModel(): string {
  return envString('OPENAI_MODEL', 'gpt-4-turbo-preview');
}

export function coinGeckoApiBase(): string {
  return envString(
    'COINGECKO_API_BASE',
    'https://api.coingecko.com/api/v3',
  ).replace(/\/+$/, '');
}

export interface TimeoutSettings {
  marketDataMs: number;
  apiMs: number;
}

export function timeouts(): TimeoutSettings {
  return {
    marketDataMs: envNumber('MARKET_DATA_TIMEOUT_MS', 5_000),
    apiMs: envNumber('API_TIMEOUT_MS', 10_000),
  };
}

export interface ChartSettings {
  minIntervalMs: number;
  retryDelayMs: number;
}

export function chartSettings(): ChartSettings {
  return {
    minIntervalMs: envNumber('CHART_MIN_INTERVAL_MS', 1_200),
    retryDelayMs: envNumber('CHART_RETRY_DELAY_MS', 5_000),
  };
}

const defaultAllowedOrigins = [
  'http://localhost:5173',
  'http://localhost:3000',
  'http://localhost:8000',
];

export function allowedOrigins(): string[] {
  const envAllowedOrigins = [process.env.CORS_ORIGINS, process.env.FRONTEND_URL]
    .filter(Boolean)
    .join(',')
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);

  return Array.from(new Set([...defaultAllowedOrigins, ...envAllowedOrigins]));
}
