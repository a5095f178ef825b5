/**
 * Environment variable handling
 * The sheet id and gog account are never logged or exposed
 */

import { isAbsolute, join } from 'path';

export interface EnvConfig {
  sheetId: string;
  sheetRange: string;
  gogAccount: string;
  cacheDurationSeconds: number;
  dataDir: string;
  logLevel: 'debug' | 'info' | 'warn' | 'error' | 'silent';
  nodeEnv: 'development' | 'production' | 'test';
}

export const DEFAULT_SHEET_RANGE = "'Main'!A1:W50";
export const DEFAULT_CACHE_DURATION_SECONDS = 300;

function getEnvVar(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

function parseCacheDuration(raw: string | undefined): number {
  if (raw === undefined) return DEFAULT_CACHE_DURATION_SECONDS;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : DEFAULT_CACHE_DURATION_SECONDS;
}

function resolveDataDir(raw: string | undefined): string {
  if (!raw) return join(process.cwd(), 'data');
  return isAbsolute(raw) ? raw : join(process.cwd(), raw);
}

function isLogLevel(value: string): value is EnvConfig['logLevel'] {
  return ['debug', 'info', 'warn', 'error', 'silent'].includes(value);
}

function isNodeEnv(value: string): value is EnvConfig['nodeEnv'] {
  return ['development', 'production', 'test'].includes(value);
}

export function loadEnvConfig(): EnvConfig {
  const logLevelRaw = getEnvVar('LOG_LEVEL') ?? 'info';
  const nodeEnvRaw = getEnvVar('NODE_ENV') ?? 'development';

  return {
    sheetId: getEnvVar('GOOGLE_SHEET_ID') ?? '',
    sheetRange: getEnvVar('SHEET_RANGE') ?? DEFAULT_SHEET_RANGE,
    gogAccount: getEnvVar('GOG_ACCOUNT') ?? '',
    cacheDurationSeconds: parseCacheDuration(getEnvVar('CACHE_DURATION')),
    dataDir: resolveDataDir(getEnvVar('DATA_DIR')),
    logLevel: isLogLevel(logLevelRaw) ? logLevelRaw : 'info',
    nodeEnv: isNodeEnv(nodeEnvRaw) ? nodeEnvRaw : 'development',
  };
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}

export function resetEnvConfig(): void {
  cachedConfig = null;
}
