import { LogLevel } from '@nestjs/common';
import { DEFAULT_CASH_SYMBOL } from '../../balances/balance-loader.service';
import { InvalidConfigError } from '../errors/rebalance.errors';

// Most to least severe; a threshold enables itself and everything before it
const LOG_LEVELS: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

export interface AppSettings {
  port: number;
  configPath: string;
  balancesPath?: string;
  balancesDir: string;
  cashSymbol: string;
  logLevel?: LogLevel;             // unset means each entry point picks its default
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Enabled levels for a threshold, e.g. `warn` -> fatal, error, warn */
export function logLevelsFrom(threshold: LogLevel): LogLevel[] {
  return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(threshold) + 1);
}

/**
 * Reads process settings from the environment (`.env` is loaded by the entry points).
 * @throws InvalidConfigError on an invalid PORT or LOG_LEVEL
 */
export function loadAppSettings(env: NodeJS.ProcessEnv = process.env): AppSettings {
  const port = Number(env.PORT ?? 3000);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new InvalidConfigError(`PORT must be a TCP port number, got "${env.PORT}"`);
  }

  let logLevel: LogLevel | undefined;
  const rawLevel = env.LOG_LEVEL?.trim().toLowerCase();
  if (rawLevel) {
    if (!isLogLevel(rawLevel)) {
      throw new InvalidConfigError(
        `LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${env.LOG_LEVEL}"`,
      );
    }
    logLevel = rawLevel;
  }

  return {
    port,
    configPath: env.REBALANCE_CONFIG || 'config.yaml',
    balancesPath: env.REBALANCE_BALANCES || undefined,
    balancesDir: env.REBALANCE_BALANCES_DIR || '.',
    cashSymbol: env.REBALANCE_CASH_SYMBOL || DEFAULT_CASH_SYMBOL,
    logLevel,
  };
}
