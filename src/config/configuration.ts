import { ConfigType, registerAs } from '@nestjs/config';
import { LOG_LEVELS, LogLevelName } from './env.validation';

function readLogLevel(value: string | undefined): LogLevelName {
  return LOG_LEVELS.find((level) => level === value) ?? 'log';
}

export const appConfig = registerAs('app', () => ({
  port: Number(process.env.PORT ?? 3000),
  logLevel: readLogLevel(process.env.LOG_LEVEL),
}));

// Valuation settings shared by every portfolio query.
export const portfolioConfig = registerAs('portfolio', () => ({
  baseCurrency: (process.env.BASE_CURRENCY ?? 'USD').toUpperCase(),
  maxHistoryDays: Number(process.env.MAX_HISTORY_DAYS ?? 3660),
}));

export type PortfolioConfig = ConfigType<typeof portfolioConfig>;
