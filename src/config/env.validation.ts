import { plainToInstance } from 'class-transformer';
import { IsIn, IsInt, IsISO4217CurrencyCode, IsOptional, IsPositive, Max, Min, validateSync } from 'class-validator';

export const LOG_LEVELS = ['error', 'warn', 'log', 'debug', 'verbose'] as const;
export type LogLevelName = (typeof LOG_LEVELS)[number];

// Environment contract, checked once at start-up.
export class EnvironmentVariables {
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 3000;

  @IsOptional()
  @IsISO4217CurrencyCode()
  BASE_CURRENCY: string = 'USD';

  @IsOptional()
  @IsIn(LOG_LEVELS)
  LOG_LEVEL: LogLevelName = 'log';

  @IsOptional()
  @IsInt()
  @IsPositive()
  MAX_HISTORY_DAYS: number = 3660;
}

/**
 * Validates raw env for ConfigModule.forRoot({ validate }).
 * Throws listing every invalid variable.
 */
export function validateEnv(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment configuration - ${details}`);
  }
  return validated;
}
