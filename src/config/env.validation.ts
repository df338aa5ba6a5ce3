import { Type, plainToInstance } from 'class-transformer';
import { IsBooleanString, IsIn, IsInt, IsOptional, Matches, Max, Min, validateSync } from 'class-validator';

// Environment accepted at startup. Every variable is optional.
export class EnvironmentVariables {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @IsIn(['error', 'warn', 'log', 'debug', 'verbose'])
  LOG_LEVEL?: string;

  @IsOptional()
  @IsBooleanString()
  LEDGER_INCLUDE_FEES_IN_COST?: string;

  @IsOptional()
  @Matches(/^\s*([A-Za-z0-9]+\s*(,\s*[A-Za-z0-9]+\s*)*)?$/, {
    message: 'LEDGER_QUOTE_FILTER must be a comma-separated list of currency codes',
  })
  LEDGER_QUOTE_FILTER?: string;

  @IsOptional()
  @IsBooleanString()
  LEDGER_USE_MIDPRICE?: string;
}

/**
 * Validates process environment for ConfigModule.
 * @throws Error listing every invalid variable
 */
export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config);
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .flatMap((error) => Object.values(error.constraints ?? {}))
      .map((message) => `  - ${message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${details}`);
  }
  return validated;
}
