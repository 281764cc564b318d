/**
 * Environment-derived configuration.
 *
 * Reads the following environment variables:
 * - `log_level` (or `LOG_LEVEL`): root level, default `DEBUG`
 * - `boto_level` (or `AUXILIARY_LOG_LEVEL`): AWS SDK logger level, default `WARN`
 *
 * Values are not checked against the known level names here; `setup`
 * falls back to INFO for anything it cannot parse.
 *
 * @module config
 */

import { z } from 'zod';

export const DEFAULT_LEVEL = 'DEBUG';
export const DEFAULT_AUXILIARY_LEVEL = 'WARN';

const optionalValue = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const EnvironmentSchema = z.object({
  log_level: optionalValue,
  LOG_LEVEL: optionalValue,
  boto_level: optionalValue,
  AUXILIARY_LOG_LEVEL: optionalValue,
});

/**
 * Levels taken from the environment.
 */
export interface LoggingEnvironment {
  level: string;
  auxiliaryLevel: string;
}

export function configFromEnvironment(env: NodeJS.ProcessEnv = process.env): LoggingEnvironment {
  const result = EnvironmentSchema.safeParse(env);
  if (!result.success) {
    return { level: DEFAULT_LEVEL, auxiliaryLevel: DEFAULT_AUXILIARY_LEVEL };
  }

  const vars = result.data;
  return {
    level: vars.log_level ?? vars.LOG_LEVEL ?? DEFAULT_LEVEL,
    auxiliaryLevel: vars.boto_level ?? vars.AUXILIARY_LOG_LEVEL ?? DEFAULT_AUXILIARY_LEVEL,
  };
}
