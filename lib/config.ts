/**
 * Study Planner - Server-Side Configuration Loader
 *
 * Reads storage locations and profile seed values from the environment.
 * This module must ONLY be imported in server-side code.
 */

import { resolve } from 'path';
import { ensureServerOnly } from './server-only-guard';
import { isIsoDate } from './dates';

// Prevent client-side imports
ensureServerOnly('lib/config');

type ConfigError = {
  field: string;
  message: string;
};

/**
 * Get optional environment variable
 */
function optEnv(key: string): string | undefined {
  const value = process.env[key];
  return value && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Typed configuration object
 */
export type AppConfig = {
  storage: {
    dbPath: string;
    migrationsPath: string;
  };
  profileDefaults: {
    heightM: number;
    birthdate: string;
  };
};

export const DEFAULT_HEIGHT_M = 1.71;
export const DEFAULT_BIRTHDATE = '1999-06-19';

/**
 * Load and validate application configuration
 *
 * @throws {Error} If any variable is set to an invalid value
 */
export function getConfig(): AppConfig {
  const errors: ConfigError[] = [];

  const storage = {
    dbPath: optEnv('PLANNER_DB_PATH') ?? resolve(process.cwd(), '.data', 'planner.db'),
    migrationsPath: optEnv('PLANNER_MIGRATIONS_PATH') ?? resolve(process.cwd(), 'migrations'),
  };

  let heightM = DEFAULT_HEIGHT_M;
  const rawHeight = optEnv('PLANNER_DEFAULT_HEIGHT_M');
  if (rawHeight !== undefined) {
    heightM = Number(rawHeight);
    if (!Number.isFinite(heightM) || heightM <= 0) {
      errors.push({
        field: 'PLANNER_DEFAULT_HEIGHT_M',
        message: `must be a positive number in meters (got "${rawHeight}")`,
      });
    }
  }

  const birthdate = optEnv('PLANNER_DEFAULT_BIRTHDATE') ?? DEFAULT_BIRTHDATE;
  if (!isIsoDate(birthdate)) {
    errors.push({
      field: 'PLANNER_DEFAULT_BIRTHDATE',
      message: `must be a YYYY-MM-DD date (got "${birthdate}")`,
    });
  }

  // If there are any validation errors, throw with all details
  if (errors.length > 0) {
    const errorMessages = errors.map(e => `  - ${e.field}: ${e.message}`).join('\n');
    throw new Error(
      `Configuration validation failed:\n${errorMessages}\n\n` +
      `Please check your .env.local file or environment variables.`
    );
  }

  return {
    storage,
    profileDefaults: { heightM, birthdate },
  };
}

/**
 * Cached configuration instance
 * Loaded once on server startup
 */
let cachedConfig: AppConfig | null = null;

/**
 * Get cached configuration or load if not cached
 */
export function cfg(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = getConfig();
  }
  return cachedConfig;
}

/**
 * Reset cached configuration (primarily for testing)
 */
export function resetConfigCache(): void {
  cachedConfig = null;
}
