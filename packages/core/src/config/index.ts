/**
 * fxlog Configuration Module
 *
 * Centralizes writer defaults read from environment variables
 * with validation and defaults.
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

/**
 * Accepts the usual spellings of a boolean flag
 */
const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1');

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  /** Redraw interval for async writers in milliseconds (10ms - 10s) */
  updateIntervalMs: z.coerce.number().int().min(10).max(10000).default(100),
  /** Redraw bars from a timer instead of on every update */
  async: booleanFlag.default('false'),
  /** Level name coloring: auto follows TTY detection */
  color: z.enum(['auto', 'always', 'never']).default('auto'),
  /** Line width used when the destination does not report one */
  fallbackColumns: z.coerce.number().int().min(20).max(1000).default(80),
});

export type FxlogConfig = z.infer<typeof configSchema>;

/**
 * FXLOG_COLOR wins; otherwise NO_COLOR and FORCE_COLOR override automatic detection
 */
function resolveColorSetting(): string | undefined {
  const color = process.env.FXLOG_COLOR;
  if (color !== undefined && color !== 'auto') {
    return color;
  }
  if (process.env.NO_COLOR !== undefined) {
    return 'never';
  }
  if (process.env.FORCE_COLOR !== undefined) {
    return 'always';
  }
  return color;
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): FxlogConfig {
  const raw = {
    updateIntervalMs: process.env.FXLOG_UPDATE_INTERVAL_MS,
    async: process.env.FXLOG_ASYNC,
    color: resolveColorSetting(),
    fallbackColumns: process.env.FXLOG_FALLBACK_COLUMNS,
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    log.error({ errors: result.error.errors }, 'Invalid configuration');
    throw new Error(`Configuration validation failed: ${result.error.message}`);
  }

  log.debug(
    {
      updateIntervalMs: result.data.updateIntervalMs,
      async: result.data.async,
      color: result.data.color,
      fallbackColumns: result.data.fallbackColumns,
    },
    'Configuration loaded'
  );

  return result.data;
}

/**
 * Singleton configuration instance
 */
let configInstance: FxlogConfig | null = null;

/**
 * Get the configuration singleton
 */
export function getConfig(): FxlogConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
