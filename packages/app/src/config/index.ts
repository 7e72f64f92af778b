/**
 * Configuration loading and management
 */

import { ConfigError } from '@ibhist/contracts';
import type { Logger } from '@ibhist/logger';
import { configSchema, envMapping, type Config } from './schema.js';

interface RawConfig {
  [key: string]: string | RawConfig;
}

/**
 * Load configuration from environment and defaults.
 *
 * Empty variables count as unset. The result is deep-frozen.
 *
 * @throws {ConfigError} If any value fails validation
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, logger?: Logger): Config {
  const rawConfig: RawConfig = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey]?.trim();
    if (value) {
      setNestedProperty(rawConfig, configPath, value);
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, { issues });
  }

  if (logger) {
    logger.debug('Configuration loaded', getConfigSummary(result.data));
  }

  return deepFreeze(result.data);
}

/**
 * Set nested property in object
 */
function setNestedProperty(target: RawConfig, path: string, value: string): void {
  const keys = path.split('.');
  const lastKey = keys.pop();
  if (!lastKey) return;

  let current = target;
  for (const key of keys) {
    const next = current[key];
    if (typeof next === 'object') {
      current = next;
    } else {
      const created: RawConfig = {};
      current[key] = created;
      current = created;
    }
  }

  current[lastKey] = value;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    gateway: `${config.ib.host}:${config.ib.port}`,
    clientId: config.ib.clientId,
    symbol: config.instrument.symbol,
    securityType: config.instrument.securityType,
    timeframe: config.request.timeframe,
    duration: config.request.duration,
    timezone: config.request.timezone,
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      file: config.logging.filePath ?? null,
    },
  };
}

// Re-export types
export type { Config } from './schema.js';
