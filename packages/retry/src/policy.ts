import {
  ConfigManager,
  RetryRoundsConfigSchema,
  type ConfigOptions,
  type RetryPolicy,
  type RetryRoundsConfig,
} from '@retry-rounds/configuration';
import { LoggerFactory, type Logger } from '@retry-rounds/logging';

import type { RetryOptions } from './types.js';

/**
 * Scheduler options from a validated policy. Predicate, logger and the time
 * primitives stay with the caller.
 */
export function retryOptionsFromPolicy(
  policy: RetryPolicy,
  overrides: Omit<RetryOptions, 'delaysMs' | 'timeoutMs'> = {}
): RetryOptions {
  return {
    ...overrides,
    delaysMs: [...policy.delays],
    timeoutMs: policy.timeout,
  };
}

export interface RetrySetup {
  logger: Logger;
  options: RetryOptions;
}

async function loadConfig(configPath: string, options: ConfigOptions): Promise<RetryRoundsConfig> {
  const manager = new ConfigManager(configPath, RetryRoundsConfigSchema, {
    enableEnvSubstitution: true,
    ...options,
  });

  return manager.loadConfig();
}

/**
 * Read the `retry` section of a YAML configuration file, with environment
 * variable substitution enabled
 */
export async function loadRetryPolicy(
  configPath: string,
  options: ConfigOptions = {}
): Promise<RetryPolicy> {
  const config = await loadConfig(configPath, options);
  return config.retry;
}

/**
 * Read a whole configuration file: a logger built from its `logging` section
 * and scheduler options from its `retry` section, logging through that logger
 */
export async function loadRetrySetup(
  configPath: string,
  component: string = 'retry',
  options: ConfigOptions = {}
): Promise<RetrySetup> {
  const config = await loadConfig(configPath, options);
  const logger = LoggerFactory.fromConfig(component, config.logging);

  return { logger, options: retryOptionsFromPolicy(config.retry, { logger }) };
}
