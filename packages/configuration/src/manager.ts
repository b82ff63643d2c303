import { promises as fs } from 'fs';

import { ErrorCategory, RetryRoundsError, errorCode } from '@retry-rounds/errors';
import type { Logger } from '@retry-rounds/logging';
import { load as yamlLoad } from 'js-yaml';
import { z } from 'zod';

import { ConfigUtils } from './utils.js';

/**
 * Options for configuration management
 */
export interface ConfigOptions {
  /** Logger instance for configuration operations */
  logger?: Logger;
  /** Whether to substitute `${VAR:-default}` placeholders from the environment */
  enableEnvSubstitution?: boolean;
  /** Default configuration to merge under the loaded config */
  defaults?: Record<string, unknown>;
}

/**
 * Configuration validation error with detailed information
 */
export class ConfigValidationError extends RetryRoundsError {
  constructor(
    message: string,
    public readonly errors: z.ZodError
  ) {
    super(message, 'CONFIG_INVALID', ErrorCategory.CONFIGURATION, {
      issues: errors.issues.length,
    });
  }

  /**
   * Get formatted error details
   */
  getFormattedErrors(): string[] {
    return this.errors.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
  }
}

/**
 * Generic configuration manager: YAML file loading with Zod validation
 */
export class ConfigManager<T> {
  private config: T | null = null;
  private readonly logger: Logger | undefined;

  constructor(
    private readonly configPath: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    private readonly options: ConfigOptions = {}
  ) {
    this.logger = options.logger;
  }

  /**
   * Load configuration from file
   */
  async loadConfig(): Promise<T> {
    try {
      let parsedConfig: unknown = yamlLoad(await this.readConfigFile()) ?? {};

      if (this.options.enableEnvSubstitution) {
        parsedConfig = ConfigUtils.processEnvVars(parsedConfig);
      }

      if (this.options.defaults) {
        if (!ConfigUtils.isPlainObject(parsedConfig)) {
          throw new Error(`Configuration root must be a mapping: ${this.configPath}`);
        }
        parsedConfig = ConfigUtils.mergeConfigs(this.options.defaults, parsedConfig);
      }

      const data = this.validateConfig(parsedConfig);
      this.config = data;
      this.logger?.info(`Configuration loaded from: ${this.configPath}`);

      return data;
    } catch (error) {
      if (error instanceof ConfigValidationError) {
        this.logger?.error(`Configuration validation failed: ${error.message}`, undefined, {
          errors: error.getFormattedErrors(),
        });
      } else {
        this.logger?.error('Failed to load configuration', error, { path: this.configPath });
      }
      throw error;
    }
  }

  /**
   * Get current configuration (must be loaded first)
   */
  getConfig(): T {
    if (this.config === null) {
      throw new Error('Configuration not loaded. Call loadConfig() first.');
    }
    return this.config;
  }

  isLoaded(): boolean {
    return this.config !== null;
  }

  /**
   * Validate configuration without loading from file
   */
  validateConfig(config: unknown): T {
    const result = this.schema.safeParse(config);

    if (!result.success) {
      throw new ConfigValidationError(
        `Configuration validation failed for ${this.configPath}`,
        result.error
      );
    }

    return result.data;
  }

  private async readConfigFile(): Promise<string> {
    try {
      return await fs.readFile(this.configPath, 'utf8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        throw new Error(`Configuration file not found: ${this.configPath}`);
      }
      throw error;
    }
  }
}
