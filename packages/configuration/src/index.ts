export { ConfigManager, ConfigValidationError, type ConfigOptions } from './manager.js';
export { ConfigUtils, TIME, type TimeUnit } from './utils.js';
export {
  LoggingConfigSchema,
  RetryPolicySchema,
  RetryRoundsConfigSchema,
  type LoggingConfig,
  type RetryPolicy,
  type RetryRoundsConfig,
} from './schemas.js';
