/**
 * Configuration schemas for loggers and retry policies
 */

import { LOG_FORMATS, LOG_LEVELS } from '@retry-rounds/logging';
import { z } from 'zod';

import { ConfigUtils } from './utils.js';

/**
 * Standard logging configuration schema
 */
export const LoggingConfigSchema = z.object({
  /** Log level */
  level: z.enum(LOG_LEVELS).default('INFO'),
  /** Log file path (optional for console-only logging) */
  file: z.string().min(1).optional(),
  /** Log format */
  format: z.enum(LOG_FORMATS).default('text'),
  /** Whether to colorize console output; defaults to on for text output */
  colors: z.boolean().optional(),
  /** Log file size in bytes before rotation */
  max_size: z.number().int().positive().optional(),
  /** Number of rotated files to keep */
  backup_count: z.number().int().min(1).optional(),
});

/**
 * Retry policy: delay schedule and overall time budget
 */
export const RetryPolicySchema = z.object({
  /** Delays between rounds; the last one repeats once the list runs out */
  delays: z
    .array(ConfigUtils.durationTransformer())
    .min(1, 'At least one delay is required')
    .default(['0s', '1s', '1s', '4s', '16s', '64s']),
  /** Overall budget for all rounds together; 0 means a single attempt */
  timeout: ConfigUtils.durationTransformer().default('5m'),
});

export const RetryRoundsConfigSchema = z.object({
  logging: LoggingConfigSchema.default({}),
  retry: RetryPolicySchema.default({}),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type RetryPolicy = z.infer<typeof RetryPolicySchema>;
export type RetryRoundsConfig = z.infer<typeof RetryRoundsConfigSchema>;
