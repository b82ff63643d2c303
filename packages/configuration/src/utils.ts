/**
 * Configuration utilities for parsing, transformation, and standardization
 */

import { describeError } from '@retry-rounds/errors';
import { z } from 'zod';

/**
 * Time units and their millisecond multipliers
 */
const TIME_UNITS = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
} as const;

export type TimeUnit = keyof typeof TIME_UNITS;

/**
 * Readable time constants for use in configuration defaults
 */
export const TIME = {
  MILLISECOND: TIME_UNITS.ms,
  SECOND: TIME_UNITS.s,
  MINUTE: TIME_UNITS.m,
  HOUR: TIME_UNITS.h,
  DAY: TIME_UNITS.d,
} as const;

const isTimeUnit = (value: string): value is TimeUnit => Object.hasOwn(TIME_UNITS, value);

const DURATION_FORMAT = /^(?:\d+(?:\.\d+)?\s*[a-z]+\s*)+$/;

/**
 * Configuration parsing and transformation utilities
 */
export class ConfigUtils {
  /**
   * Parse duration string to milliseconds
   * @param duration Duration string like "5m", "1m30s", "250ms"; bare numbers are milliseconds
   */
  static parseDuration(duration: string | number): number {
    if (typeof duration === 'number') {
      if (!Number.isFinite(duration) || duration < 0) {
        throw new Error(`Invalid duration value: ${duration}`);
      }
      return duration;
    }

    const durationStr = duration.trim().toLowerCase();

    if (/^\d+$/.test(durationStr)) {
      return parseInt(durationStr, 10);
    }

    if (!DURATION_FORMAT.test(durationStr)) {
      throw new Error(
        `Invalid duration format: ${duration}. Expected format like "5m", "1m30s", "250ms"`
      );
    }

    let totalMs = 0;
    const parts = durationStr.matchAll(/(\d+(?:\.\d+)?)\s*([a-z]+)/g);
    for (const [, valueStr = '', unit = ''] of parts) {
      if (!isTimeUnit(unit)) {
        const validUnits = Object.keys(TIME_UNITS).join(', ');
        throw new Error(`Invalid duration unit: ${unit}. Valid units: ${validUnits}`);
      }

      totalMs += parseFloat(valueStr) * TIME_UNITS[unit];
    }

    return Math.floor(totalMs);
  }

  /**
   * Process environment variable substitution in configuration
   */
  static processEnvVars(value: unknown): unknown {
    if (typeof value === 'string') {
      return ConfigUtils.substituteEnvVars(value);
    }

    if (Array.isArray(value)) {
      return value.map(item => ConfigUtils.processEnvVars(item));
    }

    if (ConfigUtils.isPlainObject(value)) {
      const result: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(value)) {
        result[key] = ConfigUtils.processEnvVars(item);
      }
      return result;
    }

    return value;
  }

  /**
   * Substitute `${VAR}` and `${VAR:-default}` placeholders
   */
  static substituteEnvVars(str: string): string {
    return str.replace(/\$\{([^}]+)\}/g, (_match, varExpr: string) => {
      const [varName = '', defaultValue] = varExpr.split(':-');
      const envValue = process.env[varName.trim()];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue.trim();
      }

      throw new Error(`Required environment variable not set: ${varName}`);
    });
  }

  /**
   * Deep-merge plain objects; arrays and primitives from later sources replace earlier ones
   */
  static mergeConfigs(
    target: Record<string, unknown>,
    ...sources: Record<string, unknown>[]
  ): Record<string, unknown> {
    const result = { ...target };

    for (const source of sources) {
      for (const [key, value] of Object.entries(source)) {
        if (value === undefined) {
          continue;
        }

        const existing = result[key];
        result[key] =
          ConfigUtils.isPlainObject(value) && ConfigUtils.isPlainObject(existing)
            ? ConfigUtils.mergeConfigs(existing, value)
            : value;
      }
    }

    return result;
  }

  static isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  }

  /**
   * Create a Zod transformer for duration values
   * @returns Zod transformer that parses duration strings to milliseconds
   */
  static durationTransformer() {
    return z.union([z.string(), z.number()]).transform((value, ctx) => {
      try {
        return ConfigUtils.parseDuration(value);
      } catch (error) {
        const message = error instanceof Error ? error.message : describeError(error);
        ctx.addIssue({ code: z.ZodIssueCode.custom, message });
        return z.NEVER;
      }
    });
  }
}
