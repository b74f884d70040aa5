/**
 * Configuration Schemas
 *
 * Centralized Zod schemas for type-safe runtime configuration validation.
 * All environment variable parsing goes through these schemas for consistent
 * validation and clear error messages.
 */

import { z } from 'zod';

// ============================================
// HELPER SCHEMAS
// ============================================

/**
 * Schema for parsing a string as a boolean.
 * Recognizes 'true', '1', 'yes' as true; everything else as false.
 */
export const booleanStringSchema = z
  .string()
  .optional()
  .transform((val) => {
    if (!val) return false;
    return ['true', '1', 'yes'].includes(val.toLowerCase());
  });

/**
 * Boolean string that falls back to `defaultVal` when the value is absent.
 * booleanStringSchema maps a missing value to false, which is wrong for
 * switches that default to on.
 */
export function booleanStringWithDefault(defaultVal: boolean) {
  return z
    .string()
    .optional()
    .transform((val) => {
      if (val === undefined || val === '') return defaultVal;
      return ['true', '1', 'yes'].includes(val.toLowerCase());
    });
}

/**
 * Schema for parsing a string as an integer with bounds.
 */
export function integerStringSchema(options: {
  min?: number;
  max?: number;
  default: number;
}) {
  const { min, max } = options;
  let schema = z.coerce.number().int();

  if (min !== undefined) schema = schema.min(min);
  if (max !== undefined) schema = schema.max(max);

  return schema.default(options.default);
}

/**
 * Schema for parsing a string as a float between 0 and 1 (percentage/rate).
 */
export function rateSchema(defaultVal: number) {
  return z.coerce.number().min(0).max(1).default(defaultVal);
}

/**
 * Schema for a non-negative float, such as a size in GB.
 */
export function nonNegativeNumberSchema(defaultVal: number) {
  return z.coerce.number().min(0).default(defaultVal);
}

// ============================================
// LOG LEVEL SCHEMA
// ============================================

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export type LogLevel = z.infer<typeof logLevelSchema>;

export const logConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  prettyPrint: booleanStringSchema,
});

export type LogConfig = z.infer<typeof logConfigSchema>;

// ============================================
// MONITOR CONFIGURATION
// ============================================

export const monitorConfigSchema = z
  .object({
    loopTimeSeconds: integerStringSchema({ min: 10, max: 86400, default: 300 }),
    heartbeatSeconds: integerStringSchema({ min: 1, max: 3600, default: 30 }),
    checkLiveOnStartup: booleanStringWithDefault(true),
    platformMaxConcurrentRequests: integerStringSchema({ min: 1, max: 50, default: 3 }),
    emaAlphaActive: rateSchema(0.1),
    emaAlphaOffline: rateSchema(0.01),
    notifyLoopTimeSeconds: integerStringSchema({ min: 10, max: 86400, default: 600 }),
    probeJitterMinMs: integerStringSchema({ min: 0, max: 60000, default: 2000 }),
    probeJitterMaxMs: integerStringSchema({ min: 0, max: 60000, default: 5000 }),
    retryAttempts: integerStringSchema({ min: 0, max: 10, default: 2 }),
    retryDelaySeconds: integerStringSchema({ min: 0, max: 600, default: 20 }),
    placeholderStreamerName: z.string().optional().default('Live Room'),
  })
  .refine((config) => config.probeJitterMinMs <= config.probeJitterMaxMs, {
    message: 'probeJitterMinMs must not exceed probeJitterMaxMs',
    path: ['probeJitterMinMs'],
  });

export type MonitorConfig = z.infer<typeof monitorConfigSchema>;

// ============================================
// STORAGE CONFIGURATION
// ============================================

export const storageConfigSchema = z.object({
  channelsFile: z.string().optional().default('./config/channels.json'),
  persistDebounceMs: integerStringSchema({ min: 0, max: 60000, default: 2000 }),
  recordingDir: z.string().optional().default('./downloads'),
  recordingSpaceThresholdGb: nonNegativeNumberSchema(0),
});

export type StorageConfig = z.infer<typeof storageConfigSchema>;

// ============================================
// NOTIFICATION CONFIGURATION
// ============================================

export const notificationConfigSchema = z.object({
  desktopNotify: booleanStringWithDefault(true),
  pushOnLiveStart: booleanStringWithDefault(true),
  pushOnLiveEnd: booleanStringWithDefault(false),
  notificationTitle: z.string().optional().default(''),
  liveStartContent: z.string().optional().default(''),
  liveEndContent: z.string().optional().default(''),
});

export type NotificationConfig = z.infer<typeof notificationConfigSchema>;

// ============================================
// COMPLETE APPLICATION CONFIGURATION
// ============================================

export const appConfigSchema = z.object({
  log: logConfigSchema,
  monitor: monitorConfigSchema,
  storage: storageConfigSchema,
  notifications: notificationConfigSchema,
});

export type AppConfig = z.infer<typeof appConfigSchema>;

/**
 * Defaults for every section, as produced by parsing an empty source.
 */
export function defaultAppConfig(): AppConfig {
  return appConfigSchema.parse({ log: {}, monitor: {}, storage: {}, notifications: {} });
}

// ============================================
// ERROR FORMATTING
// ============================================

/**
 * Format Zod validation errors into readable messages.
 */
export function formatConfigErrors(error: z.ZodError<unknown>): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return `  - ${path}: ${issue.message}`;
    })
    .join('\n');
}

/**
 * Create a configuration validation error with helpful messages.
 */
export class ConfigValidationError extends Error {
  constructor(
    public readonly section: string,
    public readonly zodError: z.ZodError
  ) {
    const formatted = formatConfigErrors(zodError);
    super(
      `Configuration validation failed for ${section}:\n${formatted}\n\n` +
      `Please check your environment variables or configuration file.`
    );
    this.name = 'ConfigValidationError';
  }
}
