/**
 * Configuration File Loader
 *
 * Loads configuration from .streamwatchrc or .streamwatchrc.json files.
 * Configuration precedence: Environment Variables > Config File > Defaults
 *
 * Search paths (in order):
 * 1. Current working directory
 * 2. Home directory (~/.streamwatchrc)
 * 3. Package root
 *
 * @example
 * // .streamwatchrc in project root
 * {
 *   "monitor": {
 *     "loopTimeSeconds": 300,
 *     "platformMaxConcurrentRequests": 2
 *   },
 *   "storage": {
 *     "recordingSpaceThresholdGb": 5
 *   }
 * }
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import {
  logConfigSchema,
  monitorConfigSchema,
  storageConfigSchema,
  notificationConfigSchema,
  ConfigValidationError,
  type AppConfig,
  type LogConfig,
  type MonitorConfig,
  type StorageConfig,
  type NotificationConfig,
} from './config-schemas.js';
import { logger } from './logger.js';

const log = logger.config;

// ============================================
// CONFIG FILE SCHEMA
// ============================================

/**
 * Schema for configuration file contents.
 * All fields are optional - missing fields use defaults or env vars.
 */
export const configFileSchema = z.object({
  log: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
    prettyPrint: z.boolean().optional(),
  }).optional(),

  monitor: z.object({
    loopTimeSeconds: z.number().int().min(10).max(86400).optional(),
    heartbeatSeconds: z.number().int().min(1).max(3600).optional(),
    checkLiveOnStartup: z.boolean().optional(),
    platformMaxConcurrentRequests: z.number().int().min(1).max(50).optional(),
    emaAlphaActive: z.number().min(0).max(1).optional(),
    emaAlphaOffline: z.number().min(0).max(1).optional(),
    notifyLoopTimeSeconds: z.number().int().min(10).max(86400).optional(),
    probeJitterMinMs: z.number().int().min(0).max(60000).optional(),
    probeJitterMaxMs: z.number().int().min(0).max(60000).optional(),
    retryAttempts: z.number().int().min(0).max(10).optional(),
    retryDelaySeconds: z.number().int().min(0).max(600).optional(),
    placeholderStreamerName: z.string().optional(),
  }).optional(),

  storage: z.object({
    channelsFile: z.string().optional(),
    persistDebounceMs: z.number().int().min(0).max(60000).optional(),
    recordingDir: z.string().optional(),
    recordingSpaceThresholdGb: z.number().min(0).optional(),
  }).optional(),

  notifications: z.object({
    desktopNotify: z.boolean().optional(),
    pushOnLiveStart: z.boolean().optional(),
    pushOnLiveEnd: z.boolean().optional(),
    notificationTitle: z.string().optional(),
    liveStartContent: z.string().optional(),
    liveEndContent: z.string().optional(),
  }).optional(),
}).strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

// ============================================
// FILE SEARCH
// ============================================

const CONFIG_FILE_NAMES = [
  '.streamwatchrc',
  '.streamwatchrc.json',
  'streamwatchrc.json',
];

function getPackageRoot(): string {
  try {
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = dirname(__filename);
    // Go up from src/utils to package root
    return join(__dirname, '..', '..');
  } catch {
    return process.cwd();
  }
}

function getSearchPaths(): string[] {
  const paths: string[] = [process.cwd()];

  const home = homedir();
  if (home && !paths.includes(home)) {
    paths.push(home);
  }

  const packageRoot = getPackageRoot();
  if (!paths.includes(packageRoot)) {
    paths.push(packageRoot);
  }

  return paths;
}

function findConfigFile(): string | null {
  const searchPaths = getSearchPaths();

  for (const dir of searchPaths) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        log.debug('Found config file', { path: filePath });
        return filePath;
      }
    }
  }

  log.debug('No config file found', { searchPaths, fileNames: CONFIG_FILE_NAMES });
  return null;
}

// ============================================
// FILE LOADING
// ============================================

/**
 * Load and parse a config file. Comments (// and /* *\/) are allowed.
 * An unreadable or invalid file yields an empty config so defaults apply.
 */
export function loadConfigFile(filePath: string): ConfigFile {
  try {
    const content = readFileSync(filePath, 'utf-8');

    const stripped = content
      .replace(/\/\*[\s\S]*?\*\//g, '')
      .replace(/^\s*\/\/.*$/gm, '');

    const parsed: unknown = JSON.parse(stripped);
    const result = configFileSchema.safeParse(parsed);

    if (!result.success) {
      log.warn('Config file validation failed', {
        path: filePath,
        errors: result.error.issues.map(i => ({
          path: i.path.join('.'),
          message: i.message,
        })),
      });
      return {};
    }

    log.info('Loaded config file', {
      path: filePath,
      sections: Object.entries(result.data)
        .filter(([, value]) => value !== undefined)
        .map(([key]) => key),
    });

    return result.data;
  } catch (error) {
    if (error instanceof SyntaxError) {
      log.warn('Config file has invalid JSON', {
        path: filePath,
        error: error.message,
      });
    } else {
      log.warn('Failed to read config file', {
        path: filePath,
        error: String(error),
      });
    }
    return {};
  }
}

// ============================================
// CACHED CONFIG
// ============================================

let cachedConfigFile: ConfigFile | null = null;
let cachedConfigFilePath: string | null = null;
let configFileLoaded = false;

/**
 * Get the loaded config file (cached after first load).
 */
export function getConfigFile(): ConfigFile {
  if (!configFileLoaded) {
    cachedConfigFilePath = findConfigFile();
    cachedConfigFile = cachedConfigFilePath ? loadConfigFile(cachedConfigFilePath) : {};
    configFileLoaded = true;
  }
  return cachedConfigFile ?? {};
}

/**
 * Clear the config file cache.
 * Useful for testing or reloading configuration.
 */
export function clearConfigFileCache(): void {
  cachedConfigFile = null;
  cachedConfigFilePath = null;
  configFileLoaded = false;
}

// ============================================
// MERGE HELPERS
// ============================================

function boolToEnvString(value: boolean | undefined): string | undefined {
  if (value === undefined) return undefined;
  return value ? 'true' : 'false';
}

function numToEnvString(value: number | undefined): string | undefined {
  if (value === undefined) return undefined;
  return String(value);
}

function parseSection<T>(section: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, merged: unknown): T {
  const result = schema.safeParse(merged);
  if (!result.success) {
    throw new ConfigValidationError(section, result.error);
  }
  return result.data;
}

// ============================================
// MERGED CONFIG FUNCTIONS
// ============================================

/**
 * Get merged log configuration.
 * Config file values are used unless overridden by environment variables.
 */
export function getMergedLogConfig(env: NodeJS.ProcessEnv = process.env): LogConfig {
  const file = getConfigFile().log ?? {};

  return parseSection('log', logConfigSchema, {
    level: env.LOG_LEVEL ?? file.level,
    prettyPrint: env.LOG_PRETTY ?? boolToEnvString(file.prettyPrint),
  });
}

/**
 * Get merged scheduler configuration.
 */
export function getMergedMonitorConfig(env: NodeJS.ProcessEnv = process.env): MonitorConfig {
  const file = getConfigFile().monitor ?? {};

  return parseSection('monitor', monitorConfigSchema, {
    loopTimeSeconds: env.LOOP_TIME_SECONDS ?? numToEnvString(file.loopTimeSeconds),
    heartbeatSeconds: env.HEARTBEAT_SECONDS ?? numToEnvString(file.heartbeatSeconds),
    checkLiveOnStartup: env.CHECK_LIVE_ON_STARTUP ?? boolToEnvString(file.checkLiveOnStartup),
    platformMaxConcurrentRequests:
      env.PLATFORM_MAX_CONCURRENT_REQUESTS ?? numToEnvString(file.platformMaxConcurrentRequests),
    emaAlphaActive: env.EMA_ALPHA_ACTIVE ?? numToEnvString(file.emaAlphaActive),
    emaAlphaOffline: env.EMA_ALPHA_OFFLINE ?? numToEnvString(file.emaAlphaOffline),
    notifyLoopTimeSeconds: env.NOTIFY_LOOP_TIME_SECONDS ?? numToEnvString(file.notifyLoopTimeSeconds),
    probeJitterMinMs: env.PROBE_JITTER_MIN_MS ?? numToEnvString(file.probeJitterMinMs),
    probeJitterMaxMs: env.PROBE_JITTER_MAX_MS ?? numToEnvString(file.probeJitterMaxMs),
    retryAttempts: env.RETRY_ATTEMPTS ?? numToEnvString(file.retryAttempts),
    retryDelaySeconds: env.RETRY_DELAY_SECONDS ?? numToEnvString(file.retryDelaySeconds),
    placeholderStreamerName: env.PLACEHOLDER_STREAMER_NAME ?? file.placeholderStreamerName,
  });
}

/**
 * Get merged storage configuration.
 */
export function getMergedStorageConfig(env: NodeJS.ProcessEnv = process.env): StorageConfig {
  const file = getConfigFile().storage ?? {};

  return parseSection('storage', storageConfigSchema, {
    channelsFile: env.CHANNELS_FILE ?? file.channelsFile,
    persistDebounceMs: env.PERSIST_DEBOUNCE_MS ?? numToEnvString(file.persistDebounceMs),
    recordingDir: env.RECORDING_DIR ?? file.recordingDir,
    recordingSpaceThresholdGb:
      env.RECORDING_SPACE_THRESHOLD_GB ?? numToEnvString(file.recordingSpaceThresholdGb),
  });
}

/**
 * Get merged notification configuration.
 */
export function getMergedNotificationConfig(env: NodeJS.ProcessEnv = process.env): NotificationConfig {
  const file = getConfigFile().notifications ?? {};

  return parseSection('notifications', notificationConfigSchema, {
    desktopNotify: env.DESKTOP_NOTIFY ?? boolToEnvString(file.desktopNotify),
    pushOnLiveStart: env.PUSH_ON_LIVE_START ?? boolToEnvString(file.pushOnLiveStart),
    pushOnLiveEnd: env.PUSH_ON_LIVE_END ?? boolToEnvString(file.pushOnLiveEnd),
    notificationTitle: env.NOTIFICATION_TITLE ?? file.notificationTitle,
    liveStartContent: env.LIVE_START_CONTENT ?? file.liveStartContent,
    liveEndContent: env.LIVE_END_CONTENT ?? file.liveEndContent,
  });
}

/**
 * Get the complete merged configuration.
 */
export function getMergedAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    log: getMergedLogConfig(env),
    monitor: getMergedMonitorConfig(env),
    storage: getMergedStorageConfig(env),
    notifications: getMergedNotificationConfig(env),
  };
}

// ============================================
// UTILITY FUNCTIONS
// ============================================

/**
 * Get the path to the loaded config file, if any.
 */
export function getConfigFilePath(): string | null {
  getConfigFile();
  return cachedConfigFilePath;
}

/**
 * Generate a sample .streamwatchrc file with all available options.
 */
export function generateSampleConfig(): string {
  const sample = {
    log: {
      level: 'info',
      prettyPrint: false,
    },
    monitor: {
      loopTimeSeconds: 300,
      heartbeatSeconds: 30,
      checkLiveOnStartup: true,
      platformMaxConcurrentRequests: 3,
      emaAlphaActive: 0.1,
      emaAlphaOffline: 0.01,
      notifyLoopTimeSeconds: 600,
      retryAttempts: 2,
      retryDelaySeconds: 20,
    },
    storage: {
      channelsFile: './config/channels.json',
      persistDebounceMs: 2000,
      recordingDir: './downloads',
      recordingSpaceThresholdGb: 0,
    },
    notifications: {
      desktopNotify: true,
      pushOnLiveStart: true,
      pushOnLiveEnd: false,
      liveStartContent: '[room_name] went live at [time]: [title]',
    },
  };

  return JSON.stringify(sample, null, 2);
}
