/**
 * Structured logging on pino.
 *
 * Entries are JSON lines on stderr, tagged with `service` and the emitting
 * `component`. Each scheduler part logs through its own entry in `logger`.
 * `configureLogger()` swaps the underlying pino instance; component loggers
 * pick up the new one on their next call.
 */

import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';
import { logLevelSchema, type LogLevel } from './config-schemas.js';

export type { LogLevel };

export interface LogContext {
  component?: string;
  channelId?: string;
  url?: string;
  platformKey?: string;
  lane?: string;
  durationMs?: number;
  [key: string]: unknown;
}

export interface LoggerConfig {
  level: LogLevel;
  prettyPrint: boolean;
  destination: 'stderr' | 'stdout';
}

const ENV_LEVEL = logLevelSchema.safeParse(process.env.LOG_LEVEL);

const DEFAULT_CONFIG: LoggerConfig = {
  level: ENV_LEVEL.success ? ENV_LEVEL.data : 'info',
  prettyPrint: process.env.LOG_PRETTY === 'true',
  destination: 'stderr',
};

// Resolver metadata can carry platform cookies; push settings carry tokens.
const REDACT_PATHS = [
  'headers.authorization',
  'headers.cookie',
  '*.authorization',
  '*.Authorization',
  '*.cookie',
  '*.Cookie',
  '*.cookies',
  '*.password',
  '*.secret',
  '*.token',
  '*.accessToken',
  '*.webhookUrl',
];

function buildPino(config: LoggerConfig): PinoLogger {
  const options: LoggerOptions = {
    level: config.level,
    base: { pid: process.pid, service: 'stream-watch' },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
  };

  if (config.prettyPrint) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
          destination: config.destination === 'stderr' ? 2 : 1,
        },
      },
    });
  }

  return pino(options, config.destination === 'stderr' ? process.stderr : process.stdout);
}

let root = buildPino(DEFAULT_CONFIG);

export function configureLogger(config: Partial<LoggerConfig>): void {
  root = buildPino({ ...DEFAULT_CONFIG, ...config });
}

function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { message: error.message, name: error.name, stack: error.stack };
  }
  return { message: String(error) };
}

export class Logger {
  /** Set for child loggers, which are bound to the pino instance current at creation */
  private bound: PinoLogger | null = null;

  constructor(private readonly component: string) {}

  private get target(): PinoLogger {
    return this.bound ?? root.child({ component: this.component });
  }

  child(context: LogContext): Logger {
    const child = new Logger(this.component);
    child.bound = this.target.child(context);
    return child;
  }

  debug(message: string, context: LogContext = {}): void {
    this.target.debug(context, message);
  }

  info(message: string, context: LogContext = {}): void {
    this.target.info(context, message);
  }

  warn(message: string, context: LogContext = {}): void {
    this.target.warn(context, message);
  }

  /**
   * `context.error` may be anything a catch clause produced; it is logged
   * under `err`.
   */
  error(message: string, context: LogContext & { error?: unknown } = {}): void {
    const entry = context.error === undefined ? context : { ...context, err: serializeError(context.error) };
    this.target.error(entry, message);
  }
}

export const logger = {
  monitor: new Logger('LiveMonitor'),
  registry: new Logger('Registry'),
  dispatcher: new Logger('Dispatcher'),
  workers: new Logger('LaneWorkers'),
  prober: new Logger('Prober'),
  sessions: new Logger('RecordingSessions'),
  notifications: new Logger('Notifications'),
  persistence: new Logger('Persistence'),
  diskSpace: new Logger('DiskSpace'),
  config: new Logger('ConfigLoader'),

  create: (component: string) => new Logger(component),
};

export default logger;
