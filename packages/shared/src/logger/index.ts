/**
 * Structured logging for Kubemend
 */

import pino from 'pino';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const NODE_ENVS = ['development', 'production', 'test'] as const;
export type NodeEnv = (typeof NODE_ENVS)[number];
export const DEFAULT_NODE_ENV: NodeEnv = 'development';

// Re-export pino.Logger type for convenience
export type Logger = pino.Logger;

export interface LogContext {
  component?: string;
  namespace?: string;
  pod?: string;
  [key: string]: unknown;
}

export interface LoggerSettings {
  level: LogLevel;
  /** pino-pretty output, used when the node environment is development */
  pretty: boolean;
}

/**
 * Blank values count as unset, and unset NODE_ENV means development,
 * matching how the configuration reads the same variables
 */
export function resolveLoggerSettings(env: NodeJS.ProcessEnv = process.env): LoggerSettings {
  const level = env.LOG_LEVEL?.trim().toLowerCase();
  const nodeEnv = env.NODE_ENV?.trim() || DEFAULT_NODE_ENV;

  return {
    level: LOG_LEVELS.find((candidate) => candidate === level) ?? 'info',
    pretty: nodeEnv === 'development',
  };
}

// Create base logger
function createBaseLogger({ level, pretty }: LoggerSettings) {
  return pino({
    level,
    transport: pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
    base: {
      service: 'kubemend',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
  });
}

// Singleton logger instance
let loggerInstance: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    loggerInstance = createBaseLogger(resolveLoggerSettings());
  }
  return loggerInstance;
}

// Create child logger with context
export function createChildLogger(context: LogContext): pino.Logger {
  return getLogger().child(context);
}

/**
 * Structured event for every remediation the executor carries out,
 * simulated or not
 */
export function logActionExecution(actionKind: string, target: string, dryRun: boolean): void {
  getLogger().info(
    {
      event: 'action_execution',
      actionKind,
      target,
      dryRun,
    },
    `Executing action: ${actionKind} on ${target}${dryRun ? ' (dry-run)' : ''}`
  );
}

// Reset logger (for testing)
export function resetLogger(): void {
  loggerInstance = null;
}
