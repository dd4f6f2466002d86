/**
 * Structured logging with Pino
 */

import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';

const nodeEnv = process.env['NODE_ENV'];
const isTest = nodeEnv === 'test';
const isDevelopment = nodeEnv !== 'production' && !isTest;

// Tests stay quiet unless LOG_LEVEL asks otherwise
const level = process.env['LOG_LEVEL'] || (isTest ? 'silent' : 'info');

const loggerOptions: LoggerOptions = isDevelopment
  ? {
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
          translateTime: 'HH:MM:ss',
        },
      },
    }
  : {
      level,
    };

export const logger: Logger = pino(loggerOptions);

/**
 * Create a child logger for a specific agent
 */
export function createAgentLogger(agentId: string): Logger {
  return logger.child({ agentId });
}

/**
 * Create a child logger for a specific module
 */
export function createModuleLogger(module: string): Logger {
  return logger.child({ module });
}

/**
 * Create a child logger bound to a single run
 */
export function createRunLogger(parent: Logger, runId: string): Logger {
  return parent.child({ runId });
}
