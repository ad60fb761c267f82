import debug from 'debug';
import chalk from 'chalk';
import { log as clackLog } from '@clack/prompts';

/**
 * Main namespace for all task-transformer logging
 */
const NAMESPACE = 'tt';

type Level = 'debug' | 'info' | 'warn' | 'error' | 'success';

/**
 * Logger interface providing contextualized logging methods.
 * Levels are coloured gray, blue, yellow, red and green on the debug channel.
 */
export type Logger = Record<Level, (...args: unknown[]) => void> & {
  /** Direct stdout output; only safe where stdout is not a protocol channel */
  raw: (...args: unknown[]) => void;
};

const COLOURS: Record<Level, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
  success: chalk.green,
};

const CLACK: Record<Level, (message: string) => void> = {
  debug: message => console.log(chalk.gray(message)),
  info: message => clackLog.info(message),
  warn: message => clackLog.warning(message),
  error: message => clackLog.error(message),
  success: message => clackLog.success(message),
};

/**
 * Render log arguments into a single line. Objects are pretty-printed,
 * errors keep their message.
 */
export function formatArgs(args: unknown[]): string {
  return args.map(arg => {
    if (arg instanceof Error) {
      return arg.message;
    }
    return typeof arg === 'object' && arg !== null ? JSON.stringify(arg, null, 2) : String(arg);
  }).join(' ');
}

/**
 * Creates a contextualized logger instance
 *
 * @param context - The context/module name (e.g., 'catalog', 'cache', 'server')
 * @param useClack - Whether to print through @clack/prompts for user-facing messages
 */
export function createLogger(context: string, useClack: boolean = false): Logger {
  const debugLogger = debug(`${NAMESPACE}:${context}`);
  const emit = (level: Level) => (...args: unknown[]) => {
    const message = formatArgs(args);
    if (useClack) {
      CLACK[level](message);
    } else {
      debugLogger(COLOURS[level](message));
    }
  };

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
    success: emit('success'),
    raw: (...args) => {
      console.log(...args);
    },
  };
}

/**
 * Pre-configured logger instances
 *
 * Usage:
 * ```typescript
 * import { logger } from '@task-transformer/logger';
 *
 * logger.catalog.debug('Fetched repositories', names);
 * logger.cache.info(`Cloned ${repo}`);
 * ```
 *
 * Enable all logs: DEBUG=tt:* task-bridge serve
 * Enable specific context: DEBUG=tt:cache task-bridge serve
 *
 * Only the `cli` logger prints through clack (stdout). Everything else goes
 * through `debug`, which writes to stderr, so the stdio MCP channel stays clean.
 */
export const logger = {
  /** Create a custom logger for any context */
  create: createLogger,

  /** CLI-specific logging with clack integration */
  cli: createLogger('cli', true),

  /** MCP server registration and tool calls */
  server: createLogger('server'),

  /** Template catalog and enrichment fetches */
  catalog: createLogger('catalog'),

  /** GitHub repository host */
  github: createLogger('github'),

  /** Repository cache and clones */
  cache: createLogger('cache'),

  /** Build orchestration */
  builder: createLogger('builder'),

  /** Configuration loading */
  config: createLogger('config'),

  /** Prompt rendering */
  prompts: createLogger('prompts')
};

/**
 * Helper to enable logging programmatically
 */
export const setDebugNamespace = (namespace: string) => {
  debug.enable(namespace);
};

/**
 * Helper to check if debug is enabled for a specific context
 */
export const isDebugEnabled = (context: string): boolean => {
  return debug.enabled(`${NAMESPACE}:${context}`);
};
