/**
 * Structured logging for lanwire.
 *
 * Every component logs through a child of one pino root logger, bound to a
 * `component` field. Components accept an injected logger in their options,
 * which is how tests capture or silence output.
 *
 * @module logger
 */

import { pino, type DestinationStream, type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLevel(value: string): value is LevelWithSilent {
  return LEVELS.some((level) => level === value);
}

/**
 * Resolves the root log level from the environment.
 *
 * `LOG_LEVEL` wins when it names a pino level; test runs are silent otherwise.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LevelWithSilent {
  const requested = env['LOG_LEVEL']?.toLowerCase();
  if (requested && isLevel(requested)) {
    return requested;
  }
  return env['NODE_ENV'] === 'test' ? 'silent' : 'info';
}

let rootLogger: Logger = pino({ name: 'lanwire', level: resolveLogLevel() });

/**
 * Returns the root logger.
 */
export function getRootLogger(): Logger {
  return rootLogger;
}

/**
 * Options for configureLogger().
 */
export interface LoggerOptions {
  /** Root level (defaults to resolveLogLevel()) */
  readonly level?: LevelWithSilent;

  /** Where entries are written (defaults to stdout) */
  readonly destination?: DestinationStream;
}

/**
 * Replaces the root logger, e.g. to raise verbosity from the command line.
 *
 * Loggers created earlier keep their original parent.
 */
export function configureLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? resolveLogLevel();
  rootLogger = options.destination
    ? pino({ name: 'lanwire', level }, options.destination)
    : pino({ name: 'lanwire', level });
  return rootLogger;
}

/**
 * Creates a component logger.
 *
 * @param component - Name bound to every entry
 * @param parent - Logger to derive from (defaults to the root logger)
 */
export function createLogger(component: string, parent: Logger = rootLogger): Logger {
  return parent.child({ component });
}
