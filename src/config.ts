/**
 * Configuration for range pagination and the demo server
 */

import type { PaginationSource } from './domain/value-objects/RangePair';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Config {
  PORT: number;
  // Only paginate requests carrying X-Requested-With: XMLHttpRequest
  PAGINATE_AJAX_ONLY: boolean;
  // Where Range / Range-Unit are read from (headers win in 'both')
  PAGINATE_MODE: PaginationSource;
  LOG_LEVEL: LogLevel;
  // Size of the in-memory collection served by the demo /items route
  DEMO_ITEM_COUNT: number;
}

const PAGINATION_MODES: readonly PaginationSource[] = ['headers', 'parameters', 'both'];
const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isPaginationSource(value: string | undefined): value is PaginationSource {
  return PAGINATION_MODES.some((mode) => mode === value);
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function loadConfig(env: NodeJS.ProcessEnv): Config {
  const mode = env.PAGINATE_MODE?.toLowerCase();
  const level = env.LOG_LEVEL?.toLowerCase();

  return {
    // Server configuration
    PORT: Number(env.PORT) || 3000,

    // Pagination defaults, overridable per route
    PAGINATE_AJAX_ONLY: env.PAGINATE_AJAX_ONLY !== 'false',
    PAGINATE_MODE: isPaginationSource(mode) ? mode : 'headers',

    LOG_LEVEL: isLogLevel(level) ? level : 'info',

    DEMO_ITEM_COUNT: Number(env.DEMO_ITEM_COUNT) || 250
  };
}

const config: Config = loadConfig(process.env);

export default config;
