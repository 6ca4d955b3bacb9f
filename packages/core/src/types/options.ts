/**
 * Configuration options for ladder searches
 *
 * All options are optional. The length cap defaults to the longer of the two
 * endpoints, which keeps the reachable state space bounded without excluding
 * either word.
 */

import { MAX_SEARCH_LENGTH } from '../codec/word.js';
import type { LevelProgress } from '../search/types.js';
import type { MetricsCollector } from '../util/metrics.js';
import { ConfigError } from './errors.js';

export interface SearchOptions {
  /** Maximum number of BFS levels to expand (default: 31) */
  maxDepth?: number;
  /** Longest word duplicate-first may produce (default: longer endpoint) */
  maxLength?: number;
  /** Called once after each fully expanded level */
  onLevel?: (progress: LevelProgress) => void;
  /** Collector receiving timings and BFS counters */
  metrics?: MetricsCollector;
}

export interface ResolvedSearchOptions {
  maxDepth: number;
  maxLength: number;
  onLevel?: (progress: LevelProgress) => void;
  metrics?: MetricsCollector;
}

export const DEFAULT_MAX_DEPTH = 31;

/** Upper bound accepted for maxDepth; the state space is exhausted well before. */
export const MAX_DEPTH_LIMIT = 1024;

export const DEFAULT_SEARCH_OPTIONS = {
  maxDepth: DEFAULT_MAX_DEPTH,
} as const satisfies Partial<ResolvedSearchOptions>;

/**
 * Resolve user options against defaults.
 *
 * @param endpointLength - length of the longer endpoint word
 * @throws {ConfigError} When a setting is out of range
 */
export function resolveSearchOptions(
  userOptions: SearchOptions = {},
  endpointLength: number = 1
): ResolvedSearchOptions {
  const resolved: ResolvedSearchOptions = {
    ...DEFAULT_SEARCH_OPTIONS,
    ...stripUndefined(userOptions),
    maxLength: userOptions.maxLength ?? endpointLength,
  };

  validateOptions(resolved, endpointLength);
  return resolved;
}

function stripUndefined(options: SearchOptions): SearchOptions {
  const out: SearchOptions = {};
  if (options.maxDepth !== undefined) out.maxDepth = options.maxDepth;
  if (options.onLevel !== undefined) out.onLevel = options.onLevel;
  if (options.metrics !== undefined) out.metrics = options.metrics;
  return out;
}

function validateOptions(
  options: ResolvedSearchOptions,
  endpointLength: number
): void {
  if (
    !Number.isInteger(options.maxDepth) ||
    options.maxDepth <= 0 ||
    options.maxDepth > MAX_DEPTH_LIMIT
  ) {
    throw new ConfigError({
      message: `maxDepth must be an integer between 1 and ${MAX_DEPTH_LIMIT}`,
      context: { setting: 'maxDepth', value: options.maxDepth },
    });
  }

  if (
    !Number.isInteger(options.maxLength) ||
    options.maxLength < 1 ||
    options.maxLength > MAX_SEARCH_LENGTH
  ) {
    throw new ConfigError({
      message: `maxLength must be an integer between 1 and ${MAX_SEARCH_LENGTH}`,
      context: { setting: 'maxLength', value: options.maxLength },
    });
  }

  if (options.maxLength < endpointLength) {
    throw new ConfigError({
      message: `maxLength ${options.maxLength} is shorter than an endpoint word (${endpointLength} letters)`,
      context: {
        setting: 'maxLength',
        value: options.maxLength,
        suggestion: `Use --max-length ${endpointLength} or more`,
      },
    });
  }
}
