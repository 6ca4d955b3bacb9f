import { appendFile } from 'node:fs/promises';
import path from 'node:path';
import {
  ConfigError,
  MAX_SEARCH_LENGTH,
  encode,
  findLadder,
  resolveSearchOptions,
  type LadderResult,
  type MetricsCollector,
} from '@wordhop/core';

import type { OutputFormat, SortOrder } from './flags.js';
import { sortPairs, type LadderPair } from './pairs.js';
import {
  formatLadderLine,
  formatLevelProgress,
  toLadderRecord,
} from './render.js';

export interface BatchOptions {
  maxDepth?: number;
  /** Cap for pairs that do not carry their own maxLength. */
  maxLength?: number;
  sort: SortOrder;
  out: OutputFormat;
  progress: boolean;
  /** File that receives one text result line per pair, appended. */
  log?: string;
  metrics?: MetricsCollector;
}

export interface BatchSummary {
  results: LadderResult[];
  found: number;
  exhausted: number;
}

/**
 * Encode every endpoint and resolve every pair's options before any search
 * runs, so a bad word on the last line fails the batch immediately.
 */
export function validatePairs(
  pairs: readonly LadderPair[],
  options: Pick<BatchOptions, 'maxDepth' | 'maxLength'>
): void {
  for (const pair of pairs) {
    encode(pair.start, MAX_SEARCH_LENGTH);
    encode(pair.target, MAX_SEARCH_LENGTH);
    resolveSearchOptions(
      {
        maxDepth: options.maxDepth,
        maxLength: pair.maxLength ?? options.maxLength,
      },
      Math.max(pair.start.length, pair.target.length)
    );
  }
}

/**
 * Resolve the log path and touch it with an empty append, so an unwritable
 * log fails the batch before the first search.
 */
async function openLog(log: string): Promise<string> {
  const abs = path.resolve(process.cwd(), log);
  try {
    await appendFile(abs, '', 'utf8');
  } catch (error) {
    throw new ConfigError({
      message: `Log file cannot be written: ${abs}`,
      context: { setting: '--log', value: log },
      cause: error instanceof Error ? error : undefined,
    });
  }
  return abs;
}

export async function runBatch(
  pairs: readonly LadderPair[],
  options: BatchOptions
): Promise<BatchSummary> {
  validatePairs(pairs, options);

  const ordered = sortPairs(pairs, options.sort);
  const logFile =
    options.log !== undefined ? await openLog(options.log) : undefined;
  const summary: BatchSummary = { results: [], found: 0, exhausted: 0 };

  for (const [idx, pair] of ordered.entries()) {
    if (options.progress) {
      process.stderr.write(
        `[wordhop] pair ${idx + 1}/${ordered.length}: ${pair.start} -> ${pair.target}\n`
      );
    }

    const result = findLadder(pair.start, pair.target, {
      maxDepth: options.maxDepth,
      maxLength: pair.maxLength ?? options.maxLength,
      onLevel: options.progress
        ? (progress) => {
            process.stderr.write(`${formatLevelProgress(progress)}\n`);
          }
        : undefined,
      metrics: options.metrics,
    });

    summary.results.push(result);
    if (result.status === 'found') {
      summary.found += 1;
    } else {
      summary.exhausted += 1;
    }

    const line = formatLadderLine(result);
    process.stdout.write(
      options.out === 'json'
        ? `${JSON.stringify(toLadderRecord(result))}\n`
        : `${line}\n`
    );
    if (logFile !== undefined) {
      await appendFile(logFile, `${line}\n`, 'utf8');
    }
  }

  return summary;
}
