#!/usr/bin/env node

// CLI entry point
// - Command name: `wordhop` with subcommands `solve` and `batch`.
// - `solve` runs one ladder search and prints a single result line (or JSON).
// - `batch` reads a pair list (text or JSON), validates every pair up front,
//   runs the searches in order and optionally appends the result lines to a log.
// - Exit codes: 0 when every search found a path, 1 when at least one did not,
//   EXIT_CODES for errors.

import { Command, CommanderError } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ErrorCode,
  ErrorPresenter,
  InvariantError,
  getExitCode,
  MetricsCollector,
  findLadder,
  isLadderError,
  type LadderError,
  type LadderResult,
} from '@wordhop/core';
import { runBatch } from './batch.js';
import {
  parseSearchOptions,
  resolveOutputFormat,
  resolveSortOrder,
  type CliOptions,
  type OutputFormat,
} from './flags.js';
import { loadPairs } from './pairs.js';
import {
  formatLadderLine,
  formatLevelProgress,
  renderCLIView,
  toLadderRecord,
} from './render.js';

/** Exit status for a search that ended without reaching its target. */
export const EXIT_NO_PATH = 1;

/**
 * Build a fresh `wordhop` program. Commander keeps parsed option values on
 * the command, so each parse that must start clean gets its own instance.
 */
export function createProgram(): Command {
  const program = new Command();

  // Usage errors surface as CommanderError so they get a configuration exit
  // code instead of commander's default 1, which means "no path" here.
  program
    .name('wordhop')
    .description('Find shortest edit ladders between lowercase words')
    .version('0.1.0')
    .exitOverride();

  program
    .command('solve')
    .description('Find a shortest ladder from <start> to <target>')
    .argument('<start>', 'Start word (a-z)')
    .argument('<target>', 'Target word (a-z)')
    .option(
      '--max-length <number>',
      'Longest word the search may build (default: longer endpoint)'
    )
    .option('--max-depth <number>', 'Maximum number of BFS levels (default: 31)')
    .option('--out <format>', 'Output format: text|json', 'text')
    .option('--progress', 'Print one line per BFS level to stderr', false)
    .option('--print-metrics', 'Print search metrics as JSON to stderr', false)
    .action(async (start: string, target: string, options: CliOptions) => {
      let exitCode = 0;
      try {
        const searchOptions = parseSearchOptions(options);
        const outFormat = resolveOutputFormat(options.out);
        const metrics = new MetricsCollector({
          enabled: options.printMetrics === true,
        });

        const result = findLadder(start, target, {
          ...searchOptions,
          onLevel:
            options.progress === true
              ? (progress) => {
                  process.stderr.write(`${formatLevelProgress(progress)}\n`);
                }
              : undefined,
          metrics,
        });

        writeResult(result, outFormat);
        if (metrics.isEnabled()) {
          process.stderr.write(
            `[wordhop] metrics: ${JSON.stringify(metrics.snapshotMetrics())}\n`
          );
        }
        if (result.status !== 'found') {
          exitCode = EXIT_NO_PATH;
        }
      } catch (err: unknown) {
        await handleCliError(err);
      }
      if (exitCode !== 0) {
        process.exit(exitCode);
      }
    });

  program
    .command('batch')
    .description('Run ladder searches for every pair in a file')
    .requiredOption(
      '-p, --pairs <file>',
      'Pair list: text (one "start target" per line) or .json'
    )
    .option('--log <file>', 'Append one result line per pair to this file')
    .option('--sort <order>', 'Search order: length|none', 'length')
    .option(
      '--max-length <number>',
      'Cap for pairs without their own maxLength (default: longer endpoint)'
    )
    .option('--max-depth <number>', 'Maximum number of BFS levels (default: 31)')
    .option('--out <format>', 'Output format: text|json', 'text')
    .option('--progress', 'Print per-pair and per-level lines to stderr', false)
    .option('--print-metrics', 'Print aggregated metrics as JSON to stderr', false)
    .action(async (options: CliOptions) => {
      let exitCode = 0;
      try {
        const searchOptions = parseSearchOptions(options);
        const outFormat = resolveOutputFormat(options.out);
        const sort = resolveSortOrder(options.sort);
        const pairsFile = typeof options.pairs === 'string' ? options.pairs : '';
        const pairs = await loadPairs(pairsFile);
        const metrics = new MetricsCollector({
          enabled: options.printMetrics === true,
        });

        const summary = await runBatch(pairs, {
          ...searchOptions,
          sort,
          out: outFormat,
          progress: options.progress === true,
          log: typeof options.log === 'string' ? options.log : undefined,
          metrics,
        });

        process.stderr.write(
          `[wordhop] batch: ${summary.results.length} pairs, ${summary.found} found, ${summary.exhausted} without a path\n`
        );
        if (metrics.isEnabled()) {
          process.stderr.write(
            `[wordhop] metrics: ${JSON.stringify(metrics.snapshotMetrics())}\n`
          );
        }
        if (summary.exhausted > 0) {
          exitCode = EXIT_NO_PATH;
        }
      } catch (err: unknown) {
        await handleCliError(err);
      }
      if (exitCode !== 0) {
        process.exit(exitCode);
      }
    });

  return program;
}

function writeResult(result: LadderResult, outFormat: OutputFormat): void {
  if (outFormat === 'json') {
    process.stdout.write(`${JSON.stringify(toLadderRecord(result), null, 2)}\n`);
  } else {
    process.stdout.write(`${formatLadderLine(result)}\n`);
  }
}

async function handleCliError(err: unknown): Promise<never> {
  if (err instanceof CommanderError) {
    // commander has already printed usage, help or version output
    process.exit(
      err.exitCode === 0 ? 0 : getExitCode(ErrorCode.CONFIGURATION_ERROR)
    );
  }

  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  let error: LadderError;
  if (isLadderError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new InvariantError(message || 'Unexpected error');
  }

  const view = presenter.formatForCLI(error);
  console.error(renderCLIView(view));

  process.exit(error.getExitCode());
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv).catch(handleCliError);
}

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
