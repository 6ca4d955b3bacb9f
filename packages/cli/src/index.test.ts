import { mkdtemp, rm, writeFile, readFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { ErrorCode, getExitCode } from '@wordhop/core';
import { createProgram, main } from './index.js';
import { stripAnsi } from './render.js';

class ExitSignal extends Error {
  constructor(readonly code: number) {
    super(`EXIT:${code}`);
  }
}

interface CliRun {
  stdout: string;
  stderr: string;
  errors: string;
  exitCode: number | undefined;
}

async function capture(run: () => Promise<void>): Promise<CliRun> {
  const stdoutChunks: string[] = [];
  const stderrChunks: string[] = [];
  const errorChunks: string[] = [];
  let exitCode: number | undefined;

  const stdoutSpy = vi
    .spyOn(process.stdout, 'write')
    .mockImplementation((chunk: string | Uint8Array) => {
      stdoutChunks.push(String(chunk));
      return true;
    });
  const stderrSpy = vi
    .spyOn(process.stderr, 'write')
    .mockImplementation((chunk: string | Uint8Array) => {
      stderrChunks.push(String(chunk));
      return true;
    });
  const consoleErrorSpy = vi
    .spyOn(console, 'error')
    .mockImplementation((...args: unknown[]) => {
      errorChunks.push(args.map(String).join(' '));
    });
  const exitSpy = vi
    .spyOn(process, 'exit')
    .mockImplementation((code?: string | number | null): never => {
      throw new ExitSignal(Number(code ?? 0));
    });

  try {
    await run();
  } catch (error) {
    if (!(error instanceof ExitSignal)) throw error;
    exitCode = error.code;
  } finally {
    stdoutSpy.mockRestore();
    stderrSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    exitSpy.mockRestore();
  }

  return {
    stdout: stdoutChunks.join(''),
    stderr: stderrChunks.join(''),
    errors: stripAnsi(errorChunks.join('\n')),
    exitCode,
  };
}

function runCli(args: string[]): Promise<CliRun> {
  return capture(async () => {
    await createProgram().parseAsync(args, { from: 'user' });
  });
}

describe('wordhop solve', () => {
  it('prints the ladder and exits normally when a path exists', async () => {
    const run = await runCli(['solve', 'a', 'c']);

    expect(run.stdout).toBe('a -> c: found in 2 steps: a b c\n');
    expect(run.exitCode).toBeUndefined();
    expect(run.stderr).toBe('');
  });

  it('exits with 1 when the depth bound is reached', async () => {
    const run = await runCli(['solve', 'a', 'n', '--max-depth', '5']);

    expect(run.stdout).toBe('a -> n: no path within 5 levels (depth-bound)\n');
    expect(run.exitCode).toBe(1);
  });

  it('writes a JSON record with --out json', async () => {
    const run = await runCli(['solve', 'a', 'c', '--out', 'json']);

    expect(JSON.parse(run.stdout)).toEqual({
      status: 'found',
      start: 'a',
      target: 'c',
      path: ['a', 'b', 'c'],
      depth: 2,
      visitedCount: 5,
    });
  });

  it('reports each level on stderr with --progress', async () => {
    const run = await runCli(['solve', 'a', 'c', '--progress']);

    expect(run.stderr).toBe(
      '[wordhop] level 1: frontier 2, visited 3\n' +
        '[wordhop] level 2: frontier 2, visited 5, target found\n'
    );
  });

  it('prints metrics as a single stderr line with --print-metrics', async () => {
    const run = await runCli(['solve', 'a', 'c', '--print-metrics']);

    const prefix = '[wordhop] metrics: ';
    const line = run.stderr.split('\n').find((l) => l.startsWith(prefix));
    expect(line).toBeDefined();
    const metrics: unknown = JSON.parse((line ?? '').slice(prefix.length));
    expect(metrics).toMatchObject({
      searches: 1,
      laddersFound: 1,
      ladderLevels: 2,
      ladderNodesExpanded: 3,
    });
  });

  it('renders word errors with their exit code', async () => {
    const run = await runCli(['solve', 'Ab', 'c']);

    expect(run.exitCode).toBe(getExitCode(ErrorCode.INVALID_LETTER));
    expect(run.errors).toContain(
      'Error E002: Word "Ab" contains "A" at index 0; only a-z are allowed'
    );
    expect(run.errors).toContain('Location: index 0 of "Ab"');
    expect(run.errors).toContain('Workaround: Use lowercase Latin letters only');
    expect(run.stdout).toBe('');
  });

  it('rejects endpoints longer than six letters', async () => {
    const run = await runCli(['solve', 'abcdefg', 'a']);
    expect(run.exitCode).toBe(12);
  });

  it('rejects a length cap below an endpoint length', async () => {
    const run = await runCli(['solve', 'ab', 'abc', '--max-length', '2']);

    expect(run.exitCode).toBe(50);
    expect(run.errors).toContain(
      'maxLength 2 is shorter than an endpoint word (3 letters)'
    );
  });

  it('rejects malformed numeric flags', async () => {
    const run = await runCli(['solve', 'a', 'b', '--max-depth', 'nope']);

    expect(run.exitCode).toBe(50);
    expect(run.errors).toContain(
      'Invalid --max-depth value "nope". Expected an integer.'
    );
  });

  it('rejects unknown output formats', async () => {
    const run = await runCli(['solve', 'a', 'b', '--out', 'xml']);
    expect(run.exitCode).toBe(50);
  });
});

describe('wordhop batch', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'wordhop-cli-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writePairs(name: string, content: string): Promise<string> {
    const file = path.join(dir, name);
    await writeFile(file, content, 'utf8');
    return file;
  }

  it('runs shorter pairs first and appends to the log', async () => {
    const pairs = await writePairs('pairs.txt', '# sample\nab ba\na c\n');
    const log = path.join(dir, 'results.log');
    await writeFile(log, 'previous run\n', 'utf8');

    const run = await runCli(['batch', '--pairs', pairs, '--log', log]);

    const expected =
      'a -> c: found in 2 steps: a b c\n' + 'ab -> ba: found in 1 steps: ab ba\n';
    expect(run.exitCode).toBeUndefined();
    expect(run.stdout).toBe(expected);
    expect(await readFile(log, 'utf8')).toBe(`previous run\n${expected}`);
    expect(run.stderr).toContain(
      '[wordhop] batch: 2 pairs, 2 found, 0 without a path\n'
    );
  });

  it('keeps file order with --sort none', async () => {
    const pairs = await writePairs('pairs.txt', 'ab ba\na c\n');

    const run = await runCli(['batch', '--pairs', pairs, '--sort', 'none']);

    expect(run.stdout).toBe(
      'ab -> ba: found in 1 steps: ab ba\n' + 'a -> c: found in 2 steps: a b c\n'
    );
  });

  it('reads JSON pair files with per-pair caps', async () => {
    const pairs = await writePairs(
      'pairs.json',
      JSON.stringify({ pairs: [{ start: 'ab', target: 'ba', maxLength: 3 }] })
    );

    const run = await runCli(['batch', '--pairs', pairs, '--out', 'json']);

    const lines = run.stdout.trim().split('\n');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({
      status: 'found',
      path: ['ab', 'ba'],
      depth: 1,
    });
  });

  it('exits with 1 when some pair has no path', async () => {
    const pairs = await writePairs('pairs.txt', 'a c\na n\n');

    const run = await runCli(['batch', '--pairs', pairs, '--max-depth', '3']);

    expect(run.stdout).toBe(
      'a -> c: found in 2 steps: a b c\n' +
        'a -> n: no path within 3 levels (depth-bound)\n'
    );
    expect(run.exitCode).toBe(1);
    expect(run.stderr).toContain('2 pairs, 1 found, 1 without a path');
  });

  it('validates every pair before searching', async () => {
    const pairs = await writePairs('pairs.txt', 'a c\nab x1\n');

    const run = await runCli(['batch', '--pairs', pairs]);

    expect(run.exitCode).toBe(11);
    expect(run.stdout).toBe('');
  });

  it('reports malformed lines as parse errors', async () => {
    const pairs = await writePairs('pairs.txt', 'a c\nlonely\n');

    const run = await runCli(['batch', '--pairs', pairs]);

    expect(run.exitCode).toBe(60);
    expect(run.errors).toContain('Location: line 2');
  });

  it('reports schema violations in JSON pair files', async () => {
    const pairs = await writePairs('pairs.json', '{"pairs":[{"start":"a"}]}');

    const run = await runCli(['batch', '--pairs', pairs]);

    expect(run.exitCode).toBe(60);
    expect(run.errors).toContain("must have required property 'target'");
  });

  it('rejects an unwritable log before any search runs', async () => {
    const pairs = await writePairs('pairs.txt', 'a c\n');
    const log = path.join(dir, 'missing', 'results.log');

    const run = await runCli(['batch', '--pairs', pairs, '--log', log]);

    expect(run.exitCode).toBe(getExitCode(ErrorCode.CONFIGURATION_ERROR));
    expect(run.stdout).toBe('');
    expect(run.errors).toContain('Error E300: Log file cannot be written');
  });

  it('fails with a configuration error for a missing file', async () => {
    const run = await runCli([
      'batch',
      '--pairs',
      path.join(dir, 'missing.txt'),
    ]);

    expect(run.exitCode).toBe(50);
    expect(run.errors).toContain('Pair file not found or unreadable');
  });
});

describe('main', () => {
  it('maps commander usage errors to the configuration exit code', async () => {
    const run = await capture(() => main(['node', 'wordhop', 'batch']));

    expect(run.exitCode).toBe(50);
    expect(run.stderr).toContain("required option '-p, --pairs <file>'");
  });
});
