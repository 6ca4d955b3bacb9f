import { describe, it, expect } from 'vitest';
import {
  ErrorCode,
  encode,
  type CLIErrorView,
  type LadderResult,
} from '@wordhop/core';
import {
  formatLadderLine,
  formatLevelProgress,
  renderCLIView,
  stripAnsi,
  toLadderRecord,
} from './render.js';

describe('renderCLIView', () => {
  it('renders title and sections with wrapping', () => {
    const view: CLIErrorView = {
      title: 'Error E400: Expected "start target" on line 2, found 1 field(s)',
      code: ErrorCode.PARSE_ERROR,
      location: 'Location: line 2',
      excerpt: 'lonely',
      workaround: 'Write one pair per line, separated by whitespace',
      colors: false,
      terminalWidth: 30,
    };

    expect(renderCLIView(view)).toBe(
      [
        '❌ Error E400: Expected "start target" on line 2, found 1 field(s)',
        '📍 Location: line 2',
        'Excerpt: lonely',
        '💡 Workaround: Write one pair',
        'per line, separated by',
        'whitespace',
      ].join('\n')
    );
  });

  it('applies ANSI colors when enabled', () => {
    const view: CLIErrorView = {
      title: 'Error E500: Internal error',
      code: ErrorCode.INTERNAL_ERROR,
      colors: true,
      terminalWidth: 80,
    };
    const out = renderCLIView(view);

    expect(out.includes('\u001B[31m')).toBe(true);
    expect(stripAnsi(out)).toBe('❌ Error E500: Internal error');
  });
});

describe('ladder result lines', () => {
  const found: LadderResult = {
    status: 'found',
    start: 'ab',
    target: 'ba',
    path: ['ab', 'ba'],
    words: [encode('ab'), encode('ba')],
    depth: 1,
    visitedCount: 8,
  };
  const exhausted: LadderResult = {
    status: 'exhausted',
    start: 'a',
    target: 'n',
    reason: 'depth-bound',
    depth: 5,
    maxDepth: 5,
    visitedCount: 11,
  };

  it('formats found and exhausted results', () => {
    expect(formatLadderLine(found)).toBe('ab -> ba: found in 1 steps: ab ba');
    expect(formatLadderLine(exhausted)).toBe(
      'a -> n: no path within 5 levels (depth-bound)'
    );
  });

  it('drops packed words from JSON records', () => {
    expect(toLadderRecord(found)).toEqual({
      status: 'found',
      start: 'ab',
      target: 'ba',
      path: ['ab', 'ba'],
      depth: 1,
      visitedCount: 8,
    });
    expect(toLadderRecord(exhausted)).toBe(exhausted);
    expect(() => JSON.stringify(toLadderRecord(found))).not.toThrow();
  });

  it('formats level progress', () => {
    expect(
      formatLevelProgress({
        depth: 3,
        frontierSize: 40,
        visitedCount: 61,
        targetFound: false,
      })
    ).toBe('[wordhop] level 3: frontier 40, visited 61');
  });
});
