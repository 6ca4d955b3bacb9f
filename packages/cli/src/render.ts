import type {
  CLIErrorView,
  LadderExhausted,
  LadderFound,
  LadderResult,
  LevelProgress,
} from '@wordhop/core';

// Minimal ANSI helpers (no external deps)
const ANSI = {
  reset: '\u001B[0m',
  red: '\u001B[31m',
  bold: '\u001B[1m',
};

function colorize(text: string, useColor: boolean, color: string): string {
  if (!useColor) return text;
  return `${color}${text}${ANSI.reset}`;
}

function wrapText(text: string, width: number): string {
  if (!text) return '';
  const words = text.split(/\s+/);
  const lines: string[] = [];
  let line = '';
  for (const word of words) {
    if ((line + (line ? ' ' : '') + word).length > width) {
      if (line) lines.push(line);
      line = word;
    } else {
      line = line ? `${line} ${word}` : word;
    }
  }
  if (line) lines.push(line);
  return lines.join('\n');
}

export function renderCLIView(view: CLIErrorView): string {
  const width = view.terminalWidth || 80;
  const lines: string[] = [];

  const title = `❌ ${view.title}`;
  lines.push(
    colorize(colorize(title, view.colors, ANSI.bold), view.colors, ANSI.red)
  );

  if (view.location) {
    lines.push(wrapText(`📍 ${view.location}`, width));
  }
  if (view.excerpt) {
    lines.push(wrapText(`Excerpt: ${view.excerpt}`, width));
  }
  if (view.workaround) {
    lines.push(wrapText(`💡 Workaround: ${view.workaround}`, width));
  }

  return lines.join('\n');
}

export function stripAnsi(input: string): string {
  const ansiRe =
    /[\u001B\u009B][[\]()#;?]*(?:\d{1,4}(?:;\d{0,4})*)?[\dA-PR-TZcf-ntqry=><~]/g; // eslint-disable-line no-control-regex
  return input.replace(ansiRe, '');
}

/**
 * One line per search, shared by stdout and the batch log.
 */
export function formatLadderLine(result: LadderResult): string {
  const head = `${result.start} -> ${result.target}`;
  if (result.status === 'found') {
    return `${head}: found in ${result.depth} steps: ${result.path.join(' ')}`;
  }
  return `${head}: no path within ${result.depth} levels (${result.reason})`;
}

/** JSON-safe view of a result; packed words are bigints and stay out. */
export type LadderRecord = Omit<LadderFound, 'words'> | LadderExhausted;

export function toLadderRecord(result: LadderResult): LadderRecord {
  if (result.status === 'exhausted') {
    return result;
  }
  return {
    status: result.status,
    start: result.start,
    target: result.target,
    path: result.path,
    depth: result.depth,
    visitedCount: result.visitedCount,
  };
}

export function formatLevelProgress(progress: LevelProgress): string {
  const suffix = progress.targetFound ? ', target found' : '';
  return `[wordhop] level ${progress.depth}: frontier ${progress.frontierSize}, visited ${progress.visitedCount}${suffix}`;
}

export default renderCLIView;
