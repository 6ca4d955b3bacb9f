import type { Word } from '../codec/word.js';

export interface VisitEntry {
  /** BFS level at which the word was first discovered (0 for the start). */
  readonly depth: number;
  /** Word it was discovered from; the start word is its own predecessor. */
  readonly predecessor: Word;
}

export type ExhaustionReason = 'depth-bound' | 'frontier-empty';

export interface LadderFound {
  status: 'found';
  start: string;
  target: string;
  /** Decoded words from start to target inclusive. */
  path: string[];
  words: Word[];
  /** Number of edits, equal to the level the target was discovered at. */
  depth: number;
  visitedCount: number;
}

export interface LadderExhausted {
  status: 'exhausted';
  start: string;
  target: string;
  reason: ExhaustionReason;
  /** Levels expanded before giving up. */
  depth: number;
  maxDepth: number;
  visitedCount: number;
}

export type LadderResult = LadderFound | LadderExhausted;

export interface LevelProgress {
  depth: number;
  frontierSize: number;
  visitedCount: number;
  targetFound: boolean;
}
