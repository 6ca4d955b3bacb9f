/**
 * Breadth-first ladder search over packed words.
 *
 * The graph is implicit: the neighbours of a word are the results of the four
 * edit operators. Levels are expanded whole, in order, so the first level at
 * which the target appears is its distance from the start. Each discovered
 * word stores only its depth and predecessor; the path is rebuilt by walking
 * predecessors back from the target once it has been found.
 */

import { duplFirst, pop, rotate, shifts } from '../codec/operators.js';
import {
  MAX_SEARCH_LENGTH,
  decode,
  encode,
  type Word,
} from '../codec/word.js';
import { InvariantError } from '../types/errors.js';
import {
  resolveSearchOptions,
  type ResolvedSearchOptions,
  type SearchOptions,
} from '../types/options.js';
import type {
  ExhaustionReason,
  LadderExhausted,
  LadderFound,
  LadderResult,
} from './types.js';
import { VisitedMap } from './visited-map.js';

interface Endpoints {
  start: string;
  target: string;
  startWord: Word;
  targetWord: Word;
}

/**
 * Find a shortest edit ladder from `start` to `target`.
 *
 * Invalid words and options throw before any search starts. Running out of
 * levels or of new words is reported as an `exhausted` result.
 */
export function findLadder(
  start: string,
  target: string,
  options: SearchOptions = {}
): LadderResult {
  const metrics = options.metrics;

  metrics?.begin('ENCODE');
  let endpoints: Endpoints;
  try {
    endpoints = {
      start,
      target,
      startWord: encode(start, MAX_SEARCH_LENGTH),
      targetWord: encode(target, MAX_SEARCH_LENGTH),
    };
  } finally {
    metrics?.end('ENCODE');
  }

  const resolved = resolveSearchOptions(
    options,
    Math.max(start.length, target.length)
  );
  return runSearch(endpoints, resolved);
}

function runSearch(
  endpoints: Endpoints,
  options: ResolvedSearchOptions
): LadderResult {
  const { startWord, targetWord } = endpoints;
  const { maxDepth, maxLength, onLevel, metrics } = options;

  const visited = new VisitedMap();
  visited.insertIfAbsent(startWord, { depth: 0, predecessor: startWord });

  let frontier: Word[] = [startWord];
  let depth = 0;
  let nodesExpanded = 0;
  let frontierPeak = frontier.length;

  const finish = (result: LadderResult): LadderResult => {
    metrics?.recordLadderBfs({
      levels: depth,
      nodesExpanded,
      frontierPeak,
      visitedCount: visited.size,
      found: result.status === 'found',
    });
    return result;
  };

  if (startWord === targetWord) {
    return finish(found(endpoints, visited, options));
  }

  metrics?.begin('SEARCH');
  let reason: ExhaustionReason = 'depth-bound';
  try {
    while (depth < maxDepth) {
      depth += 1;
      const next: Word[] = [];

      for (const word of frontier) {
        nodesExpanded += 1;
        const discover = (candidate: Word | undefined): void => {
          if (
            candidate !== undefined &&
            visited.insertIfAbsent(candidate, { depth, predecessor: word })
          ) {
            next.push(candidate);
          }
        };

        discover(duplFirst(word, maxLength));
        discover(pop(word));
        for (const shifted of shifts(word)) discover(shifted);
        for (const rotated of rotate(word)) discover(rotated);
      }

      // Checked once per completed level, never mid-level.
      const targetFound = visited.has(targetWord);
      onLevel?.({
        depth,
        frontierSize: next.length,
        visitedCount: visited.size,
        targetFound,
      });

      if (targetFound) {
        break;
      }
      // Every word within the cap connects to every other (pop down to one
      // letter, shifts, then duplicate-first and a first-letter shift per added
      // letter), so with both endpoints within the cap the target is reached
      // before this can happen.
      if (next.length === 0) {
        reason = 'frontier-empty';
        break;
      }

      frontier = next;
      frontierPeak = Math.max(frontierPeak, next.length);
    }
  } finally {
    metrics?.end('SEARCH');
  }

  if (visited.has(targetWord)) {
    return finish(found(endpoints, visited, options));
  }
  return finish(exhausted(endpoints, reason, depth, maxDepth, visited));
}

function found(
  endpoints: Endpoints,
  visited: VisitedMap,
  options: ResolvedSearchOptions
): LadderFound {
  options.metrics?.begin('RECONSTRUCT');
  let words: Word[];
  try {
    words = reconstructPath(visited, endpoints.startWord, endpoints.targetWord);
  } finally {
    options.metrics?.end('RECONSTRUCT');
  }

  return {
    status: 'found',
    start: endpoints.start,
    target: endpoints.target,
    path: words.map(decode),
    words,
    depth: words.length - 1,
    visitedCount: visited.size,
  };
}

function exhausted(
  endpoints: Endpoints,
  reason: ExhaustionReason,
  depth: number,
  maxDepth: number,
  visited: VisitedMap
): LadderExhausted {
  return {
    status: 'exhausted',
    start: endpoints.start,
    target: endpoints.target,
    reason,
    depth,
    maxDepth,
    visitedCount: visited.size,
  };
}

/**
 * Walk predecessors from `target` back to `start` and return the words in
 * start-to-target order.
 *
 * @throws {InvariantError} When the chain is broken or does not match the
 *   recorded depth of the target
 */
export function reconstructPath(
  visited: VisitedMap,
  start: Word,
  target: Word
): Word[] {
  const targetEntry = visited.get(target);
  if (!targetEntry) {
    throw new InvariantError(
      `Target "${decode(target)}" was never discovered`
    );
  }

  const reversed: Word[] = [target];
  let current = target;
  while (current !== start) {
    const entry = visited.get(current);
    if (!entry) {
      throw new InvariantError(
        `No predecessor recorded for "${decode(current)}"`
      );
    }
    if (entry.predecessor === current || reversed.length > visited.size) {
      throw new InvariantError(
        `Predecessor chain from "${decode(target)}" never reaches "${decode(start)}"`
      );
    }
    current = entry.predecessor;
    reversed.push(current);
  }

  if (reversed.length - 1 !== targetEntry.depth) {
    throw new InvariantError(
      `Path to "${decode(target)}" has ${reversed.length - 1} steps but was discovered at depth ${targetEntry.depth}`
    );
  }

  return reversed.reverse();
}
