import type { Word } from '../codec/word.js';
import type { VisitEntry } from './types.js';

/**
 * First-discovery record of a single search run. Entries are never replaced
 * or removed; the first insert for a word decides its depth and predecessor.
 */
export class VisitedMap {
  private readonly entries = new Map<Word, VisitEntry>();

  /** Returns true when the word was new and has been recorded. */
  insertIfAbsent(word: Word, entry: VisitEntry): boolean {
    if (this.entries.has(word)) {
      return false;
    }
    this.entries.set(word, entry);
    return true;
  }

  get(word: Word): VisitEntry | undefined {
    return this.entries.get(word);
  }

  has(word: Word): boolean {
    return this.entries.has(word);
  }

  get size(): number {
    return this.entries.size;
  }
}
