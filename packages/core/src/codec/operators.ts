/**
 * Edit operators on packed words.
 *
 * Every operator is a pure function of its input and returns fresh words;
 * `undefined` means "no such neighbour", never an error.
 */

import {
  FIELD,
  FIELD_BITS,
  FIELD_MASK,
  ALPHABET_SIZE,
  SHIFT_POSITIONS,
  WORD_CAPACITY,
  fromBits,
  length,
  type Word,
} from './word.js';

export type RotatePair = readonly [Word | undefined, Word | undefined];

/** Slot `i` holds the increment of letter `i`, slot `i + SHIFT_POSITIONS` its decrement. */
export const SHIFT_SLOTS = SHIFT_POSITIONS * 2;

// Mask covering the first `n` fields, indexed by n
const PREFIX_MASKS: readonly bigint[] = Array.from(
  { length: WORD_CAPACITY + 1 },
  (_, n) => (1n << BigInt(n * FIELD_BITS)) - 1n
);

const FIELD_OFFSETS: readonly bigint[] = Array.from(
  { length: WORD_CAPACITY },
  (_, idx) => BigInt(idx * FIELD_BITS)
);

function offsetOf(position: number): bigint {
  return FIELD_OFFSETS[position] ?? BigInt(position * FIELD_BITS);
}

function prefixMask(fields: number): bigint {
  return PREFIX_MASKS[fields] ?? (1n << BigInt(fields * FIELD_BITS)) - 1n;
}

/**
 * Insert a copy of the first letter right after itself.
 *
 * @param maxLength - length cap; clamped to {@link WORD_CAPACITY}
 */
export function duplFirst(word: Word, maxLength: number): Word | undefined {
  const cap = Math.min(maxLength, WORD_CAPACITY);
  if (length(word) >= cap) {
    return undefined;
  }
  return fromBits((word << FIELD) | (word & FIELD_MASK));
}

/**
 * Drop the first letter. A one-letter word has no result.
 */
export function pop(word: Word): Word | undefined {
  const rest = word >> FIELD;
  return rest === 0n ? undefined : fromBits(rest);
}

/**
 * `[left, right]`: first letter moved to the end, last letter moved to the
 * front. Periodic words can return the same value twice.
 */
export function rotate(word: Word): RotatePair {
  const len = length(word);
  if (len === 1) {
    return [undefined, undefined];
  }

  const lastOffset = offsetOf(len - 1);
  const first = word & FIELD_MASK;
  const last = word >> lastOffset;

  const left = (word >> FIELD) | (first << lastOffset);
  const right = ((word << FIELD) & prefixMask(len)) | last;
  return [fromBits(left), fromBits(right)];
}

/**
 * Cyclic one-step shifts of each of the first {@link SHIFT_POSITIONS}
 * letters ('z' wraps to 'a' and back).
 */
export function shifts(word: Word): Array<Word | undefined> {
  const out: Array<Word | undefined> = Array.from(
    { length: SHIFT_SLOTS },
    () => undefined
  );

  for (let position = 0; position < SHIFT_POSITIONS; position += 1) {
    const offset = offsetOf(position);
    const letter = Number((word >> offset) & FIELD_MASK);
    if (letter === 0) break;

    const rest = word & ~(FIELD_MASK << offset);
    const up = letter === ALPHABET_SIZE ? 1 : letter + 1;
    const down = letter === 1 ? ALPHABET_SIZE : letter - 1;

    out[position] = fromBits(rest | (BigInt(up) << offset));
    out[position + SHIFT_POSITIONS] = fromBits(rest | (BigInt(down) << offset));
  }

  return out;
}

/**
 * All one-step neighbours, in the order the search applies the operators:
 * duplicate-first, pop, the shifts, then both rotations. Duplicates are kept.
 */
export function neighbors(word: Word, maxLength: number): Word[] {
  const out: Word[] = [];
  const push = (candidate: Word | undefined): void => {
    if (candidate !== undefined) out.push(candidate);
  };

  push(duplFirst(word, maxLength));
  push(pop(word));
  for (const shifted of shifts(word)) push(shifted);
  for (const rotated of rotate(word)) push(rotated);
  return out;
}
