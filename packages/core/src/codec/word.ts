/**
 * Packed word encoding.
 *
 * A word is stored as a 64-bit unsigned integer divided into 5-bit fields, one
 * per letter, first letter in the least-significant field. Field value 0 marks
 * the end of the word and 1..26 map to 'a'..'z'. Occupied fields always form a
 * contiguous run starting at field 0, so the encoded value is never zero and
 * equality of words is equality of integers.
 */

import { ErrorCode } from '../errors/codes.js';
import { ConfigError, InvariantError, WordError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';

declare const wordBrand: unique symbol;

/** A non-empty packed word. Only obtainable through {@link isWord}, {@link encode} or an operator. */
export type Word = bigint & { readonly [wordBrand]: true };

export const FIELD_BITS = 5;
export const ALPHABET_SIZE = 26;

/** Letters that fit in the 64-bit encoding. */
export const WORD_CAPACITY = 12;

/** Positions covered by {@link shifts}; also the longest word a search accepts. */
export const SHIFT_POSITIONS = 6;
export const MAX_SEARCH_LENGTH = SHIFT_POSITIONS;

export const FIELD = BigInt(FIELD_BITS);
export const FIELD_MASK = (1n << FIELD) - 1n;
const MAX_PACKED = (1n << BigInt(WORD_CAPACITY * FIELD_BITS)) - 1n;

// 'a' encodes as 1
const LETTER_OFFSET = 'a'.charCodeAt(0) - 1;
const FIRST_LETTER = 'a'.charCodeAt(0);
const LAST_LETTER = 'z'.charCodeAt(0);

/**
 * Full structural check: non-zero, within capacity, every field up to the
 * highest occupied one holds a letter.
 */
export function isWord(value: bigint): value is Word {
  if (value <= 0n || value > MAX_PACKED) return false;
  let bits = value;
  while (bits !== 0n) {
    const letter = bits & FIELD_MASK;
    if (letter === 0n || letter > BigInt(ALPHABET_SIZE)) return false;
    bits >>= FIELD;
  }
  return true;
}

export function assertWord(value: bigint): Word {
  if (!isWord(value)) {
    throw new InvariantError(
      `Value 0x${value.toString(16)} is not a packed word`,
      { value: value.toString() }
    );
  }
  return value;
}

/** Brand an operator result, checking it through {@link isWord}. */
export function fromBits(bits: bigint): Word {
  if (!isWord(bits)) {
    throw new InvariantError(
      `Operator produced an invalid packed value 0x${bits.toString(16)}`,
      { value: bits.toString() }
    );
  }
  return bits;
}

/**
 * Encode a lowercase word without throwing.
 *
 * @param maxLength - caller-enforced limit, a positive integer clamped to
 *   {@link WORD_CAPACITY}
 */
export function tryEncode(
  input: string,
  maxLength: number = WORD_CAPACITY
): Result<Word, WordError | ConfigError> {
  if (!Number.isInteger(maxLength) || maxLength < 1) {
    return err(
      new ConfigError({
        message: `Invalid maxLength ${maxLength}: expected a positive integer`,
        context: { setting: 'maxLength', value: maxLength },
      })
    );
  }
  const limit = Math.min(maxLength, WORD_CAPACITY);

  if (input.length === 0) {
    return err(
      new WordError({
        message: 'Word must not be empty',
        errorCode: ErrorCode.EMPTY_WORD,
        context: { input },
      })
    );
  }

  let bits = 0n;
  for (let idx = 0; idx < input.length; idx += 1) {
    const code = input.charCodeAt(idx);
    if (code < FIRST_LETTER || code > LAST_LETTER) {
      return err(
        new WordError({
          message: `Word "${input}" contains "${input.charAt(idx)}" at index ${idx}; only a-z are allowed`,
          errorCode: ErrorCode.INVALID_LETTER,
          context: {
            input,
            position: idx,
            suggestion: 'Use lowercase Latin letters only',
          },
        })
      );
    }
    bits |= BigInt(code - LETTER_OFFSET) << BigInt(idx * FIELD_BITS);
  }

  if (input.length > limit) {
    return err(
      new WordError({
        message: `Word "${input}" has ${input.length} letters; at most ${limit} are supported`,
        errorCode: ErrorCode.WORD_TOO_LONG,
        context: { input, limit },
      })
    );
  }

  return ok(fromBits(bits));
}

/**
 * Encode a lowercase word, throwing {@link WordError} on invalid input and
 * {@link ConfigError} on an invalid limit.
 */
export function encode(input: string, maxLength: number = WORD_CAPACITY): Word {
  return tryEncode(input, maxLength).unwrap();
}

export function decode(word: Word): string {
  let out = '';
  let bits: bigint = word;
  while (bits !== 0n) {
    out += String.fromCharCode(Number(bits & FIELD_MASK) + LETTER_OFFSET);
    bits >>= FIELD;
  }
  return out;
}

/**
 * Number of letters, from the bit length of the encoded value.
 */
export function length(word: Word): number {
  const high = Number(word >> 32n);
  const bitLength =
    high !== 0
      ? 64 - Math.clz32(high)
      : 32 - Math.clz32(Number(word & 0xffffffffn));
  return Math.ceil(bitLength / FIELD_BITS);
}
