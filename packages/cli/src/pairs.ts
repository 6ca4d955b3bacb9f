/**
 * Pair lists for `wordhop batch`.
 *
 * Text files hold one `start target` pair per line; `#` starts a comment and
 * blank lines are skipped. Files ending in `.json` hold
 * `{ "pairs": [{ "start", "target", "maxLength"? }] }` and are checked
 * against a JSON Schema before use.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import AjvModule, { type JSONSchemaType } from 'ajv';
import {
  ConfigError,
  ParseError,
  err,
  ok,
  type Result,
} from '@wordhop/core';

import type { SortOrder } from './flags.js';

// ajv is CommonJS; under NodeNext the class sits on the default export.
const Ajv = AjvModule.default;

export interface LadderPair {
  start: string;
  target: string;
  maxLength?: number;
  /** 1-based line (text files) or entry number (JSON files). */
  position: number;
}

export type PairFormat = 'text' | 'json';

interface PairFileEntry {
  start: string;
  target: string;
  maxLength?: number;
}

interface PairFile {
  pairs: PairFileEntry[];
}

const pairFileSchema: JSONSchemaType<PairFile> = {
  type: 'object',
  properties: {
    pairs: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          start: { type: 'string', minLength: 1 },
          target: { type: 'string', minLength: 1 },
          maxLength: { type: 'integer', minimum: 1, nullable: true },
        },
        required: ['start', 'target'],
        additionalProperties: false,
      },
    },
  },
  required: ['pairs'],
  additionalProperties: false,
};

const ajv = new Ajv({ allErrors: true });
const validatePairFile = ajv.compile(pairFileSchema);

const EXCERPT_LIMIT = 40;

function excerpt(line: string): string {
  return line.length > EXCERPT_LIMIT ? `${line.slice(0, EXCERPT_LIMIT)}…` : line;
}

export function parseTextPairs(text: string): Result<LadderPair[], ParseError> {
  const pairs: LadderPair[] = [];
  const lines = text.split(/\r?\n/);

  for (let idx = 0; idx < lines.length; idx += 1) {
    const raw = lines[idx] ?? '';
    const content = raw.replace(/#.*$/, '').trim();
    if (content === '') continue;

    const fields = content.split(/\s+/);
    const [start, target] = fields;
    if (fields.length !== 2 || start === undefined || target === undefined) {
      return err(
        new ParseError({
          message: `Expected "start target" on line ${idx + 1}, found ${fields.length} field(s)`,
          context: {
            input: raw,
            position: idx + 1,
            valueExcerpt: excerpt(raw),
            suggestion: 'Write one pair per line, separated by whitespace',
          },
        })
      );
    }
    pairs.push({ start, target, position: idx + 1 });
  }

  return ok(pairs);
}

export function parseJsonPairs(text: string): Result<LadderPair[], ParseError> {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    return err(
      new ParseError({
        message: 'Pair file is not valid JSON',
        context: { valueExcerpt: excerpt(text.trim()) },
        cause: error instanceof Error ? error : undefined,
      })
    );
  }

  if (!validatePairFile(data)) {
    return err(
      new ParseError({
        message: `Pair file does not match the schema: ${ajv.errorsText(validatePairFile.errors)}`,
        context: {
          suggestion:
            'Expected { "pairs": [{ "start": "...", "target": "..." }] }',
        },
      })
    );
  }

  return ok(
    data.pairs.map((entry, idx) => {
      const pair: LadderPair = {
        start: entry.start,
        target: entry.target,
        position: idx + 1,
      };
      if (typeof entry.maxLength === 'number') {
        pair.maxLength = entry.maxLength;
      }
      return pair;
    })
  );
}

export function parsePairs(
  text: string,
  format: PairFormat
): Result<LadderPair[], ParseError> {
  return format === 'json' ? parseJsonPairs(text) : parseTextPairs(text);
}

export function detectPairFormat(file: string): PairFormat {
  return path.extname(file).toLowerCase() === '.json' ? 'json' : 'text';
}

/**
 * Read and parse a pair list from disk.
 *
 * @throws {ConfigError} When the file cannot be read
 * @throws {ParseError} When its contents are malformed
 */
export async function loadPairs(file: string): Promise<LadderPair[]> {
  const abs = path.resolve(process.cwd(), file);
  let text: string;
  try {
    text = await readFile(abs, 'utf8');
  } catch (error) {
    throw new ConfigError({
      message: `Pair file not found or unreadable: ${abs}`,
      context: { setting: '--pairs', value: file },
      cause: error instanceof Error ? error : undefined,
    });
  }
  return parsePairs(text, detectPairFormat(abs)).unwrap();
}

/**
 * Order pairs for a batch run. `length` puts shorter searches first, keeping
 * input order among pairs of equal length.
 */
export function sortPairs(
  pairs: readonly LadderPair[],
  order: SortOrder
): LadderPair[] {
  const copy = [...pairs];
  if (order === 'none') return copy;
  const longest = (pair: LadderPair): number =>
    Math.max(pair.start.length, pair.target.length);
  return copy.sort((a, b) => longest(a) - longest(b));
}
