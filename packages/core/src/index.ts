// @wordhop/core entry point
//
// - Word codec: packed encoding of lowercase words and the four edit operators.
// - Ladder search: breadth-first shortest edit path between two words.
// - Errors, options and metrics shared with the CLI.

// Codec
export {
  encode,
  tryEncode,
  decode,
  length,
  isWord,
  assertWord,
  fromBits,
  FIELD_BITS,
  ALPHABET_SIZE,
  WORD_CAPACITY,
  SHIFT_POSITIONS,
  MAX_SEARCH_LENGTH,
  type Word,
} from './codec/word.js';
export {
  duplFirst,
  pop,
  rotate,
  shifts,
  neighbors,
  SHIFT_SLOTS,
  type RotatePair,
} from './codec/operators.js';

// Search
export { findLadder, reconstructPath } from './search/ladder.js';
export { VisitedMap } from './search/visited-map.js';
export type {
  VisitEntry,
  ExhaustionReason,
  LadderFound,
  LadderExhausted,
  LadderResult,
  LevelProgress,
} from './search/types.js';

// Options
export {
  resolveSearchOptions,
  DEFAULT_SEARCH_OPTIONS,
  DEFAULT_MAX_DEPTH,
  MAX_DEPTH_LIMIT,
  type SearchOptions,
  type ResolvedSearchOptions,
} from './types/options.js';

// Errors
export { ErrorCode, EXIT_CODES, type Severity, getExitCode } from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
  type ProductionView,
} from './errors/presenter.js';
export {
  LadderError,
  WordError,
  ConfigError,
  ParseError,
  InvariantError,
  isLadderError,
  type ErrorContext,
  type SerializedError,
  type UserError,
} from './types/errors.js';
export {
  Ok,
  Err,
  ok,
  err,
  isOk,
  isErr,
  type Result,
} from './types/result.js';

// Metrics
export {
  MetricsCollector,
  METRIC_PHASES,
  type MetricPhase,
  type MetricsSnapshot,
  type MetricsCollectorOptions,
  type LadderBfsMetrics,
} from './util/metrics.js';
