import fc from 'fast-check';

// ============================================================================
// DETERMINISTIC PROPERTY TESTING
// ============================================================================

const seed = Number.parseInt(process.env.TEST_SEED ?? '424242', 10);
const numRuns = Number.parseInt(process.env.FC_NUM_RUNS ?? '100', 10);

if (Number.isNaN(seed)) {
  throw new Error(`Invalid TEST_SEED: ${process.env.TEST_SEED}`);
}
if (Number.isNaN(numRuns) || numRuns < 1) {
  throw new Error(`Invalid FC_NUM_RUNS: ${process.env.FC_NUM_RUNS}`);
}

fc.configureGlobal({ seed, numRuns });
