import fc from 'fast-check';

/**
 * Per-file setup: pins fast-check to a reproducible seed so property tests
 * fail the same way locally and in CI.
 */
const seed = Number.parseInt(process.env.TEST_SEED ?? '424242', 10);
const numRuns = Number.parseInt(process.env.FC_NUM_RUNS ?? '100', 10);

fc.configureGlobal({
  seed: Number.isNaN(seed) ? 424242 : seed,
  numRuns: Number.isNaN(numRuns) ? 100 : numRuns,
});
