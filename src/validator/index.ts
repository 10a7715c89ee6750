/**
 * Differential Validator exports
 */

export { loadFixtures } from './fixtures.js';
export { compareBytes, firstDivergence, hexContext, CONTEXT_BYTES, type ByteComparison } from './compare.js';
export { runPool, defaultConcurrency, type PoolResult } from './pool.js';
export { validateCorpus, checkFixture, summarize, type ValidateOptions } from './validator.js';
export { mismatchErrors, formatFixture, formatSummary } from './report.js';
