import * as fc from "fast-check";

const DEFAULT_NUM_RUNS = 100;

const numRuns = process.env.FAST_CHECK_NUM_RUNS ? parseInt(process.env.FAST_CHECK_NUM_RUNS, 10) : DEFAULT_NUM_RUNS;

fc.configureGlobal({
  numRuns,
  verbose: process.env.FAST_CHECK_VERBOSE === "true",
});

export const propertyTestConfig = { numRuns };
