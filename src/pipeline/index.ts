export type { RunOptions, RunResult } from './run.js';
export { runBucket, runStage } from './run.js';
