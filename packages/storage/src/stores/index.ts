export { RunHistoryStore } from './run-history.js';
export type { RunSummary, ListRunsOptions } from './run-history.js';
