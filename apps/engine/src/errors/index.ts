export { ConflictError } from './conflict.error';
export { RunNotFoundError } from './run-not-found.error';
export { HistoryMismatchError } from './history-mismatch.error';
