export { PgWorkflowHistory } from './history.repository';
export { PgRunRepository } from './run.repository';
export { InMemoryWorkflowHistory } from './in-memory-history.repository';
export { InMemoryRunStore } from './in-memory-run.repository';
export { signalKey } from './types';
export type { WorkflowHistory, RunStore, RunHeader, NewRun, CreateRunResult, CreateRunStatus } from './types';
