// History contains a step the workflow definition does not know about;
// replaying it would not be deterministic.
export class HistoryMismatchError extends Error {
    constructor(
        public readonly runId: string,
        public readonly workflowName: string,
        stepName: string,
    ) {
        super(`Run ${runId} has a record for step "${stepName}" that workflow "${workflowName}" does not define`);
        this.name = 'HistoryMismatchError';
    }
}
