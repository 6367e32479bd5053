export { ActivityExecutor, classifyError } from './activity-executor';
export type { ActivityHandler, ActivityHandlers, ActivityOutcome, ErrorClassifier } from './activity-executor';
export { createActivityHandlers } from './activities';
export type { ActivityDependencies } from './activities';
export { WorkflowEngine, decide, stateOf, stepCursor } from './workflow-engine';
export type { Decision, DecisionType, RunContext, WorkflowRunView } from './workflow-engine';
export { Scheduler } from './scheduler';
export type { SchedulerOptions } from './scheduler';
export { IntakeService } from './intake.service';
export type { IntakeResult, IntakeOptions, RejectionReason } from './intake.service';
export { SignalPoller } from './poller';
export { Reaper } from './reaper';
export type { ReapedAttempt } from './reaper';
export { LeaderElector } from './leaderelector';
export { EventLoopMonitor } from './event-loop-monitor';
export { ConsoleSink, CompositeSink, RedisPublishSink, RecordingSink, emitSafely } from './observability';
export {
    IdempotentDeliveryService,
    InMemoryDeliveryLedger,
    RedisDeliveryLedger,
} from './delivery-ledger';
export type { DeliveryLedger, LedgerEntry } from './delivery-ledger';
