// public api for @briefline/sdk
// usage:
//   import { defineWorkflow, ActivityError } from '@briefline/sdk';
//   const wf = defineWorkflow({ name: 'brief', steps: [...], result: (ctx) => ... });

export * from './types';
export * from './collaborators';
export * from './errors';
export * from './schemas';
export {
    defineWorkflow,
    validateRetryPolicy,
    WorkflowRegistry,
    InvalidDefinitionError,
    WorkflowNotRegisteredError,
} from './workflow';
export type { StepDefinition, StepInputContext, WorkflowDefinition } from './workflow';
export {
    serialize,
    deserialize,
    toBuffer,
    SerializationError,
    MAX_PAYLOAD_BYTES,
} from './utils/serialization';
