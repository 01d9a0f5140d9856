// public api for @ingestq/sdk
// usage:
//   import { pipeline, PermanentPipelineError } from '@ingestq/sdk';
//   pipeline('file_ingestion', async (ctx) => { ... });

export * from './types';
export { pipeline, pipelineRegistry, isTaskType } from './pipeline';
export type { Pipeline } from './pipeline';
export { PipelineError, PermanentPipelineError, toErrorInfo, fromErrorInfo } from './errors';
export type { ErrorInfo } from './errors';
export { serialize, deserialize, toBytes, fromBytes, SerializationError } from './utils/serialization';
