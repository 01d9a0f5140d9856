export { QueueService } from './queue.service';
export type { EnqueueInput, EnqueueResult, QueueStats, ReapedTask, QueueServiceOptions } from './queue.service';
export { ProgressService } from './progress.service';
export { SubmissionService } from './submission.service';
export { QueueWorker } from './worker';
export type { WorkerState, WorkerStatus } from './worker';
export { HeartbeatService } from './heartbeat.service';
export { LeaderElector } from './leaderelector';
export type { Leadership } from './leaderelector';
export { Reaper } from './reaper';
export { PipelineExecutor } from './pipeline-executor';
export type { PipelineRunner } from './pipeline-executor';
