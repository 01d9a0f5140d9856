import "dotenv/config";
import { createPool, createRedis } from "./db";
import { loadConfig } from "./config";
import { createGrpcServer, startGrpcServer, stopGrpcServer } from "./grpc/server";
import { HealthService } from "./grpc/health.service";
import { IngestServiceImpl } from "./grpc/ingest.service";
import { TaskRepository } from "./repositories/task.repository";
import { ProgressRepository } from "./repositories/progress.repository";
import {
  QueueService,
  ProgressService,
  SubmissionService,
  QueueWorker,
  HeartbeatService,
  LeaderElector,
  Reaper,
  PipelineExecutor,
} from "./services";
import { runTask } from "./task-runner";

const TAG = "[ingestq]";

const config = loadConfig();

// Wiring
const pool = createPool(config.databaseUrl);
const redis = createRedis(config.redisUrl);

pool.on("error", (err) => console.error(`${TAG} idle client error:`, err));

const taskRepo = new TaskRepository(pool);
const progressRepo = new ProgressRepository(pool);

const queue = new QueueService(taskRepo, {
  maxRetries: config.maxRetries,
  backoff: config.retryBackoff,
});
const progress = new ProgressService(progressRepo, taskRepo);
const submissions = new SubmissionService(queue, progress);

const heartbeat = new HeartbeatService(queue, config.heartbeatIntervalMs);
const executor = new PipelineExecutor({
  threads: config.pipelineThreads,
  pipelines: config.pipelines,
});

const worker = new QueueWorker(queue, {
  workerId: config.workerId,
  pollIntervalMs: config.pollIntervalMs,
  runTask: (task) => runTask({ queue, progress, pipeline: executor, heartbeat }, task),
});

const reaper = new Reaper(
  queue,
  progress,
  new LeaderElector(redis, { workerId: config.workerId, ttlSeconds: config.leaderTtlSeconds }),
  { staleThresholdSeconds: config.reaperStale, intervalMs: config.reaperInterval },
);

const grpcServer = createGrpcServer({
  health: new HealthService(pool, redis),
  ingest: new IngestServiceImpl(submissions, queue, progress, worker),
});

async function main() {
  console.log(`${TAG} starting engine... (worker: ${config.workerId})`);

  if (!config.pipelines) {
    console.warn(
      `${TAG} WARNING: INGEST_PIPELINES is not set. Pipeline threads will not load any pipelines.`,
    );
  }

  // Health checks
  await pool.query("SELECT 1");
  console.log(`${TAG} postgres connected`);

  await redis.ping();
  console.log(`${TAG} redis connected`);

  await startGrpcServer(grpcServer, config.port);

  // First sweep picks up tasks a previous crash left in processing
  reaper.start();
  worker.start();

  console.log(`${TAG} engine ready`);
}

let shuttingDown = false;

async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`${TAG} ${signal} received, shutting down...`);

  await stopGrpcServer(grpcServer);
  await worker.stop();
  heartbeat.stop();
  await reaper.stop();
  await executor.destroy();

  await pool.end();
  await redis.quit();
  console.log(`${TAG} shutdown complete`);
}

function onSignal(signal: string) {
  shutdown(signal).then(
    () => process.exit(0),
    (err) => {
      console.error(`${TAG} shutdown failed:`, err);
      process.exit(1);
    },
  );
}

process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));
process.on("SIGUSR2", () => onSignal("SIGUSR2"));

main().catch((err) => {
  console.error(`${TAG} fatal:`, err);
  process.exit(1);
});
