import * as grpc from "@grpc/grpc-js";
import * as protoLoader from "@grpc/proto-loader";
import { ReflectionService } from "@grpc/reflection";
import path from "path";
import { HealthService } from "./health.service";
import { IngestServiceImpl } from "./ingest.service";

const PROTO_DIR = path.dirname(require.resolve("@ingestq/proto/package.json"));

const protoOptions: protoLoader.Options = {
  keepCase: true,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
};

const healthPackageDef = protoLoader.loadSync(path.join(PROTO_DIR, "health.service.proto"), protoOptions);
const ingestPackageDef = protoLoader.loadSync(path.join(PROTO_DIR, "ingest.service.proto"), protoOptions);

function serviceDefinition(
  packageDef: protoLoader.PackageDefinition,
  name: string,
): protoLoader.ServiceDefinition {
  const definition = packageDef[name];
  // message and enum definitions carry a `format`, services do not
  if (!definition || "format" in definition) {
    throw new Error(`gRPC service ${name} not found in proto definitions`);
  }
  return definition;
}

export interface GrpcServices {
  health: HealthService;
  ingest: IngestServiceImpl;
}

export function createGrpcServer({ health, ingest }: GrpcServices): grpc.Server {
  const server = new grpc.Server({
    "grpc.max_receive_message_length": 4 * 1024 * 1024,
    "grpc.max_send_message_length": 4 * 1024 * 1024,
    "grpc.keepalive_time_ms": 30000,
    "grpc.keepalive_timeout_ms": 10000,
    "grpc.keepalive_permit_without_calls": 1,
  });

  server.addService(serviceDefinition(healthPackageDef, "grpc.health.v1.Health"), {
    check: health.check.bind(health),
    watch: health.watch.bind(health),
  });

  server.addService(serviceDefinition(ingestPackageDef, "ingestq.IngestService"), {
    submitIngestion: ingest.submitIngestion.bind(ingest),
    getProgress: ingest.getProgress.bind(ingest),
    listActiveProgress: ingest.listActiveProgress.bind(ingest),
    deleteProgress: ingest.deleteProgress.bind(ingest),
    cancelTask: ingest.cancelTask.bind(ingest),
    getQueueStats: ingest.getQueueStats.bind(ingest),
    getWorkerStatus: ingest.getWorkerStatus.bind(ingest),
  });

  // reflection for grpcurl debugging
  const reflectionService = new ReflectionService({
    ...healthPackageDef,
    ...ingestPackageDef,
  });
  reflectionService.addToServer(server);

  return server;
}

export function startGrpcServer(
  server: grpc.Server,
  port: number = 50051,
): Promise<number> {
  return new Promise((resolve, reject) => {
    server.bindAsync(
      `0.0.0.0:${port}`,
      grpc.ServerCredentials.createInsecure(),
      (err, boundPort) => {
        if (err) {
          reject(err);
        } else {
          console.log(`[ingestq] grpc server listening on port ${boundPort}`);
          resolve(boundPort);
        }
      },
    );
  });
}

export function stopGrpcServer(server: grpc.Server): Promise<void> {
  return new Promise((resolve) => {
    server.tryShutdown((err) => {
      if (err) {
        console.error("[ingestq] grpc graceful shutdown failed, forcing:", err);
        server.forceShutdown();
      }
      resolve();
    });
  });
}
