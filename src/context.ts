import { PgArtifactStore, type ArtifactStore } from "./artifacts/artifactStore";
import type { AppConfig } from "./config";
import { createPool } from "./db";
import { PdfLibEngine, type PdfEngine } from "./pdf/engine";
import { InMemoryJobQueue } from "./queue/memory";
import { RabbitJobQueue } from "./queue/rabbit";
import type { JobQueue } from "./queue/types";
import { LocalBlobStorage } from "./storage/local";
import { S3BlobStorage, createS3Client } from "./storage/s3";
import type { BlobStorage } from "./storage/types";
import { AdmissionService } from "./tasks/admission";
import { PgTaskRegistry, type TaskRegistry } from "./tasks/registry";
import { StatusService } from "./tasks/status";

/** Process-lifetime handles, created once at startup and passed down explicitly. */
export interface AppContext {
  config: AppConfig;
  tasks: TaskRegistry;
  artifacts: ArtifactStore;
  queue: JobQueue;
  storage: BlobStorage;
  engine: PdfEngine;
  admission: AdmissionService;
  status: StatusService;
  pingDatabase(): Promise<unknown>;
  close(): Promise<void>;
}

export interface ContextParts {
  tasks: TaskRegistry;
  artifacts: ArtifactStore;
  queue: JobQueue;
  storage: BlobStorage;
  engine: PdfEngine;
  pingDatabase(): Promise<unknown>;
  close?(): Promise<void>;
}

export function assembleContext(config: AppConfig, parts: ContextParts): AppContext {
  const { tasks, artifacts, queue } = parts;

  return {
    config,
    tasks,
    artifacts,
    queue,
    storage: parts.storage,
    engine: parts.engine,
    admission: new AdmissionService({ artifacts, tasks, queue, limits: config.limits }),
    status: new StatusService(tasks),
    pingDatabase: parts.pingDatabase,
    close: parts.close ?? (async () => undefined),
  };
}

function createQueue(config: AppConfig): JobQueue {
  const { driver, url, name, maxDeliveryAttempts } = config.queue;
  if (driver === "memory") {
    console.warn("[MQ] using in-memory queue; jobs do not survive a restart");
    return new InMemoryJobQueue(maxDeliveryAttempts);
  }
  return new RabbitJobQueue({ url, queue: name, maxAttempts: maxDeliveryAttempts });
}

function createStorage(config: AppConfig): BlobStorage {
  const { driver, root, s3 } = config.storage;
  if (driver === "s3" && s3) {
    return new S3BlobStorage(createS3Client(s3), s3.bucket);
  }
  return new LocalBlobStorage(root);
}

export function createContext(config: AppConfig): AppContext {
  const pool = createPool(config.databaseUrl, config.databasePoolMax);
  const queue = createQueue(config);

  return assembleContext(config, {
    tasks: new PgTaskRegistry(pool),
    artifacts: new PgArtifactStore(pool),
    queue,
    storage: createStorage(config),
    engine: new PdfLibEngine(),
    pingDatabase: () => pool.query("SELECT 1"),
    close: async () => {
      await queue.close();
      await pool.end();
    },
  });
}
