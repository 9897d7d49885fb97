import type { Server } from "node:http";
import { createAnalysisRunner } from "../trigger/analysis-runner";
import { getConfig } from "../trigger/config";
import { InProcessTaskQueue } from "../trigger/queue/in-process-queue";
import { createLocalTaskHandler } from "../trigger/queue/local-handler";
import type { TaskQueue } from "../trigger/queue/task-queue";
import { TriggerTaskQueue } from "../trigger/queue/trigger-queue";
import { closeDb, getDb, migrate } from "../trigger/utils/db";
import {
  flushLangfuseTracing,
  initLangfuseTracing,
} from "../trigger/utils/langfuseInstrumentation";
import { PostgresResultStore } from "../trigger/utils/result-store";
import { removeStaleUploads } from "../trigger/utils/uploads";
import { createApp } from "./app";
import { SlidingWindowRateLimiter } from "./rate-limiter";
import { AnalysisService } from "./service";

async function main() {
  const config = getConfig();
  console.log(`[api] Starting with ${config.TASK_QUEUE_BACKEND} task queue`);

  initLangfuseTracing();

  const db = getDb();
  await migrate(db);

  const resultStore = new PostgresResultStore(db);
  const runner = createAnalysisRunner();

  const localQueue =
    config.TASK_QUEUE_BACKEND === "local"
      ? new InProcessTaskQueue(createLocalTaskHandler(resultStore, runner), {
          concurrency: config.WORKER_CONCURRENCY,
          retentionMs: config.TASK_RETENTION_MS,
        })
      : null;
  const queue: TaskQueue = localQueue ?? new TriggerTaskQueue();

  const rateLimiter = new SlidingWindowRateLimiter({
    limit: config.RATE_LIMIT_MAX,
    windowMs: config.RATE_LIMIT_WINDOW_MS,
  });

  const app = createApp({
    service: new AnalysisService({
      queue,
      resultStore,
      runner,
      uploadDir: config.UPLOAD_DIR,
    }),
    rateLimiter,
    maxUploadBytes: config.MAX_UPLOAD_BYTES,
  });

  const server = app.listen(config.PORT, config.HOST, () => {
    console.log(`[api] Listening on http://${config.HOST}:${config.PORT}`);
  });

  const sweep = setInterval(() => {
    rateLimiter.prune();
    removeStaleUploads(config.UPLOAD_DIR, config.UPLOAD_RETENTION_MS).catch(
      error => {
        console.error("[api] Upload sweep failed:", error);
      }
    );
  }, config.UPLOAD_SWEEP_INTERVAL_MS);
  sweep.unref();

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    console.log(`[api] ${signal} received, shutting down...`);

    clearInterval(sweep);
    await closeServer(server);
    if (localQueue) {
      console.log(
        `[api] Waiting for ${localQueue.runningCount} running and ${localQueue.pendingCount} pending task(s)...`
      );
      await localQueue.onIdle();
    }
    await flushLangfuseTracing();
    await closeDb();
    console.log("[api] Done. Exiting.");
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch(error => {
          console.error("[api] Shutdown failed:", error);
          process.exit(1);
        });
    });
  }
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(error => (error ? reject(error) : resolve()));
  });
}

main().catch(error => {
  console.error("Error:", error);
  process.exit(1);
});
