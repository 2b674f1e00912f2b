import express from "express";
import { loadConfig } from "./config";
import { createContext } from "./context";
import { errorMessage } from "./errors";
import { createHealthRouter } from "./health";
import { asyncHandler } from "./http";
import { metricsHandler } from "./metrics";
import { createTaskWorker } from "./worker/taskWorker";

const config = loadConfig();

if (config.queue.driver === "memory") {
  console.error("[WORKER] QUEUE_DRIVER=memory runs the worker inside the API process; start the API instead");
  process.exit(1);
}

const ctx = createContext(config);
const worker = createTaskWorker(ctx);

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled Rejection:", reason);
});

// Health & metrics for the worker process
const app = express();
app.use("/health", createHealthRouter(ctx));
app.get("/metrics", asyncHandler(metricsHandler));

const server = app.listen(config.worker.metricsPort, () => {
  console.log(`[WORKER] health and metrics on ${config.worker.metricsPort}`);
});

worker.start();

async function shutdown(signal: string) {
  console.log(`[WORKER] ${signal} received, finishing current job`);
  server.close();
  try {
    await worker.stop();
    await ctx.close();
  } catch (err) {
    console.error("[WORKER] shutdown failed:", errorMessage(err));
    process.exitCode = 1;
  }
}

process.once("SIGINT", () => void shutdown("SIGINT"));
process.once("SIGTERM", () => void shutdown("SIGTERM"));
