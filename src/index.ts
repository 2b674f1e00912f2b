import http from "http";
import { buildApp } from "./app";
import { loadConfig } from "./config";
import { createContext } from "./context";
import { errorMessage } from "./errors";
import { startReconciler } from "./worker/reconciler";
import { createTaskWorker } from "./worker/taskWorker";

const config = loadConfig();
const ctx = createContext(config);

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled Rejection:", reason);
});

const app = buildApp(ctx);
const server = http.createServer(app);

const stopReconciler = startReconciler(ctx.tasks, config.reconciler);

// the in-memory queue only reaches workers in this process
const embeddedWorker = config.queue.driver === "memory" ? createTaskWorker(ctx) : null;
embeddedWorker?.start();

server.listen(config.port, () => {
  console.log(`pdf task api listening on ${config.port}`);
});

async function shutdown(signal: string) {
  console.log(`[API] ${signal} received, shutting down`);
  stopReconciler();
  server.close();
  try {
    await embeddedWorker?.stop();
    await ctx.close();
  } catch (err) {
    console.error("[API] shutdown failed:", errorMessage(err));
    process.exitCode = 1;
  }
}

process.once("SIGINT", () => void shutdown("SIGINT"));
process.once("SIGTERM", () => void shutdown("SIGTERM"));
