import { Router } from "express";
import { errorMessage } from "./errors";
import { asyncHandler } from "./http";
import type { JobQueue } from "./queue/types";
import type { BlobStorage } from "./storage/types";

export interface HealthDeps {
  /** Runs `SELECT 1` against the task database. */
  pingDatabase: () => Promise<unknown>;
  queue: JobQueue;
  storage: BlobStorage;
}

type CheckState = "up" | "down";

async function check(name: string, ping: () => Promise<unknown>): Promise<CheckState> {
  try {
    await ping();
    return "up";
  } catch (err) {
    console.error(`[HEALTH] ${name} check failed:`, errorMessage(err));
    return "down";
  }
}

export function createHealthRouter(deps: HealthDeps) {
  const router = Router();

  router.get(
    "/",
    asyncHandler(async (_req, res) => {
      const [db, queue, storage] = await Promise.all([
        check("db", deps.pingDatabase),
        check("queue", () => deps.queue.ping()),
        check("storage", () => deps.storage.ping()),
      ]);

      const ok = db === "up" && queue === "up" && storage === "up";
      res.status(ok ? 200 : 503).json({
        status: ok ? "ok" : "error",
        db,
        queue,
        storage,
        timestamp: new Date().toISOString(),
      });
    })
  );

  return router;
}
