import { Router } from "express";
import { requireInternalToken } from "./auth";
import { asyncHandler } from "./http";
import type { JobQueue } from "./queue/types";

const PEEK_LIMIT = 10;

/** GET /internal/dlq: dead letters, oldest first, left in place. */
export function createDlqRouter(queue: JobQueue, internalApiToken: string | undefined) {
  const router = Router();

  router.get(
    "/dlq",
    requireInternalToken(internalApiToken),
    asyncHandler(async (_req, res) => {
      res.json({ deadLetters: await queue.peekDeadLetters(PEEK_LIMIT) });
    })
  );

  return router;
}
