import { errorMessage } from "../errors";
import type { TaskRegistry } from "../tasks/registry";
import { failed } from "../tasks/types";

const RECONCILER_ID = "reconciler";

export interface ReconcilerOptions {
  intervalMs: number;
  staleStartedMinutes: number;
  stalePendingMinutes: number;
  /** Lease used while failing a PENDING task; only needs to outlive one transaction. */
  leaseMs?: number;
}

export interface SweepResult {
  staleStarted: number;
  stalePending: number;
}

const minutesAgo = (now: Date, minutes: number) => new Date(now.getTime() - minutes * 60_000);

/**
 * Fail tasks nothing will finish: STARTED tasks whose lease ran out long ago
 * (their worker died) and PENDING tasks that never got picked up.
 */
export async function sweepStaleTasks(
  tasks: TaskRegistry,
  options: ReconcilerOptions,
  now = new Date()
): Promise<SweepResult> {
  const leaseMs = options.leaseMs ?? 10_000;
  const result: SweepResult = { staleStarted: 0, stalePending: 0 };

  const staleStarted = await tasks.findStaleStarted(minutesAgo(now, options.staleStartedMinutes));
  for (const task of staleStarted) {
    try {
      const claim = await tasks.claim(task.id, RECONCILER_ID, leaseMs);
      if (!claim.claimed) continue;
      const done = await tasks.complete(
        task.id,
        RECONCILER_ID,
        failed(`Worker lease expired (last held by ${task.claimedBy ?? "unknown"})`)
      );
      if (done) result.staleStarted++;
    } catch (err) {
      console.error("[RECONCILER] failed to time out stale task", task.id, errorMessage(err));
    }
  }

  const stalePending = await tasks.findStalePending(minutesAgo(now, options.stalePendingMinutes));
  for (const task of stalePending) {
    try {
      const claim = await tasks.claim(task.id, RECONCILER_ID, leaseMs);
      if (!claim.claimed) continue;
      const done = await tasks.complete(task.id, RECONCILER_ID, failed("Task was never picked up by a worker"));
      if (done) result.stalePending++;
    } catch (err) {
      console.error("[RECONCILER] failed to expire pending task", task.id, errorMessage(err));
    }
  }

  if (result.staleStarted || result.stalePending) {
    console.log(
      `[RECONCILER] failed ${result.staleStarted} stale started and ${result.stalePending} stale pending tasks`
    );
  }

  return result;
}

export function startReconciler(tasks: TaskRegistry, options: ReconcilerOptions) {
  console.log("[RECONCILER] started");

  let sweeping = false;
  const timer = setInterval(async () => {
    if (sweeping) return;
    sweeping = true;
    try {
      await sweepStaleTasks(tasks, options);
    } catch (err) {
      console.error("[RECONCILER ERROR]", errorMessage(err));
    } finally {
      sweeping = false;
    }
  }, options.intervalMs);

  return () => clearInterval(timer);
}
