import { setTimeout as sleep } from "timers/promises";
import type { AppContext } from "../context";
import { errorMessage, isExecutionFailure } from "../errors";
import { workerExecutionsTotal } from "../metrics";
import type { Delivery, JobQueue, RetryOutcome } from "../queue/types";
import type { TaskRegistry } from "../tasks/registry";
import { failed, succeeded, type Task, type TaskKind, type TaskOutcome } from "../tasks/types";
import { withTimeout } from "../util/timeout";
import { defaultHandlers, dispatch, type HandlerDeps, type TaskHandlers } from "./handlers";

export interface TaskWorkerOptions {
  workerId: string;
  pollIntervalMs: number;
  leaseMs: number;
  /** Executions allowed per task before it is failed without running. */
  maxAttempts: number;
  timeouts: Record<TaskKind, number>;
}

export interface TaskWorkerDeps extends HandlerDeps {
  tasks: TaskRegistry;
  queue: JobQueue;
  handlers?: TaskHandlers;
}

/**
 * Pulls jobs off the queue and drives each task from STARTED to a terminal
 * state. Failures caused by the task's inputs end the task; anything else
 * releases the lease and hands the job back to the queue.
 */
export class TaskWorker {
  private running = false;
  private loop: Promise<void> | null = null;
  private abort = new AbortController();
  private readonly handlers: TaskHandlers;

  constructor(
    private readonly deps: TaskWorkerDeps,
    private readonly options: TaskWorkerOptions
  ) {
    this.handlers = deps.handlers ?? defaultHandlers;
  }

  start() {
    if (this.running) return;
    this.running = true;
    this.abort = new AbortController();
    console.log(`[WORKER] ${this.options.workerId} started`);
    this.loop = this.run();
  }

  async stop() {
    this.running = false;
    this.abort.abort();
    await this.loop;
    this.loop = null;
    console.log(`[WORKER] ${this.options.workerId} stopped`);
  }

  /** Process at most one job. Resolves false when the queue was empty. */
  async runOnce(): Promise<boolean> {
    const delivery = await this.deps.queue.dequeue();
    if (!delivery) return false;

    await this.process(delivery);
    return true;
  }

  private async run() {
    while (this.running) {
      let busy = false;
      try {
        busy = await this.runOnce();
      } catch (err) {
        console.error("[WORKER] poll failed:", errorMessage(err));
      }

      if (!busy && this.running) {
        try {
          await sleep(this.options.pollIntervalMs, undefined, { signal: this.abort.signal });
        } catch (err) {
          if (!this.abort.signal.aborted) throw err;
        }
      }
    }
  }

  private async process(delivery: Delivery) {
    const { job } = delivery;
    const { tasks } = this.deps;
    const { workerId, leaseMs, maxAttempts } = this.options;

    let task: Task;
    try {
      const claim = await tasks.claim(job.taskId, workerId, leaseMs);
      if (!claim.claimed) {
        console.log(`[WORKER] skipping task ${job.taskId}: ${claim.reason}`);
        await delivery.ack();
        return;
      }
      task = claim.task;
    } catch (err) {
      await this.requeue(delivery, null, err);
      return;
    }

    try {
      const outcome =
        task.attempts > maxAttempts
          ? failed(`Task exceeded ${maxAttempts} execution attempts`)
          : await this.execute(task);
      await this.settle(task, delivery, outcome);
    } catch (err) {
      await this.requeue(delivery, task, err);
    }
  }

  /**
   * Run the handler under a lease heartbeat and the kind's timeout.
   * Throws only for errors that should be retried.
   */
  private async execute(task: Task): Promise<TaskOutcome> {
    const { tasks } = this.deps;
    const { workerId, leaseMs, timeouts } = this.options;

    const heartbeat = setInterval(() => {
      tasks
        .heartbeat(task.id, workerId, leaseMs)
        .then((extended) => {
          if (!extended) console.warn(`[WORKER] lost lease on task ${task.id}`);
        })
        .catch((err: unknown) => {
          console.error(`[WORKER] heartbeat failed for task ${task.id}:`, errorMessage(err));
        });
    }, Math.max(1, Math.floor(leaseMs / 3)));

    console.log(`[WORKER] executing ${task.kind} task ${task.id} (attempt ${task.attempts})`);

    // a handler still running after the timeout must not store its result
    const abort = new AbortController();

    try {
      const artifact = await withTimeout(
        dispatch(this.handlers, task, this.deps, abort.signal),
        timeouts[task.kind],
        `${task.kind} task ${task.id}`
      );
      return succeeded(artifact.id, artifact.storagePath);
    } catch (err) {
      if (isExecutionFailure(err)) {
        return failed(err.message);
      }
      throw err;
    } finally {
      clearInterval(heartbeat);
      abort.abort(new Error(`${task.kind} task ${task.id} was abandoned`));
    }
  }

  private async settle(task: Task, delivery: Delivery, outcome: TaskOutcome) {
    const completed = await this.deps.tasks.complete(task.id, this.options.workerId, outcome);

    if (completed) {
      workerExecutionsTotal.inc({ kind: task.kind, result: outcome.type });
      if (outcome.type === "failure") {
        console.warn(`[WORKER] task ${task.id} failed: ${outcome.message}`);
      }
    } else {
      console.warn(`[WORKER] task ${task.id} was taken over before it could complete`);
    }

    await delivery.ack();
  }

  private async requeue(delivery: Delivery, task: Task | null, err: unknown) {
    const { tasks } = this.deps;
    const { workerId, leaseMs } = this.options;
    const reason = errorMessage(err);
    const taskId = delivery.job.taskId;

    console.error(`[WORKER] task ${taskId} attempt ${delivery.attempt} errored:`, reason);
    workerExecutionsTotal.inc({ kind: delivery.job.kind, result: "retry" });

    try {
      if (task) await tasks.release(task.id, workerId);
    } catch (releaseErr) {
      console.error(`[WORKER] could not release task ${taskId}:`, errorMessage(releaseErr));
    }

    let outcome: RetryOutcome;
    try {
      outcome = await delivery.retry(reason);
    } catch (retryErr) {
      console.error(`[WORKER] could not retry task ${taskId}, returning it to the queue:`, errorMessage(retryErr));
      await delivery.nack();
      return;
    }
    if (outcome === "requeued") return;

    // dead-lettered: nothing will redeliver it, so end the task here
    try {
      const claim = await tasks.claim(taskId, workerId, leaseMs);
      if (!claim.claimed) return;
      await tasks.complete(
        taskId,
        workerId,
        failed(`Delivery failed after ${delivery.attempt} attempts: ${reason}`)
      );
    } catch (failErr) {
      console.error(`[WORKER] could not fail dead-lettered task ${taskId}:`, errorMessage(failErr));
    }
  }
}

export function createTaskWorker(ctx: AppContext): TaskWorker {
  const { config } = ctx;
  return new TaskWorker(
    {
      tasks: ctx.tasks,
      queue: ctx.queue,
      artifacts: ctx.artifacts,
      storage: ctx.storage,
      engine: ctx.engine,
    },
    {
      workerId: config.worker.id,
      pollIntervalMs: config.worker.pollIntervalMs,
      leaseMs: config.worker.leaseMs,
      maxAttempts: config.queue.maxDeliveryAttempts,
      timeouts: config.worker.timeouts,
    }
  );
}
