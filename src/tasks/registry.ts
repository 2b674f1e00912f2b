import type { Pool, PoolClient } from "pg";
import { withTransaction } from "../db";
import type { Page } from "../artifacts/types";
import { assertTransition, recordTransition } from "./stateMachine";
import {
  ClaimResult,
  NewTask,
  Task,
  TaskOutcome,
  TaskState,
  isTerminal,
  taskInputSchema,
} from "./types";

/**
 * Durable record of tasks. Every state change is a single atomic
 * read-modify-write; implementations must reject transitions the state
 * machine does not allow.
 */
export interface TaskRegistry {
  create(task: NewTask): Promise<Task>;
  get(taskId: string): Promise<Task | null>;
  listByOwner(ownerId: string, page: Page): Promise<Task[]>;
  /** Guarded first-enqueue marker. Returns false if the task was already marked. */
  markEnqueued(taskId: string): Promise<boolean>;
  /** PENDING → STARTED, or take over a STARTED task whose lease has expired. */
  claim(taskId: string, workerId: string, leaseMs: number): Promise<ClaimResult>;
  heartbeat(taskId: string, workerId: string, leaseMs: number): Promise<boolean>;
  /** Expire the caller's lease so a redelivered job can claim the task again. */
  release(taskId: string, workerId: string): Promise<boolean>;
  /** STARTED → SUCCESS | FAILURE, only for the lease holder. */
  complete(taskId: string, workerId: string, outcome: TaskOutcome): Promise<boolean>;
  findStaleStarted(leaseExpiredBefore: Date): Promise<Task[]>;
  findStalePending(createdBefore: Date): Promise<Task[]>;
}

interface TaskRow {
  id: string;
  kind: string;
  owner_id: string;
  state: TaskState;
  input: unknown;
  result_artifact_id: string | null;
  result_path: string | null;
  error: string | null;
  attempts: number;
  claimed_by: string | null;
  lease_expires_at: Date | null;
  created_at: Date;
  enqueued_at: Date | null;
  started_at: Date | null;
  completed_at: Date | null;
}

interface LockedTaskRow extends TaskRow {
  lease_expired: boolean;
}

const TASK_COLUMNS = `
  id, kind, owner_id, state, input, result_artifact_id, result_path, error,
  attempts, claimed_by, lease_expires_at, created_at, enqueued_at, started_at, completed_at
`;

function toOutcome(row: TaskRow): TaskOutcome | null {
  if (row.state === "SUCCESS" && row.result_artifact_id && row.result_path) {
    return { type: "success", artifactId: row.result_artifact_id, path: row.result_path };
  }
  if (row.state === "FAILURE") {
    return { type: "failure", message: row.error ?? "Task failed" };
  }
  return null;
}

export function rowToTask(row: TaskRow): Task {
  const input = taskInputSchema.parse(row.input);
  return {
    id: row.id,
    kind: input.kind,
    ownerId: row.owner_id,
    state: row.state,
    input,
    outcome: toOutcome(row),
    attempts: row.attempts,
    claimedBy: row.claimed_by,
    leaseExpiresAt: row.lease_expires_at,
    createdAt: row.created_at,
    enqueuedAt: row.enqueued_at,
    startedAt: row.started_at,
    completedAt: row.completed_at,
  };
}

export class PgTaskRegistry implements TaskRegistry {
  constructor(private readonly pool: Pool) { }

  async create(task: NewTask): Promise<Task> {
    const { rows } = await this.pool.query<TaskRow>(
      `
      INSERT INTO tasks (id, kind, owner_id, state, input, created_at)
      VALUES ($1, $2, $3, 'PENDING', $4, NOW())
      RETURNING ${TASK_COLUMNS}
      `,
      [task.id, task.input.kind, task.ownerId, JSON.stringify(task.input)]
    );
    return rowToTask(rows[0]);
  }

  async get(taskId: string): Promise<Task | null> {
    const { rows } = await this.pool.query<TaskRow>(
      `SELECT ${TASK_COLUMNS} FROM tasks WHERE id = $1`,
      [taskId]
    );
    return rows.length ? rowToTask(rows[0]) : null;
  }

  async listByOwner(ownerId: string, page: Page): Promise<Task[]> {
    const { rows } = await this.pool.query<TaskRow>(
      `
      SELECT ${TASK_COLUMNS}
      FROM tasks
      WHERE owner_id = $1
      ORDER BY created_at DESC
      LIMIT $2 OFFSET $3
      `,
      [ownerId, page.limit, page.offset]
    );
    return rows.map(rowToTask);
  }

  async markEnqueued(taskId: string): Promise<boolean> {
    const { rowCount } = await this.pool.query(
      `
      UPDATE tasks
      SET enqueued_at = NOW()
      WHERE id = $1 AND state = 'PENDING' AND enqueued_at IS NULL
      `,
      [taskId]
    );
    return rowCount === 1;
  }

  async claim(taskId: string, workerId: string, leaseMs: number): Promise<ClaimResult> {
    return withTransaction<ClaimResult>(this.pool, async (client) => {
      const current = await this.lockRow(client, taskId);

      if (!current) {
        return { claimed: false, reason: "not_found", task: null };
      }
      if (isTerminal(current.state)) {
        return { claimed: false, reason: "terminal", task: rowToTask(current) };
      }

      if (current.state === "STARTED" && !current.lease_expired) {
        return { claimed: false, reason: "leased", task: rowToTask(current) };
      }

      if (current.state === "PENDING") {
        assertTransition(taskId, current.state, "STARTED");
      }

      const { rows } = await client.query<TaskRow>(
        `
        UPDATE tasks
        SET
          state = 'STARTED',
          claimed_by = $2,
          lease_expires_at = NOW() + ($3 * INTERVAL '1 millisecond'),
          attempts = attempts + 1,
          started_at = COALESCE(started_at, NOW())
        WHERE id = $1
        RETURNING ${TASK_COLUMNS}
        `,
        [taskId, workerId, leaseMs]
      );

      if (current.state === "PENDING") {
        recordTransition(taskId, "PENDING", "STARTED", { worker: workerId });
      } else {
        console.log(`[TASK] ${taskId} lease taken over by ${workerId} (was ${current.claimed_by ?? "none"})`);
      }

      return { claimed: true, task: rowToTask(rows[0]) };
    });
  }

  async heartbeat(taskId: string, workerId: string, leaseMs: number): Promise<boolean> {
    const { rowCount } = await this.pool.query(
      `
      UPDATE tasks
      SET lease_expires_at = NOW() + ($3 * INTERVAL '1 millisecond')
      WHERE id = $1 AND state = 'STARTED' AND claimed_by = $2
      `,
      [taskId, workerId, leaseMs]
    );
    return rowCount === 1;
  }

  async release(taskId: string, workerId: string): Promise<boolean> {
    const { rowCount } = await this.pool.query(
      `
      UPDATE tasks
      SET lease_expires_at = NOW()
      WHERE id = $1 AND state = 'STARTED' AND claimed_by = $2
      `,
      [taskId, workerId]
    );
    return rowCount === 1;
  }

  async complete(taskId: string, workerId: string, outcome: TaskOutcome): Promise<boolean> {
    const next: TaskState = outcome.type === "success" ? "SUCCESS" : "FAILURE";

    return withTransaction<boolean>(this.pool, async (client) => {
      const current = await this.lockRow(client, taskId);

      if (!current || current.state !== "STARTED" || current.claimed_by !== workerId) {
        return false;
      }

      assertTransition(taskId, current.state, next);

      await client.query(
        `
        UPDATE tasks
        SET
          state = $2,
          result_artifact_id = $3,
          result_path = $4,
          error = $5,
          lease_expires_at = NULL,
          completed_at = NOW()
        WHERE id = $1
        `,
        [
          taskId,
          next,
          outcome.type === "success" ? outcome.artifactId : null,
          outcome.type === "success" ? outcome.path : null,
          outcome.type === "failure" ? outcome.message : null,
        ]
      );

      recordTransition(taskId, "STARTED", next, { worker: workerId });
      return true;
    });
  }

  async findStaleStarted(leaseExpiredBefore: Date): Promise<Task[]> {
    const { rows } = await this.pool.query<TaskRow>(
      `
      SELECT ${TASK_COLUMNS}
      FROM tasks
      WHERE state = 'STARTED'
        AND (lease_expires_at IS NULL OR lease_expires_at < $1)
      ORDER BY started_at ASC
      LIMIT 100
      `,
      [leaseExpiredBefore]
    );
    return rows.map(rowToTask);
  }

  async findStalePending(createdBefore: Date): Promise<Task[]> {
    const { rows } = await this.pool.query<TaskRow>(
      `
      SELECT ${TASK_COLUMNS}
      FROM tasks
      WHERE state = 'PENDING' AND created_at < $1
      ORDER BY created_at ASC
      LIMIT 100
      `,
      [createdBefore]
    );
    return rows.map(rowToTask);
  }

  private async lockRow(client: PoolClient, taskId: string): Promise<LockedTaskRow | null> {
    const { rows } = await client.query<LockedTaskRow>(
      `
      SELECT ${TASK_COLUMNS}, (lease_expires_at IS NULL OR lease_expires_at <= NOW()) AS lease_expired
      FROM tasks
      WHERE id = $1
      FOR UPDATE
      `,
      [taskId]
    );
    return rows[0] ?? null;
  }
}
