import { validate as isUuid } from "uuid";
import type { Page } from "../artifacts/types";
import { notFound } from "../errors";
import type { TaskRegistry } from "./registry";
import type { Task, TaskKind, TaskState } from "./types";

export interface TaskStatus {
  taskId: string;
  kind: TaskKind;
  state: TaskState;
  result?: { artifactId: string; path: string };
  error?: string;
  createdAt: string;
  completedAt: string | null;
}

export function toStatus(task: Task): TaskStatus {
  const status: TaskStatus = {
    taskId: task.id,
    kind: task.kind,
    state: task.state,
    createdAt: task.createdAt.toISOString(),
    completedAt: task.completedAt ? task.completedAt.toISOString() : null,
  };

  if (task.outcome?.type === "success") {
    status.result = { artifactId: task.outcome.artifactId, path: task.outcome.path };
  } else if (task.outcome?.type === "failure") {
    status.error = task.outcome.message;
  }

  return status;
}

export class StatusService {
  constructor(private readonly tasks: TaskRegistry) { }

  /** Someone else's task is reported exactly like a missing one. */
  async getStatus(ownerId: string, taskId: string): Promise<TaskStatus> {
    const task = isUuid(taskId) ? await this.tasks.get(taskId) : null;

    if (!task) {
      throw notFound(`Task ${taskId} not found`);
    }
    if (task.ownerId !== ownerId) {
      console.warn(`[STATUS] user ${ownerId} denied access to task ${taskId} owned by ${task.ownerId}`);
      throw notFound(`Task ${taskId} not found`);
    }

    return toStatus(task);
  }

  async listTasks(ownerId: string, page: Page): Promise<TaskStatus[]> {
    const tasks = await this.tasks.listByOwner(ownerId, page);
    return tasks.map(toStatus);
  }
}
