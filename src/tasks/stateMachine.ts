import { AppError } from "../errors";
import { taskTransitionsTotal } from "../metrics";
import type { TaskState } from "./types";

const TASK_TRANSITIONS: Record<TaskState, TaskState[]> = {
  PENDING: ["STARTED"],
  STARTED: ["SUCCESS", "FAILURE"],
  SUCCESS: [],
  FAILURE: [],
};

export function canTransition(current: TaskState, next: TaskState): boolean {
  return TASK_TRANSITIONS[current].includes(next);
}

export function assertTransition(taskId: string, current: TaskState, next: TaskState) {
  if (!canTransition(current, next)) {
    throw new AppError({
      code: "INTERNAL",
      message: `Illegal task transition for ${taskId}: ${current} → ${next}`,
    });
  }
}

export function recordTransition(taskId: string, from: TaskState, to: TaskState, meta: Record<string, unknown> = {}) {
  taskTransitionsTotal.inc({ state: to });
  console.log(`[TASK] ${taskId} ${from} → ${to}`, meta);
}
