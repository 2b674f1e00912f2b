import { z } from "zod";

export const TASK_KINDS = ["convert", "merge"] as const;

export type TaskKind = (typeof TASK_KINDS)[number];

export type TaskState = "PENDING" | "STARTED" | "SUCCESS" | "FAILURE";

export const TERMINAL_STATES: readonly TaskState[] = ["SUCCESS", "FAILURE"];

export const convertInputSchema = z.object({
  kind: z.literal("convert"),
  artifactId: z.string().min(1),
});

export const mergeInputSchema = z.object({
  kind: z.literal("merge"),
  artifactIds: z.array(z.string().min(1)).min(1),
  outputName: z.string().min(1),
});

export const taskInputSchema = z.discriminatedUnion("kind", [convertInputSchema, mergeInputSchema]);

export type ConvertInput = z.infer<typeof convertInputSchema>;
export type MergeInput = z.infer<typeof mergeInputSchema>;
export type TaskInput = z.infer<typeof taskInputSchema>;

export type TaskOutcome =
  | { type: "success"; artifactId: string; path: string }
  | { type: "failure"; message: string };

export const succeeded = (artifactId: string, path: string): TaskOutcome => ({ type: "success", artifactId, path });

export const failed = (message: string): TaskOutcome => ({ type: "failure", message });

export interface Task {
  id: string;
  kind: TaskKind;
  ownerId: string;
  state: TaskState;
  input: TaskInput;
  outcome: TaskOutcome | null;
  attempts: number;
  claimedBy: string | null;
  leaseExpiresAt: Date | null;
  createdAt: Date;
  enqueuedAt: Date | null;
  startedAt: Date | null;
  completedAt: Date | null;
}

export interface NewTask {
  id: string;
  ownerId: string;
  input: TaskInput;
}

export type ClaimResult =
  | { claimed: true; task: Task }
  | { claimed: false; reason: "not_found" | "terminal" | "leased"; task: Task | null };

/** Body of a queued job. Only ids and names; the task row stays the source of truth. */
export const taskJobSchema = z.object({
  taskId: z.string().uuid(),
  kind: z.enum(TASK_KINDS),
  ownerId: z.string().min(1),
  input: taskInputSchema,
});

export type TaskJob = z.infer<typeof taskJobSchema>;

export function isTerminal(state: TaskState) {
  return TERMINAL_STATES.includes(state);
}
