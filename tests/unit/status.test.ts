import { beforeEach, describe, expect, it } from "vitest";
import { StatusService } from "../../src/tasks/status";
import { InMemoryTaskRegistry, OWNER_A, OWNER_B } from "../helpers/fakes";

const T1 = "11111111-1111-4111-8111-111111111111";
const T2 = "22222222-2222-4222-8222-222222222222";
const RESULT = "33333333-3333-4333-8333-333333333333";
const NOW = new Date("2026-03-01T12:00:00.000Z");

describe("StatusService", () => {
  let tasks: InMemoryTaskRegistry;
  let status: StatusService;

  beforeEach(async () => {
    tasks = new InMemoryTaskRegistry(() => NOW);
    status = new StatusService(tasks);
    await tasks.create({ id: T1, ownerId: OWNER_A, input: { kind: "convert", artifactId: RESULT } });
  });

  it("reports a pending task without result or error", async () => {
    expect(await status.getStatus(OWNER_A, T1)).toEqual({
      taskId: T1,
      kind: "convert",
      state: "PENDING",
      createdAt: "2026-03-01T12:00:00.000Z",
      completedAt: null,
    });
  });

  it("includes the result once the task succeeded", async () => {
    await tasks.claim(T1, "w1", 1_000);
    await tasks.complete(T1, "w1", { type: "success", artifactId: RESULT, path: "outputs/user-a/t/photo.pdf" });

    const view = await status.getStatus(OWNER_A, T1);
    expect(view.state).toBe("SUCCESS");
    expect(view.result).toEqual({ artifactId: RESULT, path: "outputs/user-a/t/photo.pdf" });
    expect(view.error).toBeUndefined();
    expect(view.completedAt).toBe("2026-03-01T12:00:00.000Z");
  });

  it("includes the error once the task failed", async () => {
    await tasks.claim(T1, "w1", 1_000);
    await tasks.complete(T1, "w1", { type: "failure", message: "Failed to convert image to PDF: bad" });

    const view = await status.getStatus(OWNER_A, T1);
    expect(view.state).toBe("FAILURE");
    expect(view.error).toBe("Failed to convert image to PDF: bad");
    expect(view.result).toBeUndefined();
  });

  it("answers another owner exactly like a missing task", async () => {
    await expect(status.getStatus(OWNER_B, T1)).rejects.toMatchObject({ code: "NOT_FOUND", message: `Task ${T1} not found` });
    await expect(status.getStatus(OWNER_B, T2)).rejects.toMatchObject({ code: "NOT_FOUND", message: `Task ${T2} not found` });
  });

  it("treats a malformed id as missing", async () => {
    await expect(status.getStatus(OWNER_A, "nope")).rejects.toMatchObject({ code: "NOT_FOUND" });
  });

  it("lists only the caller's tasks, newest first", async () => {
    await tasks.create({ id: T2, ownerId: OWNER_A, input: { kind: "convert", artifactId: RESULT } });
    await tasks.create({
      id: "44444444-4444-4444-8444-444444444444",
      ownerId: OWNER_B,
      input: { kind: "convert", artifactId: RESULT },
    });

    const listed = await status.listTasks(OWNER_A, { limit: 10, offset: 0 });
    expect(listed.map((t) => t.taskId)).toEqual([T2, T1]);
  });
});
