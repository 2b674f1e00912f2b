import { beforeEach, describe, expect, it } from "vitest";
import { sweepStaleTasks } from "../../src/worker/reconciler";
import { InMemoryTaskRegistry, OWNER_A } from "../helpers/fakes";

const STALE = "11111111-1111-4111-8111-111111111111";
const LIVE = "22222222-2222-4222-8222-222222222222";
const OLD_PENDING = "33333333-3333-4333-8333-333333333333";
const FRESH_PENDING = "44444444-4444-4444-8444-444444444444";
const ARTIFACT = "55555555-5555-4555-8555-555555555555";

const MINUTE = 60_000;
const options = { intervalMs: 1_000, staleStartedMinutes: 30, stalePendingMinutes: 60 };

describe("sweepStaleTasks", () => {
  let now: Date;
  let tasks: InMemoryTaskRegistry;

  async function create(id: string) {
    await tasks.create({ id, ownerId: OWNER_A, input: { kind: "convert", artifactId: ARTIFACT } });
  }

  beforeEach(async () => {
    now = new Date("2026-03-01T12:00:00.000Z");
    tasks = new InMemoryTaskRegistry(() => now);

    await create(STALE);
    await create(OLD_PENDING);
    await tasks.claim(STALE, "dead-worker", MINUTE);

    now = new Date(now.getTime() + 45 * MINUTE);
    await create(LIVE);
    await tasks.claim(LIVE, "busy-worker", MINUTE);

    now = new Date(now.getTime() + 30 * MINUTE);
    await create(FRESH_PENDING);
    await tasks.heartbeat(LIVE, "busy-worker", MINUTE);
  });

  it("fails abandoned STARTED tasks and PENDING tasks nobody picked up", async () => {
    const result = await sweepStaleTasks(tasks, options, now);

    expect(result).toEqual({ staleStarted: 1, stalePending: 1 });

    expect((await tasks.get(STALE))?.outcome).toEqual({
      type: "failure",
      message: "Worker lease expired (last held by dead-worker)",
    });
    expect((await tasks.get(OLD_PENDING))?.outcome).toEqual({
      type: "failure",
      message: "Task was never picked up by a worker",
    });
    expect(tasks.history(OLD_PENDING)).toEqual(["PENDING", "STARTED", "FAILURE"]);
  });

  it("leaves live and recent tasks alone", async () => {
    await sweepStaleTasks(tasks, options, now);

    expect((await tasks.get(LIVE))?.state).toBe("STARTED");
    expect((await tasks.get(LIVE))?.claimedBy).toBe("busy-worker");
    expect((await tasks.get(FRESH_PENDING))?.state).toBe("PENDING");
  });
});
