import { v4 as uuidv4 } from "uuid";
import type { ArtifactStore } from "../artifacts/artifactStore";
import { assertArtifactKind, loadOwnedArtifacts } from "../artifacts/ownership";
import { normalizeOutputName } from "../artifacts/paths";
import { AppError, errorMessage, invalidRequest } from "../errors";
import { tasksCreatedTotal } from "../metrics";
import type { JobQueue } from "../queue/types";
import type { TaskRegistry } from "./registry";
import { failed, type TaskInput } from "./types";

const ADMISSION_ID = "admission";

export interface AdmissionDeps {
  artifacts: ArtifactStore;
  tasks: TaskRegistry;
  queue: JobQueue;
  limits: { mergeMaxInputs: number };
  newId?: () => string;
}

export interface Submitted {
  taskId: string;
}

/**
 * Validates submissions, records the PENDING task and hands it to the queue.
 * A request that fails validation leaves no task behind.
 */
export class AdmissionService {
  private readonly newId: () => string;

  constructor(private readonly deps: AdmissionDeps) {
    this.newId = deps.newId ?? uuidv4;
  }

  async submitConvert(ownerId: string, artifactId: string): Promise<Submitted> {
    if (typeof artifactId !== "string" || !artifactId.trim()) {
      throw invalidRequest("artifactId is required");
    }

    const [source] = await loadOwnedArtifacts(this.deps.artifacts, ownerId, [artifactId]);
    assertArtifactKind(source, "image-upload");

    return this.admit(ownerId, { kind: "convert", artifactId });
  }

  async submitMerge(ownerId: string, artifactIds: string[], outputName: string): Promise<Submitted> {
    const { mergeMaxInputs } = this.deps.limits;

    if (!Array.isArray(artifactIds) || artifactIds.length === 0) {
      throw invalidRequest("artifactIds must contain at least one artifact");
    }
    if (artifactIds.length > mergeMaxInputs) {
      throw invalidRequest(`Cannot merge more than ${mergeMaxInputs} files`);
    }
    if (new Set(artifactIds).size !== artifactIds.length) {
      throw invalidRequest("artifactIds must not contain duplicates");
    }

    const name = normalizeOutputName(outputName);

    const sources = await loadOwnedArtifacts(this.deps.artifacts, ownerId, artifactIds);
    sources.forEach((source) => assertArtifactKind(source, "pdf"));

    return this.admit(ownerId, { kind: "merge", artifactIds, outputName: name });
  }

  private async admit(ownerId: string, input: TaskInput): Promise<Submitted> {
    const { tasks, queue } = this.deps;
    const taskId = this.newId();

    await tasks.create({ id: taskId, ownerId, input });
    tasksCreatedTotal.inc({ kind: input.kind });

    if (!(await tasks.markEnqueued(taskId))) {
      // only possible if the id collided with an existing task
      throw new AppError({ code: "INTERNAL", message: `Task ${taskId} was already enqueued` });
    }

    try {
      await queue.enqueue({ taskId, kind: input.kind, ownerId, input });
    } catch (err) {
      console.error(`[ADMISSION] enqueue failed for task ${taskId}:`, errorMessage(err));
      await this.failUndelivered(taskId, err);
      throw new AppError({
        code: "DELIVERY_FAILURE",
        message: "Task could not be queued, try again later",
        details: { taskId },
        cause: err,
      });
    }

    console.log(`[ADMISSION] accepted ${input.kind} task ${taskId} for user ${ownerId}`);
    return { taskId };
  }

  private async failUndelivered(taskId: string, cause: unknown) {
    const { tasks } = this.deps;
    try {
      const claim = await tasks.claim(taskId, ADMISSION_ID, 10_000);
      if (claim.claimed) {
        await tasks.complete(taskId, ADMISSION_ID, failed(`Could not queue task: ${errorMessage(cause)}`));
      }
    } catch (err) {
      // the reconciler picks it up as stale PENDING
      console.error(`[ADMISSION] could not fail undelivered task ${taskId}:`, errorMessage(err));
    }
  }
}
