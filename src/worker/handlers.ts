import { v4 as uuidv4 } from "uuid";
import type { ArtifactStore } from "../artifacts/artifactStore";
import { PDF_CONTENT_TYPE } from "../artifacts/defaults";
import { assertArtifactKind, loadOwnedArtifact, loadOwnedArtifacts } from "../artifacts/ownership";
import { outputKey, pdfNameFor } from "../artifacts/paths";
import type { Artifact } from "../artifacts/types";
import { assertUnreachable } from "../errors";
import type { PdfEngine } from "../pdf/engine";
import type { BlobStorage } from "../storage/types";
import type { ConvertInput, MergeInput, Task, TaskKind } from "../tasks/types";

export interface HandlerDeps {
  artifacts: ArtifactStore;
  storage: BlobStorage;
  engine: PdfEngine;
}

export type TaskHandlers = {
  [K in TaskKind]: (
    input: Extract<ConvertInput | MergeInput, { kind: K }>,
    task: Task,
    deps: HandlerDeps,
    signal?: AbortSignal
  ) => Promise<Artifact>;
};

/**
 * Store `produce()`'s bytes at `storagePath` unless an earlier execution of
 * the same task already did. Output paths are derived from the task id, so
 * a redelivered job converges on the first result. Once `signal` is aborted
 * nothing more is written.
 */
async function storeOutput(
  task: Task,
  deps: HandlerDeps,
  storagePath: string,
  filename: string,
  produce: () => Promise<Buffer>,
  signal?: AbortSignal
): Promise<Artifact> {
  const existing = await deps.artifacts.findByStoragePath(storagePath);
  if (existing) {
    console.log(`[WORKER] task ${task.id} reusing artifact ${existing.id} from an earlier attempt`);
    return existing;
  }

  const bytes = await produce();

  signal?.throwIfAborted();
  if (!(await deps.storage.exists(storagePath))) {
    await deps.storage.put(storagePath, bytes, PDF_CONTENT_TYPE);
  }

  signal?.throwIfAborted();
  return deps.artifacts.create({
    id: uuidv4(),
    ownerId: task.ownerId,
    kind: "pdf",
    filename,
    storagePath,
    contentType: PDF_CONTENT_TYPE,
    sizeBytes: bytes.length,
    sourceTaskId: task.id,
  });
}

export async function convertImage(
  input: ConvertInput,
  task: Task,
  deps: HandlerDeps,
  signal?: AbortSignal
): Promise<Artifact> {
  const source = await loadOwnedArtifact(deps.artifacts, task.ownerId, input.artifactId);
  assertArtifactKind(source, "image-upload");

  const filename = pdfNameFor(source.filename);
  const storagePath = outputKey(task.ownerId, task.id, filename);

  return storeOutput(task, deps, storagePath, filename, async () => {
    const image = await deps.storage.get(source.storagePath);
    return deps.engine.imageToPdf(image);
  }, signal);
}

export async function mergePdfs(
  input: MergeInput,
  task: Task,
  deps: HandlerDeps,
  signal?: AbortSignal
): Promise<Artifact> {
  // order of input.artifactIds is the page order of the result
  const sources = await loadOwnedArtifacts(deps.artifacts, task.ownerId, input.artifactIds);
  sources.forEach((source) => assertArtifactKind(source, "pdf"));

  const storagePath = outputKey(task.ownerId, task.id, input.outputName);

  return storeOutput(task, deps, storagePath, input.outputName, async () => {
    const buffers: Buffer[] = [];
    for (const source of sources) {
      buffers.push(await deps.storage.get(source.storagePath));
    }
    return deps.engine.merge(buffers);
  }, signal);
}

export const defaultHandlers: TaskHandlers = {
  convert: convertImage,
  merge: mergePdfs,
};

export function dispatch(
  handlers: TaskHandlers,
  task: Task,
  deps: HandlerDeps,
  signal?: AbortSignal
): Promise<Artifact> {
  const input = task.input;
  switch (input.kind) {
    case "convert":
      return handlers.convert(input, task, deps, signal);
    case "merge":
      return handlers.merge(input, task, deps, signal);
    default:
      return assertUnreachable(input);
  }
}
