import { v4 as uuidv4 } from "uuid";
import { invalidRequest } from "../errors";
import type { BlobStorage } from "../storage/types";
import type { ArtifactStore } from "./artifactStore";
import { uploadContentType } from "./defaults";
import { sanitizeFilename, uploadKey } from "./paths";
import type { Artifact } from "./types";

interface CreateUploadInput {
  ownerId: string;
  filename: unknown;
  contentType: string | undefined;
  data: unknown;
}

/**
 * Store an uploaded image and record it as an `image-upload` artifact.
 * Bytes are written before the row so a visible artifact always has content.
 */
export async function createUploadArtifact(
  deps: { artifacts: ArtifactStore; storage: BlobStorage },
  input: CreateUploadInput
): Promise<Artifact> {
  const contentType = uploadContentType(input.contentType);
  if (!contentType) {
    throw invalidRequest("Uploads must be PNG or JPEG images");
  }
  if (!Buffer.isBuffer(input.data) || input.data.length === 0) {
    throw invalidRequest("Upload body is empty");
  }

  const filename = sanitizeFilename(input.filename);
  const id = uuidv4();
  const storagePath = uploadKey(input.ownerId, id, filename);

  await deps.storage.put(storagePath, input.data, contentType);

  // a failed insert leaves the blob unreferenced; the upload area is append-only
  const artifact = await deps.artifacts.create({
    id,
    ownerId: input.ownerId,
    kind: "image-upload",
    filename,
    storagePath,
    contentType,
    sizeBytes: input.data.length,
    sourceTaskId: null,
  });

  console.log(`[ARTIFACT] stored upload ${artifact.id} (${filename}, ${artifact.sizeBytes} bytes)`);
  return artifact;
}
