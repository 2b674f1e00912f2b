import express, { Router } from "express";
import { type AuthRequest, currentUserId } from "../auth";
import { asyncHandler, parsePage } from "../http";
import type { BlobStorage } from "../storage/types";
import type { AdmissionService } from "../tasks/admission";
import type { ArtifactStore } from "./artifactStore";
import { createUploadArtifact } from "./createArtifact";
import { ArtifactDefaults, UPLOAD_CONTENT_TYPES } from "./defaults";
import { loadOwnedArtifact } from "./ownership";
import type { Artifact } from "./types";

export interface ArtifactRouterDeps {
  artifacts: ArtifactStore;
  storage: BlobStorage;
  admission: AdmissionService;
  uploadMaxBytes: number;
}

function toView(artifact: Artifact) {
  return {
    id: artifact.id,
    kind: artifact.kind,
    filename: artifact.filename,
    contentType: artifact.contentType,
    sizeBytes: artifact.sizeBytes,
    sourceTaskId: artifact.sourceTaskId,
    createdAt: artifact.createdAt.toISOString(),
  };
}

function isConvertRequested(value: unknown) {
  if (value === undefined) return true;
  return !(typeof value === "string" && ["false", "0", "no"].includes(value.toLowerCase()));
}

// quotes and non-ASCII would break the header value
function dispositionFilename(filename: string) {
  return filename.replace(/[^\x20-\x7e]|["\\]/g, "_");
}

export function createArtifactRouter(deps: ArtifactRouterDeps) {
  const router = Router();
  const { artifacts, storage, admission } = deps;

  /**
   * POST /api/artifacts/images?filename=photo.png&convert=true
   * Raw image body. Converts to PDF unless convert=false.
   */
  router.post(
    "/images",
    express.raw({ type: [...UPLOAD_CONTENT_TYPES], limit: deps.uploadMaxBytes }),
    asyncHandler(async (req: AuthRequest, res) => {
      const ownerId = currentUserId(req);
      const artifact = await createUploadArtifact(
        { artifacts, storage },
        { ownerId, filename: req.query.filename, contentType: req.headers["content-type"], data: req.body }
      );

      if (!isConvertRequested(req.query.convert)) {
        res.status(201).json({ artifactId: artifact.id });
        return;
      }

      const { taskId } = await admission.submitConvert(ownerId, artifact.id);
      res.status(202).json({ artifactId: artifact.id, taskId });
    })
  );

  router.get(
    "/",
    asyncHandler(async (req: AuthRequest, res) => {
      const owned = await artifacts.listByOwner(currentUserId(req), parsePage(req.query));
      res.json({ artifacts: owned.map(toView) });
    })
  );

  router.get(
    "/:id",
    asyncHandler(async (req: AuthRequest, res) => {
      const artifact = await loadOwnedArtifact(artifacts, currentUserId(req), req.params.id);
      res.json(toView(artifact));
    })
  );

  /**
   * GET /api/artifacts/:id/download
   */
  router.get(
    "/:id/download",
    asyncHandler(async (req: AuthRequest, res) => {
      const artifact = await loadOwnedArtifact(artifacts, currentUserId(req), req.params.id);
      const stream = await storage.getStream(artifact.storagePath);
      const { previewable } = ArtifactDefaults[artifact.kind];

      res.setHeader("Content-Type", artifact.contentType);
      res.setHeader(
        "Content-Disposition",
        `${previewable ? "inline" : "attachment"}; filename="${dispositionFilename(artifact.filename)}"`
      );
      res.setHeader("X-Content-Type-Options", "nosniff");

      stream.on("error", (err) => {
        console.error(`[ARTIFACT] download of ${artifact.id} failed:`, err.message);
        res.destroy(err);
      });
      stream.pipe(res);
    })
  );

  return router;
}
