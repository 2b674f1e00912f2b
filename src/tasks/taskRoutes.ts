import { Router } from "express";
import { type AuthRequest, currentUserId } from "../auth";
import { asyncHandler, parsePage } from "../http";
import type { AdmissionService } from "./admission";
import type { StatusService } from "./status";
import { convertRequestSchema, mergeRequestSchema } from "./validators";

export function createTaskRouter(admission: AdmissionService, status: StatusService) {
  const router = Router();

  /**
   * POST /api/tasks/convert
   */
  router.post(
    "/convert",
    asyncHandler(async (req: AuthRequest, res) => {
      const { artifactId } = convertRequestSchema.parse(req.body);
      const submitted = await admission.submitConvert(currentUserId(req), artifactId);
      res.status(202).json(submitted);
    })
  );

  /**
   * POST /api/tasks/merge
   * Page order of the result follows artifactIds.
   */
  router.post(
    "/merge",
    asyncHandler(async (req: AuthRequest, res) => {
      const { artifactIds, outputName } = mergeRequestSchema.parse(req.body);
      const submitted = await admission.submitMerge(currentUserId(req), artifactIds, outputName);
      res.status(202).json(submitted);
    })
  );

  router.get(
    "/",
    asyncHandler(async (req: AuthRequest, res) => {
      const tasks = await status.listTasks(currentUserId(req), parsePage(req.query));
      res.json({ tasks });
    })
  );

  router.get(
    "/:taskId",
    asyncHandler(async (req: AuthRequest, res) => {
      res.json(await status.getStatus(currentUserId(req), req.params.taskId));
    })
  );

  return router;
}
