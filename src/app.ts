import express from "express";
import cors from "cors";
import { createArtifactRouter } from "./artifacts/artifactRoutes";
import { createAuthMiddleware } from "./auth";
import type { AppContext } from "./context";
import { createDlqRouter } from "./dlq";
import { errorHandler, notFound } from "./errors";
import { createHealthRouter } from "./health";
import { asyncHandler } from "./http";
import { metricsHandler, metricsMiddleware } from "./metrics";
import { createTaskRouter } from "./tasks/taskRoutes";

export function buildApp(ctx: AppContext) {
  const app = express();
  const requireAuth = createAuthMiddleware(ctx.config.jwtSecret);

  app.use(express.json());
  app.use(cors());
  app.use(metricsMiddleware);

  app.use("/api/health", createHealthRouter(ctx));

  // Public metrics endpoint for Prometheus
  app.get("/metrics", asyncHandler(metricsHandler));

  // protected routes
  app.use(
    "/api/artifacts",
    requireAuth,
    createArtifactRouter({
      artifacts: ctx.artifacts,
      storage: ctx.storage,
      admission: ctx.admission,
      uploadMaxBytes: ctx.config.limits.uploadMaxBytes,
    })
  );
  app.use("/api/tasks", requireAuth, createTaskRouter(ctx.admission, ctx.status));

  // operators only, guarded by INTERNAL_API_TOKEN
  app.use("/internal", createDlqRouter(ctx.queue, ctx.config.internalApiToken));

  app.use((req, _res, next) => {
    next(notFound(`Route ${req.method} ${req.path} not found`));
  });
  app.use(errorHandler);

  return app;
}
