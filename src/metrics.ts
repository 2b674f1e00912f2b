import type { NextFunction, Request, Response } from "express";
import client from "prom-client";

// Default Node.js metrics (CPU, memory, event loop)
client.collectDefaultMetrics();

export const httpRequestsTotal = new client.Counter({
  name: "http_requests_total",
  help: "Total HTTP requests",
  labelNames: ["method", "route", "status"],
});

export const tasksCreatedTotal = new client.Counter({
  name: "tasks_created_total",
  help: "Tasks accepted by admission",
  labelNames: ["kind"],
});

export const taskTransitionsTotal = new client.Counter({
  name: "task_transitions_total",
  help: "Task state transitions",
  labelNames: ["state"],
});

export const workerExecutionsTotal = new client.Counter({
  name: "worker_executions_total",
  help: "Task executions by workers",
  labelNames: ["kind", "result"],
});

export const deadLettersTotal = new client.Counter({
  name: "dead_letters_total",
  help: "Jobs moved to the dead-letter queue",
});

export function metricsMiddleware(req: Request, res: Response, next: NextFunction) {
  res.on("finish", () => {
    const route: unknown = req.route?.path;
    httpRequestsTotal.inc({
      method: req.method,
      route: typeof route === "string" ? `${req.baseUrl}${route}` : "unmatched",
      status: res.statusCode,
    });
  });
  next();
}

export async function metricsHandler(_req: Request, res: Response) {
  res.set("Content-Type", client.register.contentType);
  res.end(await client.register.metrics());
}
