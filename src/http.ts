import type { NextFunction, Request, Response } from "express";
import { z } from "zod";
import type { Page } from "./artifacts/types";

export function asyncHandler<T extends Request, U extends Response>(fn: (req: T, res: U) => Promise<void>) {
  return (req: T, res: U, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}

const pageQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});

export function parsePage(query: unknown): Page {
  return pageQuerySchema.parse(query);
}
