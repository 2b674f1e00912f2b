import { timingSafeEqual } from "crypto";
import type { NextFunction, Request, Response } from "express";
import jwt from "jsonwebtoken";
import { z } from "zod";
import { AppError } from "./errors";

export interface AuthRequest extends Request {
  user?: {
    id: string;
    email?: string;
  };
}

const claimsSchema = z.object({
  id: z.string().min(1).optional(),
  userId: z.string().min(1).optional(),
  sub: z.string().min(1).optional(),
  email: z.string().optional(),
});

export type AccessClaims = z.infer<typeof claimsSchema>;

const unauthorized = (message: string) => new AppError({ code: "UNAUTHORIZED", message });

export function createAuthMiddleware(secret: string) {
  return function requireAuth(req: AuthRequest, _res: Response, next: NextFunction) {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith("Bearer ")) {
      return next(unauthorized("Missing auth token"));
    }

    const token = authHeader.replace("Bearer ", "");

    let payload: unknown;
    try {
      payload = jwt.verify(token, secret, { algorithms: ["HS256"] });
    } catch {
      return next(unauthorized("Invalid token"));
    }

    const claims = claimsSchema.safeParse(payload);
    // Support flexible identity claims: id, userId, or sub
    const userId = claims.success ? claims.data.id || claims.data.userId || claims.data.sub : undefined;
    if (!claims.success || !userId) {
      return next(unauthorized("Invalid token: missing user identifier"));
    }

    req.user = { id: userId, email: claims.data.email };
    next();
  };
}

/** Owner id set by the auth middleware; routes mounted behind it can rely on it. */
export function currentUserId(req: AuthRequest): string {
  if (!req.user) {
    throw unauthorized("Not authenticated");
  }
  return req.user.id;
}

const SEVEN_DAYS_SECONDS = 7 * 24 * 60 * 60;

export function signAccessToken(secret: string, claims: AccessClaims, expiresInSeconds = SEVEN_DAYS_SECONDS) {
  return jwt.sign(claims, secret, { algorithm: "HS256", expiresIn: expiresInSeconds });
}

/** Guard for operator-only routes; disabled entirely when no token is configured. */
export function requireInternalToken(expected: string | undefined) {
  return function internalOnly(req: Request, _res: Response, next: NextFunction) {
    const provided = req.header("x-internal-token");

    if (!expected || !provided) {
      return next(new AppError({ code: "FORBIDDEN", message: "Internal endpoint" }));
    }

    const a = Buffer.from(provided);
    const b = Buffer.from(expected);
    if (a.length !== b.length || !timingSafeEqual(a, b)) {
      return next(new AppError({ code: "FORBIDDEN", message: "Internal endpoint" }));
    }

    next();
  };
}
