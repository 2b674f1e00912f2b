import express from "express";
import jwt from "jsonwebtoken";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { type AuthRequest, createAuthMiddleware, requireInternalToken, signAccessToken } from "../../src/auth";
import { errorHandler } from "../../src/errors";
import { listen, type RunningServer } from "../helpers/http";

const SECRET = "test-secret";

let server: RunningServer;

beforeAll(async () => {
  const app = express();
  app.get("/me", createAuthMiddleware(SECRET), (req: AuthRequest, res) => {
    res.json({ id: req.user?.id });
  });
  app.get("/internal", requireInternalToken("test-internal-token"), (_req, res) => {
    res.json({ ok: true });
  });
  app.use(errorHandler);
  server = await listen(app);
});

afterAll(() => server.close());

function getMe(token?: string) {
  return fetch(`${server.baseUrl}/me`, {
    headers: token ? { Authorization: `Bearer ${token}` } : {},
  });
}

describe("createAuthMiddleware", () => {
  it("accepts a token carrying an id claim", async () => {
    const res = await getMe(signAccessToken(SECRET, { id: "user-a", email: "a@test.com" }));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ id: "user-a" });
  });

  it("falls back to userId and sub claims", async () => {
    const viaUserId = await getMe(jwt.sign({ userId: "user-b" }, SECRET));
    const viaSub = await getMe(jwt.sign({ sub: "user-c" }, SECRET));

    expect(await viaUserId.json()).toEqual({ id: "user-b" });
    expect(await viaSub.json()).toEqual({ id: "user-c" });
  });

  it("rejects a missing token", async () => {
    const res = await getMe();

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: { code: "UNAUTHORIZED", message: "Missing auth token" } });
  });

  it("rejects a token signed with another secret", async () => {
    const res = await getMe(signAccessToken("other-secret", { id: "user-a" }));

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: { code: "UNAUTHORIZED", message: "Invalid token" } });
  });

  it("rejects a token without a user identifier", async () => {
    const res = await getMe(jwt.sign({ email: "a@test.com" }, SECRET));

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      error: { code: "UNAUTHORIZED", message: "Invalid token: missing user identifier" },
    });
  });
});

describe("requireInternalToken", () => {
  it("lets the configured token through", async () => {
    const res = await fetch(`${server.baseUrl}/internal`, { headers: { "x-internal-token": "test-internal-token" } });
    expect(res.status).toBe(200);
  });

  it("rejects a wrong token", async () => {
    const res = await fetch(`${server.baseUrl}/internal`, { headers: { "x-internal-token": "wrong" } });
    expect(res.status).toBe(403);
  });
});
