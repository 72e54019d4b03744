import express from "express";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createErrorHandler } from "../../src/middlewares/errorHandler.js";
import { BadRequestError } from "../../src/utils/errors.js";
import { startTestServer, type TestServer } from "../helpers/testServer.js";

function createTestApp(nodeEnv: string) {
  const app = express();
  app.get("/boom", () => {
    throw new Error("database password leaked in message");
  });
  app.get("/bad", () => {
    throw new BadRequestError("URL not allowed: https://example.com/x");
  });
  app.use(createErrorHandler(nodeEnv));
  return app;
}

describe("Error handler", () => {
  let server: TestServer | null = null;

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    await server?.close();
    server = null;
    vi.restoreAllMocks();
  });

  it("hides the message of unexpected errors and adds the stack in development", async () => {
    server = await startTestServer(createTestApp("development"));

    const res = await fetch(`${server.baseUrl}/boom`);
    expect(res.status).toBe(500);
    const body = (await res.json()) as { detail: string; stack?: string };
    expect(body.detail).toBe("Internal server error");
    expect(body.stack).toContain("database password leaked in message");
  });

  it("omits the stack in production", async () => {
    server = await startTestServer(createTestApp("production"));

    const res = await fetch(`${server.baseUrl}/boom`);
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ detail: "Internal server error" });
  });

  it("answers client errors with only their message", async () => {
    server = await startTestServer(createTestApp("development"));

    const res = await fetch(`${server.baseUrl}/bad`);
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ detail: "URL not allowed: https://example.com/x" });
  });
});
