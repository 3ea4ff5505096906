import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { TRPCError } from "@trpc/server";
import {
  createCallerFactory,
  createContext,
  authenticated,
  publicProcedure,
  router,
} from "./trpc.js";
import type { ApiServices } from "./services.js";

const services: ApiServices = {
  retrieval: { run: vi.fn() },
  passages: { getById: vi.fn(), getPassages: vi.fn() },
  circuitMetrics: () => ({}),
  poolStatus: () => ({
    totalConnections: 0,
    idleConnections: 0,
    waitingRequests: 0,
  }),
};

// Build a minimal tRPC caller to exercise the authenticated middleware
const testRouter = router({
  protected: publicProcedure.use(authenticated).query(() => "ok"),
});

function createCaller(apiKey?: string) {
  const ctx = createContext(
    services,
    apiKey
      ? {
          req: new Request("https://example.com", {
            headers: { "x-api-key": apiKey },
          }),
        }
      : undefined,
  );
  return createCallerFactory(testRouter)(ctx);
}

describe("createContext", () => {
  it("extracts x-api-key header", () => {
    const req = new Request("https://example.com", {
      headers: { "x-api-key": "test-key" },
    });
    const ctx = createContext(services, { req });
    expect(ctx.apiKey).toBe("test-key");
    expect(ctx.requestId).toBeDefined();
    expect(ctx.services).toBe(services);
  });

  it("sets apiKey to undefined when header is absent", () => {
    const ctx = createContext(services, {
      req: new Request("https://example.com"),
    });
    expect(ctx.apiKey).toBeUndefined();
  });

  it("uses the caller's x-request-id when present", () => {
    const ctx = createContext(services, {
      req: new Request("https://example.com", {
        headers: { "x-request-id": "req-42" },
      }),
    });
    expect(ctx.requestId).toBe("req-42");
  });

  it("carries the request's abort signal", () => {
    const controller = new AbortController();
    const req = new Request("https://example.com", {
      signal: controller.signal,
    });
    const ctx = createContext(services, { req });
    controller.abort();
    expect(ctx.signal?.aborted).toBe(true);
  });
});

describe("authenticated middleware", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  beforeEach(() => {
    vi.stubEnv("API_KEY", "test-secret");
  });

  it("passes through when no API key is configured (dev mode)", async () => {
    vi.stubEnv("API_KEY", "");

    const caller = createCaller();
    const result = await caller.protected();
    expect(result).toBe("ok");
  });

  it("passes through with correct API key when one is configured", async () => {
    const caller = createCaller("test-secret");
    const result = await caller.protected();
    expect(result).toBe("ok");
  });

  it("throws UNAUTHORIZED when API key is missing but one is required", async () => {
    const caller = createCaller(); // no key in request
    await expect(caller.protected()).rejects.toThrow(TRPCError);
    await expect(caller.protected()).rejects.toMatchObject({
      code: "UNAUTHORIZED",
      message: "Missing x-api-key header.",
    });
  });

  it("throws UNAUTHORIZED for an incorrect API key", async () => {
    const caller = createCaller("wrong-key");
    await expect(caller.protected()).rejects.toMatchObject({
      code: "UNAUTHORIZED",
      message: "Invalid API key.",
    });
  });
});
