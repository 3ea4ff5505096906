import { initTRPC, TRPCError } from "@trpc/server";
import superjson from "superjson";
import { getOptionalEnv } from "@docqa/shared";
import type { ApiServices } from "./services.js";

export interface Context {
  requestId: string;
  apiKey?: string | undefined;
  /** Fires when the client disconnects. */
  signal?: AbortSignal | undefined;
  services: ApiServices;
}

export function createContext(
  services: ApiServices,
  opts?: { req?: Request },
): Context {
  const requestId =
    opts?.req?.headers.get("x-request-id") ?? crypto.randomUUID();
  const apiKey = opts?.req?.headers.get("x-api-key") ?? undefined;
  return { requestId, apiKey, signal: opts?.req?.signal, services };
}

const t = initTRPC.context<Context>().create({
  transformer: superjson,
});

export const router = t.router;
export const publicProcedure = t.procedure;
export const middleware = t.middleware;
export const createCallerFactory = t.createCallerFactory;

/**
 * Validates the x-api-key header against `API_KEY`. When no key is
 * configured, auth is skipped so local dev works without extra setup.
 */
export const authenticated = middleware(async ({ ctx, next }) => {
  const configuredKey = getOptionalEnv("API_KEY", "");

  if (configuredKey === "") {
    return next();
  }

  if (!ctx.apiKey) {
    throw new TRPCError({
      code: "UNAUTHORIZED",
      message: "Missing x-api-key header.",
    });
  }

  if (ctx.apiKey !== configuredKey) {
    throw new TRPCError({
      code: "UNAUTHORIZED",
      message: "Invalid API key.",
    });
  }

  return next();
});

export const protectedProcedure = publicProcedure.use(authenticated);
